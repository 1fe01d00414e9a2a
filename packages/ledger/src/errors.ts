/**
 * errors.ts
 *
 * Ledger rejections carry a numeric code in the same bands the on-chain
 * staking contracts use: 1xx identity, 2xx parameters and amounts,
 * 3xx claim flow, 4xx settlement.
 */

export const ErrorCode = {
  UNAUTHORIZED:      100,
  INVALID_PRINCIPAL: 101,
  INVALID_RATE:      200,
  INVALID_COOLDOWN:  201,
  INVALID_AMOUNT:    205,
  CLAIM_PENDING:     300,
  NO_STAKING:        301,
  NO_REWARDS:        302,
  NO_CLAIM:          303,
  CLAIM_TOO_EARLY:   304,
  TRANSFER_FAILED:   400,
  REENTRANT_CALL:    401,
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorName = keyof typeof ErrorCode;

export class LedgerError extends Error {
  readonly code: ErrorCode;
  readonly errorName: ErrorName;

  constructor(errorName: ErrorName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerError";
    this.errorName = errorName;
    this.code = ErrorCode[errorName];
  }
}

/** True when `err` is a LedgerError, optionally with the given name. */
export function isLedgerError(err: unknown, errorName?: ErrorName): err is LedgerError {
  return err instanceof LedgerError && (errorName === undefined || err.errorName === errorName);
}
