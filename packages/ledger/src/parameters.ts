import type { LedgerParameters } from "@stakeledger/types";
import { LedgerError } from "./errors";
import { SECONDS_PER_DAY, SECONDS_PER_YEAR } from "./interest";

export const MAX_ANNUAL_RATE_PERCENT = 100;
export const MAX_COOLDOWN_SECONDS    = SECONDS_PER_YEAR; // 365 days

export const DEFAULT_PARAMETERS: LedgerParameters = {
  annualRatePercent: 0,
  cooldownSeconds:   7 * SECONDS_PER_DAY,
};

export function validateAnnualRate(rate: number): number {
  if (!Number.isInteger(rate) || rate < 0 || rate > MAX_ANNUAL_RATE_PERCENT) {
    throw new LedgerError("INVALID_RATE", `Annual rate must be an integer in 0..${MAX_ANNUAL_RATE_PERCENT}, got ${rate}`);
  }
  return rate;
}

export function validateCooldown(seconds: number): number {
  if (!Number.isInteger(seconds) || seconds < 0 || seconds > MAX_COOLDOWN_SECONDS) {
    throw new LedgerError("INVALID_COOLDOWN", `Cooldown must be an integer in 0..${MAX_COOLDOWN_SECONDS} seconds, got ${seconds}`);
  }
  return seconds;
}

export function validateParameters(params: LedgerParameters): LedgerParameters {
  return {
    annualRatePercent: validateAnnualRate(params.annualRatePercent),
    cooldownSeconds:   validateCooldown(params.cooldownSeconds),
  };
}
