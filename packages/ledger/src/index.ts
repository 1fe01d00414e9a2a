export { StakingLedger } from "./ledger";
export type { StakingLedgerOptions, ExistingStoreOptions, FreshStoreOptions } from "./ledger";
export { LedgerError, ErrorCode, isLedgerError } from "./errors";
export type { ErrorName } from "./errors";
export type { LedgerListener, ListenerErrorHandler } from "./events";
export {
  SECONDS_PER_DAY,
  SECONDS_PER_YEAR,
  elapsedSeconds,
  positionReward,
  sumPrincipal,
  sumReward,
} from "./interest";
export {
  DEFAULT_PARAMETERS,
  MAX_ANNUAL_RATE_PERCENT,
  MAX_COOLDOWN_SECONDS,
  validateAnnualRate,
  validateCooldown,
  validateParameters,
} from "./parameters";
export { isPrincipal, assertPrincipal } from "./principal";
export { MemoryLedgerStore } from "./store";
export type { LedgerStore } from "./store";
export { TokenBook, MintingTokenBook } from "./token-book";
export type { TokenBookSnapshot } from "./token-book";
export type { BaseTokenService, RewardIssuer, Rollback, Transactional } from "./tokens";
export { systemClock } from "./clock";
export type { Clock } from "./clock";
