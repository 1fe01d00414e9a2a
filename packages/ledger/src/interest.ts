/**
 * interest.ts
 *
 * Simple (non-compounding) interest on a single position.
 *
 *   reward = amount × ratePercent × elapsed / 100 / SECONDS_PER_YEAR
 *
 * Each step is bigint floor division, applied in that order: the division by
 * 100 happens before the division by seconds-per-year, never as one combined
 * divisor. Truncation is per position; summing positions does not correct it.
 */

import type { Position } from "@stakeledger/types";

export const SECONDS_PER_DAY  = 86_400;
export const SECONDS_PER_YEAR = 365 * SECONDS_PER_DAY; // 31_536_000

const PERCENT = 100n;
const YEAR    = BigInt(SECONDS_PER_YEAR);

/** Seconds a position has been open at `now`. Never negative. */
export function elapsedSeconds(position: Position, now: number): bigint {
  return now > position.createdAt ? BigInt(now - position.createdAt) : 0n;
}

export function positionReward(amount: bigint, ratePercent: number, elapsed: bigint): bigint {
  return (amount * BigInt(ratePercent) * elapsed) / PERCENT / YEAR;
}

/** Sum of `amount` over every position. */
export function sumPrincipal(positions: readonly Position[]): bigint {
  return positions.reduce((sum, p) => sum + p.amount, 0n);
}

/** Sum of per-position rewards at the current rate. */
export function sumReward(positions: readonly Position[], ratePercent: number, now: number): bigint {
  return positions.reduce(
    (sum, p) => sum + positionReward(p.amount, ratePercent, elapsedSeconds(p, now)),
    0n
  );
}
