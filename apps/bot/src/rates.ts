/**
 * rates.ts
 *
 * Pulls the annual staking rate the ledger should pay from an external feed.
 *
 * Feed format (JSON):
 *   { "annualRatePercent": 12 }    — whole percent per year, 0..100
 */

import { z } from "zod";
import { MAX_ANNUAL_RATE_PERCENT } from "@stakeledger/ledger";
import { logger } from "./logger";

const RateFeedSchema = z.object({
  annualRatePercent: z.number().int().min(0).max(MAX_ANNUAL_RATE_PERCENT),
});

export type RateSource = () => Promise<number>;

/** Fetch the current rate from `url`. Throws on HTTP or format errors. */
export async function fetchAnnualRate(url: string): Promise<number> {
  const resp = await fetch(url);
  if (!resp.ok) {
    throw new Error(`Rate feed returned HTTP ${resp.status}`);
  }

  const parsed = RateFeedSchema.safeParse(await resp.json());
  if (!parsed.success) {
    throw new Error(`Rate feed payload rejected: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }

  logger.info(`Rate fetched — ${parsed.data.annualRatePercent}% per year`);
  return parsed.data.annualRatePercent;
}

/**
 * Estimate a whole-percent annual rate from rewards observed over one period.
 *
 *   rate = floor(periodRewards * periodsPerYear * 100 / totalStaked)
 *
 * Clamped to 0..MAX_ANNUAL_RATE_PERCENT so the result is always accepted by
 * `setAnnualRate`. Nothing staked yields 0.
 */
export function estimateAnnualRate(
  periodRewards: bigint,
  totalStaked: bigint,
  periodsPerYear = 52  // weekly observations
): number {
  if (totalStaked <= 0n || periodRewards <= 0n) return 0;
  const percent = (periodRewards * BigInt(periodsPerYear) * 100n) / totalStaked;
  const max = BigInt(MAX_ANNUAL_RATE_PERCENT);
  return Number(percent > max ? max : percent);
}

/** Bind a feed URL into a RateSource for the relayer. */
export function feedRateSource(url: string): RateSource {
  return () => fetchAnnualRate(url);
}
