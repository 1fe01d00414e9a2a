/**
 * relayer.ts
 *
 * Keeps the ledger's annual rate in line with an external rate source.
 *
 * Every tick the relayer reads the source and, if the value differs from
 * the ledger's current rate, pushes it with setAnnualRate as the owner. The
 * ledger applies the current rate retroactively to every unapplied position,
 * so each push reprices all open stakes; applied claims are already frozen
 * and are not affected.
 */

import type { StakingLedger } from "@stakeledger/ledger";
import type { Principal } from "@stakeledger/types";
import { logger } from "./logger";
import type { RateSource } from "./rates";

// -----------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------

export interface RateRelayerOptions {
  ledger: StakingLedger;
  /** Identity the relayer signs parameter changes as. Must be the ledger owner. */
  owner: Principal;
  source: RateSource;
  intervalMs: number;
}

// -----------------------------------------------------------------------
// RateRelayer
// -----------------------------------------------------------------------

export class RateRelayer {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: RateRelayerOptions) {}

  start(): void {
    logger.info(`Rate relayer starting — owner: ${this.options.owner}`);
    logger.info(`Rate interval: ${this.options.intervalMs / 60_000} min`);

    // Run immediately on start, then on a timer
    void this.runRateTick();
    this.timer = setInterval(() => void this.runRateTick(), this.options.intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    logger.info("Rate relayer stopped.");
  }

  /** One tick. Never rejects: failures are logged and the next tick retries. */
  async runRateTick(): Promise<void> {
    try {
      await this.pushRate();
    } catch (err) {
      logger.error(`Rate tick failed: ${err}`);
    }
  }

  /** Push the source's rate if it changed. Returns whether the ledger was updated. */
  async pushRate(): Promise<boolean> {
    const next = await this.options.source();
    const current = this.options.ledger.parameters().annualRatePercent;

    if (next === current) {
      logger.info(`Annual rate unchanged at ${current}%.`);
      return false;
    }

    await this.options.ledger.setAnnualRate(this.options.owner, next);
    logger.info(`Pushed annual rate: ${current}% → ${next}%`);
    return true;
  }
}
