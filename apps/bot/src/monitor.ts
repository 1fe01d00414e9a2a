import type { StakingLedger } from "@stakeledger/ledger";
import type { LedgerEvent } from "@stakeledger/types";
import { logger } from "./logger";

/** One-line audit description of a ledger event. */
export function describeEvent(event: LedgerEvent): string {
  switch (event.type) {
    case "Staked":
      return `Staked — ${event.participant}: ${event.amount}`;
    case "ClaimApplied":
      return `ClaimApplied — ${event.participant}: principal ${event.principal}, reward ${event.reward}`;
    case "Claimed":
      return `Claimed — ${event.participant}: principal ${event.principal}, reward ${event.reward}`;
    case "OwnershipTransferred":
      return `OwnershipTransferred — ${event.previousOwner ?? "none"} → ${event.newOwner ?? "none"}`;
    case "AnnualRateUpdated":
      return `AnnualRateUpdated — ${event.previous}% → ${event.next}%`;
    case "CooldownUpdated":
      return `CooldownUpdated — ${event.previous}s → ${event.next}s`;
    case "BaseTokenUpdated":
      return `BaseTokenUpdated — by ${event.caller}`;
    case "RewardTokenUpdated":
      return `RewardTokenUpdated — by ${event.caller}`;
  }
}

/**
 * Audits every committed ledger operation and persists state after each one.
 * Failures of any other ledger listener are logged here too.
 */
export class LedgerMonitor {
  private unsubscribe: (() => void)[] = [];

  constructor(
    private readonly ledger: StakingLedger,
    private readonly persist: () => void
  ) {}

  start(): void {
    this.unsubscribe = [
      this.ledger.onAny((event) => this.handle(event)),
      this.ledger.onListenerError((err, event) => {
        logger.error(`[LedgerMonitor] Listener for ${event.type} failed: ${err}`);
      }),
    ];
    logger.info(`[LedgerMonitor] Started. Total staked: ${this.ledger.totalStaked()}`);
  }

  stop(): void {
    for (const off of this.unsubscribe) off();
    this.unsubscribe = [];
  }

  private handle(event: LedgerEvent): void {
    logger.info(describeEvent(event));
    try {
      this.persist();
    } catch (err) {
      // The operation has already committed in memory; a later persist will
      // carry it to disk.
      logger.error(`[LedgerMonitor] Persist after ${event.type} failed: ${err}`);
    }
  }
}
