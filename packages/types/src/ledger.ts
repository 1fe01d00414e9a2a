// Types for ledger-wide parameters, events and the persisted state surface

import type { Principal } from "./position";

/**
 * Process-wide parameters. Read at the moment of every accrual computation,
 * never captured when a position is opened.
 */
export interface LedgerParameters {
  annualRatePercent: number;  // integer, 0–100
  cooldownSeconds: number;    // integer, 0–31_536_000 (365 days)
}

export type LedgerEvent =
  | { type: "Staked"; participant: Principal; amount: bigint }
  | { type: "ClaimApplied"; participant: Principal; principal: bigint; reward: bigint }
  | { type: "Claimed"; participant: Principal; principal: bigint; reward: bigint }
  | { type: "OwnershipTransferred"; previousOwner: Principal | null; newOwner: Principal | null }
  | { type: "AnnualRateUpdated"; previous: number; next: number }
  | { type: "CooldownUpdated"; previous: number; next: number }
  | { type: "BaseTokenUpdated"; caller: Principal }
  | { type: "RewardTokenUpdated"; caller: Principal };

export type LedgerEventType = LedgerEvent["type"];

/** Narrow the event union to a single variant by its `type`. */
export type LedgerEventOf<T extends LedgerEventType> = Extract<LedgerEvent, { type: T }>;

/**
 * JSON-safe form of a position. bigint amounts travel as decimal strings.
 */
export interface PositionRecord {
  amount: string;
  createdAt: number;
}

export interface PendingClaimRecord {
  principal: string;
  reward: string;
  unlockAt: number;
}

/**
 * The durable schema of a ledger: everything needed to resume it.
 */
export interface LedgerSnapshot {
  version: 1;
  owner: Principal | null;
  parameters: LedgerParameters;
  totalStaked: string;
  positions: Record<Principal, PositionRecord[]>;
  claims: Record<Principal, PendingClaimRecord>;
}

