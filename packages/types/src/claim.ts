// Types for the two-phase withdrawal (apply-claim, then claim)

/**
 * Frozen snapshot written by apply-claim. At most one per participant;
 * deleted when claimed.
 */
export interface PendingClaim {
  principal: bigint;   // base-token units returned on claim
  reward: bigint;      // reward-token units issued on claim
  unlockAt: number;    // unix seconds; claimable when now >= unlockAt
}

/**
 * Rewards as two independent figures: `pending` is frozen in the pending
 * claim, `accruing` is recomputed live over unapplied positions.
 */
export interface RewardView {
  pending: bigint;
  accruing: bigint;
}

/**
 * Where a participant sits in the withdrawal flow.
 *
 *   idle: no positions, no claim
 *   staked: one or more positions, no claim
 *   applied: claim pending, cooldown running
 *   unlocked: claim pending, cooldown elapsed
 */
export type ClaimStatus = "idle" | "staked" | "applied" | "unlocked";
