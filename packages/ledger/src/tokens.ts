/**
 * tokens.ts
 *
 * Collaborators the ledger moves funds through. Every one is Transactional:
 * the ledger takes a savepoint before an operation and calls the returned
 * rollback if any later step fails, so a claim either pays out in full or
 * leaves balances and books exactly as they were.
 */

import type { Principal } from "@stakeledger/types";

/** Undoes every effect recorded since the savepoint was taken. */
export type Rollback = () => void;

export interface Transactional {
  savepoint(): Rollback;
}

/** Base token held in custody by the ledger. Rejects on failure. */
export interface BaseTokenService extends Transactional {
  transferIn(from: Principal, amount: bigint): Promise<void>;
  transferOut(to: Principal, amount: bigint): Promise<void>;
}

/** Reward token, minted on claim rather than drawn from a pool. */
export interface RewardIssuer extends Transactional {
  issue(to: Principal, amount: bigint): Promise<void>;
}
