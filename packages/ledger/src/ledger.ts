/**
 * ledger.ts
 *
 * The staking ledger. Participants stake the base token, accrue simple
 * interest at the current annual rate, and withdraw in two phases:
 *
 *  1. applyClaim: freezes principal and reward into a single pending claim,
 *     clears the participant's positions and starts the cooldown.
 *
 *  2. claim: after the cooldown, deletes the pending claim, returns the
 *     principal from custody and issues the reward token.
 *
 * Mutating operations run one at a time, in call order. Each one is
 * all-or-nothing: the store and both token collaborators are rolled back to
 * their savepoints if any step throws, and events are only published once
 * the operation has committed. Destructive state changes always happen
 * before funds move, so a collaborator that reads the ledger mid-transfer
 * already sees the post-operation books.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type {
  ClaimStatus,
  LedgerEvent,
  LedgerEventType,
  LedgerParameters,
  LedgerSnapshot,
  PendingClaim,
  Position,
  Principal,
  RewardView,
} from "@stakeledger/types";
import { systemClock, type Clock } from "./clock";
import { LedgerError } from "./errors";
import { LedgerEvents, type LedgerListener, type ListenerErrorHandler } from "./events";
import { sumPrincipal, sumReward } from "./interest";
import { DEFAULT_PARAMETERS, validateAnnualRate, validateCooldown, validateParameters } from "./parameters";
import { assertPrincipal } from "./principal";
import { MemoryLedgerStore, type LedgerStore } from "./store";
import type { BaseTokenService, RewardIssuer } from "./tokens";

// -----------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------

/** Start from an existing store (e.g. one restored from a snapshot)… */
export interface ExistingStoreOptions {
  store: LedgerStore;
}

/** …or from a fresh in-memory store. */
export interface FreshStoreOptions {
  owner: Principal;
  parameters?: Partial<LedgerParameters>;
}

export type StakingLedgerOptions = (ExistingStoreOptions | FreshStoreOptions) & {
  baseToken: BaseTokenService;
  rewardToken: RewardIssuer;
  clock?: Clock;
};

type Publish = (event: LedgerEvent) => void;

// -----------------------------------------------------------------------
// StakingLedger
// -----------------------------------------------------------------------

export class StakingLedger {
  private readonly store: LedgerStore;
  private readonly clock: Clock;
  private readonly events = new LedgerEvents();
  private baseToken: BaseTokenService;
  private rewardToken: RewardIssuer;

  private tail: Promise<unknown> = Promise.resolve();
  private readonly running = new AsyncLocalStorage<string>();

  constructor(options: StakingLedgerOptions) {
    this.store = "store" in options
      ? options.store
      : new MemoryLedgerStore(
          validateParameters({ ...DEFAULT_PARAMETERS, ...options.parameters }),
          assertPrincipal(options.owner, "owner")
        );
    this.baseToken = options.baseToken;
    this.rewardToken = options.rewardToken;
    this.clock = options.clock ?? systemClock;
  }

  // -----------------------------------------------------------------------
  // Public: staking flow
  // -----------------------------------------------------------------------

  /** Move `amount` of the base token into custody and open a position. */
  stake(participant: Principal, amount: bigint): Promise<void> {
    return this.run("stake", async (publish) => {
      assertPrincipal(participant);
      if (amount <= 0n) {
        throw new LedgerError("INVALID_AMOUNT", `Stake amount must be positive, got ${amount}`);
      }

      try {
        await this.baseToken.transferIn(participant, amount);
      } catch (err) {
        throw new LedgerError("TRANSFER_FAILED", `Base-token transfer from ${participant} failed`, { cause: err });
      }

      this.store.appendPosition(participant, { amount, createdAt: this.clock() });
      this.store.totalStaked += amount;
      publish({ type: "Staked", participant, amount });
    });
  }

  /**
   * Freeze every open position into one pending claim. Principal and reward
   * are computed now, at the current rate, and do not change afterwards.
   * The aggregate total is left alone until the claim settles.
   */
  applyClaim(participant: Principal): Promise<PendingClaim> {
    return this.run("applyClaim", async (publish) => {
      if (this.store.claimOf(participant)) {
        throw new LedgerError("CLAIM_PENDING", `${participant} already has a pending claim`);
      }

      const principal = this.calculatePrincipal(participant);
      if (principal === 0n) throw new LedgerError("NO_STAKING", "no staking");

      const reward = this.calculateReward(participant);
      if (reward === 0n) throw new LedgerError("NO_REWARDS", "no rewards");

      const claim: PendingClaim = {
        principal,
        reward,
        unlockAt: this.clock() + this.store.parameters.cooldownSeconds,
      };
      this.store.setClaim(participant, claim);
      this.store.clearPositions(participant);

      publish({ type: "ClaimApplied", participant, principal, reward });
      return claim;
    });
  }

  /** Settle the pending claim once `unlockAt` has been reached. */
  claim(participant: Principal): Promise<PendingClaim> {
    return this.run("claim", async (publish) => {
      const pending = this.store.claimOf(participant);
      if (!pending || pending.principal === 0n) {
        throw new LedgerError("NO_CLAIM", `${participant} has no pending claim`);
      }
      if (this.clock() < pending.unlockAt) {
        throw new LedgerError("CLAIM_TOO_EARLY", "claim too early");
      }

      // Books first, funds second.
      this.store.deleteClaim(participant);
      this.store.totalStaked -= pending.principal;

      try {
        await this.baseToken.transferOut(participant, pending.principal);
      } catch (err) {
        throw new LedgerError("TRANSFER_FAILED", `Principal transfer to ${participant} failed`, { cause: err });
      }

      if (pending.reward > 0n) {
        try {
          await this.rewardToken.issue(participant, pending.reward);
        } catch (err) {
          throw new LedgerError("TRANSFER_FAILED", `Reward issuance to ${participant} failed`, { cause: err });
        }
      }

      publish({ type: "Claimed", participant, principal: pending.principal, reward: pending.reward });
      return pending;
    });
  }

  // -----------------------------------------------------------------------
  // Public: privileged parameters
  // -----------------------------------------------------------------------

  setAnnualRate(caller: Principal, annualRatePercent: number): Promise<void> {
    return this.run("setAnnualRate", async (publish) => {
      this.assertOwner(caller);
      const next = validateAnnualRate(annualRatePercent);
      const previous = this.store.parameters.annualRatePercent;
      this.store.parameters = { ...this.store.parameters, annualRatePercent: next };
      publish({ type: "AnnualRateUpdated", previous, next });
    });
  }

  setCooldown(caller: Principal, cooldownSeconds: number): Promise<void> {
    return this.run("setCooldown", async (publish) => {
      this.assertOwner(caller);
      const next = validateCooldown(cooldownSeconds);
      const previous = this.store.parameters.cooldownSeconds;
      this.store.parameters = { ...this.store.parameters, cooldownSeconds: next };
      publish({ type: "CooldownUpdated", previous, next });
    });
  }

  setBaseToken(caller: Principal, baseToken: BaseTokenService): Promise<void> {
    return this.run("setBaseToken", async (publish) => {
      this.assertOwner(caller);
      this.baseToken = baseToken;
      publish({ type: "BaseTokenUpdated", caller });
    });
  }

  setRewardToken(caller: Principal, rewardToken: RewardIssuer): Promise<void> {
    return this.run("setRewardToken", async (publish) => {
      this.assertOwner(caller);
      this.rewardToken = rewardToken;
      publish({ type: "RewardTokenUpdated", caller });
    });
  }

  transferOwnership(caller: Principal, newOwner: Principal): Promise<void> {
    return this.run("transferOwnership", async (publish) => {
      this.assertOwner(caller);
      assertPrincipal(newOwner, "owner");
      this.store.owner = newOwner;
      publish({ type: "OwnershipTransferred", previousOwner: caller, newOwner });
    });
  }

  /** Give up the privileged role for good. Parameters are frozen afterwards. */
  renounceOwnership(caller: Principal): Promise<void> {
    return this.run("renounceOwnership", async (publish) => {
      this.assertOwner(caller);
      this.store.owner = null;
      publish({ type: "OwnershipTransferred", previousOwner: caller, newOwner: null });
    });
  }

  // -----------------------------------------------------------------------
  // Public: read projections
  // -----------------------------------------------------------------------

  calculatePrincipal(participant: Principal): bigint {
    return sumPrincipal(this.store.positionsOf(participant));
  }

  calculateReward(participant: Principal): bigint {
    return sumReward(
      this.store.positionsOf(participant),
      this.store.parameters.annualRatePercent,
      this.clock()
    );
  }

  /** Unapplied principal plus the principal of any pending claim. */
  stakedTotal(participant: Principal): bigint {
    return this.calculatePrincipal(participant) + (this.store.claimOf(participant)?.principal ?? 0n);
  }

  rewardView(participant: Principal): RewardView {
    return {
      pending:  this.store.claimOf(participant)?.reward ?? 0n,
      accruing: this.calculateReward(participant),
    };
  }

  positionsOf(participant: Principal): Position[] {
    return [...this.store.positionsOf(participant)];
  }

  pendingClaimOf(participant: Principal): PendingClaim | undefined {
    const claim = this.store.claimOf(participant);
    return claim ? { ...claim } : undefined;
  }

  claimStatus(participant: Principal): ClaimStatus {
    const claim = this.store.claimOf(participant);
    if (claim) return this.clock() >= claim.unlockAt ? "unlocked" : "applied";
    return this.store.positionsOf(participant).length > 0 ? "staked" : "idle";
  }

  participants(): Principal[] {
    return this.store.participants();
  }

  totalStaked(): bigint {
    return this.store.totalStaked;
  }

  parameters(): LedgerParameters {
    return { ...this.store.parameters };
  }

  owner(): Principal | null {
    return this.store.owner;
  }

  snapshot(): LedgerSnapshot {
    return this.store.toSnapshot();
  }

  // -----------------------------------------------------------------------
  // Public: events
  // -----------------------------------------------------------------------

  on<T extends LedgerEventType>(type: T, listener: LedgerListener<T>): () => void {
    return this.events.on(type, listener);
  }

  onAny(listener: (event: LedgerEvent) => void): () => void {
    return this.events.onAny(listener);
  }

  /**
   * Listener failures never reach the operation's caller, which has already
   * committed. They are handed here instead.
   */
  onListenerError(handler: ListenerErrorHandler): () => void {
    return this.events.onListenerError(handler);
  }

  // -----------------------------------------------------------------------
  // Operation runner
  // -----------------------------------------------------------------------

  private assertOwner(caller: Principal): void {
    const owner = this.store.owner;
    if (owner === null || caller !== owner) {
      throw new LedgerError("UNAUTHORIZED", `${caller} is not the ledger owner`);
    }
  }

  /**
   * Queue `body` behind every earlier operation. A mutating call made from
   * inside a running operation (a token collaborator calling back in) is
   * rejected; waiting for the queue there would never finish.
   */
  private run<T>(name: string, body: (publish: Publish) => Promise<T>): Promise<T> {
    const outer = this.running.getStore();
    if (outer !== undefined) {
      return Promise.reject(
        new LedgerError("REENTRANT_CALL", `${name} called while ${outer} is in progress`)
      );
    }

    const result = this.tail.then(async () => {
      const { value, events } = await this.running.run(name, () => this.execute(body));
      for (const event of events) this.events.emit(event);
      return value;
    });
    // Failures reach the caller through `result`; the queue only keeps order.
    this.tail = result.catch(() => undefined);
    return result;
  }

  private async execute<T>(
    body: (publish: Publish) => Promise<T>
  ): Promise<{ value: T; events: LedgerEvent[] }> {
    const rollbacks = [
      this.store.savepoint(),
      this.baseToken.savepoint(),
      this.rewardToken.savepoint(),
    ];
    const events: LedgerEvent[] = [];

    try {
      const value = await body((event) => events.push(event));
      return { value, events };
    } catch (err) {
      for (const rollback of rollbacks.reverse()) rollback();
      throw err;
    }
  }
}
