/**
 * store.ts
 *
 * The ledger's persisted state surface: positions and pending claims per
 * participant, the parameters, the aggregate total and the owner.
 */

import type {
  LedgerParameters,
  LedgerSnapshot,
  PendingClaim,
  Position,
  Principal,
} from "@stakeledger/types";
import { validateParameters } from "./parameters";
import { assertPrincipal } from "./principal";
import type { Rollback, Transactional } from "./tokens";

export interface LedgerStore extends Transactional {
  positionsOf(participant: Principal): readonly Position[];
  appendPosition(participant: Principal, position: Position): void;
  clearPositions(participant: Principal): void;

  claimOf(participant: Principal): PendingClaim | undefined;
  setClaim(participant: Principal, claim: PendingClaim): void;
  deleteClaim(participant: Principal): void;

  totalStaked: bigint;
  parameters: LedgerParameters;
  owner: Principal | null;

  /** Every participant holding positions or a pending claim. */
  participants(): Principal[];

  toSnapshot(): LedgerSnapshot;
}

export class MemoryLedgerStore implements LedgerStore {
  private positions = new Map<Principal, Position[]>();
  private claims = new Map<Principal, PendingClaim>();

  totalStaked = 0n;

  constructor(
    public parameters: LedgerParameters,
    public owner: Principal | null
  ) {}

  positionsOf(participant: Principal): readonly Position[] {
    return this.positions.get(participant) ?? [];
  }

  appendPosition(participant: Principal, position: Position): void {
    const list = this.positions.get(participant);
    if (list) list.push(position);
    else this.positions.set(participant, [position]);
  }

  clearPositions(participant: Principal): void {
    this.positions.delete(participant);
  }

  claimOf(participant: Principal): PendingClaim | undefined {
    return this.claims.get(participant);
  }

  setClaim(participant: Principal, claim: PendingClaim): void {
    this.claims.set(participant, claim);
  }

  deleteClaim(participant: Principal): void {
    this.claims.delete(participant);
  }

  participants(): Principal[] {
    return [...new Set([...this.positions.keys(), ...this.claims.keys()])];
  }

  savepoint(): Rollback {
    // Position and claim objects are immutable; copying the containers is enough.
    const positions = new Map([...this.positions].map(([p, list]) => [p, [...list]]));
    const claims = new Map(this.claims);
    const { totalStaked, parameters, owner } = this;
    return () => {
      this.positions = positions;
      this.claims = claims;
      this.totalStaked = totalStaked;
      this.parameters = parameters;
      this.owner = owner;
    };
  }

  toSnapshot(): LedgerSnapshot {
    const snapshot: LedgerSnapshot = {
      version: 1,
      owner: this.owner,
      parameters: { ...this.parameters },
      totalStaked: this.totalStaked.toString(),
      positions: {},
      claims: {},
    };
    for (const [participant, list] of this.positions) {
      snapshot.positions[participant] = list.map((p) => ({
        amount: p.amount.toString(),
        createdAt: p.createdAt,
      }));
    }
    for (const [participant, claim] of this.claims) {
      snapshot.claims[participant] = {
        principal: claim.principal.toString(),
        reward: claim.reward.toString(),
        unlockAt: claim.unlockAt,
      };
    }
    return snapshot;
  }

  static fromSnapshot(snapshot: LedgerSnapshot): MemoryLedgerStore {
    if (snapshot.version !== 1) {
      throw new Error(`Unsupported ledger snapshot version: ${String(snapshot.version)}`);
    }
    const owner = snapshot.owner === null ? null : assertPrincipal(snapshot.owner, "owner");
    const store = new MemoryLedgerStore(validateParameters(snapshot.parameters), owner);
    let outstanding = 0n;
    for (const [participant, list] of Object.entries(snapshot.positions)) {
      for (const p of list) {
        const amount = BigInt(p.amount);
        if (amount <= 0n) {
          throw new Error(`Snapshot position of ${participant} has non-positive amount ${amount}`);
        }
        store.appendPosition(participant, { amount, createdAt: p.createdAt });
        outstanding += amount;
      }
    }
    for (const [participant, c] of Object.entries(snapshot.claims)) {
      const principal = BigInt(c.principal);
      if (principal <= 0n) {
        throw new Error(`Snapshot claim of ${participant} has non-positive principal ${principal}`);
      }
      store.setClaim(participant, { principal, reward: BigInt(c.reward), unlockAt: c.unlockAt });
      outstanding += principal;
    }

    // The aggregate must equal every open position plus every pending principal.
    const totalStaked = BigInt(snapshot.totalStaked);
    if (totalStaked !== outstanding) {
      throw new Error(`Snapshot total staked ${totalStaked} does not match outstanding principal ${outstanding}`);
    }
    store.totalStaked = totalStaked;
    return store;
  }
}
