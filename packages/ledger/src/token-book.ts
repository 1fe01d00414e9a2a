/**
 * token-book.ts
 *
 * In-process fungible token balances. A TokenBook serves as the ledger's
 * base-token custody; a MintingTokenBook additionally mints, which makes it
 * a RewardIssuer.
 */

import type { Principal } from "@stakeledger/types";
import type { BaseTokenService, RewardIssuer, Rollback } from "./tokens";

export interface TokenBookSnapshot {
  symbol: string;
  totalSupply: string;
  balances: Record<Principal, string>;
}

export class TokenBook implements BaseTokenService {
  protected balances = new Map<Principal, bigint>();
  protected supply = 0n;

  /**
   * @param symbol  display symbol, used in error messages
   * @param custody account that holds staked funds on the ledger's behalf
   */
  constructor(
    readonly symbol: string,
    readonly custody: Principal
  ) {}

  balanceOf(holder: Principal): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  get totalSupply(): bigint {
    return this.supply;
  }

  /** Credit `amount` to `to` out of thin air. Funding helper for hosts and tests. */
  mint(to: Principal, amount: bigint): void {
    if (amount <= 0n) throw new Error(`${this.symbol}: mint amount must be positive`);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  transfer(from: Principal, to: Principal, amount: bigint): void {
    if (amount <= 0n) throw new Error(`${this.symbol}: transfer amount must be positive`);
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new Error(`${this.symbol}: insufficient balance for ${from} (${available} < ${amount})`);
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  async transferIn(from: Principal, amount: bigint): Promise<void> {
    this.transfer(from, this.custody, amount);
  }

  async transferOut(to: Principal, amount: bigint): Promise<void> {
    this.transfer(this.custody, to, amount);
  }

  savepoint(): Rollback {
    const balances = new Map(this.balances);
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.supply = supply;
    };
  }

  toSnapshot(): TokenBookSnapshot {
    const balances: Record<Principal, string> = {};
    for (const [holder, amount] of this.balances) {
      if (amount > 0n) balances[holder] = amount.toString();
    }
    return { symbol: this.symbol, totalSupply: this.supply.toString(), balances };
  }

  restore(snapshot: TokenBookSnapshot): void {
    if (snapshot.symbol !== this.symbol) {
      throw new Error(`Snapshot is for ${snapshot.symbol}, not ${this.symbol}`);
    }
    this.balances = new Map(
      Object.entries(snapshot.balances).map(([holder, amount]) => [holder, BigInt(amount)])
    );
    this.supply = BigInt(snapshot.totalSupply);
  }
}

export class MintingTokenBook extends TokenBook implements RewardIssuer {
  async issue(to: Principal, amount: bigint): Promise<void> {
    this.mint(to, amount);
  }
}
