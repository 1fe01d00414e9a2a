import { describe, it, expect, beforeEach } from "vitest";
import {
  MAX_COOLDOWN_SECONDS,
  MintingTokenBook,
  StakingLedger,
  TokenBook,
} from "@stakeledger/ledger";
import type { LedgerEvent } from "@stakeledger/types";
import { custody, deployer, rejection, wallet1, wallet2 } from "./helpers/accounts";

const DAY = 86_400;

let now: number;
let ledger: StakingLedger;
let baseToken: TokenBook;
let events: LedgerEvent[];

function setup() {
  now = 1_700_000_000;
  baseToken = new TokenBook("STAKE", custody);
  ledger = new StakingLedger({
    owner: deployer,
    parameters: { annualRatePercent: 12, cooldownSeconds: 7 * DAY },
    baseToken,
    rewardToken: new MintingTokenBook("RWD", custody),
    clock: () => now,
  });
  events = [];
  ledger.onAny((event) => events.push(event));
}

// -----------------------------------------------------------------------

describe("access-control", () => {
  beforeEach(() => setup());

  // =====================================================================
  // setAnnualRate
  // =====================================================================
  describe("setAnnualRate", () => {
    it("rejects non-owner caller", async () => {
      const err = await rejection(ledger.setAnnualRate(wallet1, 20));
      expect(err.code).toBe(100);
      expect(ledger.parameters().annualRatePercent).toBe(12);
    });

    it("rejects rate = 101", async () => {
      const err = await rejection(ledger.setAnnualRate(deployer, 101));
      expect(err.code).toBe(200);
      expect(ledger.parameters().annualRatePercent).toBe(12);
    });

    it("rejects fractional and negative rates", async () => {
      expect((await rejection(ledger.setAnnualRate(deployer, 12.5))).code).toBe(200);
      expect((await rejection(ledger.setAnnualRate(deployer, -1))).code).toBe(200);
      expect(ledger.parameters().annualRatePercent).toBe(12);
    });

    it("accepts the bounds 0 and 100", async () => {
      await ledger.setAnnualRate(deployer, 0);
      expect(ledger.parameters().annualRatePercent).toBe(0);
      await ledger.setAnnualRate(deployer, 100);
      expect(ledger.parameters().annualRatePercent).toBe(100);
    });

    it("emits AnnualRateUpdated with the previous value", async () => {
      await ledger.setAnnualRate(deployer, 20);
      expect(events).toEqual([{ type: "AnnualRateUpdated", previous: 12, next: 20 }]);
    });
  });

  // =====================================================================
  // setCooldown
  // =====================================================================
  describe("setCooldown", () => {
    it("rejects non-owner caller", async () => {
      const err = await rejection(ledger.setCooldown(wallet1, DAY));
      expect(err.code).toBe(100);
      expect(ledger.parameters().cooldownSeconds).toBe(7 * DAY);
    });

    it("rejects 366 days", async () => {
      const err = await rejection(ledger.setCooldown(deployer, 366 * DAY));
      expect(err.code).toBe(201);
      expect(ledger.parameters().cooldownSeconds).toBe(7 * DAY);
    });

    it("accepts 365 days and zero", async () => {
      await ledger.setCooldown(deployer, 365 * DAY);
      expect(ledger.parameters().cooldownSeconds).toBe(MAX_COOLDOWN_SECONDS);
      await ledger.setCooldown(deployer, 0);
      expect(ledger.parameters().cooldownSeconds).toBe(0);
    });

    it("emits CooldownUpdated", async () => {
      await ledger.setCooldown(deployer, DAY);
      expect(events).toEqual([{ type: "CooldownUpdated", previous: 7 * DAY, next: DAY }]);
    });
  });

  // =====================================================================
  // token services
  // =====================================================================
  describe("setBaseToken / setRewardToken", () => {
    it("rejects non-owner callers", async () => {
      const other = new TokenBook("ALT", custody);
      expect((await rejection(ledger.setBaseToken(wallet1, other))).code).toBe(100);
      expect((await rejection(ledger.setRewardToken(wallet1, new MintingTokenBook("ALT", custody)))).code).toBe(100);
    });

    it("later stakes draw from the new base token", async () => {
      const other = new TokenBook("ALT", custody);
      other.mint(wallet1, 500n);
      await ledger.setBaseToken(deployer, other);
      await ledger.stake(wallet1, 500n);

      expect(other.balanceOf(custody)).toBe(500n);
      expect(baseToken.balanceOf(custody)).toBe(0n);
    });

    it("claims mint from the new reward token", async () => {
      baseToken.mint(wallet1, 1_000_000n);
      await ledger.stake(wallet1, 1_000_000n);
      now += 365 * DAY;
      await ledger.applyClaim(wallet1);

      const next = new MintingTokenBook("RWD2", custody);
      await ledger.setRewardToken(deployer, next);
      now += 7 * DAY;
      await ledger.claim(wallet1);

      expect(next.balanceOf(wallet1)).toBe(120_000n);
      expect(events.map((e) => e.type)).toContain("RewardTokenUpdated");
    });
  });

  // =====================================================================
  // ownership
  // =====================================================================
  describe("transferOwnership", () => {
    it("rejects non-owner caller", async () => {
      const err = await rejection(ledger.transferOwnership(wallet1, wallet1));
      expect(err.code).toBe(100);
      expect(ledger.owner()).toBe(deployer);
    });

    it("rejects a malformed new owner", async () => {
      const err = await rejection(ledger.transferOwnership(deployer, "nobody"));
      expect(err.code).toBe(101);
      expect(ledger.owner()).toBe(deployer);
    });

    it("hands the privileged role over", async () => {
      await ledger.transferOwnership(deployer, wallet2);

      expect(ledger.owner()).toBe(wallet2);
      expect((await rejection(ledger.setAnnualRate(deployer, 5))).code).toBe(100);
      await ledger.setAnnualRate(wallet2, 5);
      expect(ledger.parameters().annualRatePercent).toBe(5);
    });

    it("accepts a contract principal", async () => {
      await ledger.transferOwnership(deployer, `${wallet2}.governor`);
      expect(ledger.owner()).toBe(`${wallet2}.governor`);
    });

    it("emits OwnershipTransferred", async () => {
      await ledger.transferOwnership(deployer, wallet2);
      expect(events).toEqual([
        { type: "OwnershipTransferred", previousOwner: deployer, newOwner: wallet2 },
      ]);
    });
  });

  describe("renounceOwnership", () => {
    it("rejects non-owner caller", async () => {
      const err = await rejection(ledger.renounceOwnership(wallet1));
      expect(err.code).toBe(100);
    });

    it("freezes every privileged setter", async () => {
      await ledger.renounceOwnership(deployer);

      expect(ledger.owner()).toBeNull();
      expect((await rejection(ledger.setAnnualRate(deployer, 5))).code).toBe(100);
      expect((await rejection(ledger.setCooldown(deployer, DAY))).code).toBe(100);
      expect((await rejection(ledger.transferOwnership(deployer, wallet1))).code).toBe(100);
      expect(events).toEqual([
        { type: "OwnershipTransferred", previousOwner: deployer, newOwner: null },
      ]);
    });

    it("leaves staking and claiming open", async () => {
      await ledger.renounceOwnership(deployer);
      baseToken.mint(wallet1, 1_000n);
      await ledger.stake(wallet1, 1_000n);
      expect(ledger.totalStaked()).toBe(1_000n);
    });
  });
});
