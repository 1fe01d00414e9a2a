import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { MintingTokenBook, StakingLedger, TokenBook } from "@stakeledger/ledger";
import { LedgerMonitor, describeEvent } from "../apps/bot/src/monitor";
import { custody, deployer, wallet1 } from "./helpers/accounts";

let ledger: StakingLedger;
let baseToken: TokenBook;

describe("ledger-monitor", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    baseToken = new TokenBook("STAKE", custody);
    baseToken.mint(wallet1, 1_000n);
    ledger = new StakingLedger({
      owner: deployer,
      baseToken,
      rewardToken: new MintingTokenBook("RWD", custody),
      clock: () => 1_700_000_000,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // =====================================================================
  // describeEvent
  // =====================================================================
  describe("describeEvent", () => {
    it("formats staking events", () => {
      expect(describeEvent({ type: "Staked", participant: "ST1", amount: 5n })).toBe("Staked — ST1: 5");
      expect(describeEvent({ type: "Claimed", participant: "ST1", principal: 5n, reward: 1n }))
        .toBe("Claimed — ST1: principal 5, reward 1");
    });

    it("formats a renounce as none", () => {
      expect(describeEvent({ type: "OwnershipTransferred", previousOwner: "ST1", newOwner: null }))
        .toBe("OwnershipTransferred — ST1 → none");
    });

    it("formats parameter changes with units", () => {
      expect(describeEvent({ type: "AnnualRateUpdated", previous: 0, next: 12 }))
        .toBe("AnnualRateUpdated — 0% → 12%");
      expect(describeEvent({ type: "CooldownUpdated", previous: 60, next: 120 }))
        .toBe("CooldownUpdated — 60s → 120s");
    });
  });

  // =====================================================================
  // LedgerMonitor
  // =====================================================================
  describe("LedgerMonitor", () => {
    it("persists after every committed operation", async () => {
      const persist = vi.fn();
      const monitor = new LedgerMonitor(ledger, persist);
      monitor.start();

      await ledger.stake(wallet1, 400n);
      await ledger.setAnnualRate(deployer, 10);
      expect(persist).toHaveBeenCalledTimes(2);
    });

    it("does not persist rejected operations", async () => {
      const persist = vi.fn();
      new LedgerMonitor(ledger, persist).start();

      await expect(ledger.stake(wallet1, 0n)).rejects.toMatchObject({ code: 205 });
      expect(persist).not.toHaveBeenCalled();
    });

    it("logs a persist failure without failing the operation", async () => {
      const monitor = new LedgerMonitor(ledger, () => {
        throw new Error("disk full");
      });
      monitor.start();

      await ledger.stake(wallet1, 400n);
      expect(ledger.totalStaked()).toBe(400n);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining("[LedgerMonitor] Persist after Staked failed: Error: disk full")
      );
    });

    it("still persists when another listener throws, and logs that failure", async () => {
      const persist = vi.fn();
      new LedgerMonitor(ledger, persist).start();
      ledger.on("Staked", () => {
        throw new Error("audit sink down");
      });

      await ledger.stake(wallet1, 400n);
      expect(persist).toHaveBeenCalledTimes(1);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringContaining("[LedgerMonitor] Listener for Staked failed: Error: audit sink down")
      );
    });

    it("stops listening after stop()", async () => {
      const persist = vi.fn();
      const monitor = new LedgerMonitor(ledger, persist);
      monitor.start();
      monitor.stop();

      await ledger.stake(wallet1, 400n);
      expect(persist).not.toHaveBeenCalled();
    });
  });
});
