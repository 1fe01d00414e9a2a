import { describe, it, expect } from "vitest";
import { assertPrincipal, isPrincipal } from "@stakeledger/ledger";
import { deployer, wallet1 } from "./helpers/accounts";

describe("principal", () => {
  it("accepts standard principals", () => {
    expect(isPrincipal(deployer)).toBe(true);
    expect(isPrincipal(wallet1)).toBe(true);
  });

  it("accepts contract principals", () => {
    expect(isPrincipal(`${deployer}.staking-ledger`)).toBe(true);
    expect(isPrincipal(`${deployer}.vault_v2`)).toBe(true);
  });

  it("rejects malformed addresses", () => {
    expect(isPrincipal("")).toBe(false);
    expect(isPrincipal("ST123")).toBe(false);
    expect(isPrincipal("0x52908400098527886E0F7030069857D2E4169EE7")).toBe(false);
  });

  it("rejects malformed contract names", () => {
    expect(isPrincipal(`${deployer}.`)).toBe(false);
    expect(isPrincipal(`${deployer}.1vault`)).toBe(false);
    expect(isPrincipal(`${deployer}.a.b`)).toBe(false);
    expect(isPrincipal(`${deployer}.${"x".repeat(41)}`)).toBe(false);
    expect(isPrincipal(`not-an-address.vault`)).toBe(false);
  });

  it("assertPrincipal names the role in its error", () => {
    expect(() => assertPrincipal("bad", "owner")).toThrow('Invalid owner principal: "bad"');
    expect(assertPrincipal(wallet1)).toBe(wallet1);
  });
});
