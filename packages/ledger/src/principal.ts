import { validateStacksAddress } from "@stacks/transactions";
import type { Principal } from "@stakeledger/types";
import { LedgerError } from "./errors";

// Clarity contract names: a letter, then letters, digits, '-' or '_'; at most 40 chars.
const CONTRACT_NAME = /^[a-zA-Z][a-zA-Z0-9_-]{0,39}$/;

/** Accepts a standard principal or `<address>.<contract-name>`. */
export function isPrincipal(value: string): boolean {
  const dot = value.indexOf(".");
  if (dot < 0) return validateStacksAddress(value);
  return validateStacksAddress(value.slice(0, dot)) && CONTRACT_NAME.test(value.slice(dot + 1));
}

export function assertPrincipal(value: string, role = "participant"): Principal {
  if (!isPrincipal(value)) {
    throw new LedgerError("INVALID_PRINCIPAL", `Invalid ${role} principal: "${value}"`);
  }
  return value;
}
