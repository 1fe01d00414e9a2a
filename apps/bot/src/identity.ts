/**
 * identity.ts
 *
 * Derives the principals the host runs as from the configured private key.
 * Uses @stacks/transactions v6 (getAddressFromPrivateKey, TransactionVersion).
 */

import { getAddressFromPrivateKey, TransactionVersion } from "@stacks/transactions";
import type { Principal } from "@stakeledger/types";

function getTxVersion(network: string): TransactionVersion {
  return network === "mainnet"
    ? TransactionVersion.Mainnet
    : TransactionVersion.Testnet;
}

/** Standard principal (`SP…` on mainnet, `ST…` elsewhere) of the owner key. */
export function getOwnerAddress(privateKey: string, network: string): Principal {
  return getAddressFromPrivateKey(privateKey, getTxVersion(network));
}

/** Contract principal that holds staked funds: "ST1ABC…XYZ.contract-name". */
export function custodyPrincipal(owner: Principal, contractName: string): Principal {
  return `${owner}.${contractName}`;
}
