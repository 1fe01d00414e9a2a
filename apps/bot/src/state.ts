/**
 * state.ts
 *
 * Persists the ledger and both token books to one JSON file and rebuilds
 * them on start. Writes go to a temporary file first and are renamed into
 * place, so a crash mid-write leaves the previous state intact.
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { z } from "zod";
import {
  MemoryLedgerStore,
  MintingTokenBook,
  StakingLedger,
  TokenBook,
  type Clock,
  type TokenBookSnapshot,
} from "@stakeledger/ledger";
import type { LedgerParameters, LedgerSnapshot, Principal } from "@stakeledger/types";

// -----------------------------------------------------------------------
// Schema
// -----------------------------------------------------------------------

const Amount = z.string().regex(/^\d+$/, "expected a non-negative integer string");
const PositiveAmount = z.string().regex(/^[1-9]\d*$/, "expected a positive integer string");
const Seconds = z.number().int().nonnegative();

const LedgerSnapshotSchema: z.ZodType<LedgerSnapshot> = z.object({
  version: z.literal(1),
  owner: z.string().nullable(),
  parameters: z.object({
    annualRatePercent: z.number().int(),
    cooldownSeconds: Seconds,
  }),
  totalStaked: Amount,
  positions: z.record(z.string(), z.array(z.object({ amount: PositiveAmount, createdAt: Seconds }))),
  claims: z.record(z.string(), z.object({ principal: PositiveAmount, reward: Amount, unlockAt: Seconds })),
});

const TokenBookSnapshotSchema: z.ZodType<TokenBookSnapshot> = z.object({
  symbol: z.string(),
  totalSupply: Amount,
  balances: z.record(z.string(), Amount),
});

const PersistedStateSchema = z.object({
  ledger: LedgerSnapshotSchema,
  baseToken: TokenBookSnapshotSchema,
  rewardToken: TokenBookSnapshotSchema,
});

export type PersistedState = z.infer<typeof PersistedStateSchema>;

// -----------------------------------------------------------------------
// File I/O
// -----------------------------------------------------------------------

/** Read persisted state, or null when the file does not exist yet. */
export function loadState(path: string): PersistedState | null {
  if (!existsSync(path)) return null;

  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  const parsed = PersistedStateSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid state file ${path}: ${issue?.path.join(".")} ${issue?.message}`);
  }
  return parsed.data;
}

export function saveState(path: string, state: PersistedState): void {
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, JSON.stringify(state, null, 2) + "\n");
  renameSync(tmp, path);
}

// -----------------------------------------------------------------------
// Ledger assembly
// -----------------------------------------------------------------------

export interface OpenLedgerOptions {
  stateFile: string;
  /** Owner of a brand-new ledger. A restored ledger keeps its persisted owner. */
  owner: Principal;
  custody: Principal;
  baseSymbol: string;
  rewardSymbol: string;
  /** Parameters for a brand-new ledger. Ignored when state is restored. */
  parameters: LedgerParameters;
  clock?: Clock;
}

export interface OpenedLedger {
  ledger: StakingLedger;
  baseToken: TokenBook;
  rewardToken: MintingTokenBook;
  restored: boolean;
  /** Write the current ledger and balances to the state file. */
  persist(): void;
}

export function openLedger(options: OpenLedgerOptions): OpenedLedger {
  const baseToken = new TokenBook(options.baseSymbol, options.custody);
  const rewardToken = new MintingTokenBook(options.rewardSymbol, options.custody);
  const state = loadState(options.stateFile);

  let ledger: StakingLedger;
  if (state) {
    baseToken.restore(state.baseToken);
    rewardToken.restore(state.rewardToken);
    ledger = new StakingLedger({
      store: MemoryLedgerStore.fromSnapshot(state.ledger),
      baseToken,
      rewardToken,
      clock: options.clock,
    });
  } else {
    ledger = new StakingLedger({
      owner: options.owner,
      parameters: options.parameters,
      baseToken,
      rewardToken,
      clock: options.clock,
    });
  }

  return {
    ledger,
    baseToken,
    rewardToken,
    restored: state !== null,
    persist: () =>
      saveState(options.stateFile, {
        ledger: ledger.snapshot(),
        baseToken: baseToken.toSnapshot(),
        rewardToken: rewardToken.toSnapshot(),
      }),
  };
}
