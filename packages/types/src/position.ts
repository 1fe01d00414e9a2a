// Types for per-participant deposit records

/**
 * A Stacks principal: standard (`ST…` / `SP…`) or contract
 * (`ST….contract-name`). Participants and the privileged owner are both
 * identified this way.
 */
export type Principal = string;

/**
 * One deposit made by `stake`. Immutable once recorded; consumed all at once
 * when the participant applies to claim.
 */
export interface Position {
  amount: bigint;      // base-token units, always > 0
  createdAt: number;   // unix seconds
}

