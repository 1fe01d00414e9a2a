import "dotenv/config";

const DAY_MS = 24 * 60 * 60 * 1000;

export const config = {
  // Selects the address version used to derive the owner principal.
  network: process.env.STACKS_NETWORK ?? "devnet",

  // Hex-encoded Stacks private key of the ledger owner. The owner is the only
  // identity allowed to change the rate, the cooldown or the token services.
  ownerPrivateKey: process.env.OWNER_PRIVATE_KEY ?? "",

  stateFile: process.env.LEDGER_STATE_FILE ?? "./ledger-state.json",

  ledger: {
    // Used only when no state file exists yet.
    annualRatePercent: Number(process.env.ANNUAL_RATE_PERCENT ?? "10"),
    cooldownSeconds:   Number(process.env.COOLDOWN_DAYS ?? "7") * (DAY_MS / 1000),
  },

  tokens: {
    baseSymbol:   process.env.BASE_TOKEN_SYMBOL ?? "STAKE",
    rewardSymbol: process.env.REWARD_TOKEN_SYMBOL ?? "RWD",
    // Custody account is `<owner>.<custodyContract>`.
    custodyContract: process.env.CUSTODY_CONTRACT ?? "staking-ledger",
  },

  relayer: {
    // JSON endpoint returning { "annualRatePercent": <0..100> }. Relayer is
    // disabled when empty.
    rateFeedUrl: process.env.RATE_FEED_URL ?? "",
    rateIntervalMs: Number(process.env.RATE_INTERVAL_MS ?? String(DAY_MS / 24)),
  },
} as const;
