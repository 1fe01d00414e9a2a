/**
 * Staking ledger host v0.1.0
 *
 * Responsibilities:
 *   - Restore the ledger and token books from LEDGER_STATE_FILE (or start
 *     fresh with ANNUAL_RATE_PERCENT / COOLDOWN_DAYS).
 *   - Audit every committed operation and persist state after each one.
 *   - Relay the annual rate from RATE_FEED_URL, when configured.
 *
 * Usage:
 *   npm run dev -w @stakeledger/bot                 — start the host
 *   npm run dev -w @stakeledger/bot -- --rate 12    — start + set the rate to 12 %
 *   npm run dev -w @stakeledger/bot -- --cooldown-days 3
 *
 * Environment variables:
 *   OWNER_PRIVATE_KEY, STACKS_NETWORK, LEDGER_STATE_FILE,
 *   ANNUAL_RATE_PERCENT, COOLDOWN_DAYS, RATE_FEED_URL, RATE_INTERVAL_MS
 */

import { SECONDS_PER_DAY } from "@stakeledger/ledger";
import { config } from "./config";
import { custodyPrincipal, getOwnerAddress } from "./identity";
import { logger } from "./logger";
import { LedgerMonitor } from "./monitor";
import { feedRateSource } from "./rates";
import { RateRelayer } from "./relayer";
import { openLedger } from "./state";

async function main() {
  logger.info("Staking ledger host v0.1.0");
  logger.info(`Network: ${config.network} | State: ${config.stateFile}`);

  if (!config.ownerPrivateKey) {
    logger.error("OWNER_PRIVATE_KEY is not set. Exiting.");
    process.exit(1);
  }

  const owner = getOwnerAddress(config.ownerPrivateKey, config.network);
  const { ledger, restored, persist } = openLedger({
    stateFile: config.stateFile,
    owner,
    custody: custodyPrincipal(owner, config.tokens.custodyContract),
    baseSymbol: config.tokens.baseSymbol,
    rewardSymbol: config.tokens.rewardSymbol,
    parameters: config.ledger,
  });

  const { annualRatePercent, cooldownSeconds } = ledger.parameters();
  logger.info(
    `${restored ? "Restored" : "Created"} ledger — owner: ${ledger.owner() ?? "renounced"}, ` +
    `rate: ${annualRatePercent}%, cooldown: ${cooldownSeconds}s, participants: ${ledger.participants().length}`
  );
  if (!restored) persist();

  const monitor = new LedgerMonitor(ledger, persist);
  monitor.start();

  let relayer: RateRelayer | null = null;
  if (config.relayer.rateFeedUrl) {
    relayer = new RateRelayer({
      ledger,
      owner,
      source: feedRateSource(config.relayer.rateFeedUrl),
      intervalMs: config.relayer.rateIntervalMs,
    });
    relayer.start();
  } else {
    logger.info("RATE_FEED_URL not set; rate relayer disabled.");
  }

  // Optional: one-shot parameter changes from CLI arguments.
  // Example: npm run dev -w @stakeledger/bot -- --rate 12 --cooldown-days 3
  const rateArg = process.argv.indexOf("--rate");
  if (rateArg !== -1) {
    const rate = Number(process.argv[rateArg + 1]);
    logger.info(`CLI: setting annual rate to ${rate}%.`);
    await ledger.setAnnualRate(owner, rate);
  }

  const cooldownArg = process.argv.indexOf("--cooldown-days");
  if (cooldownArg !== -1) {
    const days = Number(process.argv[cooldownArg + 1]);
    logger.info(`CLI: setting cooldown to ${days} days.`);
    await ledger.setCooldown(owner, days * SECONDS_PER_DAY);
  }

  if (!relayer) {
    logger.info("Nothing left to run; exiting.");
    return;
  }

  // Graceful shutdown on SIGINT / SIGTERM
  const running = relayer;
  const shutdown = () => {
    running.stop();
    monitor.stop();
    persist();
    process.exit(0);
  };
  process.on("SIGINT",  shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  logger.error(`Fatal: ${err}`);
  process.exit(1);
});
