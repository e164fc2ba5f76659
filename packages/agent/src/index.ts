import { resolve } from "node:path";
import { loadConfig } from "./config.js";
import { log, setLogLevel } from "./logger.js";
import { formatWad } from "./fixed-point.js";
import { getErrorMessage } from "./errors.js";
import { loadPaperVenues } from "./venues/paper-markets.js";
import { createAgent } from "./agent.js";

const STATUS_LOG_MS = 60_000;

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const marketsFile = resolve(config.paperMarketsFile);
  const venues = loadPaperVenues(marketsFile, config.paperBalance);
  log.info("Paper venues loaded", { file: marketsFile, venues: venues.map((v) => v.name).join(",") });

  const scheduler = createAgent(config, venues);
  scheduler.start();

  const statusTimer = setInterval(() => {
    const status = scheduler.getStatus();
    log.info("Status", {
      activePairs: status.activePairs,
      quotesTracked: status.quotesTracked,
      tradesExecuted: status.tradesExecuted,
      crossPaused: status.crossPauseReason ?? false,
      hedgePaused: status.hedgePauseReason ?? false,
      openPositions: status.statistics.openPositions,
      committed: formatWad(status.statistics.committedCapital),
      realizedPnl: formatWad(status.statistics.realizedPnl),
    });
  }, STATUS_LOG_MS);

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info("Shutting down", { signal });
    clearInterval(statusTimer);
    try {
      await scheduler.stop();
      process.exit(0);
    } catch (err) {
      log.error("Shutdown failed", { error: getErrorMessage(err) });
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  log.error("Fatal error", { error: getErrorMessage(err) });
  process.exit(1);
});
