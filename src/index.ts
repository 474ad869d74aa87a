import { createAgentCapability } from "./agents/index.js";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { closeDb } from "./db/database.js";
import { logger, pruneOldLogs } from "./logging.js";
import { yahooMarketData } from "./market/yahoo.js";
import { createFundRunner } from "./pipeline/fund-runner.js";
import { startRestServer } from "./rest/server.js";
import { withTimeout } from "./retry.js";
import { createTradeService } from "./trades/service.js";
import { sqliteTradeStore } from "./trades/store.js";

const DRAIN_TIMEOUT_MS = 30_000;

async function main() {
  logger.info({ pid: process.pid, provider: config.agents.provider }, "hedge-desk starting");

  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  pruneOldLogs();

  const fundRunner = createFundRunner({
    agent: createAgentCapability(config.agents.provider),
    market: yahooMarketData,
    maxRetries: config.pipeline.maxRetries,
    maxWorkers: config.pipeline.maxWorkers,
  });
  const service = createTradeService({
    store: sqliteTradeStore,
    fundRunner,
    analyticsTtlMs: config.analytics.cacheTtlMs,
    analyticsDefaultDays: config.analytics.defaultDays,
  });

  const server = await startRestServer({ service, agentProvider: config.agents.provider });

  // Graceful shutdown: stop accepting requests, let running trades finish, then close the DB
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");
    server.close();
    try {
      await withTimeout(service.drain(), DRAIN_TIMEOUT_MS, "trade drain");
    } catch (e: unknown) {
      logger.warn({ err: e }, "Running trades did not finish before shutdown");
    }
    closeDb();
    process.exit(0);
  };
  process.on("SIGINT", () => { shutdown().catch((e) => logger.error({ err: e }, "Shutdown error")); });
  process.on("SIGTERM", () => { shutdown().catch((e) => logger.error({ err: e }, "Shutdown error")); });

  process.on("unhandledRejection", (reason) => {
    logger.error({ reason }, "Unhandled promise rejection");
  });
}

main().catch((err) => {
  logger.fatal({ err }, "Fatal error");
  process.exit(1);
});
