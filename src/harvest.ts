import { loadConfig, toHarvestSettings } from "./config";
import { runHarvest } from "./crawlers/harvester";
import { Database } from "./lib/db";
import { Logger } from "./lib/logger";

/**
 * One harvest run, then exit. Category and persistence failures are reported
 * in the summary and never change the exit code.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = new Logger("harvester.run", config.LOG_LEVEL);
  const database = new Database(config.DATABASE_URL, new Logger("harvester.db", config.LOG_LEVEL));

  const controller = new AbortController();
  const abort = (): void => {
    logger.warn("harvest_interrupted");
    controller.abort();
  };
  process.once("SIGINT", abort);
  process.once("SIGTERM", abort);

  try {
    await database.ensureSchema();
    await runHarvest({
      settings: toHarvestSettings(config),
      store: database,
      logger,
      signal: controller.signal
    });
  } finally {
    process.off("SIGINT", abort);
    process.off("SIGTERM", abort);
    await database.close();
  }
}

main().catch((error: unknown) => {
  new Logger("harvester.run", process.env.LOG_LEVEL).error("harvest_aborted", { error });
  process.exitCode = 1;
});
