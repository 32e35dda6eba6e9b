import { createApp } from "./app";
import { loadConfig, toHarvestSettings } from "./config";
import { HarvesterService, RunInProgressError } from "./crawlers/harvester";
import { Database } from "./lib/db";
import { Logger } from "./lib/logger";

const config = loadConfig();
const settings = toHarvestSettings(config);
const logger = new Logger("harvester.server", config.LOG_LEVEL);
const harvestLogger = new Logger("harvester.run", config.LOG_LEVEL);

const database = new Database(config.DATABASE_URL, new Logger("harvester.db", config.LOG_LEVEL));
const harvester = new HarvesterService(settings, database, harvestLogger);
const app = createApp(harvester, database, logger);

let schedule: NodeJS.Timeout | null = null;

function startScheduler(): void {
  if (config.HARVEST_INTERVAL_MINUTES <= 0) {
    return;
  }
  const intervalMs = Math.round(config.HARVEST_INTERVAL_MINUTES * 60_000);
  schedule = setInterval(() => {
    try {
      harvester.startRun("schedule");
    } catch (error) {
      if (error instanceof RunInProgressError) {
        logger.warn("scheduled_run_skipped", { run_id: error.runId });
        return;
      }
      logger.error("scheduled_run_failed", { error });
    }
  }, intervalMs);
}

async function main(): Promise<void> {
  await database.ensureSchema();

  const server = app.listen(config.PORT, () => {
    logger.info("server_started", {
      port: config.PORT,
      log_level: config.LOG_LEVEL,
      database: database.isEnabled() ? "enabled" : "disabled",
      categories: settings.categoryUrls.length,
      workers: settings.workers,
      page_size: settings.api.pageSize,
      delay_min_ms: settings.delayMinMs,
      delay_max_ms: settings.delayMaxMs,
      interval_minutes: config.HARVEST_INTERVAL_MINUTES
    });
    startScheduler();
  });

  const shutdown = async (): Promise<void> => {
    logger.info("shutdown_started");
    if (schedule) {
      clearInterval(schedule);
    }
    server.close();
    await harvester.stop();
    await database.close();
    logger.info("shutdown_completed");
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("shutdown_failed", { error });
      process.exitCode = 1;
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("startup_failed", { error });
  process.exitCode = 1;
  database.close().catch((closeError: unknown) => {
    logger.error("database_close_failed", { error: closeError });
  });
});
