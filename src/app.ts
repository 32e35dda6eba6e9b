import express, { Express, NextFunction, Request, Response } from "express";
import { HarvesterService } from "./crawlers/harvester";
import { Database } from "./lib/db";
import { errorMessage } from "./lib/errors";
import { Logger } from "./lib/logger";
import { createHarvestRouter } from "./routes/harvestRoutes";

export function createApp(harvester: HarvesterService, database: Database, logger: Logger): Express {
  const app = express();
  app.use(express.json({ limit: "100kb" }));

  app.use((request: Request, response: Response, next: NextFunction) => {
    const started = Date.now();
    response.on("finish", () => {
      logger.info("http_request", {
        method: request.method,
        path: request.path,
        status_code: response.statusCode,
        duration_ms: Date.now() - started
      });
    });
    next();
  });

  app.use("/", createHarvestRouter(harvester, database, logger.child("routes")));

  app.use((error: unknown, _request: Request, response: Response, _next: NextFunction) => {
    logger.error("unhandled_error", { error });
    response.status(500).json({ error: errorMessage(error, "internal server error") });
  });

  return app;
}
