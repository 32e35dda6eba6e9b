import { Request, RequestHandler, Response, Router } from "express";
import { z } from "zod";
import { HarvesterService, RunInProgressError } from "../crawlers/harvester";
import { Database } from "../lib/db";
import { Logger } from "../lib/logger";

const productsQuerySchema = z.object({
  category: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(100),
  offset: z.coerce.number().int().nonnegative().default(0)
});

type AsyncHandler = (request: Request, response: Response) => Promise<void>;

function route(handler: AsyncHandler): RequestHandler {
  return (request, response, next) => {
    handler(request, response).catch(next);
  };
}

export function createHarvestRouter(harvester: HarvesterService, db: Database, logger: Logger): Router {
  const router = Router();

  router.get("/health", route(async (_request, response) => {
    const health = await harvester.health();
    logger.debug("health_requested", health);
    response.status(health.ok ? 200 : 503).json({ ...health, timestamp: new Date().toISOString() });
  }));

  router.post("/runs", (_request, response) => {
    try {
      const status = harvester.startRun("manual");
      logger.info("run_queued", { run_id: status.run_id, categories: status.metrics.categories_total });
      response.status(202).json(status);
    } catch (error) {
      if (error instanceof RunInProgressError) {
        logger.warn("run_rejected_in_progress", { run_id: error.runId });
        response.status(409).json({ error: error.message, run_id: error.runId });
        return;
      }
      throw error;
    }
  });

  router.get("/runs/current", (_request, response) => {
    const status = harvester.getStatus();
    if (!status) {
      response.status(404).json({ error: "no harvest run yet" });
      return;
    }
    response.json(status);
  });

  router.get("/products", route(async (request, response) => {
    const parsed = productsQuerySchema.safeParse(request.query ?? {});
    if (!parsed.success) {
      logger.warn("products_request_invalid", { errors: parsed.error.flatten() });
      response.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const products = await db.listProducts(parsed.data);
    logger.debug("products_listed", {
      category: parsed.data.category,
      returned_products: products.length,
      limit: parsed.data.limit,
      offset: parsed.data.offset
    });
    response.json({
      returned_products: products.length,
      limit: parsed.data.limit,
      offset: parsed.data.offset,
      products
    });
  }));

  router.get("/products/:productCode/prices", route(async (request, response) => {
    const product = await db.getProduct(request.params.productCode);
    if (!product) {
      response.status(404).json({ error: "product not found" });
      return;
    }
    const history = await db.listPriceHistory(product.product_code);
    response.json({ product, history });
  }));

  router.get("/categories", route(async (_request, response) => {
    const categories = await db.listCategories();
    response.json({ categories });
  }));

  return router;
}
