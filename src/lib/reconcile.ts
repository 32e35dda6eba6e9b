import { ProductRecord, Snapshot } from "../types";
import { CatalogStore } from "./db";
import { errorMessage, PersistenceError } from "./errors";
import { Logger } from "./logger";

export type ReconcileOutcome =
  | { status: "skipped" }
  | { status: "disabled" }
  | { status: "committed"; products: number; observations: number; observed_at: string }
  | { status: "failed"; error: string; product_code?: string };

export interface ReconcileOptions {
  observedAt: Date;
  logger: Logger;
}

/** Last occurrence wins, so a product seen in two categories keeps the later one. */
export function latestByProductCode(snapshot: Snapshot): Map<string, ProductRecord> {
  const latest = new Map<string, ProductRecord>();
  for (const record of snapshot) {
    latest.delete(record.product_code);
    latest.set(record.product_code, record);
  }
  return latest;
}

export async function reconcileSnapshot(
  store: CatalogStore,
  snapshot: Snapshot,
  options: ReconcileOptions
): Promise<ReconcileOutcome> {
  const { logger, observedAt } = options;

  if (snapshot.length === 0) {
    logger.warn("reconcile_skipped_empty_snapshot");
    return { status: "skipped" };
  }

  if (!store.isEnabled()) {
    logger.warn("reconcile_skipped_persistence_disabled", { snapshot_size: snapshot.length });
    return { status: "disabled" };
  }

  const products = latestByProductCode(snapshot);
  const cursor: { current?: ProductRecord } = {};

  try {
    await store.transaction(async (writer) => {
      for (const record of products.values()) {
        cursor.current = record;
        await writer.upsertProduct(record, observedAt);
      }
      for (const record of snapshot) {
        cursor.current = record;
        await writer.appendPriceObservation({
          product_code: record.product_code,
          price: record.price,
          observed_at: observedAt
        });
      }
      cursor.current = undefined;
    });
  } catch (error) {
    const failed = cursor.current;
    const productCode = (error instanceof PersistenceError ? error.productCode : undefined) ?? failed?.product_code;
    logger.error("reconcile_rolled_back", {
      error,
      product_code: productCode,
      record: failed
    });
    return {
      status: "failed",
      error: errorMessage(error, "persistence failed"),
      ...(productCode ? { product_code: productCode } : {})
    };
  }

  logger.info("reconcile_committed", {
    products: products.size,
    observations: snapshot.length,
    observed_at: observedAt.toISOString()
  });
  return {
    status: "committed",
    products: products.size,
    observations: snapshot.length,
    observed_at: observedAt.toISOString()
  };
}
