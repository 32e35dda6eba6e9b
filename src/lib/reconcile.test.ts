import assert from "node:assert/strict";
import test from "node:test";
import { MemoryCatalogStore, productRecord } from "../testing/fakes";
import { createCapturingLogger } from "./logger";
import { latestByProductCode, reconcileSnapshot } from "./reconcile";

const RUN_ONE = new Date("2026-03-01T10:00:00.000Z");
const RUN_TWO = new Date("2026-03-02T10:00:00.000Z");

test("persisting the same record twice keeps one product and two observations", async () => {
  const store = new MemoryCatalogStore();
  const { logger } = createCapturingLogger();
  const record = productRecord("DD0004-001", { price: 4995 });

  await reconcileSnapshot(store, [record], { observedAt: RUN_ONE, logger });
  const second = await reconcileSnapshot(store, [record], { observedAt: RUN_TWO, logger });

  assert.deepEqual(second, {
    status: "committed",
    products: 1,
    observations: 1,
    observed_at: "2026-03-02T10:00:00.000Z"
  });
  assert.equal(store.products.size, 1);
  assert.deepEqual(
    store.priceHistory.map((row) => [row.product_code, row.price, row.observed_at.toISOString()]),
    [
      ["DD0004-001", 4995, "2026-03-01T10:00:00.000Z"],
      ["DD0004-001", 4995, "2026-03-02T10:00:00.000Z"]
    ]
  );
  assert.equal(store.products.get("DD0004-001")?.created_at.toISOString(), "2026-03-01T10:00:00.000Z");
});

test("a failing row rolls back the whole run", async () => {
  const store = new MemoryCatalogStore({ failOnPriceFor: "EE0005-002" });
  const { logger, lines } = createCapturingLogger();
  const snapshot = [productRecord("EE0005-001"), productRecord("EE0005-002"), productRecord("EE0005-003")];

  const outcome = await reconcileSnapshot(store, snapshot, { observedAt: RUN_ONE, logger });

  assert.deepEqual(outcome, {
    status: "failed",
    error: "price insert rejected for EE0005-002",
    product_code: "EE0005-002"
  });
  assert.equal(store.products.size, 0);
  assert.equal(store.priceHistory.length, 0);

  const rollback = lines.find((line) => line.message === "reconcile_rolled_back");
  assert.equal(rollback?.level, "error");
  assert.equal(rollback?.metadata?.product_code, "EE0005-002");
});

test("a failed run leaves earlier committed runs untouched", async () => {
  const store = new MemoryCatalogStore({ failOnUpsertFor: "FF0006-002" });
  const { logger } = createCapturingLogger();

  await reconcileSnapshot(store, [productRecord("FF0006-001")], { observedAt: RUN_ONE, logger });
  const outcome = await reconcileSnapshot(store, [productRecord("FF0006-001"), productRecord("FF0006-002")], {
    observedAt: RUN_TWO,
    logger
  });

  assert.equal(outcome.status, "failed");
  assert.deepEqual([...store.products.keys()], ["FF0006-001"]);
  assert.equal(store.priceHistory.length, 1);
});

test("an empty snapshot skips persistence entirely", async () => {
  const store = new MemoryCatalogStore();
  const { logger, lines } = createCapturingLogger();

  const outcome = await reconcileSnapshot(store, [], { observedAt: RUN_ONE, logger });

  assert.deepEqual(outcome, { status: "skipped" });
  assert.equal(store.transactions, 0);
  assert.deepEqual(lines.map((line) => [line.level, line.message]), [["warn", "reconcile_skipped_empty_snapshot"]]);
});

test("a disabled store is reported without writing", async () => {
  const store = new MemoryCatalogStore({ enabled: false });
  const { logger } = createCapturingLogger();
  const outcome = await reconcileSnapshot(store, [productRecord("GG0007-001")], { observedAt: RUN_ONE, logger });

  assert.deepEqual(outcome, { status: "disabled" });
  assert.equal(store.transactions, 0);
});

test("the last occurrence of a product decides its category", async () => {
  const store = new MemoryCatalogStore();
  const { logger } = createCapturingLogger();
  const snapshot = [
    productRecord("HH0008-001", { category: "mens shoes" }),
    productRecord("HH0008-002", { category: "mens shoes" }),
    productRecord("HH0008-001", { category: "womens shoes" })
  ];

  const outcome = await reconcileSnapshot(store, snapshot, { observedAt: RUN_ONE, logger });

  assert.deepEqual(outcome, {
    status: "committed",
    products: 2,
    observations: 3,
    observed_at: "2026-03-01T10:00:00.000Z"
  });
  assert.equal(store.products.get("HH0008-001")?.category, "womens shoes");
  assert.ok(store.priceHistory.every((row) => row.observed_at.getTime() === RUN_ONE.getTime()));
});

test("latestByProductCode orders products by their last occurrence", () => {
  const latest = latestByProductCode([productRecord("A"), productRecord("B"), productRecord("A", { title: "later" })]);
  assert.deepEqual([...latest.keys()], ["B", "A"]);
  assert.equal(latest.get("A")?.title, "later");
});
