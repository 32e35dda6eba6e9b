import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_CATEGORY_URLS, parseConfig, toHarvestSettings } from "./config";

test("an empty environment yields the defaults", () => {
  const config = parseConfig({});

  assert.equal(config.PORT, 3002);
  assert.equal(config.DATABASE_URL, undefined);
  assert.equal(config.HARVEST_WORKERS, 16);
  assert.equal(config.HARVEST_PAGE_SIZE, 100);
  assert.equal(config.HARVEST_DELAY_MIN_MS, 1000);
  assert.equal(config.HARVEST_DELAY_MAX_MS, 3000);
  assert.equal(config.HARVEST_INTERVAL_MINUTES, 0);
  assert.equal(config.HARVEST_RUN_TIMEOUT_MS, undefined);
  assert.deepEqual(config.HARVEST_CATEGORY_URLS, DEFAULT_CATEGORY_URLS);
});

test("blank optional values count as unset", () => {
  const config = parseConfig({ DATABASE_URL: "  ", HARVEST_RUN_TIMEOUT_MS: "", HARVEST_CATEGORY_URLS: " " });

  assert.equal(config.DATABASE_URL, undefined);
  assert.equal(config.HARVEST_RUN_TIMEOUT_MS, undefined);
  assert.equal(config.HARVEST_CATEGORY_URLS.length, DEFAULT_CATEGORY_URLS.length);
});

test("category urls split on commas and whitespace", () => {
  const config = parseConfig({
    HARVEST_CATEGORY_URLS: "https://store.test/w/a-1, https://store.test/w/b-2\nhttps://store.test/w/c-3"
  });

  assert.deepEqual(config.HARVEST_CATEGORY_URLS, [
    "https://store.test/w/a-1",
    "https://store.test/w/b-2",
    "https://store.test/w/c-3"
  ]);
});

test("invalid values are rejected", () => {
  assert.throws(() => parseConfig({ HARVEST_CATEGORY_URLS: "not-a-url" }));
  assert.throws(() => parseConfig({ HARVEST_WORKERS: "0" }));
  assert.throws(() => parseConfig({ HARVEST_PAGE_SIZE: "500" }));
  assert.throws(
    () => parseConfig({ HARVEST_DELAY_MIN_MS: "4000", HARVEST_DELAY_MAX_MS: "2000" }),
    /HARVEST_DELAY_MIN_MS must not exceed HARVEST_DELAY_MAX_MS/
  );
});

test("toHarvestSettings maps the environment onto harvest settings", () => {
  const settings = toHarvestSettings(
    parseConfig({
      HARVEST_CATEGORY_URLS: "https://store.test/w/a-1",
      HARVEST_WORKERS: "4",
      HARVEST_PAGE_SIZE: "50",
      HARVEST_DELAY_MIN_MS: "0",
      HARVEST_DELAY_MAX_MS: "10",
      HARVEST_RUN_TIMEOUT_MS: "60000",
      CATALOG_API_BASE_URL: "https://api.store.test",
      CATALOG_CHANNEL_ID: "channel-1",
      REQUEST_RETRIES: "1"
    })
  );

  assert.deepEqual(settings, {
    categoryUrls: ["https://store.test/w/a-1"],
    workers: 4,
    api: {
      apiBaseUrl: "https://api.store.test",
      marketplace: "IN",
      language: "en-GB",
      channelId: "channel-1",
      pageSize: 50
    },
    delayMinMs: 0,
    delayMaxMs: 10,
    runTimeoutMs: 60000,
    timeoutMs: 15000,
    retries: 1,
    retryBaseDelayMs: 500,
    apiCallerId: "nike:dotcom:browse:wall.client:2.0",
    storefrontOrigin: "https://www.nike.com"
  });
});

test("no run deadline is set unless configured", () => {
  const settings = toHarvestSettings(parseConfig({}));
  assert.equal("runTimeoutMs" in settings, false);
});
