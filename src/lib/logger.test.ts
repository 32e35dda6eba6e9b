import assert from "node:assert/strict";
import test from "node:test";
import { createCapturingLogger, Logger, parseLogLevel } from "./logger";

test("parseLogLevel falls back to info for unknown input", () => {
  assert.equal(parseLogLevel(" WARN "), "warn");
  assert.equal(parseLogLevel("verbose"), "info");
  assert.equal(parseLogLevel(undefined), "info");
});

test("Logger drops events below the configured level", () => {
  const { logger, lines } = createCapturingLogger("harvester", "warn");
  logger.info("ignored");
  logger.warn("kept", { category: "mens shoes" });

  assert.equal(lines.length, 1);
  assert.equal(lines[0]?.message, "kept");
  assert.deepEqual(lines[0]?.metadata, { category: "mens shoes" });
});

test("child loggers extend the scope and share the sink", () => {
  const captured: string[] = [];
  const logger = new Logger("harvester", "debug", (_level, line) => captured.push(line));
  logger.child("http").debug("request_retry");

  assert.equal(captured.length, 1);
  const parsed: unknown = JSON.parse(captured[0] ?? "{}");
  assert.ok(parsed && typeof parsed === "object" && "scope" in parsed);
  assert.equal(parsed.scope, "harvester.http");
});

test("errors are serialized with name and message", () => {
  const { logger, lines } = createCapturingLogger();
  logger.error("category_fetch_failed", { error: new TypeError("boom") });

  const error = lines[0]?.metadata?.error;
  assert.ok(error && typeof error === "object" && "name" in error && "message" in error);
  assert.equal(error.name, "TypeError");
  assert.equal(error.message, "boom");
});
