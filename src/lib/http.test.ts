import assert from "node:assert/strict";
import test from "node:test";
import { TransportError } from "./errors";
import { backoffDelayMs, FetchLike, fetchWithRetry, fetchWithTimeout } from "./http";

const runtime = { timeoutMs: 1000, userAgent: "test-agent", retryBaseDelayMs: 0 };

test("backoffDelayMs draws below the doubled ceiling", () => {
  assert.equal(backoffDelayMs(0, 500, () => 0.5), 250);
  assert.equal(backoffDelayMs(2, 500, () => 0.5), 1000);
  assert.equal(backoffDelayMs(3, 500, () => 0), 0);
});

test("fetchWithTimeout sets the default user agent", async () => {
  let seen: string | null = null;
  const fetchImpl: FetchLike = async (_url, init) => {
    seen = new Headers(init.headers).get("user-agent");
    return new Response("ok");
  };
  await fetchWithTimeout("https://store.test/", { method: "GET" }, { ...runtime, fetchImpl });
  assert.equal(seen, "test-agent");
});

test("fetchWithTimeout wraps network failures as TransportError", async () => {
  const fetchImpl: FetchLike = async () => {
    throw new TypeError("fetch failed");
  };
  await assert.rejects(
    fetchWithTimeout("https://store.test/", { method: "GET" }, { ...runtime, fetchImpl }),
    (error: unknown) => error instanceof TransportError && error.url === "https://store.test/" && error.status === undefined
  );
});

test("fetchWithRetry retries retryable statuses until success", async () => {
  let calls = 0;
  const fetchImpl: FetchLike = async () => {
    calls += 1;
    return calls < 3 ? new Response("busy", { status: 503 }) : new Response("ok");
  };
  const response = await fetchWithRetry("https://store.test/", { method: "GET" }, { ...runtime, retries: 2, fetchImpl });
  assert.equal(await response.text(), "ok");
  assert.equal(calls, 3);
});

test("fetchWithRetry gives up after the retry budget", async () => {
  let calls = 0;
  const fetchImpl: FetchLike = async () => {
    calls += 1;
    return new Response("busy", { status: 429 });
  };
  await assert.rejects(
    fetchWithRetry("https://store.test/", { method: "GET" }, { ...runtime, retries: 1, fetchImpl }),
    (error: unknown) => error instanceof TransportError && error.status === 429
  );
  assert.equal(calls, 2);
});

test("fetchWithRetry does not retry client errors", async () => {
  let calls = 0;
  const fetchImpl: FetchLike = async () => {
    calls += 1;
    return new Response("missing", { status: 404 });
  };
  await assert.rejects(
    fetchWithRetry("https://store.test/", { method: "GET" }, { ...runtime, retries: 3, fetchImpl }),
    (error: unknown) => error instanceof TransportError && error.status === 404
  );
  assert.equal(calls, 1);
});

test("fetchWithRetry passes caller aborts through without retrying", async () => {
  const controller = new AbortController();
  let calls = 0;
  const fetchImpl: FetchLike = async () => {
    calls += 1;
    controller.abort();
    const aborted = new Error("aborted");
    aborted.name = "AbortError";
    throw aborted;
  };
  await assert.rejects(
    fetchWithRetry("https://store.test/", { method: "GET", signal: controller.signal }, { ...runtime, retries: 3, fetchImpl }),
    (error: unknown) => error instanceof Error && error.name === "AbortError"
  );
  assert.equal(calls, 1);
});

test("fetchWithRetry releases the body of every rejected response", async () => {
  const responses: Response[] = [];
  const fetchImpl: FetchLike = async () => {
    const response = new Response("temporarily unavailable", { status: 503 });
    responses.push(response);
    return response;
  };

  await assert.rejects(
    fetchWithRetry("https://store.test/", { method: "GET" }, { ...runtime, retries: 1, fetchImpl }),
    TransportError
  );
  assert.equal(responses.length, 2);
  assert.deepEqual(
    responses.map((response) => response.bodyUsed),
    [true, true]
  );
});
