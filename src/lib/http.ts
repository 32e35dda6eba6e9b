import { setTimeout as delay } from "node:timers/promises";
import { errorMessage, TransportError } from "./errors";
import { Logger } from "./logger";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchRuntimeConfig {
  timeoutMs: number;
  userAgent: string;
  retries?: number;
  retryBaseDelayMs?: number;
  fetchImpl?: FetchLike;
  random?: () => number;
  logger?: Logger;
}

const DEFAULT_RETRY_BASE_DELAY_MS = 500;

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, signal ? { signal } : undefined);
}

/**
 * Full-jitter exponential backoff: a uniform draw in [0, base * 2^attempt).
 */
export function backoffDelayMs(attempt: number, baseDelayMs: number, random: () => number = Math.random): number {
  const ceiling = baseDelayMs * 2 ** attempt;
  return Math.floor(random() * ceiling);
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  runtime: FetchRuntimeConfig
): Promise<Response> {
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, runtime.timeoutMs);

  const upstream = init.signal ?? undefined;
  const forwardAbort = (): void => controller.abort();
  if (upstream?.aborted) {
    controller.abort();
  } else {
    upstream?.addEventListener("abort", forwardAbort, { once: true });
  }

  const headers = new Headers(init.headers);
  if (!headers.has("user-agent")) {
    headers.set("user-agent", runtime.userAgent);
  }

  const fetchImpl = runtime.fetchImpl ?? fetch;
  try {
    return await fetchImpl(url, {
      ...init,
      headers,
      signal: controller.signal
    });
  } catch (error) {
    // caller cancellation is not a transport fault
    if (upstream?.aborted) {
      throw error;
    }
    if (timedOut) {
      throw new TransportError(`request timed out after ${runtime.timeoutMs}ms`, url, undefined, { cause: error });
    }
    throw new TransportError(errorMessage(error, "request failed"), url, undefined, { cause: error });
  } finally {
    clearTimeout(timeout);
    upstream?.removeEventListener("abort", forwardAbort);
  }
}

/** Releases the connection behind a response whose body will not be read. */
async function discardBody(response: Response, logger: Logger | undefined): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger?.debug("response_body_discard_failed", { url: response.url, error: errorMessage(error) });
  }
}

export async function fetchWithRetry(
  url: string,
  init: RequestInit,
  runtime: FetchRuntimeConfig
): Promise<Response> {
  const retries = Math.max(0, runtime.retries ?? 0);
  const baseDelayMs = runtime.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
  const signal = init.signal ?? undefined;

  for (let attempt = 0; ; attempt += 1) {
    let failure: TransportError;
    try {
      const response = await fetchWithTimeout(url, init, runtime);
      if (response.ok) {
        return response;
      }
      failure = new TransportError(`unexpected status ${response.status}`, url, response.status);
      await discardBody(response, runtime.logger);
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      failure = error;
    }

    if (attempt >= retries || !failure.retryable) {
      throw failure;
    }

    const waitMs = backoffDelayMs(attempt, baseDelayMs, runtime.random);
    runtime.logger?.warn("request_retry", {
      url,
      attempt: attempt + 1,
      retries,
      status: failure.status,
      wait_ms: waitMs,
      error: failure.message
    });
    await sleep(waitMs, signal);
  }
}
