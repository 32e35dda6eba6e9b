import { ParseError, TransportError } from "./errors";
import { FetchLike, fetchWithRetry, FetchRuntimeConfig } from "./http";
import { Logger } from "./logger";

export type RequestProfile = "page" | "api";

export interface SessionOptions {
  timeoutMs: number;
  retries: number;
  retryBaseDelayMs: number;
  apiCallerId: string;
  storefrontOrigin: string;
  fetchImpl?: FetchLike;
  random?: () => number;
  logger?: Logger;
}

const BROWSER_USER_AGENTS = [
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/132.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/132.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 14_5) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.5 Safari/605.1.15"
];

export function pickUserAgent(random: () => number = Math.random): string {
  const index = Math.min(BROWSER_USER_AGENTS.length - 1, Math.floor(random() * BROWSER_USER_AGENTS.length));
  return BROWSER_USER_AGENTS[index] ?? BROWSER_USER_AGENTS[0];
}

/**
 * One session per worker. Sessions are never shared so each worker keeps its
 * own user agent and connection state.
 */
export class HttpSession {
  readonly userAgent: string;
  private readonly runtime: FetchRuntimeConfig;

  constructor(private readonly options: SessionOptions) {
    this.userAgent = pickUserAgent(options.random);
    this.runtime = {
      timeoutMs: options.timeoutMs,
      userAgent: this.userAgent,
      retries: options.retries,
      retryBaseDelayMs: options.retryBaseDelayMs,
      fetchImpl: options.fetchImpl,
      random: options.random,
      logger: options.logger
    };
  }

  headersFor(profile: RequestProfile): Record<string, string> {
    if (profile === "page") {
      return {
        accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
        "accept-language": "en-US,en;q=0.9",
        "user-agent": this.userAgent
      };
    }

    const origin = this.options.storefrontOrigin.replace(/\/+$/, "");
    return {
      accept: "*/*",
      "accept-language": "en-US,en;q=0.9",
      "nike-api-caller-id": this.options.apiCallerId,
      origin,
      referer: `${origin}/`,
      "user-agent": this.userAgent
    };
  }

  async getText(url: string, profile: RequestProfile, signal?: AbortSignal): Promise<string> {
    const response = await fetchWithRetry(
      url,
      { method: "GET", redirect: "follow", headers: this.headersFor(profile), signal },
      this.runtime
    );
    try {
      return await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new TransportError("failed to read response body", url, response.status, { cause: error });
    }
  }

  async getJson(url: string, profile: RequestProfile, signal?: AbortSignal): Promise<unknown> {
    const body = await this.getText(url, profile, signal);
    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch (error) {
      throw new ParseError("response body is not valid JSON", url, { cause: error });
    }
  }
}

export type SessionFactory = () => HttpSession;

export function createSessionFactory(options: SessionOptions): SessionFactory {
  return () => new HttpSession(options);
}
