export type HarvestErrorKind = "transport" | "parse" | "persistence";

export const RETRYABLE_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

export abstract class HarvestError extends Error {
  abstract readonly kind: HarvestErrorKind;

  constructor(message: string, readonly context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransportError extends HarvestError {
  readonly kind = "transport";

  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, { url, ...(status !== undefined ? { status } : {}) }, options);
  }

  get retryable(): boolean {
    if (this.status === undefined) {
      return true;
    }
    return RETRYABLE_STATUSES.has(this.status);
  }
}

export class ParseError extends HarvestError {
  readonly kind = "parse";

  constructor(message: string, readonly url?: string, options?: { cause?: unknown }) {
    super(message, url ? { url } : {}, options);
  }
}

export class PersistenceError extends HarvestError {
  readonly kind = "persistence";

  constructor(message: string, readonly productCode?: string, options?: { cause?: unknown }) {
    super(message, productCode ? { product_code: productCode } : {}, options);
  }
}

export function errorMessage(error: unknown, fallback = "unknown error"): string {
  return error instanceof Error ? error.message : fallback;
}
