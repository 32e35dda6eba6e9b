import { CatalogPage, ProductRecord } from "../types";
import { CategorySource } from "./category";
import { ParseError } from "./errors";
import { sleep } from "./http";
import { Logger } from "./logger";
import { normalizeCatalogPage, parseCatalogPage } from "./normalize";
import { HttpSession } from "./session";

export const MAX_PAGE_SIZE = 100;

export interface CatalogApiSettings {
  apiBaseUrl: string;
  marketplace: string;
  language: string;
  channelId: string;
  pageSize: number;
}

export interface PacingPolicy {
  nextDelayMs(): number;
}

export function randomPacing(minMs: number, maxMs: number, random: () => number = Math.random): PacingPolicy {
  const low = Math.max(0, Math.min(minMs, maxMs));
  const high = Math.max(low, maxMs);
  return {
    nextDelayMs: () => Math.round(low + random() * (high - low))
  };
}

export const noPacing: PacingPolicy = {
  nextDelayMs: () => 0
};

export interface FetchedPage {
  page: CatalogPage;
  url: string;
  /** Zero-based position in cursor order. */
  index: number;
  /** Derived from `totalResources`; informational only, never used to stop the loop. */
  totalPages: number | null;
}

export interface PageFetchOptions {
  api: CatalogApiSettings;
  pacing: PacingPolicy;
  signal?: AbortSignal;
}

export interface CategoryHarvest {
  records: ProductRecord[];
  pages: number;
  dropped: number;
}

function apiBase(api: CatalogApiSettings): string {
  return api.apiBaseUrl.replace(/\/+$/, "");
}

function effectivePageSize(api: CatalogApiSettings): number {
  return Math.max(1, Math.min(MAX_PAGE_SIZE, Math.floor(api.pageSize)));
}

export function buildCatalogUrl(api: CatalogApiSettings, identifier: string, path: string): string {
  const segments = [
    "discover",
    "product_wall",
    "v1",
    "marketplace",
    encodeURIComponent(api.marketplace),
    "language",
    encodeURIComponent(api.language),
    "consumerChannelId",
    encodeURIComponent(api.channelId)
  ];
  const url = new URL(`${apiBase(api)}/${segments.join("/")}`);
  url.searchParams.set("path", path);
  url.searchParams.set("attributeIds", identifier);
  url.searchParams.set("queryType", "PRODUCTS");
  url.searchParams.set("anchor", "0");
  url.searchParams.set("count", String(effectivePageSize(api)));
  return url.toString();
}

export function resolveNextUrl(api: CatalogApiSettings, next: string): string {
  if (/^https?:\/\//i.test(next)) {
    return next;
  }
  return `${apiBase(api)}${next.startsWith("/") ? "" : "/"}${next}`;
}

export function totalPageCount(totalResources: number | null | undefined, pageSize: number): number | null {
  if (typeof totalResources !== "number") {
    return null;
  }
  return Math.ceil(totalResources / Math.max(1, pageSize));
}

/**
 * Walks the catalog cursor chain one page at a time. The loop ends only when a
 * page carries no `next` reference.
 */
export async function* fetchCatalogPages(
  session: HttpSession,
  firstUrl: string,
  options: PageFetchOptions
): AsyncGenerator<FetchedPage> {
  const visited = new Set<string>();
  let url: string | null = firstUrl;
  let index = 0;

  while (url) {
    if (visited.has(url)) {
      throw new ParseError("catalog cursor points back to an already fetched page", url);
    }
    visited.add(url);

    if (index > 0) {
      await sleep(options.pacing.nextDelayMs(), options.signal);
    }

    const payload = await session.getJson(url, "api", options.signal);
    const page = parseCatalogPage(payload, url);
    yield {
      page,
      url,
      index,
      totalPages: totalPageCount(page.pages.totalResources, effectivePageSize(options.api))
    };

    const next = page.pages.next?.trim();
    url = next ? resolveNextUrl(options.api, next) : null;
    index += 1;
  }
}

export async function harvestCategory(
  session: HttpSession,
  source: CategorySource,
  identifier: string,
  options: PageFetchOptions & { logger: Logger }
): Promise<CategoryHarvest> {
  const records: ProductRecord[] = [];
  let pages = 0;
  let dropped = 0;

  const firstUrl = buildCatalogUrl(options.api, identifier, source.path);
  for await (const fetched of fetchCatalogPages(session, firstUrl, options)) {
    const normalized = normalizeCatalogPage(fetched.page, source.name);
    records.push(...normalized.records);
    dropped += normalized.dropped;
    pages += 1;

    options.logger.debug("category_page_fetched", {
      category: source.name,
      page: fetched.index + 1,
      total_pages: fetched.totalPages,
      page_records: normalized.records.length,
      page_dropped: normalized.dropped
    });
  }

  return { records, pages, dropped };
}
