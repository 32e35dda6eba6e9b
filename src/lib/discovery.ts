import { load } from "cheerio";
import { CategorySource } from "./category";
import { errorMessage } from "./errors";
import { Logger } from "./logger";
import { HttpSession } from "./session";

export const DEEPLINK_META_NAME = "branch:deeplink:$deeplink_path";
export const CATEGORY_ID_PARAM = "conceptid";

export type DiscoveryMissReason = "meta_tag_absent" | "param_absent" | "transport_error";

export type DiscoveryOutcome =
  | { status: "found"; identifier: string }
  | { status: "missing"; reason: DiscoveryMissReason };

function decodeDeeplink(content: string): string {
  if (content.includes("?") || !/%3f/i.test(content)) {
    return content;
  }
  try {
    return decodeURIComponent(content);
  } catch {
    return content;
  }
}

export function extractDeeplinkPath(html: string): string | null {
  const $ = load(html);
  const tag = $("meta")
    .filter((_, element) => $(element).attr("name") === DEEPLINK_META_NAME)
    .first();
  const content = tag.attr("content")?.trim();
  return content ? content : null;
}

export function extractCategoryIdentifier(deeplinkPath: string): string | null {
  const decoded = decodeDeeplink(deeplinkPath);
  const queryStart = decoded.indexOf("?");
  if (queryStart < 0) {
    return null;
  }
  const query = decoded.slice(queryStart + 1).split("#")[0] ?? "";
  const value = new URLSearchParams(query).get(CATEGORY_ID_PARAM)?.trim();
  return value ? value : null;
}

/**
 * Resolves the catalog identifier for one category landing page. Missing
 * markers and transport failures both come back as `missing`; only caller
 * cancellation propagates.
 */
export async function resolveCategoryIdentifier(
  session: HttpSession,
  source: CategorySource,
  logger: Logger,
  signal?: AbortSignal
): Promise<DiscoveryOutcome> {
  logger.debug("discovery_started", { url: source.url, category: source.name });

  let html: string;
  try {
    html = await session.getText(source.url, "page", signal);
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    logger.error("discovery_fetch_failed", {
      url: source.url,
      category: source.name,
      error: errorMessage(error)
    });
    return { status: "missing", reason: "transport_error" };
  }

  const deeplinkPath = extractDeeplinkPath(html);
  if (!deeplinkPath) {
    logger.warn("discovery_meta_tag_absent", { url: source.url, category: source.name });
    return { status: "missing", reason: "meta_tag_absent" };
  }

  const identifier = extractCategoryIdentifier(deeplinkPath);
  if (!identifier) {
    logger.warn("discovery_param_absent", {
      url: source.url,
      category: source.name,
      deeplink_path: deeplinkPath
    });
    return { status: "missing", reason: "param_absent" };
  }

  logger.debug("discovery_resolved", { url: source.url, category: source.name, identifier });
  return { status: "found", identifier };
}
