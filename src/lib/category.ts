import { ParseError } from "./errors";

export interface CategorySource {
  url: string;
  name: string;
  /** Storefront path without the leading slash, sent to the catalog API as `path`. */
  path: string;
}

function lastSegment(pathname: string): string {
  const segments = pathname.split("/").filter(Boolean);
  return segments[segments.length - 1] ?? "";
}

/**
 * Category wall slugs end in an opaque filter code (`mens-shoes-nik1zy7ok`),
 * which is dropped from the display name.
 */
export function categoryNameFromSlug(slug: string): string {
  const parts = slug.split("-").filter((part) => part.length > 0);
  const named = parts.slice(0, -1).join(" ");
  if (named.length > 0) {
    return named;
  }
  return parts.join(" ");
}

export function toCategorySource(entryUrl: string): CategorySource {
  let parsed: URL;
  try {
    parsed = new URL(entryUrl.trim());
  } catch (error) {
    throw new ParseError(`invalid category url: ${entryUrl}`, entryUrl, { cause: error });
  }

  const path = parsed.pathname.replace(/^\/+|\/+$/g, "");
  const name = categoryNameFromSlug(lastSegment(parsed.pathname));
  if (!path || !name) {
    throw new ParseError(`category url has no path: ${entryUrl}`, entryUrl);
  }

  return { url: parsed.toString(), name, path };
}
