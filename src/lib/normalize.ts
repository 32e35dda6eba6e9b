import { CatalogPage, CatalogPageSchema, CatalogProduct, CatalogProductSchema, ProductRecord } from "../types";
import { ParseError } from "./errors";

export interface NormalizedPage {
  records: ProductRecord[];
  /** Groupings whose representative product had no usable product code or an invalid shape. */
  dropped: number;
}

function asText(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }

  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }

  return null;
}

export function toPrice(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }

  const raw = asText(value);
  if (!raw) {
    return null;
  }

  const cleaned = raw.replace(/[^\d.,-]/g, "").replace(/,(?=\d{2}$)/, ".").replace(/,/g, "");
  if (!cleaned) {
    return null;
  }

  const parsed = Number.parseFloat(cleaned);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : null;
}

export function parseCatalogPage(payload: unknown, url?: string): CatalogPage {
  const parsed = CatalogPageSchema.safeParse(payload);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ParseError(`catalog page is malformed: ${detail}`, url);
  }
  return parsed.data;
}

/**
 * Flattens one catalog product into the persisted column set. Returns null when
 * the product has no product code; every other field falls back to null.
 */
export function normalizeCatalogProduct(product: CatalogProduct, category: string): ProductRecord | null {
  const productCode = asText(product.productCode);
  if (!productCode) {
    return null;
  }

  return {
    product_code: productCode,
    title: asText(product.copy?.title),
    subtitle: asText(product.copy?.subTitle),
    category,
    image_url: asText(product.colorwayImages?.portraitURL),
    url: asText(product.pdpUrl?.url),
    price: toPrice(product.prices?.currentPrice),
    currency: asText(product.prices?.currency)
  };
}

export function normalizeCatalogPage(page: CatalogPage, category: string): NormalizedPage {
  const records: ProductRecord[] = [];
  let dropped = 0;

  for (const grouping of page.productGroupings ?? []) {
    // Only the first product of a grouping is kept: it is the colorway the wall displays.
    const representative = grouping.products?.[0];
    if (representative === undefined || representative === null) {
      continue;
    }

    const parsed = CatalogProductSchema.safeParse(representative);
    if (!parsed.success) {
      dropped += 1;
      continue;
    }

    const record = normalizeCatalogProduct(parsed.data, category);
    if (!record) {
      dropped += 1;
      continue;
    }
    records.push(record);
  }

  return { records, dropped };
}
