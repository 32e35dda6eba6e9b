import { z } from "zod";
import type { CategorySource } from "./lib/category";
import type { DiscoveryMissReason } from "./lib/discovery";

// Fields that fail validation fall back to null; only a non-object product is rejected.
const optionalText = z.string().optional().nullable().catch(null);

function optionalObject<T extends z.ZodRawShape>(shape: T) {
  return z.object(shape).optional().nullable().catch(null);
}

export const CatalogProductSchema = z.object({
  productCode: z.union([z.string(), z.number()]).optional().nullable().catch(null),
  copy: optionalObject({
    title: optionalText,
    subTitle: optionalText
  }),
  prices: optionalObject({
    currency: optionalText,
    currentPrice: z.union([z.number(), z.string()]).optional().nullable().catch(null)
  }),
  pdpUrl: optionalObject({
    url: optionalText
  }),
  colorwayImages: optionalObject({
    portraitURL: optionalText
  })
});

export const ProductGroupingSchema = z.object({
  products: z.array(z.unknown()).optional().nullable()
});

export const CatalogPageSchema = z.object({
  pages: z.object({
    // Progress reporting only; an unusable total never fails the page.
    totalResources: z.coerce.number().nonnegative().optional().nullable().catch(null),
    next: z.string().optional().nullable()
  }),
  productGroupings: z.array(ProductGroupingSchema).optional().nullable()
});

export const ProductRecordSchema = z.object({
  product_code: z.string().min(1),
  title: z.string().nullable(),
  subtitle: z.string().nullable(),
  category: z.string().min(1),
  image_url: z.string().nullable(),
  url: z.string().nullable(),
  price: z.number().nonnegative().nullable(),
  currency: z.string().nullable()
});

export type CatalogProduct = z.infer<typeof CatalogProductSchema>;
export type ProductGrouping = z.infer<typeof ProductGroupingSchema>;
export type CatalogPage = z.infer<typeof CatalogPageSchema>;
export type ProductRecord = z.infer<typeof ProductRecordSchema>;

export interface PriceObservation {
  product_code: string;
  price: number | null;
  observed_at: Date;
}

/** Every record gathered in one run, across all categories. */
export type Snapshot = ProductRecord[];

export type CategoryStage = "discovery" | "fetch";

export type CategoryResult =
  | { status: "ok"; source: CategorySource; records: ProductRecord[]; pages: number; dropped: number }
  | { status: "skipped"; source: CategorySource; reason: DiscoveryMissReason }
  | { status: "failed"; source: CategorySource; stage: CategoryStage; error: string; cancelled: boolean };
