import dotenv from "dotenv";
import { z } from "zod";
import { CatalogApiSettings, MAX_PAGE_SIZE } from "./lib/catalog";

export const DEFAULT_CATEGORY_URLS = [
  "https://www.nike.com/in/w/mens-shoes-nik1zy7ok",
  "https://www.nike.com/in/w/mens-clothing-6ymx6znik1",
  "https://www.nike.com/in/w/mens-accessories-equipment-awwpwznik1",
  "https://www.nike.com/in/w/womens-shoes-5e1x6zy7ok",
  "https://www.nike.com/in/w/womens-clothing-5e1x6z6ymx6",
  "https://www.nike.com/in/w/womens-accessories-equipment-5e1x6zawwpw",
  "https://www.nike.com/in/w/kids-shoes-v4dhzy7ok",
  "https://www.nike.com/in/w/kids-clothing-6ymx6zv4dh",
  "https://www.nike.com/in/w/kids-accessories-equipment-awwpwzv4dh"
];

const optionalNonEmptyString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().min(1).optional()
);

const optionalPositiveInt = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.coerce.number().int().positive().optional()
);

const urlList = z.preprocess((value) => {
  if (typeof value !== "string" || value.trim() === "") {
    return undefined;
  }
  return value
    .split(/[\s,]+/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}, z.array(z.string().url()).min(1).default(DEFAULT_CATEGORY_URLS));

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3002),
    DATABASE_URL: optionalNonEmptyString,
    LOG_LEVEL: z.string().min(1).default("info"),
    HARVEST_CATEGORY_URLS: urlList,
    HARVEST_WORKERS: z.coerce.number().int().positive().max(64).default(16),
    HARVEST_PAGE_SIZE: z.coerce.number().int().positive().max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
    HARVEST_DELAY_MIN_MS: z.coerce.number().int().nonnegative().default(1000),
    HARVEST_DELAY_MAX_MS: z.coerce.number().int().nonnegative().default(3000),
    HARVEST_RUN_TIMEOUT_MS: optionalPositiveInt,
    HARVEST_INTERVAL_MINUTES: z.coerce.number().nonnegative().default(0),
    CATALOG_API_BASE_URL: z.string().url().default("https://api.nike.com"),
    CATALOG_MARKETPLACE: z.string().min(1).default("IN"),
    CATALOG_LANGUAGE: z.string().min(1).default("en-GB"),
    CATALOG_CHANNEL_ID: z.string().min(1).default("d9a5bc42-4b9c-4976-858a-f159cf99c647"),
    CATALOG_API_CALLER_ID: z.string().min(1).default("nike:dotcom:browse:wall.client:2.0"),
    STOREFRONT_ORIGIN: z.string().url().default("https://www.nike.com"),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    REQUEST_RETRIES: z.coerce.number().int().nonnegative().max(10).default(2),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500)
  })
  .refine((env) => env.HARVEST_DELAY_MIN_MS <= env.HARVEST_DELAY_MAX_MS, {
    message: "HARVEST_DELAY_MIN_MS must not exceed HARVEST_DELAY_MAX_MS",
    path: ["HARVEST_DELAY_MIN_MS"]
  });

export type AppConfig = z.infer<typeof EnvSchema>;

export interface HarvestSettings {
  categoryUrls: string[];
  workers: number;
  api: CatalogApiSettings;
  delayMinMs: number;
  delayMaxMs: number;
  runTimeoutMs?: number;
  timeoutMs: number;
  retries: number;
  retryBaseDelayMs: number;
  apiCallerId: string;
  storefrontOrigin: string;
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  return EnvSchema.parse(env);
}

export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}

export function toHarvestSettings(config: AppConfig): HarvestSettings {
  return {
    categoryUrls: config.HARVEST_CATEGORY_URLS,
    workers: config.HARVEST_WORKERS,
    api: {
      apiBaseUrl: config.CATALOG_API_BASE_URL,
      marketplace: config.CATALOG_MARKETPLACE,
      language: config.CATALOG_LANGUAGE,
      channelId: config.CATALOG_CHANNEL_ID,
      pageSize: config.HARVEST_PAGE_SIZE
    },
    delayMinMs: config.HARVEST_DELAY_MIN_MS,
    delayMaxMs: config.HARVEST_DELAY_MAX_MS,
    ...(config.HARVEST_RUN_TIMEOUT_MS ? { runTimeoutMs: config.HARVEST_RUN_TIMEOUT_MS } : {}),
    timeoutMs: config.REQUEST_TIMEOUT_MS,
    retries: config.REQUEST_RETRIES,
    retryBaseDelayMs: config.RETRY_BASE_DELAY_MS,
    apiCallerId: config.CATALOG_API_CALLER_ID,
    storefrontOrigin: config.STOREFRONT_ORIGIN
  };
}
