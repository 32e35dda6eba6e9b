import { readFile } from "node:fs/promises";
import path from "node:path";
import { Pool } from "pg";
import { z } from "zod";
import { PriceObservation, ProductRecord } from "../types";
import { errorMessage, PersistenceError } from "./errors";
import { Logger } from "./logger";

export const SCHEMA_PATH = path.resolve(__dirname, "../../db/schema.sql");

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  release(): void;
}

export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

export interface CatalogWriter {
  upsertProduct(record: ProductRecord, observedAt: Date): Promise<void>;
  appendPriceObservation(observation: PriceObservation): Promise<void>;
}

export interface CatalogStore {
  isEnabled(): boolean;
  /** Runs `work` inside one transaction; any rejection rolls back every write made through the writer. */
  transaction<T>(work: (writer: CatalogWriter) => Promise<T>): Promise<T>;
}

export interface ListProductsOptions {
  category?: string;
  limit?: number;
  offset?: number;
}

const nullableText = z.string().nullable();

const StoredProductRowSchema = z.object({
  product_code: z.string(),
  title: nullableText,
  subtitle: nullableText,
  category: nullableText,
  image_url: nullableText,
  url: nullableText,
  created_at: z.coerce.date(),
  price: z.coerce.number().nullable(),
  last_seen_at: z.coerce.date().nullable()
});

const PriceHistoryRowSchema = z.object({
  price: z.coerce.number().nullable(),
  timestamp: z.coerce.date()
});

const CategoryRowSchema = z.object({
  category: nullableText,
  product_count: z.coerce.number().int()
});

export type StoredProduct = z.infer<typeof StoredProductRowSchema>;
export type PriceHistoryPoint = z.infer<typeof PriceHistoryRowSchema>;
export type CategorySummary = z.infer<typeof CategoryRowSchema>;

export function fromPgPool(pool: Pool): SqlPool {
  return {
    query: (text, values) => pool.query(text, values),
    connect: async () => {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: () => client.release()
      };
    },
    end: () => pool.end()
  };
}

class SqlCatalogWriter implements CatalogWriter {
  constructor(private readonly client: SqlClient) {}

  async upsertProduct(record: ProductRecord, observedAt: Date): Promise<void> {
    try {
      await this.client.query(
        `
        insert into products (product_code, title, subtitle, category, image_url, url, created_at)
        values ($1, $2, $3, $4, $5, $6, $7)
        on conflict (product_code) do update set
          title = excluded.title,
          subtitle = excluded.subtitle,
          category = excluded.category,
          image_url = excluded.image_url,
          url = excluded.url
        `,
        [
          record.product_code,
          record.title,
          record.subtitle,
          record.category,
          record.image_url,
          record.url,
          observedAt
        ]
      );
    } catch (error) {
      throw new PersistenceError(`product upsert failed: ${errorMessage(error)}`, record.product_code, { cause: error });
    }
  }

  async appendPriceObservation(observation: PriceObservation): Promise<void> {
    try {
      await this.client.query(
        `insert into price_history (product_code, price, "timestamp") values ($1, $2, $3)`,
        [observation.product_code, observation.price, observation.observed_at]
      );
    } catch (error) {
      throw new PersistenceError(`price observation insert failed: ${errorMessage(error)}`, observation.product_code, {
        cause: error
      });
    }
  }
}

export class Database implements CatalogStore {
  private readonly pool: SqlPool | null;
  private readonly logger: Logger;

  constructor(source: string | SqlPool | undefined, logger?: Logger) {
    if (typeof source === "string") {
      this.pool = fromPgPool(new Pool({ connectionString: source }));
    } else {
      this.pool = source ?? null;
    }
    this.logger = logger ?? new Logger("harvester.db", process.env.LOG_LEVEL);
  }

  isEnabled(): boolean {
    return this.pool !== null;
  }

  async healthcheck(): Promise<boolean> {
    if (!this.pool) {
      return true;
    }
    try {
      await this.pool.query("select 1");
      return true;
    } catch (error) {
      this.logger.warn("healthcheck_failed", { error: errorMessage(error) });
      return false;
    }
  }

  async ensureSchema(schemaPath = SCHEMA_PATH): Promise<void> {
    if (!this.pool) {
      return;
    }
    const ddl = await readFile(schemaPath, "utf8");
    await this.pool.query(ddl);
    this.logger.info("schema_ready", { schema_path: schemaPath });
  }

  async transaction<T>(work: (writer: CatalogWriter) => Promise<T>): Promise<T> {
    if (!this.pool) {
      throw new PersistenceError("database is not configured");
    }

    let client: SqlClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new PersistenceError(`database connection failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    try {
      await client.query("begin");
      const result = await work(new SqlCatalogWriter(client));
      await client.query("commit");
      return result;
    } catch (error) {
      try {
        await client.query("rollback");
      } catch (rollbackError) {
        this.logger.error("transaction_rollback_failed", { error: rollbackError });
      }
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw new PersistenceError(`transaction failed: ${errorMessage(error)}`, undefined, { cause: error });
    } finally {
      client.release();
    }
  }

  async listProducts(options: ListProductsOptions = {}): Promise<StoredProduct[]> {
    if (!this.pool) {
      return [];
    }

    const safeLimit = Math.max(1, Math.min(options.limit ?? 100, 1000));
    const safeOffset = Math.max(0, options.offset ?? 0);
    const { rows } = await this.pool.query(
      `
      select
        p.product_code,
        p.title,
        p.subtitle,
        p.category,
        p.image_url,
        p.url,
        p.created_at,
        latest.price,
        latest."timestamp" as last_seen_at
      from products p
      left join lateral (
        select h.price, h."timestamp"
        from price_history h
        where h.product_code = p.product_code
        order by h."timestamp" desc, h.id desc
        limit 1
      ) latest on true
      where ($1::text is null or p.category = $1::text)
      order by p.category asc, p.title asc nulls last, p.product_code asc
      limit $2
      offset $3
      `,
      [options.category ?? null, safeLimit, safeOffset]
    );
    return rows.map((row) => StoredProductRowSchema.parse(row));
  }

  async getProduct(productCode: string): Promise<StoredProduct | null> {
    if (!this.pool) {
      return null;
    }
    const { rows } = await this.pool.query(
      `
      select
        p.product_code, p.title, p.subtitle, p.category, p.image_url, p.url, p.created_at,
        latest.price,
        latest."timestamp" as last_seen_at
      from products p
      left join lateral (
        select h.price, h."timestamp"
        from price_history h
        where h.product_code = p.product_code
        order by h."timestamp" desc, h.id desc
        limit 1
      ) latest on true
      where p.product_code = $1
      limit 1
      `,
      [productCode]
    );
    const row = rows[0];
    return row === undefined ? null : StoredProductRowSchema.parse(row);
  }

  async listPriceHistory(productCode: string): Promise<PriceHistoryPoint[]> {
    if (!this.pool) {
      return [];
    }
    const { rows } = await this.pool.query(
      `
      select price, "timestamp"
      from price_history
      where product_code = $1
      order by "timestamp" asc, id asc
      `,
      [productCode]
    );
    return rows.map((row) => PriceHistoryRowSchema.parse(row));
  }

  async listCategories(): Promise<CategorySummary[]> {
    if (!this.pool) {
      return [];
    }
    const { rows } = await this.pool.query(
      `
      select category, count(*)::int as product_count
      from products
      group by category
      order by category asc nulls last
      `
    );
    return rows.map((row) => CategoryRowSchema.parse(row));
  }

  async close(): Promise<void> {
    await this.pool?.end();
  }
}
