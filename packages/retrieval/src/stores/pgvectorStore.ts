/**
 * PostgreSQL + pgvector Store
 *
 * One table per collection:
 *   id TEXT PRIMARY KEY, content TEXT, metadata JSONB, embedding vector(n)
 * Similarity is cosine: score = 1 - (embedding <=> query).
 */

import { ConfigurationError, type StoreOperation } from "@ragline/ai-core";
import type { RawRow } from "../types";
import {
  BaseVectorStore,
  type BaseVectorStoreOptions,
  type PreparedDocument,
  toRawRow,
  type VectorQuery,
} from "./baseVectorStore";
import { loadOptionalModule } from "./optionalModule";

/** The slice of a pg Pool the store uses */
export interface PgClientLike {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export interface PgVectorStoreOptions extends BaseVectorStoreOptions {
  connectionString?: string;
  /** Pre-built client; skips loading pg */
  client?: PgClientLike;
  /** Pool size when the store builds its own pool */
  maxConnections?: number;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]{0,62}$/;

export function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.join(",")}]`;
}

function tableName(collection: string): string {
  if (!IDENTIFIER.test(collection)) {
    throw new ConfigurationError(`Invalid pgvector collection name: ${collection}`, {
      solutions: ["Use letters, digits and underscores only, starting with a letter."],
    });
  }
  return `"${collection}"`;
}

export class PgVectorStore extends BaseVectorStore {
  readonly backend = "pgvector";
  readonly supportsSparse = false;

  private client: PgClientLike | null;
  private readonly connectionString: string | undefined;
  private readonly maxConnections: number;

  constructor(options: PgVectorStoreOptions = {}) {
    super("pgvector-store", options);
    this.client = options.client ?? null;
    this.connectionString = options.connectionString;
    this.maxConnections = options.maxConnections ?? 10;
  }

  /**
   * Create the extension, table and ivfflat index if they do not exist.
   */
  async createCollection(collection: string, dimension: number): Promise<void> {
    const table = tableName(collection);
    await this.guard("setup", async () => {
      const client = this.getClient();
      await client.query("CREATE EXTENSION IF NOT EXISTS vector");
      await client.query(
        `CREATE TABLE IF NOT EXISTS ${table} (
          id TEXT PRIMARY KEY,
          content TEXT NOT NULL,
          metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
          embedding vector(${Math.trunc(dimension)})
        )`
      );
      await client.query(
        `CREATE INDEX IF NOT EXISTS "${collection}_embedding_idx" ON ${table}
          USING ivfflat (embedding vector_cosine_ops) WITH (lists = 100)`
      );
    });
    this.logger.info("Collection ready", { collection, dimension });
  }

  override async close(): Promise<void> {
    if (this.client) {
      await this.client.end();
      this.client = null;
    }
  }

  protected async upsert(collection: string, documents: PreparedDocument[]): Promise<number> {
    const table = tableName(collection);
    // Ids are unique per batch; ON CONFLICT rejects a statement touching one twice.
    const values: unknown[] = [];
    const tuples = documents.map((doc, i) => {
      const base = i * 4;
      values.push(
        doc.id,
        doc.content,
        JSON.stringify(doc.metadata),
        toVectorLiteral(doc.embedding)
      );
      return `($${base + 1}, $${base + 2}, $${base + 3}::jsonb, $${base + 4}::vector)`;
    });

    await this.getClient().query(
      `INSERT INTO ${table} (id, content, metadata, embedding)
        VALUES ${tuples.join(", ")}
        ON CONFLICT (id) DO UPDATE SET
          content = EXCLUDED.content,
          metadata = EXCLUDED.metadata,
          embedding = EXCLUDED.embedding`,
      values
    );
    return documents.length;
  }

  protected async query(collection: string, query: VectorQuery): Promise<RawRow[]> {
    const table = tableName(collection);
    const values: unknown[] = [toVectorLiteral(query.vector)];
    const conditions: string[] = [];

    if (query.ids) {
      values.push([...query.ids]);
      conditions.push(`id = ANY($${values.length}::text[])`);
    }
    for (const [key, value] of Object.entries(query.match)) {
      values.push(key, String(value));
      conditions.push(`metadata->>$${values.length - 1} = $${values.length}`);
    }
    values.push(query.topK);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const result = await this.getClient().query(
      `SELECT id, content, metadata, 1 - (embedding <=> $1::vector) AS score
        FROM ${table}
        ${where}
        ORDER BY embedding <=> $1::vector
        LIMIT $${values.length}`,
      values
    );

    return result.rows.map((row) =>
      toRawRow(String(row.id), Number(row.score), String(row.content ?? ""), asRecord(row.metadata))
    );
  }

  protected async remove(collection: string, ids: readonly string[]): Promise<number> {
    const result = await this.getClient().query(
      `DELETE FROM ${tableName(collection)} WHERE id = ANY($1::text[])`,
      [[...ids]]
    );
    return result.rowCount ?? 0;
  }

  protected override remediation(operation: StoreOperation): string[] {
    if (operation === "search") {
      return [
        "Check that PostgreSQL is running and DATABASE_URL is correct.",
        "Check that the table exists and the query vector dimension matches the column.",
      ];
    }
    return [
      "Check that PostgreSQL is running and DATABASE_URL is correct.",
      "Check that the pgvector extension is installed (CREATE EXTENSION vector).",
    ];
  }

  private getClient(): PgClientLike {
    if (this.client) {
      return this.client;
    }
    const pg = loadOptionalModule<typeof import("pg")>("pg", "the pgvector store");
    const pool = new pg.Pool({
      connectionString: this.connectionString,
      max: this.maxConnections,
    });
    const client: PgClientLike = {
      query: async (text, values) => {
        const result = await pool.query(text, values);
        return { rows: result.rows, rowCount: result.rowCount };
      },
      end: () => pool.end(),
    };
    this.client = client;
    return client;
  }
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value === "string") {
    const parsed: unknown = JSON.parse(value);
    return asRecord(parsed);
  }
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}
