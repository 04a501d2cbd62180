/**
 * MongoDB Atlas Vector Search Store
 *
 * Documents are stored as { _id, content, embedding, metadata } and searched
 * with the `$vectorSearch` aggregation stage. Metadata filters run as a
 * `$match` after the vector stage, so they need no filter index.
 */

import type { AnyBulkWriteOperation, Document as MongoDocument } from "mongodb";
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

/** The slice of a MongoDB collection the store uses */
export interface MongoCollectionLike {
  bulkWrite(
    operations: AnyBulkWriteOperation<MongoDocument>[]
  ): Promise<{ upsertedCount: number; modifiedCount: number }>;
  aggregate(pipeline: MongoDocument[]): { toArray(): Promise<MongoDocument[]> };
  deleteMany(filter: MongoDocument): Promise<{ deletedCount: number }>;
}

/** Resolves a collection by name */
export interface MongoDatabaseLike {
  collection(name: string): MongoCollectionLike;
}

export interface MongoAtlasStoreOptions extends BaseVectorStoreOptions {
  uri?: string;
  databaseName?: string;
  /** Atlas Vector Search index name */
  indexName?: string;
  /** Pre-built database handle; skips loading mongodb */
  database?: MongoDatabaseLike;
}

/** Candidates examined per returned hit */
const CANDIDATE_MULTIPLIER = 10;

export class MongoAtlasStore extends BaseVectorStore {
  readonly backend = "mongodb";
  readonly supportsSparse = false;

  private database: MongoDatabaseLike | null;
  private closeClient: (() => Promise<void>) | null = null;
  private readonly uri: string | undefined;
  private readonly databaseName: string;
  private readonly indexName: string;

  constructor(options: MongoAtlasStoreOptions = {}) {
    super("mongo-atlas-store", options);
    this.database = options.database ?? null;
    this.uri = options.uri;
    this.databaseName = options.databaseName ?? "ragline";
    this.indexName = options.indexName ?? "vector_index";
  }

  override async close(): Promise<void> {
    if (this.closeClient) {
      await this.closeClient();
      this.closeClient = null;
      this.database = null;
    }
  }

  protected async upsert(collection: string, documents: PreparedDocument[]): Promise<number> {
    // The upsert takes its _id from the equality filter.
    const operations: AnyBulkWriteOperation<MongoDocument>[] = documents.map((doc) => ({
      replaceOne: {
        filter: { _id: doc.id },
        replacement: {
          content: doc.content,
          embedding: [...doc.embedding],
          metadata: doc.metadata,
        },
        upsert: true,
      },
    }));
    await this.getDatabase().collection(collection).bulkWrite(operations);
    return documents.length;
  }

  protected async query(collection: string, query: VectorQuery): Promise<RawRow[]> {
    const vectorSearch: MongoDocument = {
      index: this.indexName,
      path: "embedding",
      queryVector: [...query.vector],
      numCandidates: query.topK * CANDIDATE_MULTIPLIER,
      limit: query.topK,
    };
    if (query.ids) {
      vectorSearch.filter = { _id: { $in: [...query.ids] } };
    }

    const pipeline: MongoDocument[] = [
      { $vectorSearch: vectorSearch },
      {
        $project: {
          _id: 1,
          content: 1,
          metadata: 1,
          score: { $meta: "vectorSearchScore" },
        },
      },
    ];

    const match: MongoDocument = {};
    for (const [key, value] of Object.entries(query.match)) {
      match[`metadata.${key}`] = value;
    }
    if (Object.keys(match).length > 0) {
      pipeline.push({ $match: match });
    }

    const docs = await this.getDatabase().collection(collection).aggregate(pipeline).toArray();
    return docs.map((doc) => {
      const metadata = doc.metadata;
      return toRawRow(
        String(doc._id ?? ""),
        Number(doc.score ?? 0),
        typeof doc.content === "string" ? doc.content : "",
        metadata !== null && typeof metadata === "object" && !Array.isArray(metadata)
          ? { ...metadata }
          : {}
      );
    });
  }

  protected async remove(collection: string, ids: readonly string[]): Promise<number> {
    const result = await this.getDatabase()
      .collection(collection)
      .deleteMany({ _id: { $in: [...ids] } });
    return result.deletedCount;
  }

  protected override remediation(operation: StoreOperation): string[] {
    if (operation === "search") {
      return [
        "Check that the Atlas Vector Search index exists and is named correctly.",
        "Check that the query vector dimension matches the index definition.",
      ];
    }
    return [
      "Check the MongoDB Atlas connection string and network access list.",
      "Check that the database user has write permission on the collection.",
    ];
  }

  private getDatabase(): MongoDatabaseLike {
    if (this.database) {
      return this.database;
    }
    const mongodb = loadOptionalModule<typeof import("mongodb")>(
      "mongodb",
      "the MongoDB Atlas store"
    );
    if (!this.uri) {
      throw new ConfigurationError("MongoDB URI is not configured", {
        solutions: ["Set MONGODB_URI to the Atlas connection string."],
      });
    }
    const client = new mongodb.MongoClient(this.uri);
    const db = client.db(this.databaseName);
    const database: MongoDatabaseLike = {
      collection: (name) => {
        const coll = db.collection<MongoDocument>(name);
        return {
          bulkWrite: async (operations) => {
            const result = await coll.bulkWrite(operations);
            return { upsertedCount: result.upsertedCount, modifiedCount: result.modifiedCount };
          },
          aggregate: (pipeline) => coll.aggregate(pipeline),
          deleteMany: async (filter) => {
            const result = await coll.deleteMany(filter);
            return { deletedCount: result.deletedCount };
          },
        };
      },
    };
    this.database = database;
    this.closeClient = () => client.close();
    return database;
  }
}
