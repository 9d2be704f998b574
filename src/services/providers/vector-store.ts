// src/services/providers/vector-store.ts — vector store contract + SQLite implementation
import { asc, count } from 'drizzle-orm';
import type { VectorDatabase } from '@/db';
import { vectorRecords } from '@/db/schema';
import { StorageError } from '@/utils/errors';
import { errorMessage } from '@/utils/helpers';
import type { Metadata } from '@/types/core';
import { cosineSimilarity, type Embedding } from './retrieval-vector-utils';

export interface VectorSearchHit {
  id: string;
  text: string;
  metadata: Metadata;
  /** Raw similarity as computed by the store (cosine for SqliteVectorStore). */
  score: number;
}

/**
 * Reads and writes are independent atomic operations; the pipeline never needs a
 * transaction spanning both. `search` results are sorted by descending score, ties
 * in insertion order.
 */
export interface VectorStore {
  search(embedding: Embedding, topK: number): Promise<VectorSearchHit[]>;
  /** Appends a record. Throws `StorageError` on failure. */
  upsert(text: string, embedding: Embedding, metadata: Metadata): Promise<void>;
  count(): Promise<number>;
}

/** better-sqlite3 runs synchronously: callers' timeouts cannot interrupt a query already in progress. */
export class SqliteVectorStore implements VectorStore {
  constructor(private readonly db: VectorDatabase) {}

  async search(embedding: Embedding, topK: number): Promise<VectorSearchHit[]> {
    if (topK <= 0) return [];
    const rows = this.db.select().from(vectorRecords).orderBy(asc(vectorRecords.id)).all();

    // Array.prototype.sort is stable, so equal scores keep id (insertion) order.
    return rows
      .map((row) => ({
        id: String(row.id),
        text: row.text,
        metadata: row.metadata,
        score: cosineSimilarity(embedding, row.embedding),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topK);
  }

  async upsert(text: string, embedding: Embedding, metadata: Metadata): Promise<void> {
    try {
      this.db
        .insert(vectorRecords)
        .values({
          text,
          embedding,
          metadata,
          createdAt: new Date().toISOString(),
        })
        .run();
    } catch (err) {
      throw new StorageError(`Vector store upsert failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async count(): Promise<number> {
    const row = this.db.select({ n: count() }).from(vectorRecords).get();
    return row?.n ?? 0;
  }
}
