// src/services/storage-writer.ts — write final answers back to the vector store
import { StorageError, fail, ok, type Result } from '@/utils/errors';
import { errorMessage } from '@/utils/helpers';
import { withTimeout } from '@/utils/timeout';
import type { Classification, Metadata } from '@/types/core';
import type { Embedder } from './providers/retrieval-vector-utils';
import type { VectorStore } from './providers/vector-store';
import { PROCESSED_RESPONSE_TYPE } from './retrieval-branch';
import type { ObservabilityContext } from './query-processing-trace';

export const STORED_RESPONSE_SOURCE = 'ai_response';

export interface StorageWriterOptions {
  model: string;
  embeddingTimeoutMs: number;
  storeTimeoutMs: number;
}

export function buildInteractionMetadata(
  query: string,
  classification: Classification,
  model: string,
  timestamp: Date = new Date(),
): Metadata {
  return {
    source: STORED_RESPONSE_SOURCE,
    type: PROCESSED_RESPONSE_TYPE,
    query,
    classification,
    timestamp: timestamp.toISOString(),
    model,
  };
}

export class StorageWriter {
  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    private readonly options: StorageWriterOptions,
  ) {}

  /** Embeds and appends one interaction. Returns failures without logging them; no deduplication. */
  async persist(
    query: string,
    response: string,
    classification: Classification,
    obs: ObservabilityContext,
  ): Promise<Result<void, StorageError>> {
    try {
      const embedding = await withTimeout('embedding', this.options.embeddingTimeoutMs, () =>
        this.embedder.embed(response),
      );
      const metadata = buildInteractionMetadata(query, classification, this.options.model);
      await withTimeout('vector-upsert', this.options.storeTimeoutMs, () =>
        this.store.upsert(response, embedding, metadata),
      );
      obs.log.info('storage:persisted', { classification, chars: response.length });
      return ok(undefined);
    } catch (err) {
      const error =
        err instanceof StorageError ? err : new StorageError(`Persist failed: ${errorMessage(err)}`, { cause: err });
      return fail(error);
    }
  }
}
