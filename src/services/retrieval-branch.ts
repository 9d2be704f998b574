// src/services/retrieval-branch.ts — embed query → vector search → ranked ContextItems
import { RetrievalError } from '@/utils/errors';
import { clamp01, errorMessage } from '@/utils/helpers';
import { withTimeout } from '@/utils/timeout';
import type { ContextItem, ContextWindow, Metadata, Provenance } from '@/types/core';
import type { Embedder } from './providers/retrieval-vector-utils';
import type { VectorSearchHit, VectorStore } from './providers/vector-store';

export const PROCESSED_RESPONSE_TYPE = 'processed_response';

export interface RetrievalBranchOptions {
  /** Items scoring below this are dropped. */
  minScore: number;
  embeddingTimeoutMs: number;
  storeTimeoutMs: number;
}

export function provenanceOf(metadata: Metadata): Provenance {
  return metadata.type === PROCESSED_RESPONSE_TYPE ? 'prior_response' : 'document';
}

function sourceIdOf(hit: VectorSearchHit): string {
  const source = hit.metadata.source;
  return typeof source === 'string' && source ? `${source}#${hit.id}` : `record#${hit.id}`;
}

export function toContextItem(hit: VectorSearchHit): ContextItem {
  return Object.freeze({
    text: hit.text,
    sourceId: sourceIdOf(hit),
    score: clamp01(hit.score),
    provenance: provenanceOf(hit.metadata),
  });
}

export class RetrievalBranch {
  constructor(
    private readonly embedder: Embedder,
    private readonly store: VectorStore,
    private readonly options: RetrievalBranchOptions,
  ) {}

  /**
   * Lazily yields at most `topK` items, highest score first. Nothing is fetched until
   * the first `next()`. An empty store or query yields nothing; store and embedding
   * failures throw `RetrievalError`.
   */
  async *retrieve(query: string, topK: number): AsyncGenerator<ContextItem, void, undefined> {
    if (topK <= 0 || !query.trim()) return;

    let hits: VectorSearchHit[];
    try {
      const embedding = await withTimeout('embedding', this.options.embeddingTimeoutMs, () =>
        this.embedder.embed(query),
      );
      hits = await withTimeout('vector-search', this.options.storeTimeoutMs, () =>
        this.store.search(embedding, topK),
      );
    } catch (err) {
      throw new RetrievalError(`Retrieval failed: ${errorMessage(err)}`, { cause: err });
    }

    let yielded = 0;
    let previous = Number.POSITIVE_INFINITY;
    for (const hit of hits) {
      if (yielded >= topK) return;
      const item = toContextItem(hit);
      if (item.score < this.options.minScore) continue;
      // Output stays non-increasing even if a store returns hits out of order.
      if (item.score > previous) continue;
      previous = item.score;
      yielded++;
      yield item;
    }
  }
}

/** Drains a retrieval sequence into a frozen window of at most `maxItems`. */
export async function collectContextWindow(
  items: AsyncIterable<ContextItem>,
  maxItems: number,
): Promise<ContextWindow> {
  const collected: ContextItem[] = [];
  if (maxItems <= 0) return Object.freeze(collected);
  for await (const item of items) {
    collected.push(item);
    if (collected.length >= maxItems) break;
  }
  return Object.freeze(collected);
}
