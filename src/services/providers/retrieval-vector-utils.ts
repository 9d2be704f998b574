// src/services/providers/retrieval-vector-utils.ts — shared vector helpers for embedding and search

export type Embedding = number[];

/**
 * Embedding provider. Implementations throw `EmbeddingError` on empty or oversized input.
 */
export interface Embedder {
  readonly id: string;
  readonly dimensions: number;
  embed(text: string): Promise<Embedding>;
}

/** Character cap applied before embedding; longer input is rejected, not truncated. */
export const MAX_EMBEDDING_INPUT_CHARS = 8_000;

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    na += a[i] * a[i];
    nb += b[i] * b[i];
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean);
}
