// src/services/providers/web/simple-embedder.ts
// Deterministic hashed bag-of-words embedding. Works offline; used by default and in tests.

import { EmbeddingError } from '@/utils/errors';
import { MAX_EMBEDDING_INPUT_CHARS, tokenize, type Embedder, type Embedding } from '../retrieval-vector-utils';

export class SimpleEmbedder implements Embedder {
  readonly id = 'hashing';
  readonly dimensions: number;

  constructor(dim = 256) {
    this.dimensions = dim;
  }

  async embed(text: string): Promise<Embedding> {
    if (!text.trim()) throw new EmbeddingError('Cannot embed empty text');
    if (text.length > MAX_EMBEDDING_INPUT_CHARS) {
      throw new EmbeddingError(`Input of ${text.length} chars exceeds ${MAX_EMBEDDING_INPUT_CHARS}`);
    }

    const vec: number[] = new Array(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      let hash = 0;
      for (let i = 0; i < token.length; i++) {
        hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
      }
      vec[hash % this.dimensions] += 1;
    }

    const norm = Math.sqrt(vec.reduce((s, x) => s + x * x, 0));
    if (norm === 0) return vec;
    return vec.map((x) => x / norm);
  }
}
