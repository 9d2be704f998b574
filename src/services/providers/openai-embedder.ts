import OpenAI from 'openai';
import { EmbeddingError } from '@/utils/errors';
import { errorMessage } from '@/utils/helpers';
import { withTimeout } from '@/utils/timeout';
import { MAX_EMBEDDING_INPUT_CHARS, type Embedder, type Embedding } from './retrieval-vector-utils';

export interface OpenAiEmbedderOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  dimensions: number;
  timeoutMs: number;
}

export class OpenAiEmbedder implements Embedder {
  readonly id: string;
  readonly dimensions: number;
  private client: OpenAI | null = null;
  private readonly options: OpenAiEmbedderOptions;

  constructor(options: OpenAiEmbedderOptions) {
    this.options = options;
    this.id = `openai:${options.model}`;
    this.dimensions = options.dimensions;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.options.apiKey && !this.options.baseURL) {
        throw new EmbeddingError('Missing OPENAI_API_KEY for EMBEDDING_PROVIDER=openai');
      }
      this.client = new OpenAI({
        apiKey: this.options.apiKey ?? 'not-needed',
        baseURL: this.options.baseURL,
        timeout: this.options.timeoutMs,
        maxRetries: 1,
      });
    }
    return this.client;
  }

  async embed(text: string): Promise<Embedding> {
    const input = text.trim();
    if (!input) throw new EmbeddingError('Cannot embed empty text');
    if (input.length > MAX_EMBEDDING_INPUT_CHARS) {
      throw new EmbeddingError(`Input of ${input.length} chars exceeds ${MAX_EMBEDDING_INPUT_CHARS}`);
    }

    const client = this.getClient();
    try {
      const response = await withTimeout('embedding', this.options.timeoutMs, () =>
        client.embeddings.create({
          model: this.options.model,
          input,
          dimensions: this.options.dimensions,
        }),
      );
      const vector = response.data[0]?.embedding;
      if (!vector?.length) throw new EmbeddingError('Embedding response contained no vector');
      return vector;
    } catch (err) {
      if (err instanceof EmbeddingError) throw err;
      throw new EmbeddingError(`Embedding request failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
