import { describe, expect, it } from 'vitest';
import { OpenAiInferenceEngine } from '@/services/llm-client';
import { OpenAiEmbedder } from '@/services/providers/openai-embedder';
import { SimpleEmbedder } from '@/services/providers/web/simple-embedder';
import { cosineSimilarity, MAX_EMBEDDING_INPUT_CHARS } from '@/services/providers/retrieval-vector-utils';
import { EmbeddingError, EngineError } from '@/utils/errors';
import { withTimeout } from '@/utils/timeout';

describe('SimpleEmbedder', () => {
  const embedder = new SimpleEmbedder(64);

  it('produces unit-length vectors of the configured size', async () => {
    const vector = await embedder.embed('Paris is the capital of France');
    expect(vector).toHaveLength(64);
    expect(Math.hypot(...vector)).toBeCloseTo(1, 10);
  });

  it('is deterministic', async () => {
    expect(await embedder.embed('same text')).toEqual(await embedder.embed('same text'));
  });

  it('rejects empty and oversized input', async () => {
    await expect(embedder.embed('  ')).rejects.toBeInstanceOf(EmbeddingError);
    await expect(embedder.embed('a'.repeat(MAX_EMBEDDING_INPUT_CHARS + 1))).rejects.toBeInstanceOf(EmbeddingError);
  });
});

describe('cosineSimilarity', () => {
  it('handles mismatched and zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
  });
});

describe('OpenAI-compatible clients', () => {
  it('reports engine_unavailable when no key or base URL is configured', async () => {
    const engine = new OpenAiInferenceEngine({ model: 'gpt-4o-mini', timeoutMs: 1000 });

    await expect(engine.generate('hello', { task: 'synthesis' })).rejects.toSatisfy(
      (err: unknown) => err instanceof EngineError && err.code === 'engine_unavailable',
    );
  });

  it('refuses to embed without credentials', async () => {
    const embedder = new OpenAiEmbedder({ model: 'text-embedding-3-small', dimensions: 256, timeoutMs: 1000 });

    await expect(embedder.embed('hello')).rejects.toBeInstanceOf(EmbeddingError);
  });
});

describe('withTimeout', () => {
  it('rejects with TimeoutError when the call is too slow', async () => {
    await expect(withTimeout('slow-op', 10, () => new Promise(() => {}))).rejects.toMatchObject({
      code: 'timeout',
      message: 'slow-op timed out after 10ms',
    });
  });

  it('passes through a fast result', async () => {
    await expect(withTimeout('fast-op', 1000, async () => 42)).resolves.toBe(42);
  });
});
