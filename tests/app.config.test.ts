import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '@/config/app.config';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 4000,
      nodeEnv: 'development',
      inference: { apiKey: undefined, baseURL: undefined, model: 'gpt-4o-mini', timeoutMs: 30000 },
      embedding: { provider: 'hashing', model: 'text-embedding-3-small', dimensions: 256, timeoutMs: 10000 },
      vectorStore: { path: './data/vectors.sqlite', timeoutMs: 5000 },
      retrieval: { topK: 4, maxContextItems: 6, minScore: 0.2 },
      classifierMode: 'rules',
      liveDataTimeoutMs: 10000,
      evaluateInline: true,
      persistNoInformation: true,
    });
  });

  it('coerces numbers and boolean flags', () => {
    const config = loadConfig({
      PORT: '8080',
      RETRIEVAL_TOP_K: '8',
      RETRIEVAL_MIN_SCORE: '0.35',
      EVALUATE_INLINE: 'no',
      PERSIST_NO_INFORMATION: '0',
      CLASSIFIER_MODE: 'hybrid',
      OPENAI_BASE_URL: 'http://localhost:11434/v1',
    });

    expect(config.port).toBe(8080);
    expect(config.retrieval.topK).toBe(8);
    expect(config.retrieval.minScore).toBe(0.35);
    expect(config.evaluateInline).toBe(false);
    expect(config.persistNoInformation).toBe(false);
    expect(config.classifierMode).toBe('hybrid');
    expect(config.inference.baseURL).toBe('http://localhost:11434/v1');
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ PORT: '', OPENAI_API_KEY: '   ' })).toMatchObject({
      port: 4000,
      inference: { apiKey: undefined },
    });
  });

  it('rejects invalid values with the offending variable', () => {
    let caught: unknown;
    try {
      loadConfig({ RETRIEVAL_TOP_K: '0', CLASSIFIER_MODE: 'magic' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((i) => i.path).sort()).toEqual(['CLASSIFIER_MODE', 'RETRIEVAL_TOP_K']);
    }
  });
});
