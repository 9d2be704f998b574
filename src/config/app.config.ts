/**
 * App configuration. Read once from the environment (after dotenv) and validated with zod.
 */
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  INFERENCE_MODEL: z.string().min(1).default('gpt-4o-mini'),
  INFERENCE_TIMEOUT_MS: positiveInt.default(30_000),

  EMBEDDING_PROVIDER: z.enum(['hashing', 'openai']).default('hashing'),
  EMBEDDING_MODEL: z.string().min(1).default('text-embedding-3-small'),
  EMBEDDING_DIMENSIONS: positiveInt.default(256),
  EMBEDDING_TIMEOUT_MS: positiveInt.default(10_000),

  VECTOR_DB_PATH: z.string().min(1).default('./data/vectors.sqlite'),
  VECTOR_STORE_TIMEOUT_MS: positiveInt.default(5_000),
  RETRIEVAL_TOP_K: positiveInt.max(20).default(4),
  CONTEXT_WINDOW_MAX_ITEMS: positiveInt.max(20).default(6),
  RETRIEVAL_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.2),

  CLASSIFIER_MODE: z.enum(['rules', 'hybrid']).default('rules'),
  LIVE_DATA_TIMEOUT_MS: positiveInt.default(10_000),
  EVALUATE_INLINE: booleanFlag.default('true'),
  PERSIST_NO_INFORMATION: booleanFlag.default('true'),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  inference: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    timeoutMs: number;
  };
  embedding: {
    provider: 'hashing' | 'openai';
    model: string;
    dimensions: number;
    timeoutMs: number;
  };
  vectorStore: {
    path: string;
    timeoutMs: number;
  };
  retrieval: {
    topK: number;
    maxContextItems: number;
    minScore: number;
  };
  classifierMode: 'rules' | 'hybrid';
  liveDataTimeoutMs: number;
  evaluateInline: boolean;
  persistNoInformation: boolean;
}

export class ConfigError extends Error {
  readonly issues: Array<{ path: string; message: string }>;

  constructor(issues: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Blank values in .env count as unset so defaults apply. */
function dropBlank(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value.trim() !== '') out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    );
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    inference: {
      apiKey: e.OPENAI_API_KEY,
      baseURL: e.OPENAI_BASE_URL,
      model: e.INFERENCE_MODEL,
      timeoutMs: e.INFERENCE_TIMEOUT_MS,
    },
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      dimensions: e.EMBEDDING_DIMENSIONS,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    vectorStore: {
      path: e.VECTOR_DB_PATH,
      timeoutMs: e.VECTOR_STORE_TIMEOUT_MS,
    },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K,
      maxContextItems: e.CONTEXT_WINDOW_MAX_ITEMS,
      minScore: e.RETRIEVAL_MIN_SCORE,
    },
    classifierMode: e.CLASSIFIER_MODE,
    liveDataTimeoutMs: e.LIVE_DATA_TIMEOUT_MS,
    evaluateInline: e.EVALUATE_INLINE,
    persistNoInformation: e.PERSIST_NO_INFORMATION,
  };
}
