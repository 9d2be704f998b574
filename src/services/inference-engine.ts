// src/services/inference-engine.ts — black-box text generation capability used by every LLM stage
import type { AppLogger } from '@/utils/logger';

export type InferenceTask = 'classification' | 'synthesis' | 'enhancement';

export interface GenerateOptions {
  task: InferenceTask;
  maxTokens?: number;
  temperature?: number;
  /** Request-scoped logger; engines fall back to the root logger without one. */
  log?: AppLogger;
}

/**
 * Turns a prompt into text. Implementations throw `EngineError` with
 * `engine_unavailable` on connection failure or timeout and `empty_completion`
 * when the model returns nothing.
 */
export interface InferenceEngine {
  readonly modelId: string;
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

/** Per-task generation defaults. Classification is pinned to temperature 0. */
export const TASK_DEFAULTS: Record<InferenceTask, { maxTokens: number; temperature: number }> = {
  classification: { maxTokens: 16, temperature: 0 },
  synthesis: { maxTokens: 700, temperature: 0.3 },
  enhancement: { maxTokens: 900, temperature: 0.3 },
};
