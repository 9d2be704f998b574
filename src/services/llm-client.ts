// src/services/llm-client.ts — OpenAI-compatible chat client implementing InferenceEngine
import OpenAI from 'openai';
import { EngineError, TimeoutError } from '@/utils/errors';
import { errorMessage } from '@/utils/helpers';
import { withTimeout } from '@/utils/timeout';
import { logger } from '@/utils/logger';
import {
  TASK_DEFAULTS,
  type GenerateOptions,
  type InferenceEngine,
  type InferenceTask,
} from './inference-engine';

const DEFAULT_SYSTEM: Record<InferenceTask, string> = {
  classification: 'You are a query classifier. Answer with a single label and nothing else.',
  synthesis: 'You are a helpful assistant. Answer only from the evidence you are given.',
  enhancement:
    'You are an editor. Improve structure and tone of the answer you are given without adding facts.',
};

export interface OpenAiEngineOptions {
  apiKey?: string;
  baseURL?: string;
  model: string;
  timeoutMs: number;
}

export class OpenAiInferenceEngine implements InferenceEngine {
  readonly modelId: string;
  private client: OpenAI | null = null;
  private readonly options: OpenAiEngineOptions;

  constructor(options: OpenAiEngineOptions) {
    this.options = options;
    this.modelId = options.model;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = this.options.apiKey;
      // Local OpenAI-compatible servers (Ollama, vLLM) accept any key.
      if (!apiKey && !this.options.baseURL) {
        throw new EngineError(
          'engine_unavailable',
          'Missing OPENAI_API_KEY. Set it in .env or point OPENAI_BASE_URL at a local server.',
        );
      }
      this.client = new OpenAI({
        apiKey: apiKey ?? 'not-needed',
        baseURL: this.options.baseURL,
        timeout: this.options.timeoutMs,
        maxRetries: 1,
      });
    }
    return this.client;
  }

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const defaults = TASK_DEFAULTS[options.task];
    const client = this.getClient();
    let content: string | null | undefined;
    try {
      const res = await withTimeout(`inference:${options.task}`, this.options.timeoutMs, () =>
        client.chat.completions.create({
          model: this.modelId,
          messages: [
            { role: 'system', content: DEFAULT_SYSTEM[options.task] },
            { role: 'user', content: prompt },
          ],
          temperature: options.temperature ?? defaults.temperature,
          max_tokens: options.maxTokens ?? defaults.maxTokens,
        }),
      );
      content = res.choices[0]?.message?.content;
    } catch (err) {
      const reason = err instanceof TimeoutError ? err.message : errorMessage(err);
      const log = options.log ?? logger;
      log.warn('llm-client:call_failed', { task: options.task, model: this.modelId, reason });
      throw new EngineError('engine_unavailable', `Inference engine unavailable: ${reason}`, {
        cause: err,
      });
    }

    const text = content?.trim() ?? '';
    if (!text) {
      throw new EngineError('empty_completion', `Inference engine returned no content for ${options.task}`);
    }
    return text;
  }
}
