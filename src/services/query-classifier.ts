// src/services/query-classifier.ts — keyword-rule intent tagging with optional LLM tie-break
import { errorMessage } from '@/utils/helpers';
import { withTimeout } from '@/utils/timeout';
import { isClassification, type Classification } from '@/types/core';
import type { InferenceEngine } from './inference-engine';
import type { ObservabilityContext } from './query-processing-trace';

export type ClassifierMode = 'rules' | 'hybrid';

const LIVE_DATA_TERMS = [
  'weather',
  'temperature',
  'forecast',
  'climate',
  'rain',
  'raining',
  'snow',
  'snowing',
  'wind',
  'windy',
  'humidity',
  'humid',
] as const;

const RETRIEVAL_PHRASES = [
  'what is',
  'what are',
  'explain',
  'tell me about',
  'summarize',
  'summarise',
  'summary',
  'document',
  'documents',
  'report',
  'according to',
] as const;

function normalize(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9'\s]/g, ' ').replace(/\s+/g, ' ').trim();
}

function containsTerm(normalized: string, term: string): boolean {
  return ` ${normalized} `.includes(` ${term} `);
}

/**
 * Deterministic rule pass. Both lexicons → mixed, one → that tag, none → unclassified.
 */
export function classifyByRules(text: string): Classification {
  const normalized = normalize(text);
  if (!normalized) return 'unclassified';

  const live = LIVE_DATA_TERMS.some((t) => containsTerm(normalized, t));
  const retrieval = RETRIEVAL_PHRASES.some((p) => containsTerm(normalized, p));

  if (live && retrieval) return 'mixed';
  if (live) return 'live_data';
  if (retrieval) return 'retrieval';
  return 'unclassified';
}

function buildClassificationPrompt(text: string): string {
  return [
    'Classify the user query into exactly one label:',
    '- live_data: needs current external data such as weather conditions',
    '- retrieval: answerable from a document collection',
    '- mixed: needs both',
    '- unclassified: none of the above',
    '',
    `Query: ${text}`,
    '',
    'Label:',
  ].join('\n');
}

function parseLabel(raw: string): Classification | null {
  const label = raw.trim().toLowerCase().replace(/[^a-z_]/g, '');
  return isClassification(label) ? label : null;
}

export interface QueryClassifierOptions {
  mode: ClassifierMode;
  engine?: InferenceEngine;
  timeoutMs: number;
}

export class QueryClassifier {
  constructor(private readonly options: QueryClassifierOptions) {}

  /** Total: never throws. An empty or ambiguous query is `unclassified`. */
  async classify(text: string, obs: ObservabilityContext): Promise<Classification> {
    const byRules = classifyByRules(text);
    const engine = this.options.engine;
    if (byRules !== 'unclassified' || this.options.mode !== 'hybrid' || !engine || !text.trim()) {
      obs.log.debug('classifier:rules', { classification: byRules });
      return byRules;
    }

    try {
      const raw = await withTimeout('classification', this.options.timeoutMs, () =>
        engine.generate(buildClassificationPrompt(text), {
          task: 'classification',
          temperature: 0,
          log: obs.log,
        }),
      );
      const label = parseLabel(raw);
      if (label) {
        obs.log.info('classifier:llm', { classification: label });
        return label;
      }
      obs.log.warn('classifier:unparseable', { raw: raw.slice(0, 40) });
    } catch (err) {
      obs.log.warn('classifier:llm_failed', { reason: errorMessage(err) });
    }
    obs.flags.add('classifier_fallback');
    return 'unclassified';
  }
}
