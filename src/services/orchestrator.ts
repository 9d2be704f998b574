// src/services/orchestrator.ts — classify → acquire evidence → synthesize → enhance → persist → evaluate
import {
  PipelineError,
  SynthesisError,
  type LiveDataErrorCode,
  type SynthesisErrorCode,
} from '@/utils/errors';
import { errorMessage } from '@/utils/helpers';
import {
  createQuery,
  evidenceItemCount,
  evidenceSources,
  type Classification,
  type DegradationFlag,
  type DraftResponse,
  type EnhancedResponse,
  type EvaluationResult,
  type ResponseSource,
} from '@/types/core';
import type { QueryClassifier } from './query-classifier';
import { acquireEvidence, type EvidenceSources } from './evidence';
import type { Synthesizer } from './synthesizer';
import type { Enhancer } from './enhancer';
import type { StorageWriter } from './storage-writer';
import type { Evaluator } from './evaluator';
import type { BackgroundTasks } from './background-tasks';
import {
  addSpan,
  createObservabilityContext,
  finishTrace,
  type ObservabilityContext,
  type Span,
} from './query-processing-trace';

export interface OrchestratorDeps {
  classifier: QueryClassifier;
  evidence: EvidenceSources;
  synthesizer: Synthesizer;
  enhancer: Enhancer;
  storageWriter: StorageWriter;
  evaluator: Evaluator;
  background: BackgroundTasks;
  settings: {
    evaluateInline: boolean;
    persistNoInformation: boolean;
  };
}

export interface ProcessOptions {
  /** Checked before evidence acquisition and before synthesis only. */
  signal?: AbortSignal;
  /** Overrides `settings.evaluateInline` for this call. */
  evaluate?: boolean;
}

export type ProcessErrorCode = LiveDataErrorCode | SynthesisErrorCode | 'cancelled' | 'internal_error';

export interface ProcessDiagnostics {
  requestId: string;
  flags: DegradationFlag[];
  /** True when the returned response is the unenhanced draft. */
  draftUsed: boolean;
  evidenceCount: number;
  spans: Span[];
}

export interface ProcessResult {
  response: string;
  classification: Classification;
  /** Evidence the answer was synthesized from, most relevant retrieved items first. */
  sources: ResponseSource[];
  evaluation: EvaluationResult | null;
  /** Persistence was scheduled; the write itself completes in the background. */
  stored: boolean;
  error: string | null;
  errorCode: ProcessErrorCode | null;
  diagnostics: ProcessDiagnostics;
}

class CancelledError extends PipelineError<'cancelled'> {
  constructor(stage: string) {
    super('cancelled', `Request cancelled before ${stage}`);
  }
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) throw new CancelledError(stage);
}

function diagnosticsOf(
  obs: ObservabilityContext,
  extra: { draftUsed: boolean; evidenceCount: number },
): ProcessDiagnostics {
  finishTrace(obs.trace);
  return {
    requestId: obs.requestId,
    flags: [...obs.flags],
    draftUsed: extra.draftUsed,
    evidenceCount: extra.evidenceCount,
    spans: obs.trace.spans,
  };
}

function failure(
  obs: ObservabilityContext,
  classification: Classification,
  error: string,
  errorCode: ProcessErrorCode,
  evidenceCount: number,
): ProcessResult {
  obs.log.warn('orchestrator:failed', { classification, errorCode, error });
  return {
    response: '',
    classification,
    sources: [],
    evaluation: null,
    stored: false,
    error,
    errorCode,
    diagnostics: diagnosticsOf(obs, { draftUsed: false, evidenceCount }),
  };
}

async function enhanceOrKeepDraft(
  query: string,
  draft: DraftResponse,
  deps: OrchestratorDeps,
  obs: ObservabilityContext,
): Promise<EnhancedResponse> {
  if (draft.noInformation) {
    obs.flags.add('enhancement_skipped');
    return { ...draft, draft: draft.text, enhanced: false };
  }

  const start = Date.now();
  try {
    const text = await deps.enhancer.enhance(query, draft.text, obs);
    addSpan(obs.trace, 'enhance', start);
    return { ...draft, text, draft: draft.text, enhanced: true };
  } catch (err) {
    addSpan(obs.trace, 'enhance', start, { error: errorMessage(err) });
    obs.flags.add('enhancement_failed');
    obs.log.warn('orchestrator:enhancement_fallback', { reason: errorMessage(err) });
    return { ...draft, draft: draft.text, enhanced: false };
  }
}

function schedulePersistence(
  query: string,
  response: EnhancedResponse,
  deps: OrchestratorDeps,
  obs: ObservabilityContext,
): boolean {
  if (response.noInformation && !deps.settings.persistNoInformation) {
    obs.flags.add('storage_skipped');
    return false;
  }
  deps.background.schedule(
    'persist-response',
    async () => {
      const result = await deps.storageWriter.persist(query, response.text, response.classification, obs);
      if (!result.success) throw result.error;
    },
    obs.log,
  );
  return true;
}

/**
 * Runs one query through the pipeline. Resolves with a result in every case: stage
 * failures that cannot be degraded come back as `error` + `errorCode`.
 */
export async function processQuery(
  text: string,
  deps: OrchestratorDeps,
  options: ProcessOptions = {},
): Promise<ProcessResult> {
  const query = createQuery(text);
  const obs = createObservabilityContext(query.text);
  obs.log.info('orchestrator:start', { chars: query.text.length });

  let classification: Classification = 'unclassified';
  let evidenceCount = 0;

  try {
    let start = Date.now();
    classification = await deps.classifier.classify(query.text, obs);
    addSpan(obs.trace, 'classify', start, { metadata: { classification } });

    throwIfAborted(options.signal, 'evidence acquisition');
    start = Date.now();
    const acquired = await acquireEvidence(query.text, classification, deps.evidence, obs);
    if (!acquired.success) {
      addSpan(obs.trace, 'acquire', start, { error: acquired.error.message });
      return failure(obs, classification, acquired.error.message, acquired.error.code, 0);
    }
    const evidence = acquired.data;
    evidenceCount = evidenceItemCount(evidence);
    addSpan(obs.trace, 'acquire', start, { metadata: { kind: evidence.kind, items: evidenceCount } });

    throwIfAborted(options.signal, 'synthesis');
    start = Date.now();
    const draft = await deps.synthesizer.synthesize(query.text, classification, evidence, obs);
    addSpan(obs.trace, 'synthesize', start, { metadata: { noInformation: draft.noInformation } });

    // Past this point the request is not cancellable.
    const final = await enhanceOrKeepDraft(query.text, draft, deps, obs);
    const stored = schedulePersistence(query.text, final, deps, obs);

    let evaluation: EvaluationResult | null = null;
    if (options.evaluate ?? deps.settings.evaluateInline) {
      start = Date.now();
      evaluation = deps.evaluator.evaluate(query.text, final.text);
      addSpan(obs.trace, 'evaluate', start, { metadata: { aggregateScore: evaluation.aggregateScore } });
    }

    obs.log.info('orchestrator:done', {
      classification,
      flags: [...obs.flags],
      enhanced: final.enhanced,
      stored,
    });
    return {
      response: final.text,
      classification,
      sources: evidenceSources(final.evidence),
      evaluation,
      stored,
      error: null,
      errorCode: null,
      diagnostics: diagnosticsOf(obs, { draftUsed: !final.enhanced, evidenceCount }),
    };
  } catch (err) {
    if (err instanceof CancelledError || err instanceof SynthesisError) {
      return failure(obs, classification, err.message, err.code, evidenceCount);
    }
    obs.log.error('orchestrator:unexpected_error', { reason: errorMessage(err) });
    return failure(obs, classification, errorMessage(err), 'internal_error', evidenceCount);
  }
}
