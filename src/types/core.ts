// src/types/core.ts — shared domain types for the query pipeline

export const CLASSIFICATIONS = ['live_data', 'retrieval', 'mixed', 'unclassified'] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

export function isClassification(value: unknown): value is Classification {
  return typeof value === 'string' && (CLASSIFICATIONS as readonly string[]).includes(value);
}

export interface Query {
  readonly text: string;
  readonly receivedAt: Date;
}

export function createQuery(text: string, receivedAt: Date = new Date()): Query {
  return Object.freeze({ text, receivedAt });
}

export type Provenance = 'document' | 'prior_response';

export interface ContextItem {
  readonly text: string;
  readonly sourceId: string;
  /** Relevance in [0, 1]. */
  readonly score: number;
  readonly provenance: Provenance;
}

/** Ordered most-relevant first, capped, frozen once assembled. */
export type ContextWindow = readonly ContextItem[];

/** Flat metadata attached to every vector-store record. */
export type Metadata = Record<string, string | number | boolean>;

export interface LiveDataEvidence {
  kind: 'live_data';
  text: string;
  location: string;
}

export interface RetrievalEvidence {
  kind: 'retrieval';
  window: ContextWindow;
}

/** Both branches ran; `live` is null when the live-data fetch degraded. */
export interface MixedEvidence {
  kind: 'mixed';
  live: LiveDataEvidence | null;
  window: ContextWindow;
}

export type Evidence = LiveDataEvidence | RetrievalEvidence | MixedEvidence;

export function isEvidenceEmpty(evidence: Evidence): boolean {
  switch (evidence.kind) {
    case 'live_data':
      return evidence.text.trim().length === 0;
    case 'retrieval':
      return evidence.window.length === 0;
    case 'mixed':
      return (evidence.live == null || evidence.live.text.trim().length === 0) && evidence.window.length === 0;
  }
}

export function evidenceItemCount(evidence: Evidence): number {
  switch (evidence.kind) {
    case 'live_data':
      return evidence.text.trim() ? 1 : 0;
    case 'retrieval':
      return evidence.window.length;
    case 'mixed':
      return (evidence.live?.text.trim() ? 1 : 0) + evidence.window.length;
  }
}

/** What a response was built from; live data has no score and is keyed by location. */
export interface ResponseSource {
  kind: 'live_data' | Provenance;
  sourceId: string;
  score: number | null;
}

function windowSources(window: ContextWindow): ResponseSource[] {
  return window.map((item) => ({ kind: item.provenance, sourceId: item.sourceId, score: item.score }));
}

function liveSource(live: LiveDataEvidence): ResponseSource {
  return { kind: 'live_data', sourceId: live.location, score: null };
}

export function evidenceSources(evidence: Evidence): ResponseSource[] {
  switch (evidence.kind) {
    case 'live_data':
      return [liveSource(evidence)];
    case 'retrieval':
      return windowSources(evidence.window);
    case 'mixed':
      return [...(evidence.live ? [liveSource(evidence.live)] : []), ...windowSources(evidence.window)];
  }
}

export interface DraftResponse {
  text: string;
  classification: Classification;
  evidence: Evidence;
  /** True when the text is the fixed no-information answer. */
  noInformation: boolean;
}

export interface EnhancedResponse extends DraftResponse {
  draft: string;
  enhanced: boolean;
}

export interface CriterionResult {
  criterion: string;
  score: number;
  reasoning: string;
}

export interface EvaluationResult {
  criteria: CriterionResult[];
  aggregateScore: number;
}

export type DegradationFlag =
  | 'empty_evidence'
  | 'live_data_failed'
  | 'retrieval_failed'
  | 'enhancement_failed'
  | 'enhancement_skipped'
  | 'storage_skipped'
  | 'classifier_fallback';
