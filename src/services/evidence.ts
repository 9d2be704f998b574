// src/services/evidence.ts — classification → branch dispatch → tagged Evidence
import { RetrievalError, ok, type LiveDataError, type Result } from '@/utils/errors';
import type {
  Classification,
  ContextWindow,
  Evidence,
  LiveDataEvidence,
  MixedEvidence,
  RetrievalEvidence,
} from '@/types/core';
import type { LiveDataBranch } from './live-data-branch';
import { collectContextWindow, type RetrievalBranch } from './retrieval-branch';
import type { ObservabilityContext } from './query-processing-trace';

export interface EvidenceSources {
  liveData: LiveDataBranch;
  retrieval: RetrievalBranch;
  topK: number;
  maxContextItems: number;
}

export type BranchKind = Evidence['kind'];

/** Unclassified queries are answered from the corpus. */
export function selectBranch(classification: Classification): BranchKind {
  switch (classification) {
    case 'live_data':
      return 'live_data';
    case 'mixed':
      return 'mixed';
    case 'retrieval':
    case 'unclassified':
      return 'retrieval';
  }
}

async function retrieveWindow(
  query: string,
  sources: EvidenceSources,
  obs: ObservabilityContext,
): Promise<ContextWindow> {
  try {
    return await collectContextWindow(
      sources.retrieval.retrieve(query, sources.topK),
      sources.maxContextItems,
    );
  } catch (err) {
    if (!(err instanceof RetrievalError)) throw err;
    obs.log.warn('retrieval:failed', { reason: err.message });
    obs.flags.add('retrieval_failed');
    return Object.freeze([]);
  }
}

async function fetchLiveEvidence(
  query: string,
  sources: EvidenceSources,
  obs: ObservabilityContext,
): Promise<Result<LiveDataEvidence, LiveDataError>> {
  const result = await sources.liveData.fetchLive(query, obs);
  if (!result.success) return result;
  const evidence: LiveDataEvidence = { kind: 'live_data', text: result.data.text, location: result.data.location };
  return ok(evidence);
}

/**
 * Runs the branch(es) the classification selects. Only a live-data failure on a
 * pure live-data query is returned as an error; every other failure degrades.
 */
export async function acquireEvidence(
  query: string,
  classification: Classification,
  sources: EvidenceSources,
  obs: ObservabilityContext,
): Promise<Result<Evidence, LiveDataError>> {
  const branch = selectBranch(classification);

  if (branch === 'live_data') {
    return fetchLiveEvidence(query, sources, obs);
  }

  if (branch === 'retrieval') {
    const evidence: RetrievalEvidence = { kind: 'retrieval', window: await retrieveWindow(query, sources, obs) };
    return ok(evidence);
  }

  const [live, window] = await Promise.all([
    fetchLiveEvidence(query, sources, obs),
    retrieveWindow(query, sources, obs),
  ]);
  if (!live.success) {
    obs.flags.add('live_data_failed');
    obs.log.warn('evidence:live_degraded', { code: live.error.code });
  }
  const evidence: MixedEvidence = { kind: 'mixed', live: live.success ? live.data : null, window };
  return ok(evidence);
}
