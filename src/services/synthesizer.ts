// src/services/synthesizer.ts — evidence + query → draft answer (one inference call)
import { EngineError, SynthesisError } from '@/utils/errors';
import { errorMessage, truncate } from '@/utils/helpers';
import {
  isEvidenceEmpty,
  type Classification,
  type ContextItem,
  type DraftResponse,
  type Evidence,
  type LiveDataEvidence,
} from '@/types/core';
import type { InferenceEngine } from './inference-engine';
import type { ObservabilityContext } from './query-processing-trace';

export const NO_INFORMATION_ANSWER =
  "I couldn't find any relevant information to answer your question. Please try rephrasing your query or ask about a different topic.";

/** Upper bound on evidence characters placed in a single prompt. */
export const EVIDENCE_CHAR_BUDGET = 6_000;

function liveBlock(live: LiveDataEvidence): string {
  return `[live_data: ${live.location}]\n${live.text}`;
}

function itemBlock(item: ContextItem): string {
  return `[${item.provenance}: ${item.sourceId}]\n${item.text}`;
}

/** Renders evidence blocks in priority order until the character budget is spent. */
export function renderEvidence(evidence: Evidence, budget: number = EVIDENCE_CHAR_BUDGET): string {
  const blocks: string[] = [];
  switch (evidence.kind) {
    case 'live_data':
      blocks.push(liveBlock(evidence));
      break;
    case 'retrieval':
      blocks.push(...evidence.window.map(itemBlock));
      break;
    case 'mixed':
      if (evidence.live) blocks.push(liveBlock(evidence.live));
      blocks.push(...evidence.window.map(itemBlock));
      break;
  }

  const out: string[] = [];
  let remaining = budget;
  for (const block of blocks) {
    if (remaining <= 0) break;
    const piece = block.length <= remaining ? block : truncate(block, Math.max(0, remaining - 3));
    out.push(piece);
    remaining -= piece.length + 2;
  }
  return out.join('\n\n');
}

function instructionsFor(evidence: Evidence): string {
  switch (evidence.kind) {
    case 'live_data':
      return 'Answer using the current conditions below. Mention the location by name.';
    case 'retrieval':
      return 'Answer using only the passages below. If they do not contain the answer, say so.';
    case 'mixed':
      return 'Answer using the current conditions and passages below. Do not invent facts.';
  }
}

export function buildSynthesisPrompt(query: string, classification: Classification, evidence: Evidence): string {
  return [
    instructionsFor(evidence),
    `Query type: ${classification}`,
    '',
    'Evidence:',
    renderEvidence(evidence),
    '',
    `Question: ${query}`,
    '',
    'Answer:',
  ].join('\n');
}

const MAX_PARAGRAPHS = 10;
const PARAGRAPH_SIGNATURE_CHARS = 50;

/**
 * Collapses looping model output: paragraphs whose first 50 characters repeat an
 * earlier one are dropped, at most ten paragraphs are kept, and repeated lines are
 * removed. Blank separators between paragraphs survive.
 */
export function cleanRepetitiveResponse(text: string): string {
  const seenParagraphs = new Set<string>();
  const paragraphs: string[] = [];
  for (const raw of text.split(/\n\s*\n/)) {
    const paragraph = raw.trim();
    if (!paragraph) continue;
    const signature = paragraph.slice(0, PARAGRAPH_SIGNATURE_CHARS).toLowerCase().trim();
    if (seenParagraphs.has(signature)) continue;
    seenParagraphs.add(signature);
    paragraphs.push(paragraph);
    if (paragraphs.length >= MAX_PARAGRAPHS) break;
  }

  const seenLines = new Set<string>();
  return paragraphs
    .map((paragraph) =>
      paragraph
        .split('\n')
        .filter((line) => {
          const key = line.trim();
          if (!key || seenLines.has(key)) return false;
          seenLines.add(key);
          return true;
        })
        .join('\n'),
    )
    .filter(Boolean)
    .join('\n\n');
}

export class Synthesizer {
  constructor(private readonly engine: InferenceEngine) {}

  /**
   * Empty evidence yields NO_INFORMATION_ANSWER without an engine call.
   * Engine failures throw `SynthesisError` carrying the engine's code; so does a
   * completion that is empty once repetition is removed.
   */
  async synthesize(
    query: string,
    classification: Classification,
    evidence: Evidence,
    obs: ObservabilityContext,
  ): Promise<DraftResponse> {
    if (isEvidenceEmpty(evidence)) {
      obs.flags.add('empty_evidence');
      obs.log.info('synthesizer:no_information', { classification });
      return { text: NO_INFORMATION_ANSWER, classification, evidence, noInformation: true };
    }

    const prompt = buildSynthesisPrompt(query, classification, evidence);
    try {
      const raw = await this.engine.generate(prompt, { task: 'synthesis', log: obs.log });
      const text = cleanRepetitiveResponse(raw);
      if (!text) throw new EngineError('empty_completion', 'Completion was empty after cleanup');
      obs.log.info('synthesizer:done', { chars: text.length, trimmedChars: raw.length - text.length });
      return { text, classification, evidence, noInformation: false };
    } catch (err) {
      const code = err instanceof EngineError ? err.code : 'engine_unavailable';
      obs.log.error('synthesizer:failed', { code, reason: errorMessage(err) });
      throw new SynthesisError(code, `Could not generate an answer: ${errorMessage(err)}`, { cause: err });
    }
  }
}
