// src/services/enhancer.ts — polish a draft answer: structure and tone, no new claims
import { EnhancementError } from '@/utils/errors';
import { errorMessage } from '@/utils/helpers';
import type { InferenceEngine } from './inference-engine';
import type { ObservabilityContext } from './query-processing-trace';

export function buildEnhancementPrompt(query: string, draft: string): string {
  return `
You are an editor improving an answer for the user who asked the question below.

Rules:
- Keep every fact from the original answer; do NOT add facts that are not in it.
- Clear and concise.
- Well-formatted, with bullet points where appropriate.
- Professional yet conversational.
- Keep place names, numbers and units exactly as written.

User query:
"${query}"

Original answer:
"""
${draft}
"""

Return ONLY the improved answer text, no explanations.
`;
}

export class Enhancer {
  constructor(private readonly engine: InferenceEngine) {}

  /** Throws `EnhancementError`; the caller keeps the draft in that case. */
  async enhance(query: string, draft: string, obs: ObservabilityContext): Promise<string> {
    let raw: string;
    try {
      raw = await this.engine.generate(buildEnhancementPrompt(query, draft), {
        task: 'enhancement',
        log: obs.log,
      });
    } catch (err) {
      throw new EnhancementError(`Enhancement failed: ${errorMessage(err)}`, { cause: err });
    }

    const refined = raw.trim();
    if (!refined) throw new EnhancementError('Enhancement returned an empty answer');

    obs.log.info('enhancer:done', { lengthBefore: draft.length, lengthAfter: refined.length });
    return refined;
  }
}
