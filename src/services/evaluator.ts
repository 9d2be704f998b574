// src/services/evaluator.ts — heuristic answer scoring (relevance, accuracy, helpfulness)
// Heuristics only (word overlap, length buckets, a marker lexicon); no ground truth.
import { clamp01 } from '@/utils/helpers';
import type { CriterionResult, EvaluationResult } from '@/types/core';

export interface CriterionScorer {
  readonly criterion: string;
  readonly weight: number;
  score(query: string, response: string): CriterionResult;
}

function whitespaceWords(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

export const relevanceScorer: CriterionScorer = {
  criterion: 'relevance',
  weight: 1,
  score(query, response) {
    const queryWords = new Set(whitespaceWords(query.toLowerCase()));
    if (queryWords.size === 0) {
      return { criterion: 'relevance', score: 0.5, reasoning: 'No query provided' };
    }
    const responseWords = new Set(whitespaceWords(response.toLowerCase()));
    let overlap = 0;
    for (const w of queryWords) if (responseWords.has(w)) overlap++;
    return {
      criterion: 'relevance',
      score: clamp01(overlap / queryWords.size),
      reasoning: `Relevance score based on word overlap: ${overlap}/${queryWords.size} words matched`,
    };
  },
};

export const accuracyScorer: CriterionScorer = {
  criterion: 'accuracy',
  weight: 1,
  score(_query, response) {
    if (!response.trim()) return { criterion: 'accuracy', score: 0, reasoning: 'Empty response' };
    const words = whitespaceWords(response).length;
    if (words < 5) return { criterion: 'accuracy', score: 0.3, reasoning: 'Very short response, may lack detail' };
    if (words < 20) return { criterion: 'accuracy', score: 0.7, reasoning: 'Moderate length response' };
    return { criterion: 'accuracy', score: 0.9, reasoning: 'Detailed response with substantial content' };
  },
};

export const HELPFULNESS_MARKERS = [
  'here',
  'this',
  'information',
  'details',
  'explanation',
  'because',
  'therefore',
  'however',
  'additionally',
  'furthermore',
] as const;

export const helpfulnessScorer: CriterionScorer = {
  criterion: 'helpfulness',
  weight: 1,
  score(_query, response) {
    if (!response.trim()) {
      return { criterion: 'helpfulness', score: 0, reasoning: 'Empty response is not helpful' };
    }
    const vocabulary = new Set(response.toLowerCase().match(/[a-z]+/g) ?? []);
    const markers = HELPFULNESS_MARKERS.filter((m) => vocabulary.has(m)).length;
    let score = Math.min(0.8, 0.3 + 0.1 * markers);

    const words = whitespaceWords(response).length;
    if (words > 50) score = Math.min(1, score + 0.2);
    else if (words < 10) score = Math.max(0.2, score - 0.2);

    return {
      criterion: 'helpfulness',
      score: clamp01(score),
      reasoning: `Helpfulness based on content indicators and length (${words} words)`,
    };
  },
};

export const DEFAULT_SCORERS: readonly CriterionScorer[] = [relevanceScorer, accuracyScorer, helpfulnessScorer];

export interface EvaluationItem {
  query: string;
  response: string;
}

export interface BatchSummary {
  count: number;
  meanScore: number;
  minScore: number;
  maxScore: number;
  averageByCriterion: Record<string, number>;
}

export interface BatchEvaluation {
  results: EvaluationResult[];
  summary: BatchSummary;
}

/** Pure: the same (query, response) always yields the same result. */
export class Evaluator {
  constructor(private readonly scorers: readonly CriterionScorer[] = DEFAULT_SCORERS) {}

  evaluate(query: string, response: string): EvaluationResult {
    const criteria = this.scorers.map((s) => s.score(query, response));
    let weighted = 0;
    let totalWeight = 0;
    this.scorers.forEach((s, i) => {
      weighted += s.weight * criteria[i].score;
      totalWeight += s.weight;
    });
    return { criteria, aggregateScore: totalWeight > 0 ? clamp01(weighted / totalWeight) : 0 };
  }

  evaluateBatch(items: readonly EvaluationItem[]): BatchEvaluation {
    const results = items.map((item) => this.evaluate(item.query, item.response));
    return { results, summary: summarize(results) };
  }
}

export function summarize(results: readonly EvaluationResult[]): BatchSummary {
  if (results.length === 0) {
    return { count: 0, meanScore: 0, minScore: 0, maxScore: 0, averageByCriterion: {} };
  }

  const scores = results.map((r) => r.aggregateScore);
  const sums = new Map<string, { total: number; n: number }>();
  for (const r of results) {
    for (const c of r.criteria) {
      const acc = sums.get(c.criterion) ?? { total: 0, n: 0 };
      acc.total += c.score;
      acc.n++;
      sums.set(c.criterion, acc);
    }
  }

  const averageByCriterion: Record<string, number> = {};
  for (const [criterion, acc] of sums) averageByCriterion[criterion] = acc.total / acc.n;

  return {
    count: results.length,
    meanScore: scores.reduce((a, b) => a + b, 0) / scores.length,
    minScore: Math.min(...scores),
    maxScore: Math.max(...scores),
    averageByCriterion,
  };
}
