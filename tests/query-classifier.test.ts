import { describe, expect, it } from 'vitest';
import { CLASSIFICATIONS } from '@/types/core';
import { QueryClassifier, classifyByRules } from '@/services/query-classifier';
import { ScriptedEngine, testContext } from './helpers';

describe('classifyByRules', () => {
  it('tags weather questions as live_data', () => {
    expect(classifyByRules("What's the weather in Paris?")).toBe('live_data');
    expect(classifyByRules('Will it snow in Oslo tomorrow')).toBe('live_data');
  });

  it('tags document questions as retrieval', () => {
    expect(classifyByRules('Summarize the uploaded report')).toBe('retrieval');
    expect(classifyByRules('Explain the onboarding process')).toBe('retrieval');
  });

  it('tags queries hitting both lexicons as mixed', () => {
    expect(classifyByRules('Explain how the forecast in Berlin affects the report')).toBe('mixed');
  });

  it('returns unclassified for empty and unmatched input', () => {
    expect(classifyByRules('')).toBe('unclassified');
    expect(classifyByRules('   ')).toBe('unclassified');
    expect(classifyByRules('hello there')).toBe('unclassified');
  });

  it('matches whole words only', () => {
    // "snowboard" and "reporter" contain lexicon terms but are not them
    expect(classifyByRules('snowboard reporter')).toBe('unclassified');
  });

  it('is deterministic and always one of the four tags', () => {
    const inputs = ['weather in Rome', 'what is RAG', '???', 'Tell me about the climate report'];
    for (const input of inputs) {
      const first = classifyByRules(input);
      expect(CLASSIFICATIONS).toContain(first);
      expect(classifyByRules(input)).toBe(first);
    }
  });
});

describe('QueryClassifier', () => {
  it('does not call the engine in rules mode', async () => {
    const engine = new ScriptedEngine({ classification: () => 'retrieval' });
    const classifier = new QueryClassifier({ mode: 'rules', engine, timeoutMs: 1000 });

    await expect(classifier.classify('hello there', testContext())).resolves.toBe('unclassified');
    expect(engine.calls).toHaveLength(0);
  });

  it('asks the engine at temperature 0 when rules are inconclusive in hybrid mode', async () => {
    const engine = new ScriptedEngine({ classification: () => ' Retrieval\n' });
    const classifier = new QueryClassifier({ mode: 'hybrid', engine, timeoutMs: 1000 });

    const obs = testContext();

    await expect(classifier.classify('hello there', obs)).resolves.toBe('retrieval');
    expect(engine.calls).toHaveLength(1);
    expect(engine.calls[0].options).toEqual({ task: 'classification', temperature: 0, log: obs.log });
  });

  it('skips the engine when rules already decide', async () => {
    const engine = new ScriptedEngine({ classification: () => 'retrieval' });
    const classifier = new QueryClassifier({ mode: 'hybrid', engine, timeoutMs: 1000 });

    await expect(classifier.classify('weather in Lima', testContext())).resolves.toBe('live_data');
    expect(engine.calls).toHaveLength(0);
  });

  it('falls back to unclassified when the engine fails', async () => {
    const engine = new ScriptedEngine();
    const classifier = new QueryClassifier({ mode: 'hybrid', engine, timeoutMs: 1000 });
    const obs = testContext();

    await expect(classifier.classify('hello there', obs)).resolves.toBe('unclassified');
    expect(obs.flags.has('classifier_fallback')).toBe(true);
  });

  it('falls back to unclassified on an unknown label', async () => {
    const engine = new ScriptedEngine({ classification: () => 'sports' });
    const classifier = new QueryClassifier({ mode: 'hybrid', engine, timeoutMs: 1000 });
    const obs = testContext();

    await expect(classifier.classify('hello there', obs)).resolves.toBe('unclassified');
    expect(obs.flags.has('classifier_fallback')).toBe(true);
  });
});
