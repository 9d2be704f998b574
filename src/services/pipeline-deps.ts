// Pipeline dependencies: concrete collaborators from config, wired into OrchestratorDeps.
import type { AppConfig } from '@/config/app.config';
import { openDatabase } from '@/db';
import type { OrchestratorDeps } from '@/services/orchestrator';
import { QueryClassifier } from '@/services/query-classifier';
import { LiveDataBranch } from '@/services/live-data-branch';
import { RetrievalBranch } from '@/services/retrieval-branch';
import { Synthesizer } from '@/services/synthesizer';
import { Enhancer } from '@/services/enhancer';
import { StorageWriter } from '@/services/storage-writer';
import { Evaluator } from '@/services/evaluator';
import { BackgroundTasks } from '@/services/background-tasks';
import type { InferenceEngine } from '@/services/inference-engine';
import { OpenAiInferenceEngine } from '@/services/llm-client';
import type { Embedder } from '@/services/providers/retrieval-vector-utils';
import { SimpleEmbedder } from '@/services/providers/web/simple-embedder';
import { OpenAiEmbedder } from '@/services/providers/openai-embedder';
import { SqliteVectorStore, type VectorStore } from '@/services/providers/vector-store';
import {
  OpenMeteoWeatherProvider,
  type LiveDataProvider,
} from '@/services/providers/weather/open-meteo-weather';

export interface PipelineComponents {
  engine: InferenceEngine;
  liveDataProvider: LiveDataProvider;
  embedder: Embedder;
  store: VectorStore;
  background: BackgroundTasks;
}

export interface PipelineRuntime {
  deps: OrchestratorDeps;
  components: PipelineComponents;
  close(): Promise<void>;
}

export function buildOrchestratorDeps(config: AppConfig, components: PipelineComponents): OrchestratorDeps {
  const { engine, liveDataProvider, embedder, store, background } = components;
  const io = {
    embeddingTimeoutMs: config.embedding.timeoutMs,
    storeTimeoutMs: config.vectorStore.timeoutMs,
  };

  return {
    classifier: new QueryClassifier({
      mode: config.classifierMode,
      engine,
      timeoutMs: config.inference.timeoutMs,
    }),
    evidence: {
      liveData: new LiveDataBranch(liveDataProvider, config.liveDataTimeoutMs),
      retrieval: new RetrievalBranch(embedder, store, { minScore: config.retrieval.minScore, ...io }),
      topK: config.retrieval.topK,
      maxContextItems: config.retrieval.maxContextItems,
    },
    synthesizer: new Synthesizer(engine),
    enhancer: new Enhancer(engine),
    storageWriter: new StorageWriter(embedder, store, { model: engine.modelId, ...io }),
    evaluator: new Evaluator(),
    background,
    settings: {
      evaluateInline: config.evaluateInline,
      persistNoInformation: config.persistNoInformation,
    },
  };
}

function createEmbedder(config: AppConfig): Embedder {
  if (config.embedding.provider === 'openai') {
    return new OpenAiEmbedder({
      apiKey: config.inference.apiKey,
      baseURL: config.inference.baseURL,
      model: config.embedding.model,
      dimensions: config.embedding.dimensions,
      timeoutMs: config.embedding.timeoutMs,
    });
  }
  return new SimpleEmbedder(config.embedding.dimensions);
}

/** Opens the SQLite store and builds production collaborators. `close()` drains pending writes first. */
export function createPipelineRuntime(config: AppConfig): PipelineRuntime {
  const database = openDatabase(config.vectorStore.path);
  const components: PipelineComponents = {
    engine: new OpenAiInferenceEngine(config.inference),
    liveDataProvider: new OpenMeteoWeatherProvider(),
    embedder: createEmbedder(config),
    store: new SqliteVectorStore(database.db),
    background: new BackgroundTasks(),
  };

  return {
    deps: buildOrchestratorDeps(config, components),
    components,
    close: async () => {
      await components.background.drain();
      database.close();
    },
  };
}
