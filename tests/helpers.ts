// Shared in-process stand-ins for the external collaborators.
import { loadConfig, type AppConfig } from '@/config/app.config';
import { openDatabase, type OpenedDatabase } from '@/db';
import { BackgroundTasks } from '@/services/background-tasks';
import type { GenerateOptions, InferenceEngine, InferenceTask } from '@/services/inference-engine';
import { buildOrchestratorDeps, type PipelineComponents } from '@/services/pipeline-deps';
import type { OrchestratorDeps } from '@/services/orchestrator';
import { SimpleEmbedder } from '@/services/providers/web/simple-embedder';
import { SqliteVectorStore } from '@/services/providers/vector-store';
import type {
  CurrentWeather,
  LiveDataProvider,
  LiveDataRequest,
} from '@/services/providers/weather/open-meteo-weather';
import { createObservabilityContext, type ObservabilityContext } from '@/services/query-processing-trace';
import { EngineError } from '@/utils/errors';

type TaskScript = (prompt: string) => string | Promise<string>;

/** Inference engine that answers each task from a script and records every call. */
export class ScriptedEngine implements InferenceEngine {
  readonly modelId = 'scripted-model';
  readonly calls: Array<{ prompt: string; options: GenerateOptions }> = [];

  constructor(private readonly scripts: Partial<Record<InferenceTask, TaskScript>> = {}) {}

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.calls.push({ prompt, options });
    const script = this.scripts[options.task];
    if (!script) throw new EngineError('engine_unavailable', `No script for ${options.task}`);
    return script(prompt);
  }

  callsFor(task: InferenceTask): Array<{ prompt: string; options: GenerateOptions }> {
    return this.calls.filter((c) => c.options.task === task);
  }
}

export const PARIS_WEATHER: CurrentWeather = {
  location: 'Paris',
  country: 'France',
  observedAt: '2026-10-18T12:00',
  temperatureC: 18.5,
  feelsLikeC: 17.9,
  condition: 'Mainly clear to cloudy',
  humidityPct: 62,
  windSpeedMs: 3.4,
  pressureHpa: 1012.3,
};

export class StubWeatherProvider implements LiveDataProvider {
  readonly name = 'stub-weather';
  readonly requests: LiveDataRequest[] = [];

  constructor(private readonly respond: (request: LiveDataRequest) => Promise<CurrentWeather>) {}

  fetch(request: LiveDataRequest): Promise<CurrentWeather> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({ NODE_ENV: 'test', VECTOR_DB_PATH: ':memory:', ...overrides });
}

export function testContext(query = 'test query'): ObservabilityContext {
  return createObservabilityContext(query);
}

export interface TestPipeline {
  config: AppConfig;
  deps: OrchestratorDeps;
  components: PipelineComponents;
  engine: ScriptedEngine;
  weather: StubWeatherProvider;
  store: SqliteVectorStore;
  embedder: SimpleEmbedder;
  background: BackgroundTasks;
  database: OpenedDatabase;
}

export function createTestPipeline(options: {
  engine?: ScriptedEngine;
  weather?: StubWeatherProvider;
  env?: Record<string, string>;
} = {}): TestPipeline {
  const config = testConfig(options.env);
  const database = openDatabase(':memory:');
  const store = new SqliteVectorStore(database.db);
  const embedder = new SimpleEmbedder(config.embedding.dimensions);
  const engine = options.engine ?? new ScriptedEngine();
  const weather = options.weather ?? new StubWeatherProvider(async () => PARIS_WEATHER);
  const background = new BackgroundTasks();
  const components: PipelineComponents = {
    engine,
    liveDataProvider: weather,
    embedder,
    store,
    background,
  };
  return {
    config,
    deps: buildOrchestratorDeps(config, components),
    components,
    engine,
    weather,
    store,
    embedder,
    background,
    database,
  };
}

/** Stores a passage the way document ingestion would. */
export async function addDocument(
  pipeline: Pick<TestPipeline, 'store' | 'embedder'>,
  text: string,
  source = 'handbook.pdf',
): Promise<void> {
  await pipeline.store.upsert(text, await pipeline.embedder.embed(text), { source, type: 'document' });
}
