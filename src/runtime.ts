/**
 * Composition root: wires the pipeline from configuration.
 */

import type { Config } from './config.js';
import { DEFAULT_CONFIDENCE_POLICY, type ConfidencePolicy } from './types/models.js';
import { logger } from './utils/logger.js';
import { createResultCache, type ResultCache } from './services/cache/index.js';
import { CatalogDiscovery, knexIntrospector } from './services/catalog/discovery.js';
import { CatalogRegistry } from './services/catalog/registry.js';
import { FileCatalogStore, type CatalogStore } from './services/catalog/store.js';
import { Corrector } from './services/corrector.js';
import { connectDataSource, type DataSource } from './services/database.js';
import { QueryExecutor } from './services/executor.js';
import { AiSdkGenerationService, type GenerationService } from './services/generation.js';
import { RequestMonitor } from './services/monitor.js';
import { Narrator } from './services/narrator.js';
import { dialectName, type PromptContext } from './services/prompts.js';
import { QueryService } from './services/query-service.js';
import { SchemaContextReducer } from './services/reducer.js';
import { Supervisor } from './services/supervisor.js';
import { Synthesizer } from './services/synthesizer.js';

export type RuntimeSettings = Pick<
  Config,
  | 'DEFAULT_CATALOG_ID'
  | 'REDUCER_MAX_TABLES'
  | 'ROW_CAP'
  | 'EXECUTION_TIMEOUT_MS'
  | 'EXECUTION_POOL_SIZE'
  | 'ATTEMPT_BUDGET'
  | 'SUCCESS_THRESHOLD'
  | 'MAX_QUESTION_LENGTH'
>;

export interface RuntimeParts {
  dataSource: DataSource;
  cache: ResultCache;
  store: CatalogStore;
  generation: GenerationService;
  discovery?: CatalogDiscovery;
  /** Fixed clock for prompts; defaults to today. */
  today?: () => string;
}

export interface Runtime {
  settings: RuntimeSettings;
  dataSource: DataSource;
  cache: ResultCache;
  catalogs: CatalogRegistry;
  executor: QueryExecutor;
  monitor: RequestMonitor;
  query: QueryService;
  close(): Promise<void>;
}

/**
 * Build the pipeline around already-connected parts.
 */
export function assembleRuntime(settings: RuntimeSettings, parts: RuntimeParts): Runtime {
  const policy: ConfidencePolicy = {
    ...DEFAULT_CONFIDENCE_POLICY,
    successThreshold: settings.SUCCESS_THRESHOLD,
  };
  const today = parts.today ?? (() => new Date().toISOString().slice(0, 10));
  const prompt = (): PromptContext => ({ dialect: dialectName(parts.dataSource.dialect), date: today() });

  const catalogs = new CatalogRegistry(parts.store, parts.cache, parts.discovery);
  const executor = new QueryExecutor(parts.dataSource, parts.cache, {
    poolSize: settings.EXECUTION_POOL_SIZE,
    rowCap: settings.ROW_CAP,
    timeoutMs: settings.EXECUTION_TIMEOUT_MS,
  });
  const supervisor = new Supervisor(
    {
      catalogs,
      reducer: new SchemaContextReducer(settings.REDUCER_MAX_TABLES),
      synthesizer: new Synthesizer(parts.generation, prompt, policy),
      executor,
      corrector: new Corrector(parts.generation, prompt, policy),
    },
    { attemptBudget: settings.ATTEMPT_BUDGET, rowCap: settings.ROW_CAP, policy }
  );
  const monitor = new RequestMonitor();
  const query = new QueryService(supervisor, new Narrator(parts.generation, prompt), monitor, {
    defaultCatalogId: settings.DEFAULT_CATALOG_ID,
  });

  return {
    settings,
    dataSource: parts.dataSource,
    cache: parts.cache,
    catalogs,
    executor,
    monitor,
    query,
    async close() {
      await parts.cache.close();
      await parts.dataSource.close();
    },
  };
}

/**
 * Connect to the configured database, cache and model provider.
 */
export async function createRuntime(config: Config): Promise<Runtime> {
  const { db, dataSource } = await connectDataSource(config.KNEX_CONFIG);
  const cache = createResultCache({
    ttlMs: config.RESULT_CACHE_TTL_SECONDS * 1000,
    capacity: config.RESULT_CACHE_SIZE,
    redisUrl: config.REDIS_URL,
  });

  logger.info(`Catalogs stored in ${config.CATALOG_DIR}`);

  return assembleRuntime(config, {
    dataSource,
    cache,
    store: new FileCatalogStore(config.CATALOG_DIR),
    generation: new AiSdkGenerationService(config.LLM_CONFIG),
    discovery: new CatalogDiscovery(knexIntrospector(db)),
  });
}
