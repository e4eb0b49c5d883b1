import type { SchemaCatalog } from '../src/types/models.js';
import type { Row } from '../src/types/utils.js';
import type { DataSource, RunOptions } from '../src/services/database.js';
import type { GenerationRequest, GenerationService } from '../src/services/generation.js';
import type { PromptContext } from '../src/services/prompts.js';
import { MemoryResultCache } from '../src/services/cache/memory.js';
import type { CatalogDiscovery } from '../src/services/catalog/discovery.js';
import { MemoryCatalogStore } from '../src/services/catalog/store.js';
import { assembleRuntime, type Runtime, type RuntimeSettings } from '../src/runtime.js';

export const shopCatalog: SchemaCatalog = {
  id: 'shop',
  tables: [
    {
      name: 'orders',
      alias: 'Orders',
      columns: [
        { name: 'id', type: 'integer', role: 'identifier', primaryKey: true },
        { name: 'customer_id', type: 'integer', role: 'identifier' },
        { name: 'order_date', type: 'date', role: 'date' },
        { name: 'revenue', type: 'decimal', role: 'amount' },
        { name: 'status', type: 'varchar', role: 'status' },
      ],
    },
    {
      name: 'customers',
      alias: 'Customers',
      columns: [
        { name: 'id', type: 'integer', role: 'identifier', primaryKey: true },
        { name: 'name', type: 'varchar', role: 'name' },
        { name: 'region', type: 'varchar', role: 'status' },
      ],
    },
  ],
  relationships: [
    {
      sourceTable: 'orders',
      targetTable: 'customers',
      joinKeys: [{ source: 'customer_id', target: 'id' }],
      cardinality: 'many_to_one',
    },
  ],
};

export const promptContext = (): PromptContext => ({ dialect: 'SQLite', date: '2024-06-30' });

export type Reply = string | Error | ((request: GenerationRequest) => string | Error);

/**
 * Generation stand-in: answers from a script, repeating the last reply.
 */
export class ScriptedGeneration implements GenerationService {
  readonly calls: GenerationRequest[] = [];

  constructor(private readonly replies: Reply[]) {}

  async generate(request: GenerationRequest): Promise<string> {
    this.calls.push(request);
    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    const value = typeof reply === 'function' ? reply(request) : reply;
    if (value instanceof Error) throw value;
    return value;
  }
}

export type Handler = (sql: string, options: RunOptions) => Row[] | Error | Promise<Row[]>;

/**
 * Data source stand-in that records every statement it receives.
 */
export class FakeDataSource implements DataSource {
  readonly dialect = 'better-sqlite3';
  readonly statements: string[] = [];
  closed = false;

  constructor(private readonly handler: Handler = () => []) {}

  async run(sql: string, options: RunOptions): Promise<Row[]> {
    this.statements.push(sql);
    const result = await this.handler(sql, options);
    if (result instanceof Error) throw result;
    return result;
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const testSettings: RuntimeSettings = {
  DEFAULT_CATALOG_ID: 'shop',
  REDUCER_MAX_TABLES: 5,
  ROW_CAP: 1000,
  EXECUTION_TIMEOUT_MS: 5000,
  EXECUTION_POOL_SIZE: 2,
  ATTEMPT_BUDGET: 3,
  SUCCESS_THRESHOLD: 0.5,
  MAX_QUESTION_LENGTH: 200,
};

export interface TestRuntime {
  runtime: Runtime;
  generation: ScriptedGeneration;
  dataSource: FakeDataSource;
  store: MemoryCatalogStore;
}

/**
 * Full pipeline over in-process stand-ins, seeded with the shop catalog.
 */
export function buildRuntime(replies: Reply[], handler?: Handler, discovery?: CatalogDiscovery): TestRuntime {
  const generation = new ScriptedGeneration(replies);
  const dataSource = new FakeDataSource(handler);
  const store = new MemoryCatalogStore([shopCatalog]);
  const runtime = assembleRuntime(testSettings, {
    dataSource,
    cache: new MemoryResultCache({ ttlMs: 60_000, capacity: 100 }),
    store,
    generation,
    discovery,
    today: () => '2024-06-30',
  });
  return { runtime, generation, dataSource, store };
}

/**
 * Answers narration prompts with `narrative` and everything else with `sql`.
 */
export function answering(sql: string, narrative: string): Reply {
  return (request) => (request.prompt.includes('Rows (') ? narrative : sql);
}
