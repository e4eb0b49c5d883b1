/**
 * Published catalog snapshots.
 *
 * Each snapshot is frozen when published. A refresh builds a new snapshot
 * and swaps it in; requests that already hold the old one keep using it.
 */

import { Mutex } from 'async-mutex';
import type { SchemaCatalog } from '../../types/models.js';
import { CatalogError } from '../../types/errors.js';
import { deepFreeze } from '../../types/utils.js';
import { logger } from '../../utils/logger.js';
import type { ResultCache } from '../cache/index.js';
import type { CatalogDiscovery } from './discovery.js';
import type { CatalogStore } from './store.js';
import { validateCatalog, type CatalogReport } from './validation.js';

export interface CatalogSummary {
  id: string;
  tables: number;
  relationships: number;
  refreshedAt: string | null;
}

export interface RefreshOutcome {
  catalog: SchemaCatalog;
  warnings: string[];
  /** Cached results dropped because they may describe the old schema. */
  flushed: number;
}

export class CatalogRegistry {
  private snapshots = new Map<string, SchemaCatalog>();
  private readonly lock = new Mutex();
  private readonly log = logger.child({ component: 'catalog' });

  constructor(
    private readonly store: CatalogStore,
    private readonly cache: ResultCache,
    private readonly discovery?: CatalogDiscovery
  ) {}

  /**
   * Current snapshot for an id, loading it from the store on first use.
   */
  async get(id: string): Promise<SchemaCatalog | undefined> {
    const snapshot = this.snapshots.get(id);
    if (snapshot) return snapshot;

    const loaded = await this.store.load(id);
    if (!loaded) return undefined;

    const report = validateCatalog(loaded);
    if (!report.valid) {
      throw new CatalogError(`Catalog "${id}" is invalid`, report.errors);
    }
    // Another caller may have published while we were loading.
    const current = this.snapshots.get(id);
    if (current) return current;

    const frozen = deepFreeze(loaded);
    this.snapshots.set(id, frozen);
    return frozen;
  }

  async list(): Promise<CatalogSummary[]> {
    const ids = new Set([...(await this.store.list()), ...this.snapshots.keys()]);
    const summaries: CatalogSummary[] = [];
    for (const id of [...ids].sort()) {
      const catalog = await this.get(id);
      if (!catalog) continue;
      summaries.push({
        id,
        tables: catalog.tables.length,
        relationships: catalog.relationships.length,
        refreshedAt: catalog.refreshedAt ?? null,
      });
    }
    return summaries;
  }

  /**
   * Validate, persist and swap in a catalog, then flush the result cache.
   *
   * @throws CatalogError when the catalog violates an invariant
   */
  async publish(catalog: SchemaCatalog): Promise<RefreshOutcome> {
    return this.lock.runExclusive(() => this.publishLocked(catalog));
  }

  /**
   * Rediscover a catalog from the data source and publish it.
   */
  async refresh(id: string): Promise<RefreshOutcome> {
    const discovery = this.discovery;
    if (!discovery) {
      throw new CatalogError('Schema discovery is not configured');
    }
    return this.lock.runExclusive(async () => {
      this.log.info(`Refreshing catalog "${id}"`);
      const catalog = await discovery.discover(id);
      return this.publishLocked(catalog);
    });
  }

  private async publishLocked(catalog: SchemaCatalog): Promise<RefreshOutcome> {
    const report: CatalogReport = validateCatalog(catalog);
    if (!report.valid) {
      throw new CatalogError(`Catalog "${catalog.id}" is invalid`, report.errors);
    }
    for (const warning of report.warnings) {
      this.log.warn(`[${catalog.id}] ${warning}`);
    }

    await this.store.save(catalog);
    const frozen = deepFreeze(structuredClone(catalog));
    this.snapshots.set(catalog.id, frozen);

    const flushed = await this.cache.flush();
    this.log.info(`Published catalog "${catalog.id}" (${catalog.tables.length} tables), flushed ${flushed} cached results`);

    return { catalog: frozen, warnings: report.warnings, flushed };
  }
}
