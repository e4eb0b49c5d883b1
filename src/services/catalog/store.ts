/**
 * Catalog persistence.
 */

import { mkdir, readFile, readdir, writeFile, rename } from 'fs/promises';
import { existsSync } from 'fs';
import { join, resolve } from 'path';
import type { SchemaCatalog } from '../../types/models.js';
import { CatalogError } from '../../types/errors.js';
import { CatalogSchema } from './validation.js';

export interface CatalogStore {
  load(id: string): Promise<SchemaCatalog | undefined>;
  save(catalog: SchemaCatalog): Promise<void>;
  list(): Promise<string[]>;
}

const CATALOG_ID = /^[A-Za-z0-9_.-]+$/;

function assertCatalogId(id: string): void {
  if (!CATALOG_ID.test(id) || id.startsWith('.')) {
    throw new CatalogError(`Invalid catalog id "${id}"`);
  }
}

/**
 * One JSON file per catalog under a directory.
 */
export class FileCatalogStore implements CatalogStore {
  private readonly dir: string;

  constructor(dir: string) {
    this.dir = resolve(dir);
  }

  private path(id: string): string {
    assertCatalogId(id);
    return join(this.dir, `${id}.json`);
  }

  async load(id: string): Promise<SchemaCatalog | undefined> {
    const path = this.path(id);
    if (!existsSync(path)) return undefined;

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf-8'));
    } catch (error) {
      throw new CatalogError(`Catalog file ${path} is not valid JSON: ${error}`);
    }

    const parsed = CatalogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogError(
        `Catalog file ${path} is invalid`,
        parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      );
    }
    return parsed.data;
  }

  async save(catalog: SchemaCatalog): Promise<void> {
    const path = this.path(catalog.id);
    await mkdir(this.dir, { recursive: true });
    // Atomic replace: temp file, then rename.
    const tmp = `${path}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(catalog, null, 2), 'utf-8');
    await rename(tmp, path);
  }

  async list(): Promise<string[]> {
    if (!existsSync(this.dir)) return [];
    const files = await readdir(this.dir);
    return files
      .filter((f) => f.endsWith('.json'))
      .map((f) => f.slice(0, -'.json'.length))
      .sort();
  }
}

/**
 * Catalogs held in memory; used by tests and embedded callers.
 */
export class MemoryCatalogStore implements CatalogStore {
  private catalogs = new Map<string, SchemaCatalog>();

  constructor(initial: SchemaCatalog[] = []) {
    for (const catalog of initial) this.catalogs.set(catalog.id, catalog);
  }

  async load(id: string): Promise<SchemaCatalog | undefined> {
    return this.catalogs.get(id);
  }

  async save(catalog: SchemaCatalog): Promise<void> {
    this.catalogs.set(catalog.id, catalog);
  }

  async list(): Promise<string[]> {
    return [...this.catalogs.keys()].sort();
  }
}
