/**
 * Result cache contract.
 * Keys are query fingerprints; values are the rows a query produced.
 */

import type { CacheStats } from '../../types/models.js';
import type { Row } from '../../types/utils.js';

export interface ResultCache {
  /**
   * Rows stored under a fingerprint, or undefined when absent or expired.
   * Counts a hit or a miss.
   */
  get(fingerprint: string): Promise<Row[] | undefined>;

  /**
   * Store rows unless a live entry already exists. The first writer wins;
   * returns whether this call stored the rows.
   */
  setIfAbsent(fingerprint: string, rows: Row[]): Promise<boolean>;

  /**
   * Drop every entry. Returns the number of entries removed.
   */
  flush(): Promise<number>;

  getStats(): Promise<CacheStats>;

  /**
   * Returns 'memory' or 'redis' for diagnostics.
   */
  getType(): CacheStats['backend'];

  close(): Promise<void>;
}

export interface ResultCacheOptions {
  ttlMs: number;
  capacity: number;
}
