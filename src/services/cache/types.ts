/**
 * Cache Interface Definitions
 * Contract for the query result store used by QueryExecutor.
 */

import type { TableData } from '../../types/models.js';

/**
 * Outcome of a cache lookup.
 */
export interface CacheLookup {
  /**
   * Cached or freshly computed result
   */
  readonly table: TableData;

  /**
   * True when the result was read from disk and compute was not called
   */
  readonly hit: boolean;

  /**
   * File backing this entry
   */
  readonly path: string;
}

/**
 * Summary of one on-disk entry, for "gsq cache list".
 */
export interface CacheEntryInfo {
  key: string;
  path: string;
  query: string;
  createdAt: Date;
  rows: number;
  sizeBytes: number;
}

/**
 * Statistics for the cache since this process started.
 */
export interface LayerStats {
  /**
   * Number of cache hits
   */
  hits: number;

  /**
   * Number of cache misses
   */
  misses: number;
}

export interface CacheProvider {
  /**
   * Return the stored result for `query`, or compute, store and return it.
   * `compute` is never called on a hit.
   */
  getOrCompute(query: string, compute: () => Promise<TableData>): Promise<CacheLookup>;

  /**
   * File path an entry for `query` lives at, whether or not it exists.
   */
  pathFor(query: string): string;

  list(): Promise<CacheEntryInfo[]>;

  /**
   * Delete every entry. Returns the number removed.
   */
  clear(): Promise<number>;

  getStats(): LayerStats;
}
