/**
 * Query execution behind the result cache.
 */

import { performance } from 'perf_hooks';
import type { Logger } from 'pino';
import type { QueryEngine } from './engine.js';
import type { CacheProvider } from './cache/index.js';
import { DataFrame } from './dataframe.js';

/**
 * Result of one execution.
 */
export interface ExecuteResult {
  table: DataFrame;
  cacheHit: boolean;

  /**
   * Wall-clock seconds spent in the engine; null on a cache hit
   */
  elapsedSeconds: number | null;

  cachePath: string;
}

/**
 * Runs resolved queries, at most once per distinct query text.
 */
export class QueryExecutor {
  private registered: Promise<void> | null = null;

  constructor(
    private engine: QueryEngine,
    private cache: CacheProvider,
    private logger?: Logger
  ) {}

  async execute(query: string): Promise<ExecuteResult> {
    const timing: { elapsedSeconds: number | null } = { elapsedSeconds: null };

    const lookup = await this.cache.getOrCompute(query, async () => {
      await this.registerFilesystem();

      // engine errors propagate as-is; no retry
      const tick = performance.now();
      const table = await this.engine.run(query);
      timing.elapsedSeconds = (performance.now() - tick) / 1000;
      return table;
    });

    const { elapsedSeconds } = timing;
    if (elapsedSeconds !== null) {
      this.logger?.info({ elapsedSeconds, rows: lookup.table.rows.length }, 'Query executed');
    }

    return {
      table: DataFrame.fromTableData(lookup.table),
      cacheHit: lookup.hit,
      elapsedSeconds,
      cachePath: lookup.path,
    };
  }

  /**
   * Once per executor, before the first fresh compute. Retried after a failure.
   */
  private registerFilesystem(): Promise<void> {
    if (!this.registered) {
      this.registered = this.engine.registerFilesystem().catch((error: unknown) => {
        this.registered = null;
        throw error;
      });
    }
    return this.registered;
  }
}
