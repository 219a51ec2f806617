/**
 * Content-addressed result cache on the local filesystem.
 * One JSON file per distinct resolved query, named by the MD5 of its text.
 */

import { createHash, randomUUID } from 'crypto';
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import type { Logger } from 'pino';
import { CacheFileSchema, type CacheFile, type TableData } from '../../types/models.js';
import { CacheError } from '../../types/errors.js';
import type { CacheEntryInfo, CacheLookup, CacheProvider, LayerStats } from './types.js';

const ENTRY_PATTERN = /^cache_([0-9a-f]{32})\.json$/;

/**
 * File-backed cache. Entries never expire; a hit always short-circuits
 * compute, so an entry is written at most once per key in one process.
 *
 * Writes go through a temporary file and a rename, so readers never see
 * a partial entry. Two processes missing on the same key at once will
 * both compute and the last rename wins.
 */
export class FileCache implements CacheProvider {
  private ready: Promise<void> | null = null;
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly cacheDir: string,
    private readonly logger?: Logger
  ) {}

  /**
   * MD5 of the UTF-8 query text, as 32 hex characters.
   */
  keyFor(query: string): string {
    return createHash('md5').update(query, 'utf8').digest('hex');
  }

  pathFor(query: string): string {
    return join(this.cacheDir, `cache_${this.keyFor(query)}.json`);
  }

  async getOrCompute(query: string, compute: () => Promise<TableData>): Promise<CacheLookup> {
    await this.ensureDir();
    const path = this.pathFor(query);

    const cached = await this.read(path);
    if (cached) {
      this.hits++;
      this.logger?.info({ path }, 'Loading from cache');
      return { table: { columns: cached.columns, rows: cached.rows }, hit: true, path };
    }

    this.misses++;
    const table = await compute();
    await this.write(path, {
      version: 1,
      query,
      createdAt: new Date().toISOString(),
      columns: table.columns,
      rows: table.rows,
    });
    this.logger?.info({ path }, 'Query cached');
    return { table, hit: false, path };
  }

  async list(): Promise<CacheEntryInfo[]> {
    const names = await this.entryNames();
    const entries: CacheEntryInfo[] = [];

    for (const name of names) {
      const path = join(this.cacheDir, name);
      const entry = await this.read(path);
      if (!entry) continue; // removed since readdir
      const info = await stat(path);
      entries.push({
        key: name.replace(ENTRY_PATTERN, '$1'),
        path,
        query: entry.query,
        createdAt: new Date(entry.createdAt),
        rows: entry.rows.length,
        sizeBytes: info.size,
      });
    }

    return entries.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async clear(): Promise<number> {
    const names = await this.entryNames();
    await Promise.all(names.map((name) => rm(join(this.cacheDir, name), { force: true })));
    this.hits = 0;
    this.misses = 0;
    this.logger?.info({ removed: names.length, dir: this.cacheDir }, 'Cache cleared');
    return names.length;
  }

  getStats(): LayerStats {
    return {
      hits: this.hits,
      misses: this.misses,
    };
  }

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.cacheDir, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }

  private async entryNames(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.cacheDir);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    return names.filter((name) => ENTRY_PATTERN.test(name)).sort();
  }

  /**
   * Decode the entry at `path`; null when there is no file.
   */
  private async read(path: string): Promise<CacheFile | null> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CacheError(`Cache entry is not valid JSON: ${path}`, path, { cause: error });
    }

    const parsed = CacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CacheError(
        `Cache entry has an unexpected shape: ${path} (${parsed.error.issues[0]?.message ?? 'invalid'})`,
        path
      );
    }
    return parsed.data;
  }

  private async write(path: string, entry: CacheFile): Promise<void> {
    const tmp = `${path}.${randomUUID()}.tmp`;
    try {
      await writeFile(tmp, JSON.stringify(entry), 'utf8');
      await rename(tmp, path);
    } catch (error) {
      await rm(tmp, { force: true });
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
