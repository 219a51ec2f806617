/**
 * DuckDB query engine.
 * Runs SQL in-process and reads gs:// Parquet files through the httpfs extension.
 */

import type { DuckDBConnection } from '@duckdb/node-api';
import type { Logger } from 'pino';
import type { ColumnInfo, TableData } from '../types/models.js';
import type { JsonObject, JsonValue } from '../types/utils.js';

const WIDE_INTEGER_TYPES = new Set(['BIGINT', 'UBIGINT', 'HUGEINT', 'UHUGEINT']);
const LIST_TYPE = /^(.+)\[\d*\]$/;

/**
 * Anything that can run a SQL string and return a table.
 */
export interface QueryEngine {
  /**
   * Make remote storage (gs://) readable. Safe to call more than once.
   */
  registerFilesystem(): Promise<void>;

  run(sql: string): Promise<TableData>;
}

export class DuckDBEngine implements QueryEngine {
  private connection: Promise<DuckDBConnection> | null = null;
  private filesystem: Promise<void> | null = null;

  constructor(
    private readonly path: string = ':memory:',
    private readonly logger?: Logger
  ) {}

  registerFilesystem(): Promise<void> {
    if (!this.filesystem) {
      // a failed INSTALL (e.g. offline) is retried on the next call
      this.filesystem = this.loadHttpfs().catch((error: unknown) => {
        this.filesystem = null;
        throw error;
      });
    }
    return this.filesystem;
  }

  async run(sql: string): Promise<TableData> {
    const connection = await this.connect();
    const reader = await connection.runAndReadAll(sql);
    const names = reader.columnNames();
    const types = reader.columnTypes();
    const columns = names.map((name, i) => ({ name, type: types[i].toString() }));

    return { columns, rows: normalizeRows(columns, reader.getRowObjectsJson()) };
  }

  private connect(): Promise<DuckDBConnection> {
    if (!this.connection) {
      this.connection = this.open();
    }
    return this.connection;
  }

  private async open(): Promise<DuckDBConnection> {
    // native bindings load on first use, not on import
    const { DuckDBInstance } = await import('@duckdb/node-api');
    const instance = await DuckDBInstance.create(this.path);
    this.logger?.debug({ path: this.path }, 'Opened DuckDB');
    return instance.connect();
  }

  private async loadHttpfs(): Promise<void> {
    const connection = await this.connect();
    await connection.run('INSTALL httpfs');
    await connection.run('LOAD httpfs');
    this.logger?.debug('Registered httpfs for gs:// paths');
  }
}

/**
 * DuckDB's JSON conversion renders 64/128-bit integers and DECIMALs as
 * strings. Turn them back into numbers where that is exact, so `df`
 * sorts, filters and does arithmetic on them. Integers outside the safe
 * range stay strings.
 */
export function normalizeRows(columns: readonly ColumnInfo[], rows: readonly JsonObject[]): JsonObject[] {
  return rows.map((row) => {
    const out: JsonObject = { ...row };
    for (const { name, type } of columns) {
      const value = row[name];
      if (value !== undefined) out[name] = normalizeValue(type, value);
    }
    return out;
  });
}

function normalizeValue(type: string, value: JsonValue): JsonValue {
  if (typeof value === 'string') {
    if (WIDE_INTEGER_TYPES.has(type)) {
      const n = Number(value);
      return Number.isSafeInteger(n) ? n : value;
    }
    if (type.startsWith('DECIMAL')) {
      const n = Number(value);
      return Number.isFinite(n) ? n : value;
    }
    return value;
  }
  const list = LIST_TYPE.exec(type);
  if (list && Array.isArray(value)) {
    return value.map((item) => normalizeValue(list[1], item));
  }
  return value;
}
