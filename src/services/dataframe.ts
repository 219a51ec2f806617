/**
 * In-memory tabular result.
 * Bound as `df` inside --eval-df expressions and scripts.
 */

import type { JsonObject, JsonValue, SortDirection } from '../types/utils.js';
import type { ColumnInfo, TableData } from '../types/models.js';
import { PostProcessError } from '../types/errors.js';

/**
 * Immutable table of named columns. Every transformation returns a new
 * DataFrame so expressions can be chained: df.select('a').head(3)
 */
export class DataFrame {
  readonly columnInfo: readonly ColumnInfo[];
  readonly rows: readonly JsonObject[];

  constructor(columns: readonly ColumnInfo[], rows: readonly JsonObject[]) {
    this.columnInfo = columns;
    this.rows = rows;
  }

  /**
   * Build a DataFrame from plain records; column order follows first appearance.
   */
  static fromRecords(records: readonly JsonObject[]): DataFrame {
    const names: string[] = [];
    for (const record of records) {
      for (const key of Object.keys(record)) {
        if (!names.includes(key)) names.push(key);
      }
    }
    const columns = names.map((name) => ({
      name,
      type: inferColumnType(records.map((r) => r[name] ?? null)),
    }));
    return new DataFrame(columns, records);
  }

  static fromTableData(data: TableData): DataFrame {
    return new DataFrame(data.columns, data.rows);
  }

  get columns(): string[] {
    return this.columnInfo.map((c) => c.name);
  }

  get length(): number {
    return this.rows.length;
  }

  /**
   * [rows, columns]
   */
  get shape(): [number, number] {
    return [this.rows.length, this.columnInfo.length];
  }

  get T(): DataFrame {
    return this.transpose();
  }

  select(...names: string[]): DataFrame {
    const columns = names.map((name) => this.columnOf(name));
    const rows = this.rows.map((row) => pick(row, names));
    return new DataFrame(columns, rows);
  }

  drop(...names: string[]): DataFrame {
    for (const name of names) this.columnOf(name);
    return this.select(...this.columns.filter((c) => !names.includes(c)));
  }

  head(n: number = 5): DataFrame {
    return new DataFrame(this.columnInfo, this.rows.slice(0, Math.max(n, 0)));
  }

  tail(n: number = 5): DataFrame {
    return new DataFrame(this.columnInfo, n > 0 ? this.rows.slice(-n) : []);
  }

  filter(predicate: (row: JsonObject, index: number) => boolean): DataFrame {
    return new DataFrame(this.columnInfo, this.rows.filter(predicate));
  }

  sortBy(name: string, direction: SortDirection = 'asc'): DataFrame {
    this.columnOf(name);
    const sign = direction === 'asc' ? 1 : -1;
    const rows = [...this.rows].sort((a, b) => {
      const x = a[name] ?? null;
      const y = b[name] ?? null;
      // nulls last in both directions
      if (x === null || y === null) return compareValues(x, y);
      return sign * compareValues(x, y);
    });
    return new DataFrame(this.columnInfo, rows);
  }

  /**
   * Values of a single column.
   */
  col(name: string): JsonValue[] {
    this.columnOf(name);
    return this.rows.map((row) => row[name] ?? null);
  }

  rename(mapping: Record<string, string>): DataFrame {
    const renameKey = (key: string): string => mapping[key] ?? key;
    const columns = this.columnInfo.map((c) => ({ ...c, name: renameKey(c.name) }));
    const rows = this.rows.map((row) => {
      const out: JsonObject = {};
      for (const [key, value] of Object.entries(row)) out[renameKey(key)] = value;
      return out;
    });
    return new DataFrame(columns, rows);
  }

  /**
   * Add or replace a column computed from each row.
   */
  assign(name: string, compute: (row: JsonObject, index: number) => JsonValue): DataFrame {
    const rows = this.rows.map((row, i) => ({ ...row, [name]: compute(row, i) }));
    const values = rows.map((row) => row[name] ?? null);
    const column: ColumnInfo = { name, type: inferColumnType(values) };
    const exists = this.columnInfo.some((c) => c.name === name);
    const columns = exists
      ? this.columnInfo.map((c) => (c.name === name ? column : c))
      : [...this.columnInfo, column];
    return new DataFrame(columns, rows);
  }

  /**
   * Columns become rows. The first output column, `column`, holds the
   * original column names; the rest are named by row index.
   */
  transpose(): DataFrame {
    const indexNames = this.rows.map((_, i) => String(i));
    const rows = this.columnInfo.map((c) => {
      const out: JsonObject = { column: c.name };
      this.rows.forEach((row, i) => {
        out[indexNames[i]] = row[c.name] ?? null;
      });
      return out;
    });
    const columns: ColumnInfo[] = [
      { name: 'column', type: 'VARCHAR' },
      ...indexNames.map((name) => ({ name, type: inferColumnType(rows.map((r) => r[name] ?? null)) })),
    ];
    return new DataFrame(columns, rows);
  }

  toRecords(): JsonObject[] {
    return this.rows.map((row) => ({ ...row }));
  }

  toTableData(): TableData {
    return { columns: [...this.columnInfo], rows: this.toRecords() };
  }

  toJSON(): JsonObject[] {
    return this.toRecords();
  }

  toCSV(): string {
    const lines = [this.columns.map(csvCell).join(',')];
    for (const row of this.rows) {
      lines.push(this.columns.map((name) => csvCell(row[name] ?? null)).join(','));
    }
    return lines.join('\n') + '\n';
  }

  toMarkdown(): string {
    const header = `| ${this.columns.join(' | ')} |`;
    const divider = `|${this.columns.map(() => '---').join('|')}|`;
    const body = this.rows.map(
      (row) => `| ${this.columns.map((name) => displayValue(row[name] ?? null).replace(/\|/g, '\\|')).join(' | ')} |`
    );
    return [header, divider, ...body].join('\n');
  }

  private columnOf(name: string): ColumnInfo {
    const column = this.columnInfo.find((c) => c.name === name);
    if (!column) {
      throw new PostProcessError(
        `Unknown column "${name}". Available columns: ${this.columns.join(', ')}`
      );
    }
    return column;
  }
}

/**
 * Render a cell for terminals and markdown.
 */
export function displayValue(value: JsonValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function pick(row: JsonObject, names: string[]): JsonObject {
  const out: JsonObject = {};
  for (const name of names) out[name] = row[name] ?? null;
  return out;
}

function csvCell(value: JsonValue): string {
  const text = displayValue(value);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function compareValues(a: JsonValue, b: JsonValue): number {
  if (a === null) return b === null ? 0 : 1;
  if (b === null) return -1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return displayValue(a).localeCompare(displayValue(b));
}

function inferColumnType(values: JsonValue[]): string {
  const sample = values.find((v) => v !== null);
  if (sample === undefined) return 'NULL';
  if (typeof sample === 'boolean') return 'BOOLEAN';
  if (typeof sample === 'number') return Number.isInteger(sample) ? 'BIGINT' : 'DOUBLE';
  if (typeof sample === 'string') return 'VARCHAR';
  if (Array.isArray(sample)) return 'LIST';
  return 'STRUCT';
}
