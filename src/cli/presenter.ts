/**
 * Renders queries and results for the terminal.
 * Verbose mode decorates every stage; silent mode prints only the final value.
 */

import Table from 'cli-table3';
import chalk from 'chalk';
import { DataFrame, displayValue } from '../services/dataframe.js';
import type { ExecuteResult } from '../services/executor.js';
import * as logger from './logger.js';

/**
 * Plain-text rendering of any post-processing value.
 */
export function renderValue(value: unknown, colors: boolean = true): string {
  if (value instanceof DataFrame) {
    return renderTable(value, colors);
  }
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return 'undefined';
  }
  return JSON.stringify(value, null, 2) ?? String(value);
}

function renderTable(df: DataFrame, colors: boolean): string {
  const table = new Table({
    head: df.columns,
    style: colors ? { head: ['green'], border: ['gray'] } : { head: [], border: [] },
  });
  for (const row of df.rows) {
    table.push(df.columns.map((name) => displayValue(row[name] ?? null)));
  }
  const [rows, columns] = df.shape;
  return `${table.toString()}\n${rows} rows × ${columns} columns`;
}

export class Presenter {
  constructor(private readonly verbose: boolean) {}

  printQuery(sql: string): void {
    if (!this.verbose) return;
    logger.label('In', 'query');
    logger.code(sql, 'sql');
  }

  printExecution(result: ExecuteResult): void {
    if (!this.verbose) return;
    if (result.cacheHit) {
      console.log(chalk.bold.yellow(`Loading from cache: ${result.cachePath}`));
    } else {
      console.log(`Query cached: ${result.cachePath}`);
      if (result.elapsedSeconds !== null) {
        console.log(`Query took: ${result.elapsedSeconds.toFixed(2)} seconds`);
      }
    }
  }

  /**
   * Show an intermediate result; nothing in silent mode.
   */
  printStage(value: unknown, key: string): void {
    if (!this.verbose) return;
    logger.label('Out', key);
    console.log(renderValue(value));
  }

  printStep(expression: string, value: unknown): void {
    if (!this.verbose) return;
    logger.label('In', 'eval-df');
    console.log(expression);
    this.printStage(value, 'eval-df');
  }

  printScript(script: string): void {
    if (!this.verbose) return;
    logger.label('In', 'script');
    logger.code(script, 'js');
    logger.label('Out', 'script');
  }

  /**
   * The final value is always printed; undecorated in silent mode.
   */
  printResult(value: unknown, key: string = 'df'): void {
    if (this.verbose) {
      logger.label('Out', key);
    }
    console.log(renderValue(value, this.verbose));
  }

  /**
   * The SQL a failed execution ran, on stderr in both modes.
   */
  printFailedQuery(sql: string): void {
    console.error(chalk.dim('Failed query:'));
    console.error(sql);
  }

  /**
   * Values passed to print()/printJson() from scripts.
   */
  printUser(value: unknown): void {
    console.log(renderValue(value, this.verbose));
  }

  startSpinner(text: string): { succeed(text?: string): void; fail(text?: string): void } | null {
    if (!this.verbose) return null;
    const spin = logger.spinner(text);
    return {
      succeed: (t) => {
        spin.succeed(t);
      },
      fail: (t) => {
        spin.fail(t);
      },
    };
  }
}
