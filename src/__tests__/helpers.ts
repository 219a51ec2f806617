/**
 * Test doubles shared by the suites.
 */

import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { QueryEngine } from '../services/engine.js';
import type { TableData } from '../types/models.js';

/**
 * In-process engine that answers from a function and counts calls.
 */
export class FakeEngine implements QueryEngine {
  runs: string[] = [];
  registrations = 0;

  constructor(private readonly answer: (sql: string) => TableData = answerFortyTwo) {}

  async registerFilesystem(): Promise<void> {
    this.registrations++;
  }

  async run(sql: string): Promise<TableData> {
    this.runs.push(sql);
    return this.answer(sql);
  }
}

export function answerFortyTwo(): TableData {
  return {
    columns: [{ name: 'answer', type: 'INTEGER' }],
    rows: [{ answer: 42 }],
  };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'gsq-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
