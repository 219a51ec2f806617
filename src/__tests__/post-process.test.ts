import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import { PostProcessor } from '../services/post-process.js';
import { DataFrame } from '../services/dataframe.js';
import { PostProcessError } from '../types/errors.js';
import { makeTempDir, removeDir } from './helpers.js';

const frame = (): DataFrame =>
  DataFrame.fromRecords([
    { a: 1, b: 'x' },
    { a: 2, b: 'y' },
    { a: 3, b: 'z' },
  ]);

describe('PostProcessor', () => {
  describe('evaluate', () => {
    it('binds the input as df', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      const result = processor.evaluate("df.select('a')", frame());

      expect(result).toBeInstanceOf(DataFrame);
      expect(result).toMatchObject({ columns: ['a'] });
    });

    it('returns plain values', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      expect(processor.evaluate('df.length', frame())).toBe(3);
      expect(processor.evaluate("df.col('b').join('')", frame())).toBe('xyz');
    });

    it('binds the resolved query', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      expect(processor.evaluate('query.length', frame(), { query: 'SELECT 1' })).toBe(8);
      expect(processor.evaluate('typeof query', frame())).toBe('undefined');
    });

    it('reports each step', () => {
      const onStep = vi.fn();
      const processor = new PostProcessor({ nestedSteps: 'sequential', onStep });

      processor.evaluate('df.length', frame());

      expect(onStep).toHaveBeenCalledWith('df.length', 3);
    });

    it('wraps failures in PostProcessError with the expression', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      let caught: unknown;
      try {
        processor.evaluate('df.nope()', frame());
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(PostProcessError);
      expect(caught).toMatchObject({ source: 'df.nope()' });
      expect(String(caught)).toContain('Expression failed: TypeError');
    });

    it('wraps unknown column errors', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      expect(() => processor.evaluate("df.select('missing')", frame())).toThrow(PostProcessError);
    });
  });

  describe('apply', () => {
    it('returns the input when there are no steps', () => {
      const input = frame();
      expect(new PostProcessor({ nestedSteps: 'sequential' }).apply([], input)).toBe(input);
    });

    it('feeds each result into the next step', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      const result = processor.apply(["df.sortBy('a', 'desc')", 'df.head(1)', "df.col('a')"], frame());

      expect(result).toEqual([3]);
    });

    it('applies every element of a nested list in sequential mode', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      const result = processor.apply([['df.head(2)', 'df.length']], frame());

      expect(result).toBe(2);
    });

    it('applies only the first step in first mode', () => {
      const onStep = vi.fn();
      const processor = new PostProcessor({ nestedSteps: 'first', onStep });

      const result = processor.apply(['df.head(2)', 'df.length'], frame());

      expect(result).toBeInstanceOf(DataFrame);
      expect(result).toMatchObject({ length: 2 });
      expect(onStep).toHaveBeenCalledTimes(1);
    });

    it('applies only the first element of a leading nested list in first mode', () => {
      const onStep = vi.fn();
      const processor = new PostProcessor({ nestedSteps: 'first', onStep });

      const result = processor.apply([['df.length', 'df.head(2)'], "df.col('a')"], frame());

      expect(result).toBe(3);
      expect(onStep).toHaveBeenCalledTimes(1);
    });

    it('stops at the first failing step', () => {
      const onStep = vi.fn();
      const processor = new PostProcessor({ nestedSteps: 'sequential', onStep });

      expect(() => processor.apply(['df.head(1)', 'df.nope()', 'df.length'], frame())).toThrow(PostProcessError);
      expect(onStep).toHaveBeenCalledTimes(1);
    });
  });

  describe('runScript', () => {
    it('returns df after the script reassigns it', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      const result = processor.runScript("df = df.filter((row) => row.a > 1).select('b')", frame());

      expect(result).toBeInstanceOf(DataFrame);
      expect(result).toMatchObject({ columns: ['b'], length: 2 });
    });

    it('keeps the input when df is not reassigned', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });
      const input = frame();

      expect(processor.runScript('const n = df.length + 1;', input)).toBe(input);
    });

    it('sends print and printJson output to the print hook', () => {
      const print = vi.fn();
      const processor = new PostProcessor({ nestedSteps: 'sequential', print });

      processor.runScript("print('rows', df.length); printJson({ ok: true });", frame());

      expect(print.mock.calls).toEqual([['rows'], [3], ['{\n  "ok": true\n}']]);
    });

    it('reports the script before running it', () => {
      const onScript = vi.fn();
      const processor = new PostProcessor({ nestedSteps: 'sequential', onScript });

      processor.runScript('df = df.head(1)', frame());

      expect(onScript).toHaveBeenCalledWith('df = df.head(1)');
    });

    it('wraps failures in PostProcessError', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      expect(() => processor.runScript("throw new Error('boom')", frame())).toThrow('Script failed: Error: boom');
    });

    it('sees the resolved query', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      const result = processor.runScript("df = query.toLowerCase()", frame(), { query: 'SELECT 1' });

      expect(result).toBe('select 1');
    });

    it('exposes the DataFrame constructor', () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      const result = processor.runScript('df = DataFrame.fromRecords([{ n: df.length }])', frame());

      expect(result).toBeInstanceOf(DataFrame);
      expect(result).toMatchObject({ columns: ['n'] });
    });
  });

  describe('runScriptFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('runs a script read from disk', async () => {
      const path = join(dir, 'top.js');
      await writeFile(path, "\ndf = df.sortBy('a', 'desc').head(1)\n", 'utf8');
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      const result = await processor.runScriptFile(path, frame());

      expect(result).toBeInstanceOf(DataFrame);
      expect(result).toMatchObject({ rows: [{ a: 3, b: 'z' }] });
    });

    it('rejects when the file is missing', async () => {
      const processor = new PostProcessor({ nestedSteps: 'sequential' });

      await expect(processor.runScriptFile(join(dir, 'missing.js'), frame())).rejects.toMatchObject({
        code: 'ENOENT',
      });
    });
  });
});
