import { describe, it, expect } from 'vitest';
import { DataFrame, displayValue } from '../services/dataframe.js';
import { PostProcessError } from '../types/errors.js';

const people = (): DataFrame =>
  DataFrame.fromRecords([
    { name: 'ada', age: 36 },
    { name: 'alan', age: null },
    { name: 'grace', age: 85 },
  ]);

describe('DataFrame', () => {
  describe('construction', () => {
    it('orders columns by first appearance and fills gaps with null', () => {
      const df = DataFrame.fromRecords([{ a: 1 }, { b: 'two' }]);

      expect(df.columns).toEqual(['a', 'b']);
      expect(df.col('b')).toEqual([null, 'two']);
    });

    it('infers column types from the first non-null value', () => {
      const df = DataFrame.fromRecords([
        { i: null, f: 1.5, s: 'x', b: true, l: [1], o: { k: 1 } },
        { i: 3, f: 2, s: 'y', b: false, l: [], o: null },
      ]);

      expect(df.columnInfo.map((c) => c.type)).toEqual(['BIGINT', 'DOUBLE', 'VARCHAR', 'BOOLEAN', 'LIST', 'STRUCT']);
    });

    it('keeps engine column types from table data', () => {
      const df = DataFrame.fromTableData({
        columns: [{ name: 'answer', type: 'INTEGER' }],
        rows: [{ answer: 42 }],
      });

      expect(df.columnInfo).toEqual([{ name: 'answer', type: 'INTEGER' }]);
      expect(df.shape).toEqual([1, 1]);
    });
  });

  describe('selection', () => {
    it('selects columns in the requested order', () => {
      expect(people().select('age', 'name').columns).toEqual(['age', 'name']);
    });

    it('drops columns', () => {
      expect(people().drop('age').toRecords()).toEqual([{ name: 'ada' }, { name: 'alan' }, { name: 'grace' }]);
    });

    it('rejects unknown columns', () => {
      expect(() => people().select('email')).toThrow(PostProcessError);
      expect(() => people().col('email')).toThrow('Unknown column "email". Available columns: name, age');
    });

    it('takes head and tail slices', () => {
      expect(people().head(2).col('name')).toEqual(['ada', 'alan']);
      expect(people().tail(1).col('name')).toEqual(['grace']);
      expect(people().tail(0).length).toBe(0);
      expect(people().head().length).toBe(3);
    });

    it('filters rows', () => {
      expect(people().filter((row) => row.age !== null).col('name')).toEqual(['ada', 'grace']);
    });
  });

  describe('sortBy', () => {
    it('sorts ascending with nulls last', () => {
      expect(people().sortBy('age').col('age')).toEqual([36, 85, null]);
    });

    it('sorts descending with nulls last', () => {
      expect(people().sortBy('age', 'desc').col('age')).toEqual([85, 36, null]);
    });

    it('sorts strings', () => {
      expect(people().sortBy('name', 'desc').col('name')).toEqual(['grace', 'alan', 'ada']);
    });

    it('leaves the original untouched', () => {
      const df = people();
      df.sortBy('age', 'desc');
      expect(df.col('name')).toEqual(['ada', 'alan', 'grace']);
    });
  });

  describe('reshaping', () => {
    it('renames columns', () => {
      const df = people().rename({ age: 'years' });

      expect(df.columns).toEqual(['name', 'years']);
      expect(df.col('years')).toEqual([36, null, 85]);
    });

    it('assigns a new column', () => {
      const df = people().assign('senior', (row) => typeof row.age === 'number' && row.age > 60);

      expect(df.columns).toEqual(['name', 'age', 'senior']);
      expect(df.col('senior')).toEqual([false, false, true]);
      expect(df.columnInfo[2]).toEqual({ name: 'senior', type: 'BOOLEAN' });
    });

    it('replaces an existing column in place', () => {
      const df = people().assign('age', (_, i) => i);

      expect(df.columns).toEqual(['name', 'age']);
      expect(df.col('age')).toEqual([0, 1, 2]);
    });

    it('transposes with a leading column of names', () => {
      const df = DataFrame.fromRecords([
        { a: 1, b: 'x' },
        { a: 2, b: 'y' },
      ]).T;

      expect(df.columns).toEqual(['column', '0', '1']);
      expect(df.toRecords()).toEqual([
        { column: 'a', '0': 1, '1': 2 },
        { column: 'b', '0': 'x', '1': 'y' },
      ]);
    });
  });

  describe('output', () => {
    it('writes CSV with quoting', () => {
      const df = DataFrame.fromRecords([
        { a: 1, b: 'x,y' },
        { a: null, b: 'say "hi"' },
      ]);

      expect(df.toCSV()).toBe('a,b\n1,"x,y"\n,"say ""hi"""\n');
    });

    it('writes a markdown table', () => {
      const df = DataFrame.fromRecords([{ a: 1, b: 'x|y' }]);

      expect(df.toMarkdown()).toBe('| a | b |\n|---|---|\n| 1 | x\\|y |');
    });

    it('serializes to records', () => {
      expect(JSON.stringify(people().head(1))).toBe('[{"name":"ada","age":36}]');
    });

    it('returns copies from toRecords', () => {
      const df = people();
      const records = df.toRecords();
      records[0].name = 'changed';

      expect(df.col('name')[0]).toBe('ada');
    });
  });
});

describe('displayValue', () => {
  it('renders null as empty and nested values as JSON', () => {
    expect(displayValue(null)).toBe('');
    expect(displayValue({ k: [1, 2] })).toBe('{"k":[1,2]}');
    expect(displayValue(false)).toBe('false');
  });
});
