/**
 * Usage examples shown by `gsq --examples`.
 */

import chalk from 'chalk';
import * as logger from './logger.js';

export const EXAMPLES: Array<{ title: string; commands: string[] }> = [
  {
    title: 'Quick start',
    commands: ['gsq --query "SELECT 42"'],
  },
  {
    title: 'Silent mode',
    commands: ['gsq --query "SELECT 42" --silent'],
  },
  {
    title: 'All queries are cached',
    commands: [
      `gsq --query "FROM read_parquet('gs://bucket/**/*.parquet') LIMIT 1"`,
      `gsq --query "FROM read_parquet('gs://bucket/**/*.parquet') LIMIT 1"`,
    ],
  },
  {
    title: 'Simplify queries using placeholders',
    commands: [
      `gsq --bucket "bucket/**/*.parquet" --query "SELECT * FROM read_parquet('{bucket}')"`,
    ],
  },
  {
    title: 'This is equivalent to',
    commands: [
      `gsq --query "FROM read_parquet('{bucket}') LIMIT 1" --kwargs "{'bucket': 'gs://bucket/**/*.parquet'}"`,
    ],
  },
  {
    title: 'More placeholders',
    commands: [
      `gsq --bucket "gs://bucket/**/*.parquet" --query "SELECT {cols} FROM read_parquet('{bucket}')" --kwargs "{'cols': 'bidfloor, hour'}"`,
    ],
  },
  {
    title: 'Or environment variables',
    commands: [`GSQ_BUCKET=gs://bucket/**/*.parquet gsq --query "SELECT 42 FROM read_parquet('{bucket}')"`],
  },
  {
    title: 'From a file',
    commands: [
      `echo "SELECT * FROM read_parquet('gs://bucket/*.parquet') LIMIT 1" > /tmp/query.sql`,
      'gsq --query-file /tmp/query.sql',
    ],
  },
  {
    title: 'Modify the output',
    commands: [
      'gsq --query-file /tmp/query.sql --eval-df "df.T"',
      'gsq --query-file /tmp/query.sql --eval-df "df.columns"',
      'gsq --query-file /tmp/query.sql --eval-df "df.toMarkdown()"',
      `gsq --query-file /tmp/query.sql --eval-df "df.select('hour').head(3)"`,
    ],
  },
  {
    title: "Pick columns (df[['a']] has no JavaScript equivalent; use select)",
    commands: [`gsq --query-file /tmp/query.sql --eval-df "df.select('hour', 'bidfloor')"`],
  },
  {
    title: 'The resolved query is available as `query`',
    commands: ['gsq --query-file /tmp/query.sql --eval-df "query.length"'],
  },
  {
    title: 'Run a script (assign df to keep changes)',
    commands: [`gsq --query-file /tmp/query.sql --script "print(df.shape); df = df.tail(2)"`],
  },
  {
    title: 'Save the output to a file',
    commands: ['gsq --query-file /tmp/query.sql --eval-df "df.toCSV()" -s > /tmp/out.csv'],
  },
  {
    title: 'Manage the cache',
    commands: ['gsq cache list', 'gsq cache clear'],
  },
];

export function printExamples(): void {
  logger.printBanner();
  for (const example of EXAMPLES) {
    console.log(chalk.yellow(`${example.title}:`));
    console.log('');
    for (const command of example.commands) {
      console.log(`  $ ${command}`);
    }
    console.log('');
  }
}
