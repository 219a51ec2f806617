#!/usr/bin/env node
/**
 * gsq CLI - DuckDB SQL over Parquet files in Google Cloud Storage
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import chalk from 'chalk';
import { loadConfig, type Config } from './config.js';
import { QueryPipeline } from './pipeline.js';
import { FileCache } from './services/cache/index.js';
import { ConfigError, UnresolvedPlaceholderError, UsageError } from './types/errors.js';
import { logger as log } from './utils/logger.js';
import { printExamples } from './cli/examples.js';
import { OPTION_HELP } from './cli/help.js';
import * as logger from './cli/logger.js';

interface QueryFlags {
  query?: string;
  queryFile?: string;
  bucket?: string;
  kwargs?: string;
  silent: boolean;
  examples: boolean;
  evalDf: string[];
  script?: string;
  scriptFile?: string;
  strict: boolean;
  cacheDir?: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Print a fatal error and exit 1.
 */
function fail(error: unknown): never {
  if (error instanceof UsageError || error instanceof ConfigError || error instanceof UnresolvedPlaceholderError) {
    logger.error(error.message);
  } else if (error instanceof Error) {
    log.debug({ err: error }, 'Fatal error');
    logger.error(error.message, 'Set LOG_LEVEL=DEBUG for the stack trace');
  } else {
    logger.error(String(error));
  }
  process.exit(1);
}

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    fail(error);
  }
}

const program = new Command();

program
  .name('gsq')
  .description('Query Parquet files in Google Cloud Storage with DuckDB SQL. Every result is cached.')
  .version('0.1.0')
  .option('-q, --query <sql>', OPTION_HELP.query)
  .option('-f, --query-file <path>', OPTION_HELP.queryFile)
  .option('-b, --bucket <bucket>', OPTION_HELP.bucket)
  .option('-k, --kwargs <mapping>', OPTION_HELP.kwargs)
  .option('-s, --silent', OPTION_HELP.silent, false)
  .option('-x, --examples', OPTION_HELP.examples, false)
  .option('-e, --eval-df <expression>', OPTION_HELP.evalDf, collect, [])
  .option('-S, --script <code>', OPTION_HELP.script)
  .option('-F, --script-file <path>', OPTION_HELP.scriptFile)
  .option('--strict', OPTION_HELP.strict, false)
  .option('--cache-dir <dir>', OPTION_HELP.cacheDir)
  .action(async (flags: QueryFlags) => {
    if (flags.examples) {
      printExamples();
      return;
    }

    const config = readConfig();
    const pipeline = QueryPipeline.fromConfig(
      { ...config, GSQ_CACHE_DIR: flags.cacheDir ?? config.GSQ_CACHE_DIR },
      { verbose: !flags.silent, strict: flags.strict, logger: log }
    );

    try {
      await pipeline.run({
        query: flags.query,
        queryFile: flags.queryFile,
        bucket: flags.bucket ?? config.GSQ_BUCKET,
        kwargs: flags.kwargs ?? config.GSQ_KWARGS,
        evalDf: flags.evalDf,
        script: flags.script,
        scriptFile: flags.scriptFile,
      });
    } catch (error) {
      fail(error);
    }
  });

const cacheCommand = program
  .command('cache')
  .description('Inspect or clear cached results')
  .option('--cache-dir <dir>', OPTION_HELP.cacheDir);

function openCache(): FileCache {
  const { cacheDir } = cacheCommand.opts<{ cacheDir?: string }>();
  return new FileCache(cacheDir ?? readConfig().GSQ_CACHE_DIR, log);
}

cacheCommand
  .command('list')
  .description('List cached queries')
  .action(async () => {
    try {
      const entries = await openCache().list();
      if (entries.length === 0) {
        logger.info('Cache is empty');
        return;
      }
      const table = new Table({
        head: ['key', 'created', 'rows', 'size', 'query'],
        style: { head: ['green'], border: ['gray'] },
      });
      for (const entry of entries) {
        table.push([
          entry.key,
          entry.createdAt.toISOString(),
          String(entry.rows),
          `${(entry.sizeBytes / 1024).toFixed(1)} KB`,
          entry.query.replace(/\s+/g, ' ').slice(0, 60),
        ]);
      }
      console.log(table.toString());

      const totalBytes = entries.reduce((sum, entry) => sum + entry.sizeBytes, 0);
      logger.box(
        `${entries.length} ${entries.length === 1 ? 'entry' : 'entries'}, ${(totalBytes / 1024).toFixed(1)} KB`,
        'gsq cache'
      );
    } catch (error) {
      fail(error);
    }
  });

cacheCommand
  .command('clear')
  .description('Delete every cached result')
  .action(async () => {
    try {
      const removed = await openCache().clear();
      logger.success(`Removed ${removed} cached ${removed === 1 ? 'result' : 'results'}`);
    } catch (error) {
      fail(error);
    }
  });

cacheCommand
  .command('path <query>')
  .description('Print the cache file a resolved query maps to')
  .action((query: string) => {
    console.log(chalk.cyan(openCache().pathFor(query)));
  });

program.parseAsync().catch(fail);
