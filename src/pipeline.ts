/**
 * Main gsq class - resolves, executes, caches and post-processes a query.
 */

import { readFile } from 'fs/promises';
import type { Logger } from 'pino';
import type { Config, NestedStepMode, PromptMode } from './config.js';
import type { Bindings } from './types/utils.js';
import { UsageError } from './types/errors.js';
import { FileCache, type CacheProvider } from './services/cache/index.js';
import { DuckDBEngine, type QueryEngine } from './services/engine.js';
import { QueryExecutor, type ExecuteResult } from './services/executor.js';
import {
  PlaceholderResolver,
  dedent,
  normalizeBucket,
  parseKwargs,
  type Prompter,
} from './services/placeholders.js';
import { PostProcessor, type Step } from './services/post-process.js';
import { Presenter } from './cli/presenter.js';

export interface PipelineOptions {
  cacheDir: string;
  promptMode: PromptMode;
  nestedSteps: NestedStepMode;

  /**
   * Print every stage (false is --silent)
   */
  verbose: boolean;

  /**
   * Defaults to DuckDB at `duckdbPath`
   */
  engine?: QueryEngine;
  duckdbPath?: string;
  cache?: CacheProvider;
  prompter?: Prompter;
  logger?: Logger;
}

export interface RunOptions {
  query?: string;
  queryFile?: string;
  bucket?: string;
  /**
   * Mapping literal, e.g. "{'year': 2021}"
   */
  kwargs?: string;
  evalDf?: Step[];
  script?: string;
  scriptFile?: string;
}

export interface RunResult {
  /**
   * Resolved query text, the cache key input
   */
  query: string;
  execution: ExecuteResult;
  /**
   * Value after post-processing: a DataFrame or whatever the last step returned
   */
  output: unknown;
}

/**
 * The query text from --query, else the trimmed contents of --query-file.
 */
export async function buildQuery(options: Pick<RunOptions, 'query' | 'queryFile'>): Promise<string> {
  if (options.query) {
    return options.query;
  }
  if (options.queryFile) {
    return (await readFile(options.queryFile, 'utf8')).trim();
  }
  throw new UsageError('Please provide a query or a query file.');
}

/**
 * Bindings before prompting: {bucket} first, then --kwargs on top.
 */
export function buildBindings(bucket: string | undefined, kwargs: string | undefined): Bindings {
  const bindings: Bindings = {};
  const normalized = normalizeBucket(bucket);
  if (normalized) {
    bindings.bucket = normalized;
  }
  return { ...bindings, ...parseKwargs(kwargs ?? '{}') };
}

/**
 * gsq pipeline
 *
 * @example
 * ```typescript
 * const pipeline = QueryPipeline.fromConfig(loadConfig(), { verbose: false });
 * const { output } = await pipeline.run({
 *   query: "SELECT * FROM read_parquet('{bucket}') LIMIT 10",
 *   bucket: 'my-bucket/events/*.parquet',
 *   evalDf: ["df.select('id')"],
 * });
 * ```
 */
export class QueryPipeline {
  readonly cache: CacheProvider;
  private readonly executor: QueryExecutor;
  private readonly resolver: PlaceholderResolver;
  private readonly processor: PostProcessor;
  private readonly presenter: Presenter;
  private readonly logger?: Logger;

  constructor(options: PipelineOptions) {
    this.logger = options.logger;
    this.presenter = new Presenter(options.verbose);
    this.cache = options.cache ?? new FileCache(options.cacheDir, options.logger);

    const engine = options.engine ?? new DuckDBEngine(options.duckdbPath, options.logger);
    this.executor = new QueryExecutor(engine, this.cache, options.logger);

    this.resolver = new PlaceholderResolver({
      mode: options.promptMode,
      prompter: options.prompter,
      logger: options.logger,
    });

    this.processor = new PostProcessor({
      nestedSteps: options.nestedSteps,
      print: (value) => this.presenter.printUser(value),
      onStep: (expression, value) => this.presenter.printStep(expression, value),
      onScript: (script) => this.presenter.printScript(script),
      logger: options.logger,
    });
  }

  static fromConfig(
    config: Config,
    options: { verbose: boolean; strict?: boolean; logger?: Logger; prompter?: Prompter }
  ): QueryPipeline {
    return new QueryPipeline({
      cacheDir: config.GSQ_CACHE_DIR,
      promptMode: options.strict ? 'strict' : config.GSQ_PROMPT_MODE,
      nestedSteps: config.GSQ_NESTED_STEPS,
      duckdbPath: config.DUCKDB_PATH,
      verbose: options.verbose,
      logger: options.logger,
      prompter: options.prompter,
    });
  }

  /**
   * Resolve the template to the exact text that keys the cache.
   */
  async resolve(options: RunOptions): Promise<string> {
    const template = await buildQuery(options);
    const bindings = buildBindings(options.bucket, options.kwargs);
    return dedent(await this.resolver.resolve(template, bindings));
  }

  async run(options: RunOptions): Promise<RunResult> {
    const query = await this.resolve(options);
    this.presenter.printQuery(query);

    const spin = this.presenter.startSpinner('Executing query...');
    let execution: ExecuteResult;
    try {
      execution = await this.executor.execute(query);
    } catch (error) {
      spin?.fail('Query failed');
      this.presenter.printFailedQuery(query);
      throw error;
    }
    spin?.succeed(execution.cacheHit ? 'Loaded from cache' : 'Query complete');

    this.presenter.printExecution(execution);
    this.presenter.printStage(execution.table, 'query');

    const scope = { query };
    let output = this.processor.apply(options.evalDf ?? [], execution.table, scope);

    if (options.script) {
      output = this.processor.runScript(options.script, output, scope);
    } else if (options.scriptFile) {
      output = await this.processor.runScriptFile(options.scriptFile, output, scope);
    } else {
      this.presenter.printResult(output, 'df');
    }

    this.logger?.debug({ cacheHit: execution.cacheHit }, 'Pipeline complete');
    return { query, execution, output };
  }
}
