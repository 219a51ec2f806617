/**
 * gsq - cached DuckDB SQL over Parquet files in Google Cloud Storage
 */

export { QueryPipeline, buildQuery, buildBindings } from './pipeline.js';
export type { PipelineOptions, RunOptions, RunResult } from './pipeline.js';
export { loadConfig } from './config.js';
export type { Config, PromptMode, NestedStepMode } from './config.js';
export {
  PlaceholderResolver,
  findPlaceholders,
  formatTemplate,
  normalizeBucket,
  parseKwargs,
  dedent,
} from './services/placeholders.js';
export type { Prompter } from './services/placeholders.js';
export { FileCache } from './services/cache/index.js';
export type { CacheProvider, CacheLookup, CacheEntryInfo, LayerStats } from './services/cache/index.js';
export { QueryExecutor } from './services/executor.js';
export type { ExecuteResult } from './services/executor.js';
export { DuckDBEngine, normalizeRows } from './services/engine.js';
export type { QueryEngine } from './services/engine.js';
export { PostProcessor } from './services/post-process.js';
export type { Step, Scope, PostProcessorOptions } from './services/post-process.js';
export { DataFrame } from './services/dataframe.js';
export type { ColumnInfo, TableData } from './types/models.js';
export type { JsonValue, JsonObject, Bindings } from './types/utils.js';
export {
  UsageError,
  ConfigError,
  UnresolvedPlaceholderError,
  CacheError,
  PostProcessError,
} from './types/errors.js';
