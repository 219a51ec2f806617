/**
 * Type definitions and Zod schemas for tabular results and cache entries.
 */

import { z } from 'zod';
import type { JsonValue } from './utils.js';

// ============================================================================
// ZOD SCHEMAS
// ============================================================================

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * A result column: name plus the engine's type name (e.g. INTEGER, VARCHAR).
 */
export const ColumnInfoSchema = z.object({
  name: z.string(),
  type: z.string(),
});

/**
 * Serializable tabular result returned by an engine.
 */
export const TableDataSchema = z.object({
  columns: z.array(ColumnInfoSchema),
  rows: z.array(z.record(JsonValueSchema)),
});

/**
 * On-disk cache entry body.
 */
export const CacheFileSchema = TableDataSchema.extend({
  version: z.literal(1),
  query: z.string(),
  createdAt: z.string(),
});

export type ColumnInfo = z.infer<typeof ColumnInfoSchema>;
export type TableData = z.infer<typeof TableDataSchema>;
export type CacheFile = z.infer<typeof CacheFileSchema>;

/**
 * Values accepted in a --kwargs mapping.
 */
export const KwargsSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));
