/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { join } from 'path';
import { existsSync } from 'fs';
import { ConfigError } from './types/errors.js';

// Load .env from the working directory if it exists
const envPath = join(process.cwd(), '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

export const LogLevelSchema = z
  .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'])
  .default('WARN');

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // Query defaults
  GSQ_BUCKET: z
    .string()
    .optional()
    .describe('Default --bucket, bound to the {bucket} placeholder'),
  GSQ_KWARGS: z
    .string()
    .default('{}')
    .describe("Default --kwargs mapping literal, e.g. {'year': 2021}"),

  // Cache
  GSQ_CACHE_DIR: z.string().min(1).default('/tmp/gsq'),

  // Behaviour
  GSQ_PROMPT_MODE: z.enum(['interactive', 'strict']).default('interactive'),
  GSQ_NESTED_STEPS: z.enum(['sequential', 'first']).default('sequential'),

  // Engine
  DUCKDB_PATH: z.string().min(1).default(':memory:'),

  LOG_LEVEL: LogLevelSchema,
});

/**
 * Validated configuration.
 */
export type Config = z.infer<typeof ConfigSchema>;

export type PromptMode = Config['GSQ_PROMPT_MODE'];
export type NestedStepMode = Config['GSQ_NESTED_STEPS'];

/**
 * Parse and validate configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}
