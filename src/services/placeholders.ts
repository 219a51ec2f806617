/**
 * Query templating: {name} placeholders, bucket normalization and --kwargs parsing.
 */

import prompts from 'prompts';
import chalk from 'chalk';
import type { Logger } from 'pino';
import type { Bindings } from '../types/utils.js';
import type { PromptMode } from '../config.js';
import { KwargsSchema } from '../types/models.js';
import { UnresolvedPlaceholderError, UsageError } from '../types/errors.js';

const PLACEHOLDER_PATTERN = /\{(.+?)\}/g;

const GCS_PREFIX = 'gs://';

/**
 * Asks the operator for the value of one placeholder.
 */
export type Prompter = (name: string) => Promise<string>;

/**
 * Placeholder names in order of first appearance, without duplicates.
 */
export function findPlaceholders(template: string): string[] {
  const names: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    if (!names.includes(match[1])) {
      names.push(match[1]);
    }
  }
  return names;
}

/**
 * Substitute every {name} with its binding.
 * If any placeholder has no binding the template comes back unchanged.
 */
export function formatTemplate(template: string, bindings: Bindings): string {
  const names = findPlaceholders(template);
  if (names.some((name) => !Object.hasOwn(bindings, name))) {
    return template;
  }
  return template.replace(PLACEHOLDER_PATTERN, (_, name: string) => bindings[name]);
}

/**
 * "my-bucket/path" -> "gs://my-bucket/path"; empty stays empty.
 */
export function normalizeBucket(bucket: string | undefined): string {
  if (!bucket) {
    return '';
  }
  return bucket.startsWith(GCS_PREFIX) ? bucket : `${GCS_PREFIX}${bucket}`;
}

// single-quoted string | double-quoted string | bare True/False/None
const MAPPING_TOKEN = /'((?:[^'\\]|\\.)*)'|"(?:[^"\\]|\\.)*"|\b(True|False|None)\b/g;

const KEYWORD_JSON: Record<string, string> = { True: 'true', False: 'false', None: 'null' };

/**
 * Rewrite a single-quoted mapping literal as JSON. Double-quoted strings
 * pass through untouched; True/False/None outside quotes become JSON.
 */
function mappingToJson(text: string): string {
  return text.replace(MAPPING_TOKEN, (match: string, single: string | undefined, keyword: string | undefined) => {
    if (single !== undefined) return JSON.stringify(single);
    if (keyword !== undefined) return KEYWORD_JSON[keyword] ?? match;
    return match;
  });
}

/**
 * Parse a --kwargs mapping. Accepts JSON or single-quoted literals such
 * as {'year': 2021, 'cols': 'a, b', 'debug': True}. Values are converted
 * to strings; null (None) binds as NULL.
 */
export function parseKwargs(literal: string): Bindings {
  const text = literal.trim();
  if (text === '') {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    try {
      raw = JSON.parse(mappingToJson(text));
    } catch {
      throw new UsageError(`Invalid --kwargs mapping: ${literal}`, [
        `Use a mapping literal, e.g. --kwargs "{'year': 2021}"`,
        `Or JSON, e.g. --kwargs '{"year": 2021}'`,
      ]);
    }
  }

  const parsed = KwargsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`--kwargs must map names to strings, numbers, booleans or None: ${literal}`);
  }

  const bindings: Bindings = {};
  for (const [key, value] of Object.entries(parsed.data)) {
    bindings[key] = value === null ? 'NULL' : String(value);
  }
  return bindings;
}

/**
 * Remove the indentation common to every non-blank line.
 */
export function dedent(text: string): string {
  const lines = text.split('\n');
  let margin: number | null = null;
  for (const line of lines) {
    if (line.trim() === '') continue;
    const indent = line.length - line.trimStart().length;
    margin = margin === null ? indent : Math.min(margin, indent);
  }
  if (!margin) {
    return lines.map((line) => (line.trim() === '' ? '' : line)).join('\n');
  }
  const width = margin;
  return lines.map((line) => (line.trim() === '' ? '' : line.slice(width))).join('\n');
}

/**
 * Default prompter: one text prompt per placeholder.
 */
export const askOperator: Prompter = async (name) => {
  let cancelled = false;
  const { value } = await prompts(
    {
      type: 'text',
      name: 'value',
      message: `Please provide a value for ${chalk.bold.green(name)}:`,
    },
    {
      onCancel: () => {
        cancelled = true;
      },
    }
  );
  if (cancelled || typeof value !== 'string') {
    throw new UsageError(`Prompt for "${name}" was cancelled`, []);
  }
  return value;
};

export interface PlaceholderResolverOptions {
  mode: PromptMode;
  prompter?: Prompter;
  logger?: Logger;
}

/**
 * Resolves a query template against a binding set, completing missing
 * names interactively (or failing, in strict mode).
 */
export class PlaceholderResolver {
  private readonly mode: PromptMode;
  private readonly prompter: Prompter;
  private readonly logger?: Logger;

  constructor(options: PlaceholderResolverOptions) {
    this.mode = options.mode;
    this.prompter = options.prompter ?? askOperator;
    this.logger = options.logger;
  }

  async resolve(template: string, bindings: Bindings): Promise<string> {
    const missing = findPlaceholders(template).filter((name) => !Object.hasOwn(bindings, name));

    if (missing.length > 0 && this.mode === 'strict') {
      throw new UnresolvedPlaceholderError(missing);
    }

    const active: Bindings = { ...bindings };
    for (const name of missing) {
      active[name] = await this.prompter(name);
    }

    this.logger?.debug({ placeholders: Object.keys(active), prompted: missing }, 'Resolved placeholders');
    return formatTemplate(template, active);
  }
}
