/**
 * Custom error classes for gsq.
 * Each error carries a list of suggested fixes printed below the message.
 */

function formatMessage(message: string, suggestions: string[]): string {
  if (suggestions.length === 0) {
    return message;
  }
  return `${message}\n\nSuggested fixes:\n${suggestions.map(s => `  • ${s}`).join('\n')}`;
}

/**
 * Error thrown when the command line is missing something it needs.
 *
 * Common causes:
 * - Neither --query nor --query-file was given
 * - --kwargs is not a valid mapping literal
 * - An interactive prompt was cancelled
 */
export class UsageError extends Error {
  public readonly suggestions: string[];

  constructor(message: string, suggestions?: string[]) {
    const suggestionList = suggestions || UsageError.getDefaultSuggestions();
    super(formatMessage(message, suggestionList));
    this.name = 'UsageError';
    this.suggestions = suggestionList;
    Object.setPrototypeOf(this, UsageError.prototype);
  }

  private static getDefaultSuggestions(): string[] {
    return [
      'Pass a query with --query "SELECT 42" or a file with --query-file',
      'Run "gsq --examples" to see common invocations',
    ];
  }
}

/**
 * Error thrown when environment configuration fails validation.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map(i => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Error thrown in strict mode when a placeholder has no binding.
 *
 * Interactive mode asks the operator instead; strict mode is meant for
 * scripts and services where nobody can answer a prompt.
 */
export class UnresolvedPlaceholderError extends Error {
  public readonly placeholders: string[];
  public readonly suggestions: string[];

  constructor(placeholders: string[]) {
    const suggestions = [
      `Pass values with --kwargs "{'${placeholders[0] ?? 'name'}': '...'}"`,
      'Set GSQ_KWARGS to a default mapping',
      'Drop --strict (or GSQ_PROMPT_MODE=strict) to be prompted instead',
    ];
    super(formatMessage(`Unresolved placeholders: ${placeholders.join(', ')}`, suggestions));
    this.name = 'UnresolvedPlaceholderError';
    this.placeholders = placeholders;
    this.suggestions = suggestions;
    Object.setPrototypeOf(this, UnresolvedPlaceholderError.prototype);
  }
}

/**
 * Error thrown when a cache file cannot be decoded.
 *
 * Corrupt entries are never repaired automatically; delete the file or
 * run "gsq cache clear".
 */
export class CacheError extends Error {
  public readonly path?: string;
  public readonly suggestions: string[];

  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    const suggestions = path
      ? [`Delete the corrupt entry: rm ${path}`, 'Or clear everything: gsq cache clear']
      : ['Check that the cache directory (GSQ_CACHE_DIR) is writable'];
    super(formatMessage(message, suggestions), options);
    this.name = 'CacheError';
    this.path = path;
    this.suggestions = suggestions;
    Object.setPrototypeOf(this, CacheError.prototype);
  }
}

/**
 * Error thrown when an --eval-df expression or a script fails.
 */
export class PostProcessError extends Error {
  public readonly source?: string;

  constructor(message: string, source?: string, options?: { cause?: unknown }) {
    super(source ? `${message}\n\nIn:\n${source}` : message, options);
    this.name = 'PostProcessError';
    this.source = source;
    Object.setPrototypeOf(this, PostProcessError.prototype);
  }
}
