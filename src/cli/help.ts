/**
 * Option descriptions for `gsq --help`.
 */

export const OPTION_HELP = {
  query: 'SQL query to execute',
  queryFile: 'Read the query from a file',
  bucket:
    'Bucket in GCS, bound to the {bucket} placeholder (env: GSQ_BUCKET). ' +
    'With no bucket set, {bucket} is prompted for like any other placeholder',
  kwargs:
    `Extra placeholder values, e.g. --kwargs "{'year': 2021, 'debug': True}" (env: GSQ_KWARGS). ` +
    'True/False/None are accepted; None binds as NULL',
  silent: 'Only print the result',
  examples: 'Show examples, e.g. gsq -x | less',
  evalDf:
    'Transform the result (`df`) with a JavaScript expression, e.g. --eval-df "df.T". ' +
    "Pick columns with df.select('a', 'b'); df[['a']] is not supported. " +
    '`query` holds the resolved SQL. Repeatable; applied in order (GSQ_NESTED_STEPS=first applies only the first)',
  script: 'Run a script after --eval-df. Assign to `df` to keep changes',
  scriptFile: 'Run a script from a file instead of --script',
  strict: 'Fail on unresolved placeholders instead of prompting',
  cacheDir: 'Cache directory (env: GSQ_CACHE_DIR)',
} as const;
