/**
 * Terminal output helpers.
 * Results go to stdout; status lines, spinners and boxes go to stderr so
 * `gsq ... -s > out.csv` captures only the result.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';

const titleGradient = gradient(['#FFB000', '#FF6A00', '#FF2E63']);

export function printBanner(): void {
  console.log('');
  console.log(`  ${titleGradient('gsq')}  ${chalk.gray('DuckDB SQL over Parquet in Google Cloud Storage')}`);
  console.log(`  ${chalk.gray('─'.repeat(56))}`);
  console.log('');
}

export function success(message: string): void {
  console.error(`${chalk.green('✔')} ${message}`);
}

/**
 * Error line with an optional hint underneath.
 */
export function error(message: string, hint?: string): void {
  console.error(`${chalk.red('✖')} ${message}`);
  if (hint) {
    console.error(`  ${chalk.yellow('→')} ${chalk.dim(hint)}`);
  }
}

export function info(message: string): void {
  console.error(`${chalk.blue('ℹ')} ${message}`);
}

/**
 * Start a spinner on stderr. ora draws nothing when stderr is not a TTY.
 */
export function spinner(text: string): Ora {
  return ora({ text, stream: process.stderr, color: 'yellow', spinner: 'dots2' }).start();
}

/**
 * Short framed summary on stderr.
 */
export function box(message: string, title?: string): void {
  console.error(
    boxen(message, {
      padding: { top: 0, bottom: 0, left: 1, right: 1 },
      borderStyle: 'single',
      borderColor: 'yellow',
      title,
    })
  );
}

/**
 * Print source with a gutter of line numbers.
 */
export function code(content: string, language?: string): void {
  const lines = content.split('\n');
  const width = String(lines.length).length;
  const rule = chalk.gray('┈'.repeat(48));

  console.log(language ? `${rule} ${chalk.gray(language)}` : rule);
  lines.forEach((line, i) => {
    console.log(`${chalk.gray(`${String(i + 1).padStart(width)} │`)} ${chalk.bold.blue(line)}`);
  });
  console.log(rule);
}

/**
 * In[...] / Out[...] section label.
 */
export function label(kind: 'In' | 'Out', key?: string): void {
  const text = key ? `${kind}[${key}]:` : `${kind}:`;
  console.log(`\n${kind === 'In' ? chalk.green(text) : chalk.red(text)}\n`);
}
