/**
 * Post-processing chain: --eval-df expressions and scripts applied to a result.
 *
 * Trusted evaluation. Code runs through node:vm with `df`, `query`,
 * `DataFrame`, `print` and `printJson` in scope. A vm context is not a sandbox: the
 * operator who passes an expression can already run anything on this
 * machine, and no attempt is made to stop user code reaching the process.
 */

import vm from 'vm';
import { readFile } from 'fs/promises';
import type { Logger } from 'pino';
import type { NestedStepMode } from '../config.js';
import { DataFrame } from './dataframe.js';
import { PostProcessError } from '../types/errors.js';

/**
 * One expression, or a nested list of expressions.
 */
export type Step = string | string[];

/**
 * Extra names bound next to `df`.
 */
export interface Scope {
  /**
   * The resolved query text
   */
  query?: string;
}

export interface PostProcessorOptions {
  /**
   * `sequential` applies every step in order; `first` applies only the
   * first step (and only the first element of a nested list).
   */
  nestedSteps: NestedStepMode;

  /**
   * Receives values passed to print()/printJson() from user code
   */
  print?: (value: unknown) => void;

  /**
   * Called after each expression with its source and result
   */
  onStep?: (expression: string, value: unknown) => void;

  /**
   * Called with a script's source before it runs
   */
  onScript?: (script: string) => void;

  logger?: Logger;
}

export class PostProcessor {
  private readonly nestedSteps: NestedStepMode;
  private readonly print: (value: unknown) => void;
  private readonly onStep?: (expression: string, value: unknown) => void;
  private readonly onScript?: (script: string) => void;
  private readonly logger?: Logger;

  constructor(options: PostProcessorOptions) {
    this.nestedSteps = options.nestedSteps;
    this.print = options.print ?? ((value) => console.log(value));
    this.onStep = options.onStep;
    this.onScript = options.onScript;
    this.logger = options.logger;
  }

  /**
   * Evaluate one expression with `df` bound to `value` and return its result.
   */
  evaluate(expression: string, value: unknown, scope: Scope = {}): unknown {
    const context = this.createContext(value, scope);
    let result: unknown;
    try {
      result = vm.runInContext(`(\n${expression}\n)`, context, { filename: 'eval-df' });
    } catch (error) {
      throw new PostProcessError(`Expression failed: ${describe(error)}`, expression, { cause: error });
    }
    this.logger?.debug({ expression }, 'Evaluated expression');
    this.onStep?.(expression, result);
    return result;
  }

  /**
   * Apply steps in order, each receiving the previous result as `df`.
   */
  apply(steps: readonly Step[], value: unknown, scope: Scope = {}): unknown {
    const first = this.nestedSteps === 'first';
    let current = value;
    for (const step of first ? steps.slice(0, 1) : steps) {
      const expressions = typeof step === 'string' ? [step] : first ? step.slice(0, 1) : step;
      for (const expression of expressions) {
        current = this.evaluate(expression, current, scope);
      }
    }
    return current;
  }

  /**
   * Run statements with `df` in scope. Assign to `df` (without let/const)
   * to replace the result; otherwise the input value is kept.
   */
  runScript(script: string, value: unknown, scope: Scope = {}, filename: string = 'script'): unknown {
    this.onScript?.(script);
    const context = this.createContext(value, scope);
    try {
      vm.runInContext(script, context, { filename });
    } catch (error) {
      throw new PostProcessError(`Script failed: ${describe(error)}`, script, { cause: error });
    }
    this.logger?.debug({ filename }, 'Ran script');
    return context.df;
  }

  async runScriptFile(path: string, value: unknown, scope: Scope = {}): Promise<unknown> {
    const script = (await readFile(path, 'utf8')).trim();
    return this.runScript(script, value, scope, path);
  }

  private createContext(value: unknown, scope: Scope): vm.Context {
    return vm.createContext({
      df: value,
      query: scope.query,
      DataFrame,
      print: (...values: unknown[]) => {
        for (const v of values) this.print(v);
      },
      printJson: (v: unknown) => this.print(JSON.stringify(v, null, 2)),
    });
  }
}

/**
 * Errors thrown inside a vm context come from another realm and fail
 * `instanceof Error`, so read the message structurally.
 */
function describe(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    const name = 'name' in error && typeof error.name === 'string' ? error.name : 'Error';
    return `${name}: ${error.message}`;
  }
  return String(error);
}
