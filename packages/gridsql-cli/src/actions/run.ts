/**
 * Shared query runner for the data commands
 */

import type { QueryPlan } from 'gridsql';
import { describeError } from '../utils/errors.js';
import { createRowWriter, type OutputFormat } from '../utils/output.js';
import type { CliContext } from './context.js';

export interface RunOptions {
  format: OutputFormat;
  /** Print the optimized plan instead of running it */
  explain?: boolean;
  /** Report whole-percent progress on stderr */
  progress?: boolean;
  logLevel?: string;
  /** Engine settings from repeated `--set name=value` */
  set?: Record<string, string>;
}

export interface RunResult {
  rows: number;
  elapsedMs: number;
}

/**
 * Run a plan and stream its rows to stdout
 */
export async function runPlan(plan: QueryPlan, options: RunOptions, ctx: CliContext): Promise<RunResult> {
  const db = ctx.createDatabase();
  const started = performance.now();

  try {
    if (options.logLevel !== undefined) {
      db.set('log_level', options.logLevel);
    }
    for (const [name, value] of Object.entries(options.set ?? {})) {
      db.set(name, value);
    }

    if (options.explain) {
      ctx.logger.info(db.explain(plan));
      return { rows: 0, elapsedMs: performance.now() - started };
    }

    const execution = db.execute(plan);
    const writer = createRowWriter(options.format, (line) => ctx.logger.info(line));
    writer.begin(execution.columns());

    let rows = 0;
    let reported = -1;
    for await (const row of execution) {
      writer.write(row);
      rows++;
      if (options.progress) {
        const percent = Math.floor(execution.progress());
        if (percent > reported) {
          ctx.logger.status(`progress ${percent}%`);
          reported = percent;
        }
      }
    }

    const elapsedMs = performance.now() - started;
    if (options.progress) {
      ctx.logger.status(`${rows} row${rows === 1 ? '' : 's'} in ${Math.round(elapsedMs)}ms`);
    }
    return { rows, elapsedMs };
  } finally {
    await db.close();
  }
}

/**
 * Run an action body, reporting a failure and setting a non-zero exit code
 */
export async function reportFailures(ctx: CliContext, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (error) {
    ctx.logger.error(describeError(error));
    ctx.exit(1);
  }
}
