/**
 * Command actions
 */

import { buildForecastPlan, type ForecastQueryOptions } from '../commands/forecast.js';
import { buildGribPlan, type GribQueryOptions } from '../commands/grib.js';
import { buildMetPlan, type MetQueryOptions } from '../commands/met.js';
import type { CliContext } from './context.js';
import { reportFailures, runPlan, type RunOptions } from './run.js';

export { createDefaultContext, type CliContext } from './context.js';
export { runPlan, reportFailures, type RunOptions, type RunResult } from './run.js';

export type ForecastActionOptions = ForecastQueryOptions & RunOptions;
export type GribActionOptions = GribQueryOptions & RunOptions;
export type MetActionOptions = MetQueryOptions & RunOptions;

export async function handleForecastAction(options: ForecastActionOptions, ctx: CliContext): Promise<void> {
  await reportFailures(ctx, async () => {
    await runPlan(buildForecastPlan(options), options, ctx);
  });
}

export async function handleGribAction(paths: string[], options: GribActionOptions, ctx: CliContext): Promise<void> {
  await reportFailures(ctx, async () => {
    await runPlan(buildGribPlan(paths, options), options, ctx);
  });
}

export async function handleMetAction(
  latitude: number,
  longitude: number,
  options: MetActionOptions,
  ctx: CliContext
): Promise<void> {
  await reportFailures(ctx, async () => {
    await runPlan(buildMetPlan(latitude, longitude, options), options, ctx);
  });
}
