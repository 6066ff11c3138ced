#!/usr/bin/env tsx
/**
 * gridsql - query forecast data from the command line
 *
 * Usage:
 *   gridsql forecast --hours 0,3,6 --variables temperature --bbox 59,61,5,11
 *   gridsql grib ./gfs.t00z.pgrb2.0p25.f000 --format csv
 *   gridsql met 59.91 10.75 --altitude 12
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, Option } from 'commander';
import {
  handleForecastAction,
  handleGribAction,
  handleMetAction,
  createDefaultContext,
  type CliContext,
  type ForecastActionOptions,
  type GribActionOptions,
  type MetActionOptions,
} from './actions/index.js';
import { OUTPUT_FORMATS } from './utils/output.js';
import {
  parseBoundingBox,
  parseInteger,
  parseIntegerList,
  parseList,
  parseNonNegativeInteger,
  parseNumber,
  parseRunDate,
} from './utils/parse.js';

const VERSION = '0.1.0';

function collectSetting(value: string, previous: Record<string, string>): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    return { ...previous, [value]: '' };
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

/**
 * Output and engine options shared by every data command
 */
function withRunOptions(command: Command): Command {
  return command
    .addOption(new Option('--format <format>', 'Row output format').choices(OUTPUT_FORMATS).default('ndjson'))
    .option('--limit <rows>', 'Stop after this many rows', parseNonNegativeInteger)
    .option('--explain', 'Print the optimized plan instead of running it')
    .option('--progress', 'Report progress on stderr')
    .addOption(
      new Option('--log-level <level>', 'Engine log level').choices(['debug', 'info', 'warn', 'error'])
    )
    .option('--set <name=value>', 'Engine setting, e.g. met_user_agent=my-app/1.0 (repeatable)', collectSetting, {});
}

/**
 * Create the CLI program
 */
export function createCLI(ctx: CliContext = createDefaultContext()): Command {
  const program = new Command();

  program.name('gridsql').version(VERSION).description('Query gridded weather forecasts as rows');

  withRunOptions(
    program
      .command('forecast')
      .description('Query the NOAA GFS 0.25 degree forecast through the NOMADS filter service')
      .option('--date <yyyymmdd>', 'Model run date (default: today, UTC)', parseRunDate)
      .option('--run-hour <hour>', 'Model run hour: 0, 6, 12 or 18', parseInteger)
      .option('--hours <list>', 'Forecast hours, e.g. 0,3,6', parseIntegerList)
      .option('--variables <list>', 'Variables, e.g. temperature,wind_u', parseList)
      .option('--levels <list>', 'Levels, e.g. 2m,surface', parseList)
      .option('--bbox <box>', 'Bounding box as latMin,latMax,lonMin,lonMax', parseBoundingBox)
  ).action(async (options: ForecastActionOptions) => {
    await handleForecastAction(options, ctx);
  });

  withRunOptions(
    program
      .command('grib')
      .description('Read local or remote GRIB2 files')
      .argument('<paths...>', 'File paths or URLs, read in the order given')
  ).action(async (paths: string[], options: GribActionOptions) => {
    await handleGribAction(paths, options, ctx);
  });

  withRunOptions(
    program
      .command('met')
      .description('Point forecast from MET Norway (put -- before negative coordinates)')
      .argument('<latitude>', 'Latitude in degrees', parseNumber)
      .argument('<longitude>', 'Longitude in degrees', parseNumber)
      .option('--altitude <metres>', 'Ground altitude in metres', parseNumber)
  ).action(async (latitude: number, longitude: number, options: MetActionOptions) => {
    await handleMetAction(latitude, longitude, options, ctx);
  });

  return program;
}

// Re-export for testing
export { buildForecastPlan, buildGribPlan, buildMetPlan, forecastPredicates } from './commands/index.js';
export {
  createDefaultContext,
  handleForecastAction,
  handleGribAction,
  handleMetAction,
  runPlan,
  type CliContext,
} from './actions/index.js';
export { Logger, createLogger } from './utils/logger.js';
export { createRowWriter, csvField, type OutputFormat } from './utils/output.js';

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  await createCLI().parseAsync(process.argv);
}
