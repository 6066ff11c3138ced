/**
 * gfs_forecast() table function
 *
 * NOAA GFS 0.25° forecast points fetched from the NOMADS GRIB filter, one
 * request per forecast hour. The function takes no arguments: what to fetch
 * comes from predicates on its columns, which filter pushdown folds into a
 * QueryDescriptor, and from a LIMIT above it.
 *
 * @example
 * ```typescript
 * const plan = limit(
 *   filter(tableFunction('gfs_forecast'), and_(
 *     eq(col('variable'), lit('temperature')),
 *     inList(col('forecast_hour'), [lit(0), lit(3)]),
 *     ge(col('latitude'), lit(59)),
 *   )),
 *   100
 * );
 * const { rows } = await db.query(plan);
 * ```
 */

import type { ColumnDef, Predicate, Row } from '../engine/types.js';
import { BindError, BindErrorCode } from '../errors/index.js';
import { createDefaultFetcher } from '../fetch/index.js';
import type { ResourceFetcher } from '../fetch/types.js';
import type { TableFunction } from '../functions/table-function.js';
import { translateFilters } from './filter-translator.js';
import { Grib2GridDecoder, type GribPoint } from './grib-decoder.js';
import { parameterName, surfaceName, unitFor } from './names.js';
import { createQueryDescriptor, toOutputLongitude, type QueryDescriptor } from './query-descriptor.js';
import { CursorScanState, ScanCursor, type GridDecoder, type ResourcePlan } from './scan-cursor.js';
import { buildGfsUrl } from './url-builder.js';

/**
 * Fixed estimate reported to the planner; never used to size or bound the output
 */
export const GFS_REPORTED_CARDINALITY = 10_000_000;

export const GFS_COLUMNS: readonly ColumnDef[] = [
  { name: 'latitude', type: 'real' },
  { name: 'longitude', type: 'real' },
  { name: 'value', type: 'real' },
  { name: 'unit', type: 'text', nullable: true },
  { name: 'variable', type: 'text' },
  { name: 'level', type: 'text' },
  { name: 'forecast_hour', type: 'integer' },
  { name: 'run_date', type: 'text' },
  { name: 'run_hour', type: 'integer' },
];

export interface GfsBindData {
  descriptor: QueryDescriptor;
  baseUrl: string;
  batchSize: number;
  fetcher: ResourceFetcher;
}

export interface WeatherScanDependencies {
  /** Defaults to HTTP for URLs and the filesystem for paths */
  fetcher?: ResourceFetcher;
  decoder?: GridDecoder<unknown, GribPoint>;
}

/**
 * Rows of one gfs_forecast scan, one resource per forecast hour
 */
export function gfsResourcePlan(bind: GfsBindData): ResourcePlan<GribPoint> {
  const { descriptor } = bind;
  const runHour = descriptor.runHour ?? 0;
  return {
    count: descriptor.forecastHours.length,
    locator: (index) => buildGfsUrl(descriptor, descriptor.forecastHours[index], bind.baseUrl),
    label: (index) => `forecast hour ${descriptor.forecastHours[index]}`,
    projectRow: (point, index): Row => {
      const variable = parameterName(point.discipline, point.parameterCategory, point.parameterNumber);
      return {
        latitude: point.latitude,
        longitude: toOutputLongitude(point.longitude),
        value: point.value,
        unit: unitFor(variable),
        variable,
        level: surfaceName(point.surfaceType, point.surfaceValue),
        forecast_hour: descriptor.forecastHours[index],
        run_date: descriptor.runDate,
        run_hour: runHour,
      };
    },
  };
}

export function createGfsForecastFunction(
  deps: WeatherScanDependencies = {},
  name = 'gfs_forecast'
): TableFunction<GfsBindData, CursorScanState<unknown, GribPoint>> {
  const decoder: GridDecoder<unknown, GribPoint> = deps.decoder ?? new Grib2GridDecoder();

  return {
    name,

    bind({ args, settings, now }) {
      if (args.length > 0) {
        throw new BindError(
          BindErrorCode.ARGUMENT_COUNT,
          `${name}() takes no arguments; filter on its columns instead`,
          { context: { function: name } }
        );
      }
      return {
        bindData: {
          descriptor: createQueryDescriptor(now),
          baseUrl: settings.gfs_base_url,
          batchSize: settings.batch_size,
          fetcher: deps.fetcher ?? createDefaultFetcher({ timeoutMs: settings.http_timeout_ms }),
        },
        columns: [...GFS_COLUMNS],
      };
    },

    pushdownFilters(bind, predicates: Predicate[]) {
      return translateFilters(bind.descriptor, predicates);
    },

    pushdownLimit(bind, limit) {
      bind.descriptor.rowLimit = limit;
    },

    cardinality() {
      return GFS_REPORTED_CARDINALITY;
    },

    describe({ descriptor }) {
      return {
        run: `${descriptor.runDate}/${String(descriptor.runHour ?? 0).padStart(2, '0')}`,
        forecast_hours: descriptor.forecastHours.join(','),
        variables: descriptor.variables.join(',') || 'default',
        levels: descriptor.levels.join(',') || 'default',
        bbox: descriptor.hasBbox
          ? `${descriptor.boundingBox.latMin},${descriptor.boundingBox.latMax},${descriptor.boundingBox.lonMin},${descriptor.boundingBox.lonMax}`
          : 'none',
        limit: descriptor.rowLimit,
      };
    },

    initGlobal(bind, ctx) {
      return new CursorScanState(
        new ScanCursor({
          plan: gfsResourcePlan(bind),
          fetcher: bind.fetcher,
          decoder,
          batchSize: bind.batchSize,
          rowLimit: bind.descriptor.rowLimit,
          logger: ctx.logger.child({ function: name }),
          signal: ctx.signal,
        })
      );
    },

    scan(_bind, state) {
      return state.cursor.nextBatch();
    },

    progress(_bind, state) {
      return state.cursor.progress.value();
    },
  };
}
