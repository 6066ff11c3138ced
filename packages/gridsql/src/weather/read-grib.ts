/**
 * read_grib(path | [path, ...]) table function
 *
 * Decodes every field of one or more GRIB2 files, local paths or URLs, in
 * argument order. Code tables resolve discipline, surface and parameter to
 * names; codes outside the tables read as `Unknown`.
 */

import type { ColumnDef, Row } from '../engine/types.js';
import { BindError, BindErrorCode } from '../errors/index.js';
import { createDefaultFetcher } from '../fetch/index.js';
import type { ResourceFetcher } from '../fetch/types.js';
import { stringListArgument, type TableFunction } from '../functions/table-function.js';
import type { WeatherScanDependencies } from './gfs-forecast.js';
import { Grib2GridDecoder, type GribPoint } from './grib-decoder.js';
import { gribDisciplineName, gribParameterName, gribSurfaceName } from './names.js';
import { toOutputLongitude } from './query-descriptor.js';
import { CursorScanState, ScanCursor, type GridDecoder, type ResourcePlan } from './scan-cursor.js';

export const GRIB_REPORTED_CARDINALITY = 100_000_000;

export const READ_GRIB_COLUMNS: readonly ColumnDef[] = [
  { name: 'latitude', type: 'real' },
  { name: 'longitude', type: 'real' },
  { name: 'value', type: 'real' },
  { name: 'discipline', type: 'text' },
  { name: 'surface', type: 'text' },
  { name: 'parameter', type: 'text' },
  { name: 'forecast_time', type: 'integer' },
  { name: 'surface_value', type: 'real' },
  { name: 'message_index', type: 'integer' },
  { name: 'file_index', type: 'integer' },
];

export interface ReadGribBindData {
  paths: string[];
  batchSize: number;
  /** 0 means unlimited */
  rowLimit: number;
  fetcher: ResourceFetcher;
}

export function gribResourcePlan(bind: ReadGribBindData): ResourcePlan<GribPoint> {
  return {
    count: bind.paths.length,
    locator: (index) => bind.paths[index],
    label: (index) => `file ${index} (${bind.paths[index]})`,
    projectRow: (point, index): Row => ({
      latitude: point.latitude,
      longitude: toOutputLongitude(point.longitude),
      value: point.value,
      discipline: gribDisciplineName(point.discipline),
      surface: gribSurfaceName(point.surfaceType),
      parameter: gribParameterName(point.discipline, point.parameterCategory, point.parameterNumber),
      forecast_time: point.forecastTime,
      surface_value: point.surfaceValue,
      message_index: point.messageIndex,
      file_index: index,
    }),
  };
}

export function createReadGribFunction(
  deps: WeatherScanDependencies = {}
): TableFunction<ReadGribBindData, CursorScanState<unknown, GribPoint>> {
  const decoder: GridDecoder<unknown, GribPoint> = deps.decoder ?? new Grib2GridDecoder();

  return {
    name: 'read_grib',

    bind({ args, settings }) {
      if (args.length !== 1) {
        throw new BindError(
          BindErrorCode.ARGUMENT_COUNT,
          'read_grib() requires a file path or array of paths',
          { context: { function: 'read_grib' } }
        );
      }
      const paths = stringListArgument('read_grib', 'path', args[0]);
      if (paths.length === 0) {
        throw new BindError(BindErrorCode.INVALID_ARGUMENT, 'read_grib() array cannot be empty', {
          context: { function: 'read_grib' },
        });
      }
      return {
        bindData: {
          paths,
          batchSize: settings.batch_size,
          rowLimit: 0,
          fetcher: deps.fetcher ?? createDefaultFetcher({ timeoutMs: settings.http_timeout_ms }),
        },
        columns: [...READ_GRIB_COLUMNS],
      };
    },

    pushdownLimit(bind, limit) {
      bind.rowLimit = limit;
    },

    cardinality() {
      return GRIB_REPORTED_CARDINALITY;
    },

    describe(bind) {
      return { files: bind.paths.length, limit: bind.rowLimit };
    },

    initGlobal(bind, ctx) {
      return new CursorScanState(
        new ScanCursor({
          plan: gribResourcePlan(bind),
          fetcher: bind.fetcher,
          decoder,
          batchSize: bind.batchSize,
          rowLimit: bind.rowLimit,
          logger: ctx.logger.child({ function: 'read_grib' }),
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
