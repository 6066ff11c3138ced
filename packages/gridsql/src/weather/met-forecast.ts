/**
 * met_forecast(lat, lon [, altitude]) table function
 *
 * Point forecast time series from the MET Norway locationforecast API. One
 * JSON request is made when the scan starts; rows are then handed out in
 * batches. MET Norway requires an identifying User-Agent, taken from the
 * `met_user_agent` setting at bind time.
 */

import { z } from 'zod';
import type { ArgumentValue, ColumnDef, Row } from '../engine/types.js';
import { BindError, BindErrorCode, FetchError, FetchErrorCode } from '../errors/index.js';
import { createDefaultFetcher, fetchJson } from '../fetch/index.js';
import type { ResourceFetcher } from '../fetch/types.js';
import {
  numberArgument,
  type TableFunction,
  type TableFunctionState,
} from '../functions/table-function.js';

// =============================================================================
// Response schema
// =============================================================================

const optionalNumber = z.number().nullish();

const MetTimeseriesEntrySchema = z.object({
  time: z.string(),
  data: z
    .object({
      instant: z
        .object({
          details: z
            .object({
              air_temperature: optionalNumber,
              relative_humidity: optionalNumber,
              wind_speed: optionalNumber,
              wind_from_direction: optionalNumber,
              wind_speed_of_gust: optionalNumber,
              air_pressure_at_sea_level: optionalNumber,
              cloud_area_fraction: optionalNumber,
            })
            .optional(),
        })
        .optional(),
      next_1_hours: z
        .object({
          details: z.object({ precipitation_amount: optionalNumber }).optional(),
        })
        .optional(),
    })
    .optional(),
});

export const MetResponseSchema = z.object({
  properties: z.object({
    timeseries: z.array(MetTimeseriesEntrySchema),
  }),
});

export type MetTimeseriesEntry = z.infer<typeof MetTimeseriesEntrySchema>;

// =============================================================================
// Table function
// =============================================================================

export const MET_COLUMNS: readonly ColumnDef[] = [
  { name: 'time', type: 'timestamp' },
  { name: 'latitude', type: 'real' },
  { name: 'longitude', type: 'real' },
  { name: 'temperature_celsius', type: 'real', nullable: true },
  { name: 'humidity_percentage', type: 'real', nullable: true },
  { name: 'wind_speed_ms', type: 'real', nullable: true },
  { name: 'wind_direction_deg', type: 'real', nullable: true },
  { name: 'wind_gust_ms', type: 'real', nullable: true },
  { name: 'pressure_hpa', type: 'real', nullable: true },
  { name: 'cloud_cover_percentage', type: 'real', nullable: true },
  { name: 'precipitation_mm', type: 'real', nullable: true },
];

export interface MetBindData {
  latitude: number;
  longitude: number;
  /** Omitted from the request when null */
  altitude: number | null;
  userAgent: string;
  baseUrl: string;
  batchSize: number;
  fetcher: ResourceFetcher;
}

export function buildMetUrl(bind: Pick<MetBindData, 'latitude' | 'longitude' | 'altitude' | 'baseUrl'>): string {
  let url = `${bind.baseUrl}?lat=${bind.latitude.toFixed(6)}&lon=${bind.longitude.toFixed(6)}`;
  if (bind.altitude !== null) {
    url += `&altitude=${bind.altitude.toFixed(0)}`;
  }
  return url;
}

export function metRow(entry: MetTimeseriesEntry, latitude: number, longitude: number): Row {
  const details = entry.data?.instant?.details;
  const time = new Date(entry.time);
  return {
    time: Number.isNaN(time.getTime()) ? null : time,
    latitude,
    longitude,
    temperature_celsius: details?.air_temperature ?? null,
    humidity_percentage: details?.relative_humidity ?? null,
    wind_speed_ms: details?.wind_speed ?? null,
    wind_direction_deg: details?.wind_from_direction ?? null,
    wind_gust_ms: details?.wind_speed_of_gust ?? null,
    pressure_hpa: details?.air_pressure_at_sea_level ?? null,
    cloud_cover_percentage: details?.cloud_area_fraction ?? null,
    precipitation_mm: entry.data?.next_1_hours?.details?.precipitation_amount ?? null,
  };
}

export class MetScanState implements TableFunctionState {
  position = 0;

  constructor(readonly rows: Row[]) {}

  async close(): Promise<void> {
    this.rows.length = 0;
  }
}

function altitudeArgument(value: ArgumentValue | undefined): number | null {
  if (value === undefined || value === null) return null;
  const altitude = numberArgument('met_forecast', 'altitude', value);
  return altitude >= 0 ? altitude : null;
}

export function createMetForecastFunction(
  deps: { fetcher?: ResourceFetcher } = {}
): TableFunction<MetBindData, MetScanState> {
  return {
    name: 'met_forecast',
    namedParameters: ['altitude'],

    bind({ args, namedArgs, settings }) {
      if (args.length < 2 || args.length > 3) {
        throw new BindError(
          BindErrorCode.ARGUMENT_COUNT,
          'met_forecast requires latitude and longitude parameters',
          { context: { function: 'met_forecast' } }
        );
      }
      return {
        bindData: {
          latitude: numberArgument('met_forecast', 'latitude', args[0]),
          longitude: numberArgument('met_forecast', 'longitude', args[1]),
          altitude: altitudeArgument(namedArgs.altitude ?? args[2]),
          userAgent: settings.met_user_agent,
          baseUrl: settings.met_base_url,
          batchSize: settings.batch_size,
          fetcher: deps.fetcher ?? createDefaultFetcher({ timeoutMs: settings.http_timeout_ms }),
        },
        columns: [...MET_COLUMNS],
      };
    },

    describe(bind) {
      return { url: buildMetUrl(bind) };
    },

    async initGlobal(bind, ctx) {
      const url = buildMetUrl(bind);
      ctx.logger.debug('Requesting {url}', { url });
      const body = await fetchJson(bind.fetcher, url, { headers: { 'User-Agent': bind.userAgent } });

      const parsed = MetResponseSchema.safeParse(body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new FetchError(
          FetchErrorCode.INVALID_RESPONSE,
          `Unexpected MET API response at ${issue.path.join('.') || '(root)'}: ${issue.message}`,
          { status: 200, locator: url }
        );
      }

      return new MetScanState(
        parsed.data.properties.timeseries.map((entry) => metRow(entry, bind.latitude, bind.longitude))
      );
    },

    async scan(bind, state) {
      const batch = state.rows.slice(state.position, state.position + bind.batchSize);
      state.position += batch.length;
      return batch;
    },

    progress(_bind, state) {
      return state.rows.length === 0 ? -1 : (state.position / state.rows.length) * 100;
    },
  };
}
