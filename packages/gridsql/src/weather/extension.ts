/**
 * Weather extension
 *
 * Registers the forecast table functions, the weather scalar functions and
 * the LIMIT pushdown rewriter on a database.
 *
 * @example
 * ```typescript
 * const db = new Database();
 * loadWeatherExtension(db);
 * db.set('met_user_agent', 'my-app/1.0 ops@example.com');
 * ```
 */

import type { Database } from '../database.js';
import { defineTableFunction } from '../functions/table-function.js';
import { weatherFunctions, weatherSignatures } from './functions.js';
import { createGfsForecastFunction, type WeatherScanDependencies } from './gfs-forecast.js';
import { limitRewriter } from './limit-rewriter.js';
import { createMetForecastFunction } from './met-forecast.js';
import { createReadGribFunction } from './read-grib.js';

export const GFS_FUNCTION_ALIAS = 'noaa_gfs_forecast_api';

export function loadWeatherExtension(db: Database, deps: WeatherScanDependencies = {}): void {
  db.registerTableFunction(defineTableFunction(createGfsForecastFunction(deps)));
  db.registerTableFunction(defineTableFunction(createGfsForecastFunction(deps, GFS_FUNCTION_ALIAS)));
  db.registerTableFunction(defineTableFunction(createReadGribFunction(deps)));
  db.registerTableFunction(defineTableFunction(createMetForecastFunction({ fetcher: deps.fetcher })));
  db.functions.registerAll(weatherFunctions, weatherSignatures);
  db.registerOptimizerExtension(limitRewriter);
}
