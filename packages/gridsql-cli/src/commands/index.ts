export { buildForecastPlan, forecastPredicates, type ForecastQueryOptions } from './forecast.js';
export { buildGribPlan, type GribQueryOptions } from './grib.js';
export { buildMetPlan, type MetQueryOptions } from './met.js';
