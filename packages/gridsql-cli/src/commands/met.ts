import { limit, tableFunction, type QueryPlan } from 'gridsql';

export interface MetQueryOptions {
  altitude?: number;
  limit?: number;
}

export function buildMetPlan(latitude: number, longitude: number, options: MetQueryOptions = {}): QueryPlan {
  const scan = tableFunction(
    'met_forecast',
    [latitude, longitude],
    options.altitude === undefined ? undefined : { altitude: options.altitude }
  );
  return options.limit === undefined ? scan : limit(scan, options.limit);
}
