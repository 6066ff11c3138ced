import { limit, list, tableFunction, type QueryPlan } from 'gridsql';

export interface GribQueryOptions {
  limit?: number;
}

/**
 * read_grib over one path, or a list of them in the order given
 */
export function buildGribPlan(paths: string[], options: GribQueryOptions = {}): QueryPlan {
  const scan = tableFunction('read_grib', [paths.length === 1 ? paths[0] : list(paths)]);
  return options.limit === undefined ? scan : limit(scan, options.limit);
}
