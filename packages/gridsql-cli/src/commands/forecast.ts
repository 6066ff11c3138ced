/**
 * gfs_forecast plans from command line options
 *
 * Every option becomes a predicate over the scan's columns, so the same
 * pushdown path runs as for a hand-built plan.
 */

import {
  and_,
  col,
  eq,
  filter,
  ge,
  inList,
  le,
  limit,
  tableFunction,
  type Predicate,
  type QueryPlan,
} from 'gridsql';
import type { BoundingBox } from '../utils/parse.js';

export interface ForecastQueryOptions {
  date?: string;
  runHour?: number;
  hours?: number[];
  variables?: string[];
  levels?: string[];
  bbox?: BoundingBox;
  limit?: number;
}

export function forecastPredicates(options: ForecastQueryOptions): Predicate[] {
  const predicates: Predicate[] = [];

  if (options.date !== undefined) predicates.push(eq(col('run_date'), options.date));
  if (options.runHour !== undefined) predicates.push(eq(col('run_hour'), options.runHour));
  if (options.hours?.length) predicates.push(inList(col('forecast_hour'), options.hours));
  if (options.variables?.length) predicates.push(inList(col('variable'), options.variables));
  if (options.levels?.length) predicates.push(inList(col('level'), options.levels));

  if (options.bbox) {
    const { latMin, latMax, lonMin, lonMax } = options.bbox;
    predicates.push(
      ge(col('latitude'), latMin),
      le(col('latitude'), latMax),
      ge(col('longitude'), lonMin),
      le(col('longitude'), lonMax)
    );
  }

  return predicates;
}

export function buildForecastPlan(options: ForecastQueryOptions): QueryPlan {
  const predicates = forecastPredicates(options);
  let plan: QueryPlan = tableFunction('gfs_forecast');

  if (predicates.length === 1) {
    plan = filter(plan, predicates[0]);
  } else if (predicates.length > 1) {
    plan = filter(plan, and_(...predicates));
  }

  return options.limit === undefined ? plan : limit(plan, options.limit);
}
