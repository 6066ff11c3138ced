/**
 * Filter pushdown for gfs_forecast
 *
 * Folds predicates over the scan's columns into the query descriptor.
 * Resolved predicates are dropped from the plan, so resolution must be exact:
 * a list with a single unrecognised entry is left whole. Range predicates on
 * coordinates only narrow the fetched rectangle and are always kept.
 */

import type { Expression, Literal, Predicate, SqlValue } from '../engine/types.js';
import { normalizeLevel, normalizeVariable } from './names.js';
import {
  clampLatitude,
  formatRunDate,
  normalizeLongitude,
  RUN_HOURS,
  type QueryDescriptor,
} from './query-descriptor.js';

type Resolution = 'removed' | 'kept';

/**
 * Apply every resolvable predicate to `descriptor` and return the predicates
 * the relational layer must still evaluate, in their original order.
 */
export function translateFilters(descriptor: QueryDescriptor, predicates: Predicate[]): Predicate[] {
  return predicates.filter((predicate) => translatePredicate(descriptor, predicate) === 'kept');
}

function translatePredicate(descriptor: QueryDescriptor, predicate: Predicate): Resolution {
  if (predicate.type === 'in') {
    const column = columnName(predicate.expr);
    const values = literalValues(predicate.values);
    if (column === undefined || values === undefined) return 'kept';
    return applyList(descriptor, column, values);
  }

  if (predicate.type !== 'comparison') return 'kept';

  const column = columnName(predicate.left);
  if (column === undefined || predicate.right.type !== 'literal') return 'kept';
  const value = predicate.right.value;

  switch (predicate.op) {
    case 'eq':
      return applyEquality(descriptor, column, value);
    case 'ge':
    case 'gt':
      applyBound(descriptor, column, 'min', value);
      return 'kept';
    case 'le':
    case 'lt':
      applyBound(descriptor, column, 'max', value);
      return 'kept';
    default:
      return 'kept';
  }
}

// =============================================================================
// Equality and membership
// =============================================================================

function applyEquality(descriptor: QueryDescriptor, column: string, value: SqlValue): Resolution {
  switch (column) {
    case 'variable':
    case 'level':
    case 'forecast_hour':
      return applyList(descriptor, column, [value]);
    case 'run_date': {
      const runDate = toRunDate(value);
      if (runDate === undefined) return 'kept';
      descriptor.runDate = runDate;
      return 'removed';
    }
    case 'run_hour': {
      const hour = toInteger(value);
      if (hour === undefined || !RUN_HOURS.includes(hour)) return 'kept';
      descriptor.runHour = hour;
      return 'removed';
    }
    default:
      return 'kept';
  }
}

/**
 * All-or-nothing: every value must resolve, or the descriptor is untouched.
 * Repeated values collapse to their first occurrence.
 */
function applyList(descriptor: QueryDescriptor, column: string, values: SqlValue[]): Resolution {
  if (values.length === 0) return 'kept';

  switch (column) {
    case 'variable': {
      const tokens = resolveAll(values, normalizeVariable);
      if (tokens === undefined) return 'kept';
      descriptor.variables = tokens;
      return 'removed';
    }
    case 'level': {
      const tokens = resolveAll(values, normalizeLevel);
      if (tokens === undefined) return 'kept';
      descriptor.levels = tokens;
      return 'removed';
    }
    case 'forecast_hour': {
      const hours: number[] = [];
      for (const value of values) {
        const hour = toInteger(value);
        if (hour === undefined || hour < 0) return 'kept';
        hours.push(hour);
      }
      descriptor.forecastHours = unique(hours);
      return 'removed';
    }
    default:
      return 'kept';
  }
}

function resolveAll(values: SqlValue[], normalize: (name: string) => string): string[] | undefined {
  const tokens: string[] = [];
  for (const value of values) {
    if (typeof value !== 'string') return undefined;
    const token = normalize(value);
    if (token === '') return undefined;
    tokens.push(token);
  }
  return unique(tokens);
}

function unique<T>(values: T[]): T[] {
  return [...new Set(values)];
}

// =============================================================================
// Bounding box
// =============================================================================

function applyBound(
  descriptor: QueryDescriptor,
  column: string,
  side: 'min' | 'max',
  value: SqlValue
): void {
  const degrees = toFiniteNumber(value);
  if (degrees === undefined) return;

  const box = descriptor.boundingBox;
  if (column === 'latitude') {
    const lat = clampLatitude(degrees);
    if (side === 'min') box.latMin = lat;
    else box.latMax = lat;
    if (box.latMin > box.latMax) {
      [box.latMin, box.latMax] = [box.latMax, box.latMin];
    }
    descriptor.hasBbox = true;
  } else if (column === 'longitude') {
    const lon = normalizeLongitude(degrees);
    if (side === 'min') box.lonMin = lon;
    else box.lonMax = lon;
    descriptor.hasBbox = true;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function columnName(expr: Expression): string | undefined {
  return expr.type === 'columnRef' ? expr.column : undefined;
}

function literalValues(exprs: Expression[]): SqlValue[] | undefined {
  const literals = exprs.filter((e): e is Literal => e.type === 'literal');
  return literals.length === exprs.length ? literals.map((l) => l.value) : undefined;
}

function toFiniteNumber(value: SqlValue): number | undefined {
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  return undefined;
}

function toInteger(value: SqlValue): number | undefined {
  const num = toFiniteNumber(value);
  return num !== undefined && Number.isInteger(num) ? num : undefined;
}

/**
 * YYYYMMDD from a date value, or from a string once separators are stripped
 */
function toRunDate(value: SqlValue): string | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : formatRunDate(value);
  }
  if (typeof value !== 'string') return undefined;
  const digits = value.replace(/\D/g, '');
  return digits.length === 8 ? digits : undefined;
}
