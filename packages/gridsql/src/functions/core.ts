/**
 * Core scalar functions
 *
 * - abs(x), round(x, y?), sqrt(x), power(x, y) / pow(x, y)
 * - floor(x), ceil(x)
 * - lower(x), upper(x)
 * - coalesce(x, ...)
 */

import type { SqlValue } from '../engine/types.js';
import type { SqlFunction, FunctionSignature } from './registry.js';

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Coerce a SQL value to a finite number, or null
 */
export function toNumber(x: SqlValue): number | null {
  if (x === null) return null;
  if (typeof x === 'number') return Number.isNaN(x) ? null : x;
  if (typeof x === 'bigint') return Number(x);
  if (typeof x === 'boolean') return x ? 1 : 0;
  if (x instanceof Date || x instanceof Uint8Array) return null;
  const num = Number(x);
  return Number.isNaN(num) ? null : num;
}

function unary(op: (x: number) => number): (x: SqlValue) => SqlValue {
  return (x) => {
    const num = toNumber(x);
    return num === null ? null : op(num);
  };
}

// =============================================================================
// IMPLEMENTATIONS
// =============================================================================

/**
 * abs(x) - Returns absolute value of x
 */
export function abs(x: SqlValue): SqlValue {
  if (typeof x === 'bigint') return x < 0n ? -x : x;
  const num = toNumber(x);
  return num === null ? null : Math.abs(num);
}

/**
 * round(x, y?) - Round x to y decimal places (default: 0)
 */
export function round(x: SqlValue, y?: SqlValue): SqlValue {
  const num = toNumber(x);
  if (num === null) return null;

  const precision = y !== undefined && y !== null ? toNumber(y) : 0;
  if (precision === null) return null;

  const factor = Math.pow(10, precision);
  return Math.round(num * factor) / factor;
}

export function power(x: SqlValue, y: SqlValue): SqlValue {
  const base = toNumber(x);
  const exponent = toNumber(y);
  if (base === null || exponent === null) return null;
  return Math.pow(base, exponent);
}

/**
 * sqrt(x) - NULL for negative input
 */
export function sqrt(x: SqlValue): SqlValue {
  const num = toNumber(x);
  if (num === null || num < 0) return null;
  return Math.sqrt(num);
}

export function lower(x: SqlValue): SqlValue {
  if (x === null) return null;
  return String(x).toLowerCase();
}

export function upper(x: SqlValue): SqlValue {
  if (x === null) return null;
  return String(x).toUpperCase();
}

/**
 * coalesce(x, ...) - First non-NULL argument
 */
export function coalesce(...args: SqlValue[]): SqlValue {
  for (const arg of args) {
    if (arg !== null) return arg;
  }
  return null;
}

// =============================================================================
// FUNCTION REGISTRY
// =============================================================================

export const coreFunctions: Record<string, SqlFunction> = {
  abs: { fn: abs, minArgs: 1, maxArgs: 1 },
  round: { fn: round, minArgs: 1, maxArgs: 2 },
  sqrt: { fn: sqrt, minArgs: 1, maxArgs: 1 },
  pow: { fn: power, minArgs: 2, maxArgs: 2 },
  power: { fn: power, minArgs: 2, maxArgs: 2 },
  floor: { fn: unary(Math.floor), minArgs: 1, maxArgs: 1 },
  ceil: { fn: unary(Math.ceil), minArgs: 1, maxArgs: 1 },
  lower: { fn: lower, minArgs: 1, maxArgs: 1 },
  upper: { fn: upper, minArgs: 1, maxArgs: 1 },
  coalesce: { fn: coalesce, minArgs: 1, maxArgs: Infinity },
};

export const coreSignatures: Record<string, FunctionSignature> = {
  abs: {
    name: 'abs',
    params: [{ name: 'x', type: 'number' }],
    returnType: 'number',
    description: 'Returns absolute value of x',
  },
  round: {
    name: 'round',
    params: [
      { name: 'x', type: 'number' },
      { name: 'y', type: 'number', optional: true },
    ],
    returnType: 'number',
    description: 'Round x to y decimal places (default: 0)',
  },
  sqrt: {
    name: 'sqrt',
    params: [{ name: 'x', type: 'number' }],
    returnType: 'number',
    description: 'Returns square root of x',
  },
  power: {
    name: 'power',
    params: [
      { name: 'x', type: 'number' },
      { name: 'y', type: 'number' },
    ],
    returnType: 'number',
    description: 'Returns x raised to power y',
  },
  coalesce: {
    name: 'coalesce',
    params: [{ name: 'values', type: 'any', variadic: true }],
    returnType: 'any',
    description: 'Returns the first non-NULL argument',
  },
};
