/**
 * Option parsers for commander
 *
 * Each throws commander's `InvalidArgumentError`, which commander reports as
 * `error: option '--hours <list>' argument '3,x' is invalid. <message>`.
 */

import { InvalidArgumentError } from 'commander';

export interface BoundingBox {
  latMin: number;
  latMax: number;
  lonMin: number;
  lonMax: number;
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number(value);
}

export function parseNonNegativeInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 0) {
    throw new InvalidArgumentError('Must not be negative.');
  }
  return parsed;
}

/**
 * Comma separated names; blanks are dropped
 */
export function parseList(value: string): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
  if (items.length === 0) {
    throw new InvalidArgumentError('Expected a comma separated list.');
  }
  return items;
}

export function parseIntegerList(value: string): number[] {
  return parseList(value).map(parseNonNegativeInteger);
}

/**
 * `latMin,latMax,lonMin,lonMax`
 */
export function parseBoundingBox(value: string): BoundingBox {
  const parts = value.split(',').map((part) => part.trim());
  if (parts.length !== 4) {
    throw new InvalidArgumentError('Expected latMin,latMax,lonMin,lonMax.');
  }
  const [latMin, latMax, lonMin, lonMax] = parts.map(parseNumber);
  if (latMin > latMax) {
    throw new InvalidArgumentError('latMin is greater than latMax.');
  }
  return { latMin, latMax, lonMin, lonMax };
}

/**
 * `YYYYMMDD`
 */
export function parseRunDate(value: string): string {
  if (!/^\d{8}$/.test(value)) {
    throw new InvalidArgumentError('Expected a date as YYYYMMDD.');
  }
  return value;
}
