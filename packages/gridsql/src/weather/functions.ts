/**
 * Weather scalar functions
 *
 * Unit conversions, derived quantities (wind speed and direction, dew point,
 * heat index, wind chill) and descriptive categories. Every function returns
 * NULL when any argument is NULL or non-numeric.
 */

import type { SqlValue } from '../engine/types.js';
import { toNumber } from '../functions/core.js';
import type { FunctionSignature, SqlFunction } from '../functions/registry.js';

// =============================================================================
// Temperature
// =============================================================================

export const kelvinToCelsius = (k: number): number => k - 273.15;
export const celsiusToFahrenheit = (c: number): number => (c * 9.0) / 5.0 + 32;
export const kelvinToFahrenheit = (k: number): number => ((k - 273.15) * 9.0) / 5.0 + 32;
export const fahrenheitToCelsius = (f: number): number => ((f - 32) * 5.0) / 9.0;

/**
 * Dew point from temperature and relative humidity (Magnus approximation)
 */
export function dewPoint(tempC: number, rh: number): number {
  const gamma = Math.log(rh / 100.0) + (17.625 * tempC) / (243.04 + tempC);
  return (243.04 * gamma) / (17.625 - gamma);
}

/**
 * Heat index (simplified Rothfusz regression); the temperature itself below 27 °C
 */
export function heatIndex(tempC: number, rh: number): number {
  if (tempC < 27) return tempC;
  return (
    -8.785 +
    1.611 * tempC +
    2.339 * rh -
    0.146 * tempC * rh -
    0.013 * tempC * tempC -
    0.016 * rh * rh +
    0.002 * tempC * tempC * rh +
    0.001 * tempC * rh * rh -
    0.000002 * tempC * tempC * rh * rh
  );
}

/**
 * Wind chill (Environment Canada); the temperature itself above 10 °C or below 4.8 km/h
 */
export function windChill(tempC: number, windKmh: number): number {
  if (tempC > 10 || windKmh < 4.8) return tempC;
  const v = Math.pow(windKmh, 0.16);
  return 13.12 + 0.6215 * tempC - 11.37 * v + 0.3965 * tempC * v;
}

export function feelsLike(tempC: number, rh: number, windKmh: number): number {
  if (tempC >= 27 && rh >= 40) return heatIndex(tempC, rh);
  if (tempC <= 10 && windKmh >= 4.8) return windChill(tempC, windKmh);
  return tempC;
}

// =============================================================================
// Wind
// =============================================================================

export const windSpeed = (u: number, v: number): number => Math.sqrt(u * u + v * v);

/**
 * Meteorological direction the wind blows from, in degrees; null when calm
 */
export function windDirection(u: number, v: number): number | null {
  if (u === 0 && v === 0) return null;
  return ((Math.atan2(-u, -v) * 180) / Math.PI + 360) % 360;
}

const BEAUFORT: readonly [number, string][] = [
  [0.5, 'Calm'],
  [1.6, 'Light air'],
  [3.4, 'Light breeze'],
  [5.5, 'Gentle breeze'],
  [8.0, 'Moderate breeze'],
  [10.8, 'Fresh breeze'],
  [13.9, 'Strong breeze'],
  [17.2, 'High wind'],
  [20.8, 'Gale'],
  [24.5, 'Strong gale'],
  [28.5, 'Storm'],
  [32.7, 'Violent storm'],
];

export function beaufortScale(windMs: number): number {
  const force = BEAUFORT.findIndex(([limit]) => windMs < limit);
  return force === -1 ? 12 : force;
}

export function beaufortDescription(windMs: number): string {
  const force = beaufortScale(windMs);
  return force === 12 ? 'Hurricane' : BEAUFORT[force][1];
}

const CARDINALS = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;

export function cardinalDirection(degrees: number): string {
  if (degrees < 22.5 || degrees >= 337.5) return 'N';
  const sector = CARDINALS.findIndex((_, i) => i > 0 && degrees < 22.5 + 45 * i);
  return sector === -1 ? 'NW' : CARDINALS[sector];
}

// =============================================================================
// Categories
// =============================================================================

function category(thresholds: readonly [number, string][], fallback: string): (x: number) => string {
  return (x) => thresholds.find(([limit]) => x < limit)?.[1] ?? fallback;
}

export const visibilityCategory = category(
  [
    [100, 'Dense fog'],
    [1000, 'Fog'],
    [4000, 'Mist'],
    [10000, 'Haze'],
  ],
  'Clear'
);

export function precipIntensity(rateMmH: number): string {
  if (rateMmH === 0) return 'None';
  return category(
    [
      [2.5, 'Light'],
      [7.6, 'Moderate'],
      [50, 'Heavy'],
    ],
    'Violent'
  )(rateMmH);
}

export const cloudDescription = category(
  [
    [12.5, 'Clear'],
    [25, 'Mostly clear'],
    [50, 'Partly cloudy'],
    [87.5, 'Mostly cloudy'],
  ],
  'Overcast'
);

export const uvCategory = category(
  [
    [3, 'Low'],
    [6, 'Moderate'],
    [8, 'High'],
    [11, 'Very high'],
  ],
  'Extreme'
);

// =============================================================================
// Registration
// =============================================================================

type NumericImpl = (...args: number[]) => number | string | null;

/**
 * Wrap a numeric implementation as a SQL function of fixed arity
 */
function numeric(arity: number, impl: NumericImpl): SqlFunction {
  return {
    fn: (...args: SqlValue[]): SqlValue => {
      const nums: number[] = [];
      for (const arg of args) {
        const num = toNumber(arg);
        if (num === null) return null;
        nums.push(num);
      }
      return impl(...nums);
    },
    minArgs: arity,
    maxArgs: arity,
    deterministic: true,
  };
}

export const weatherFunctions: Record<string, SqlFunction> = {
  kelvin_to_celsius: numeric(1, kelvinToCelsius),
  celsius_to_fahrenheit: numeric(1, celsiusToFahrenheit),
  kelvin_to_fahrenheit: numeric(1, kelvinToFahrenheit),
  fahrenheit_to_celsius: numeric(1, fahrenheitToCelsius),
  wind_speed: numeric(2, windSpeed),
  wind_direction: numeric(2, windDirection),
  wind_speed_kmh: numeric(1, (ms) => ms * 3.6),
  wind_speed_mph: numeric(1, (ms) => ms * 2.237),
  wind_speed_knots: numeric(1, (ms) => ms * 1.944),
  pa_to_hpa: numeric(1, (pa) => pa / 100.0),
  hpa_to_inhg: numeric(1, (hpa) => hpa * 0.02953),
  inhg_to_hpa: numeric(1, (inhg) => inhg / 0.02953),
  dew_point: numeric(2, dewPoint),
  heat_index: numeric(2, heatIndex),
  wind_chill: numeric(2, windChill),
  feels_like: numeric(3, feelsLike),
  beaufort_scale: numeric(1, beaufortScale),
  beaufort_description: numeric(1, beaufortDescription),
  visibility_category: numeric(1, visibilityCategory),
  precip_intensity: numeric(1, precipIntensity),
  cloud_description: numeric(1, cloudDescription),
  uv_category: numeric(1, uvCategory),
  cardinal_direction: numeric(1, cardinalDirection),
  meters_to_km: numeric(1, (m) => m / 1000.0),
  meters_to_miles: numeric(1, (m) => m / 1609.344),
  meters_to_feet: numeric(1, (m) => m * 3.28084),
  mm_to_inches: numeric(1, (mm) => mm / 25.4),
};

export const weatherSignatures: Record<string, FunctionSignature> = {
  wind_speed: {
    name: 'wind_speed',
    params: [
      { name: 'u', type: 'number' },
      { name: 'v', type: 'number' },
    ],
    returnType: 'number',
    description: 'Wind speed in m/s from its u and v components',
  },
  wind_direction: {
    name: 'wind_direction',
    params: [
      { name: 'u', type: 'number' },
      { name: 'v', type: 'number' },
    ],
    returnType: 'number',
    description: 'Direction the wind blows from in degrees, NULL when calm',
  },
  feels_like: {
    name: 'feels_like',
    params: [
      { name: 'temp_c', type: 'number' },
      { name: 'rh', type: 'number' },
      { name: 'wind_kmh', type: 'number' },
    ],
    returnType: 'number',
    description: 'Apparent temperature combining heat index and wind chill',
  },
};
