import { Database } from '../../database.js';
import type { FetchOptions, ResourceFetcher } from '../../fetch/types.js';
import { createSilentLogger } from '../../logging/index.js';
import { loadWeatherExtension } from '../extension.js';
import { Grib2GridDecoder, type GribPacketParser } from '../grib-decoder.js';

export const NOW = new Date(Date.UTC(2024, 0, 15, 9, 30));

/**
 * In-process fetcher that records every request
 */
export class MemoryFetcher implements ResourceFetcher {
  readonly requests: Array<{ locator: string; headers?: Record<string, string> }> = [];

  constructor(private readonly respond: (locator: string) => Uint8Array) {}

  async fetch(locator: string, options?: FetchOptions): Promise<Uint8Array> {
    this.requests.push({ locator, headers: options?.headers });
    return this.respond(locator);
  }

  get locators(): string[] {
    return this.requests.map((r) => r.locator);
  }
}

export function testDatabase(fetcher: ResourceFetcher): Database {
  const db = new Database({ env: {}, logger: createSilentLogger(), clock: () => NOW });
  loadWeatherExtension(db, { fetcher, decoder: testDecoder() });
  return db;
}

// =============================================================================
// GRIB2 fixtures
// =============================================================================

/**
 * A packet shaped like the ones vgrib2 hands back for a regular lat/lon grid
 */
export interface TestPacket {
  indicator: { discipline: number };
  gridDefinition: { nx: number; ny: number; la1: number; lo1: number; dx: number; dy: number; scanningMode?: number };
  productDefinition: {
    parameterCategory: number;
    parameterNumber: number;
    forecastTime?: number;
    typeOfFirstFixedSurface?: number;
    scaleFactorOfFirstFixedSurface?: number;
    scaledValueOfFirstFixedSurface?: number;
  };
  /** null marks a missing point */
  data: (number | null)[];
}

/**
 * Fixture files hold their packets as JSON; this reads them back
 */
export const parseTestPackets: GribPacketParser = (bytes) => {
  const packets: unknown = JSON.parse(new TextDecoder().decode(bytes));
  if (!Array.isArray(packets)) {
    throw new Error('Fixture does not hold a packet list');
  }
  return packets;
};

export function testDecoder(): Grib2GridDecoder {
  return new Grib2GridDecoder(parseTestPackets);
}

export function encodeGribFile(...packets: TestPacket[]): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(packets));
}

/**
 * 2x2 grid over 59-60°N, 350-351°E with one 2 m temperature field
 */
export function temperaturePacket(
  forecastTime: number,
  overrides: { parameterNumber?: number; data?: (number | null)[] } = {}
): TestPacket {
  return {
    indicator: { discipline: 0 },
    gridDefinition: { nx: 2, ny: 2, la1: 60, lo1: 350, dx: 1, dy: 1, scanningMode: 0 },
    productDefinition: {
      parameterCategory: 0,
      parameterNumber: overrides.parameterNumber ?? 0,
      forecastTime,
      typeOfFirstFixedSurface: 103,
      scaleFactorOfFirstFixedSurface: 0,
      scaledValueOfFirstFixedSurface: 2,
    },
    data: overrides.data ?? [280, 281, 282, 283],
  };
}

export function temperatureMessage(forecastTime: number): Uint8Array {
  return encodeGribFile(temperaturePacket(forecastTime));
}

/**
 * Forecast hour of a NOMADS filter URL
 */
export function forecastHourOf(url: string): number {
  const match = /pgrb2\.0p25\.f(\d{3})/.exec(url);
  return match ? Number(match[1]) : -1;
}
