import {
  Database,
  Grib2GridDecoder,
  createSilentLogger,
  loadWeatherExtension,
  type FetchOptions,
  type ResourceFetcher,
} from 'gridsql';
import type { CliContext } from '../actions/index.js';
import { Logger } from '../utils/logger.js';

export const NOW = new Date(Date.UTC(2024, 0, 15, 9, 30));

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

export interface TestContext {
  ctx: CliContext;
  stdout: string[];
  stderr: string[];
  exitCodes: number[];
}

/**
 * A context whose databases fetch through `fetcher` and whose output is captured
 */
export function testContext(fetcher: ResourceFetcher): TestContext {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const exitCodes: number[] = [];

  return {
    ctx: {
      logger: new Logger({ stdout: (line) => stdout.push(line), stderr: (line) => stderr.push(line) }),
      createDatabase: () => {
        const db = new Database({ env: {}, logger: createSilentLogger(), clock: () => NOW });
        loadWeatherExtension(db, { fetcher, decoder: new Grib2GridDecoder(parseJsonPackets) });
        return db;
      },
      exit: (code) => exitCodes.push(code),
    },
    stdout,
    stderr,
    exitCodes,
  };
}

/**
 * Fixture files hold vgrib2-shaped packets as JSON
 */
function parseJsonPackets(bytes: Uint8Array): unknown[] {
  const packets: unknown = JSON.parse(new TextDecoder().decode(bytes));
  if (!Array.isArray(packets)) {
    throw new Error('Fixture does not hold a packet list');
  }
  return packets;
}

/**
 * 2x2 grid over 59-60°N, 350-351°E with one 2 m temperature field
 */
export function temperatureMessage(forecastTime: number): Uint8Array {
  const packet = {
    indicator: { discipline: 0 },
    gridDefinition: { nx: 2, ny: 2, la1: 60, lo1: 350, dx: 1, dy: 1, scanningMode: 0 },
    productDefinition: {
      parameterCategory: 0,
      parameterNumber: 0,
      forecastTime,
      typeOfFirstFixedSurface: 103,
      scaleFactorOfFirstFixedSurface: 0,
      scaledValueOfFirstFixedSurface: 2,
    },
    data: [280, 281, 282, 283],
  };
  return new TextEncoder().encode(JSON.stringify([packet]));
}

export function forecastHourOf(url: string): number {
  const match = /pgrb2\.0p25\.f(\d{3})/.exec(url);
  return match ? Number(match[1]) : -1;
}

export function parseLines(lines: string[]): unknown[] {
  return lines.map((line) => JSON.parse(line));
}
