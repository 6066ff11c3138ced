import { describe, it, expect } from 'vitest';
import { DEFAULT_MET_BASE_URL, DEFAULT_USER_AGENT } from '../../config/settings.js';
import { col, lit, tableFunction } from '../../engine/builders.js';
import { BindError, BindErrorCode, FetchError, FetchErrorCode } from '../../errors/index.js';
import { buildMetUrl } from '../met-forecast.js';
import { MemoryFetcher, testDatabase } from './helpers.js';

const RESPONSE = {
  type: 'Feature',
  properties: {
    timeseries: [
      {
        time: '2024-01-15T10:00:00Z',
        data: {
          instant: {
            details: {
              air_temperature: -3.2,
              relative_humidity: 81.5,
              wind_speed: 4.1,
              wind_from_direction: 200,
              air_pressure_at_sea_level: 1012.4,
              cloud_area_fraction: 100,
            },
          },
          next_1_hours: { details: { precipitation_amount: 0.3 } },
        },
      },
      {
        time: '2024-01-15T11:00:00Z',
        data: { instant: { details: { air_temperature: -2.9 } } },
      },
      { time: '2024-01-15T12:00:00Z' },
    ],
  },
};

function jsonFetcher(body: unknown): MemoryFetcher {
  return new MemoryFetcher(() => new TextEncoder().encode(typeof body === 'string' ? body : JSON.stringify(body)));
}

function bindError(fn: () => unknown): BindError | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof BindError) return error;
    throw error;
  }
  return undefined;
}

const OSLO = [lit(59.911), lit(10.75)];

describe('met_forecast', () => {
  it('should turn each timeseries entry into a row', async () => {
    const db = testDatabase(jsonFetcher(RESPONSE));

    const { rows } = await db.query(tableFunction('met_forecast', OSLO));

    expect(rows).toHaveLength(3);
    expect(rows[0]).toEqual({
      time: new Date('2024-01-15T10:00:00Z'),
      latitude: 59.911,
      longitude: 10.75,
      temperature_celsius: -3.2,
      humidity_percentage: 81.5,
      wind_speed_ms: 4.1,
      wind_direction_deg: 200,
      wind_gust_ms: null,
      pressure_hpa: 1012.4,
      cloud_cover_percentage: 100,
      precipitation_mm: 0.3,
    });
    expect(rows[1]).toMatchObject({ temperature_celsius: -2.9, humidity_percentage: null, precipitation_mm: null });
    expect(rows[2]).toMatchObject({ time: new Date('2024-01-15T12:00:00Z'), temperature_celsius: null });
  });

  it('should identify itself with the configured User-Agent', async () => {
    const fetcher = jsonFetcher(RESPONSE);
    const db = testDatabase(fetcher);

    await db.query(tableFunction('met_forecast', OSLO));
    db.set('met_user_agent', 'test-agent/1.0 test@example.com');
    await db.query(tableFunction('met_forecast', OSLO));

    expect(fetcher.requests.map((r) => r.headers)).toEqual([
      { 'User-Agent': DEFAULT_USER_AGENT },
      { 'User-Agent': 'test-agent/1.0 test@example.com' },
    ]);
  });

  it('should send altitude only when given and non-negative', async () => {
    const fetcher = jsonFetcher(RESPONSE);
    const db = testDatabase(fetcher);

    await db.query(tableFunction('met_forecast', OSLO));
    await db.query(tableFunction('met_forecast', OSLO, { altitude: 90 }));
    await db.query(tableFunction('met_forecast', [...OSLO, lit(12.6)]));
    await db.query(tableFunction('met_forecast', OSLO, { altitude: -1 }));

    expect(fetcher.locators).toEqual([
      `${DEFAULT_MET_BASE_URL}?lat=59.911000&lon=10.750000`,
      `${DEFAULT_MET_BASE_URL}?lat=59.911000&lon=10.750000&altitude=90`,
      `${DEFAULT_MET_BASE_URL}?lat=59.911000&lon=10.750000&altitude=13`,
      `${DEFAULT_MET_BASE_URL}?lat=59.911000&lon=10.750000`,
    ]);
  });

  it('should show the request URL in EXPLAIN', () => {
    const db = testDatabase(jsonFetcher(RESPONSE));

    expect(db.explain(tableFunction('met_forecast', OSLO))).toBe(
      `TableFunction met_forecast(59.911, 10.75) [url=${DEFAULT_MET_BASE_URL}?lat=59.911000&lon=10.750000]`
    );
  });

  it('should hand rows out in batches of batch_size', async () => {
    const db = testDatabase(jsonFetcher(RESPONSE));
    db.set('batch_size', 1);

    const execution = db.execute(tableFunction('met_forecast', OSLO));
    const iterator = execution[Symbol.asyncIterator]();
    await iterator.next();

    expect(execution.progress()).toBeCloseTo(100 / 3);
    await iterator.return?.();
    expect(execution.progress()).toBeCloseTo(100 / 3);
  });

  describe('errors', () => {
    it('should reject a response without a timeseries', async () => {
      const db = testDatabase(jsonFetcher({ type: 'Feature' }));

      const error = await db.query(tableFunction('met_forecast', OSLO)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (!(error instanceof FetchError)) return;
      expect(error.code).toBe(FetchErrorCode.INVALID_RESPONSE);
      expect(error.message).toBe('Unexpected MET API response at properties: Required');
    });

    it('should reject a body that is not JSON', async () => {
      const db = testDatabase(jsonFetcher('<html>busy</html>'));

      const error = await db.query(tableFunction('met_forecast', OSLO)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (!(error instanceof FetchError)) return;
      expect(error.code).toBe(FetchErrorCode.INVALID_RESPONSE);
      expect(error.message).toBe(`Response from ${DEFAULT_MET_BASE_URL}?lat=59.911000&lon=10.750000 is not valid JSON`);
    });

    it('should require latitude and longitude', () => {
      const db = testDatabase(jsonFetcher(RESPONSE));

      const error = bindError(() => db.prepare(tableFunction('met_forecast', [lit(59.911)])));

      expect(error?.code).toBe(BindErrorCode.ARGUMENT_COUNT);
      expect(error?.message).toBe('met_forecast requires latitude and longitude parameters');
    });

    it('should reject non-numeric coordinates', () => {
      const db = testDatabase(jsonFetcher(RESPONSE));

      const error = bindError(() => db.prepare(tableFunction('met_forecast', [lit('north'), lit(10.75)])));

      expect(error?.code).toBe(BindErrorCode.INVALID_ARGUMENT);
      expect(error?.message).toBe('met_forecast() argument "latitude" must be a number');
    });

    it('should reject unknown named arguments', () => {
      const db = testDatabase(jsonFetcher(RESPONSE));

      const error = bindError(() => db.prepare(tableFunction('met_forecast', OSLO, { elevation: 90 })));

      expect(error?.code).toBe(BindErrorCode.UNKNOWN_ARGUMENT);
      expect(error?.message).toBe('met_forecast() does not accept a named argument "elevation"');
    });

    it('should reject arguments that depend on a row', () => {
      const db = testDatabase(jsonFetcher(RESPONSE));

      const error = bindError(() => db.prepare(tableFunction('met_forecast', [col('lat'), lit(10.75)])));

      expect(error?.code).toBe(BindErrorCode.INVALID_ARGUMENT);
      expect(error?.message).toBe('met_forecast() argument "1" must be a constant');
    });
  });
});

describe('buildMetUrl', () => {
  it('should format coordinates with six decimals', () => {
    expect(buildMetUrl({ latitude: -33.8688, longitude: 151.2093, altitude: null, baseUrl: 'https://met.test/compact' })).toBe(
      'https://met.test/compact?lat=-33.868800&lon=151.209300'
    );
  });
});
