import { describe, it, expect } from 'vitest';
import { Database } from '../database.js';
import { tableFunction, values } from '../engine/builders.js';
import { BindError } from '../errors/index.js';
import { createLogger, MemorySink } from '../logging/index.js';
import { GFS_FUNCTION_ALIAS, loadWeatherExtension } from '../weather/extension.js';
import { LIMIT_REWRITER_NAME } from '../weather/limit-rewriter.js';

describe('Database', () => {
  it('should resolve settings from options and environment', () => {
    const db = new Database({ settings: { batch_size: 16 }, env: { GRIDSQL_HTTP_TIMEOUT_MS: '1000' } });

    expect(db.get('batch_size')).toBe(16);
    expect(db.get('http_timeout_ms')).toBe(1000);
  });

  it('should hand out frozen snapshots of its settings', () => {
    const db = new Database({ env: {} });
    const snapshot = db.getSettings();

    db.set('batch_size', 32);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.batch_size).toBe(2048);
    expect(db.get('batch_size')).toBe(32);
  });

  it('should apply log_level to its logger', () => {
    const sink = new MemorySink();
    const db = new Database({ env: {}, logger: createLogger({ level: 'info', sink }) });

    db.set('log_level', 'debug');
    db.set('batch_size', 8);

    expect(sink.entries.map((e) => e.message)).toEqual(['Setting log_level changed', 'Setting batch_size changed']);
  });

  it('should reject bad settings', () => {
    const db = new Database({ env: {} });

    expect(() => db.set('batch_size', -1)).toThrow(BindError);
    expect(db.get('batch_size')).toBe(2048);
  });

  it('should register the weather extension', () => {
    const db = new Database({ env: {} });
    loadWeatherExtension(db);

    expect(db.tableFunctions.getFunctionNames()).toEqual([
      'gfs_forecast',
      'met_forecast',
      GFS_FUNCTION_ALIAS,
      'read_grib',
    ]);
    expect(db.functions.has('wind_speed')).toBe(true);
    expect(db.getOptimizerExtensions()).toEqual([LIMIT_REWRITER_NAME]);
  });

  it('should reuse a prepared query', async () => {
    const db = new Database({ env: {} });
    const prepared = db.prepare(values(['a'], [{ a: 1 }]));

    const first = await db.query(prepared);
    const second = await db.query(prepared);

    expect(first.rows).toEqual([{ a: 1 }]);
    expect(second.rows).toEqual([{ a: 1 }]);
    expect(prepared.explain()).toBe('Values [a] (~1 rows)');
  });

  it('should fail to prepare an unregistered function', () => {
    expect(() => new Database({ env: {} }).prepare(tableFunction('gfs_forecast'))).toThrow(
      'Unknown table function: gfs_forecast'
    );
  });
});
