import { describe, it, expect } from 'vitest';
import { Database } from '../../database.js';
import { PlanError, PlanErrorCode, QueryCancelledError } from '../../errors/index.js';
import { defineTableFunction } from '../../functions/table-function.js';
import { createLogger, MemorySink } from '../../logging/index.js';
import { limit, tableFunction } from '../builders.js';
import type { QueryPlan } from '../types.js';
import type { QueryExecution } from '../executor.js';
import { ticksFunction, type TicksState } from './fixtures.js';

function setup(): { db: Database; states: TicksState[]; sink: MemorySink } {
  const states: TicksState[] = [];
  const sink = new MemorySink();
  const db = new Database({ env: {}, logger: createLogger({ level: 'debug', sink }) });
  db.registerTableFunction(defineTableFunction(ticksFunction(states)));
  return { db, states, sink };
}

async function drain(execution: QueryExecution): Promise<{ ticks: unknown[]; error: unknown }> {
  const ticks: unknown[] = [];
  try {
    for await (const row of execution) {
      ticks.push(row.tick);
    }
    return { ticks, error: undefined };
  } catch (error) {
    return { ticks, error };
  }
}

const ticks: QueryPlan = tableFunction('ticks', [3]);

describe('QueryExecution', () => {
  it('should stream rows and report statistics', async () => {
    const { db } = setup();

    const result = await db.execute(ticks).collect();

    expect(result.rows.map((r) => r.tick)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(result.columns).toEqual(['tick', 'k']);
    expect(result.stats.rowsReturned).toBe(6);
    expect(result.stats.executionTime).toBeGreaterThanOrEqual(0);
  });

  it('should report scan progress as rows are pulled', async () => {
    const { db } = setup();
    const execution = db.execute(ticks);
    const seen: number[] = [];

    expect(execution.progress()).toBe(-1);
    for await (const row of execution) {
      if (row.tick === 0 || row.tick === 2) seen.push(execution.progress());
    }

    expect(seen.map(Math.round)).toEqual([33, 67]);
    expect(execution.progress()).toBe(100);
  });

  it('should stop at the next batch boundary once cancelled', async () => {
    const { db, states } = setup();
    const execution = db.execute(ticks);

    const ticksSeen: unknown[] = [];
    let error: unknown;
    try {
      for await (const row of execution) {
        ticksSeen.push(row.tick);
        if (row.tick === 0) execution.cancel('test');
      }
    } catch (e) {
      error = e;
    }

    expect(ticksSeen).toEqual([0, 1]);
    expect(error).toBeInstanceOf(QueryCancelledError);
    expect(execution.cancelled).toBe(true);
    expect(states[0].closeCount).toBe(1);
  });

  it('should honour an external abort signal', async () => {
    const { db, states } = setup();
    const controller = new AbortController();
    controller.abort();

    const { ticks: seen, error } = await drain(db.execute(ticks, { signal: controller.signal }));

    expect(seen).toEqual([]);
    expect(error).toBeInstanceOf(QueryCancelledError);
    expect(states[0].closeCount).toBe(1);
  });

  it('should close the scan when a LIMIT stops pulling early', async () => {
    const { db, states } = setup();

    const { rows } = await db.query(limit(ticks, 3));

    expect(rows).toHaveLength(3);
    expect(states[0].emitted).toBe(2);
    expect(states[0].closeCount).toBe(1);
  });

  it('should refuse a second iteration', async () => {
    const { db } = setup();
    const execution = db.execute(ticks);
    await execution.collect();

    const { error } = await drain(execution);

    expect(error).toBeInstanceOf(PlanError);
    if (!(error instanceof PlanError)) return;
    expect(error.code).toBe(PlanErrorCode.EXECUTION_STARTED);
  });

  it('should log cancellation with the query number', async () => {
    const { db, sink } = setup();
    const execution = db.execute(ticks);

    execution.cancel('user abort');

    const entry = sink.entries.find((e) => e.message === 'Cancellation requested');
    expect(entry?.context).toMatchObject({ query: 1, reason: 'user abort' });
  });
});
