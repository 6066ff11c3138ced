import { describe, it, expect } from 'vitest';
import { Database } from '../../database.js';
import { BindError, BindErrorCode } from '../../errors/index.js';
import { defineTableFunction } from '../../functions/table-function.js';
import { createSilentLogger } from '../../logging/index.js';
import { isConstantExpression } from '../binder.js';
import {
  and_,
  between,
  col,
  eq,
  filter,
  fn,
  gt,
  inList,
  isNull,
  join,
  limit,
  list,
  lit,
  not_,
  or_,
  param,
  project,
  sort,
  tableFunction,
  values,
} from '../builders.js';
import { formatExpression, formatPredicate } from '../explain.js';
import { splitConjuncts } from '../optimizer.js';
import { ticksFunction } from './fixtures.js';

function database(): Database {
  const db = new Database({ env: {}, logger: createSilentLogger() });
  db.registerTableFunction(defineTableFunction(ticksFunction()));
  return db;
}

describe('binder', () => {
  it('should number a copy of the plan and leave the original alone', () => {
    const plan = filter(values(['a'], [{ a: 1 }, { a: 2 }]), gt(col('a'), 1));

    const prepared = database().prepare(plan);

    expect(prepared.plan.id).toBe(1);
    expect(prepared.plan.type === 'filter' && prepared.plan.input.id).toBe(2);
    expect(prepared.plan.type === 'filter' && prepared.plan.input.estimatedRows).toBe(2);
    expect(plan.id).toBe(0);
    expect(plan.input.estimatedRows).toBeUndefined();
  });

  it('should resolve table functions case-insensitively', () => {
    expect(database().explain(tableFunction('TICKS', [2]))).toBe('TableFunction TICKS(2) [k=any] (~4 rows)');
  });

  it('should evaluate constant expressions in arguments', () => {
    const text = database().explain(
      tableFunction('ticks', [{ type: 'binary', op: 'add', left: lit(1), right: fn('abs', lit(-2)) }])
    );

    expect(text).toBe('TableFunction ticks((1 + abs(-2))) [k=any] (~6 rows)');
  });

  it('should reject unknown table functions with a hint', () => {
    let error: unknown;
    try {
      database().prepare(tableFunction('nope'));
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(BindError);
    if (!(error instanceof BindError)) return;
    expect(error.code).toBe(BindErrorCode.UNKNOWN_FUNCTION);
    expect(error.message).toBe('Unknown table function: nope');
    expect(error.recoveryHint).toBe('Load the weather extension or register the table function first');
  });

  it('should name the argument that is not a constant', () => {
    const bindError = (plan: ReturnType<typeof tableFunction>): BindError | undefined => {
      try {
        database().prepare(plan);
      } catch (e) {
        if (e instanceof BindError) return e;
        throw e;
      }
      return undefined;
    };

    const positional = bindError(tableFunction('ticks', [col('a')]));
    const named = bindError(tableFunction('ticks', [], { batches: param('n') }));

    expect(positional?.code).toBe(BindErrorCode.INVALID_ARGUMENT);
    expect(positional?.context).toEqual({ function: 'ticks', argument: '1' });
    expect(named?.message).toBe('ticks() argument "batches" must be a constant');
    expect(named?.context).toEqual({ function: 'ticks', argument: 'batches' });
  });

  it('should tell constants from row and parameter references', () => {
    expect(isConstantExpression(lit(1))).toBe(true);
    expect(isConstantExpression(list([1, 'a']))).toBe(true);
    expect(isConstantExpression(fn('abs', lit(-1)))).toBe(true);
    expect(isConstantExpression(col('a'))).toBe(false);
    expect(isConstantExpression(param('p'))).toBe(false);
    expect(isConstantExpression(list([lit(1), col('a')]))).toBe(false);
  });
});

describe('optimizer', () => {
  it('should flatten nested conjunctions', () => {
    const a = eq(col('a'), 1);
    const b = eq(col('b'), 2);
    const c = eq(col('c'), 3);

    expect(splitConjuncts(and_(a, and_(b, c)))).toEqual([a, b, c]);
    expect(splitConjuncts(or_(a, b))).toEqual([or_(a, b)]);
  });

  it('should drop a filter the scan absorbs completely', () => {
    expect(database().explain(filter(tableFunction('ticks'), eq(col('k'), 7)))).toBe(
      'TableFunction ticks() [k=7] (~6 rows)'
    );
  });

  it('should keep what the scan does not absorb', () => {
    expect(database().explain(filter(tableFunction('ticks'), and_(gt(col('tick'), 1), eq(col('k'), 7))))).toBe(
      'Filter tick > 1\n  TableFunction ticks() [k=7] (~6 rows)'
    );
  });

  it('should not push through other operators', () => {
    expect(database().explain(filter(limit(tableFunction('ticks'), 4), eq(col('k'), 7)))).toBe(
      'Filter k = 7\n  Limit 4\n    TableFunction ticks() [k=any] (~6 rows)'
    );
  });

  it('should run extensions after filter pushdown', () => {
    const db = database();
    const seen: string[] = [];
    db.registerOptimizerExtension({
      name: 'record',
      optimize(plan) {
        seen.push(plan.type);
        return plan;
      },
    });

    db.prepare(filter(tableFunction('ticks'), eq(col('k'), 7)));

    expect(seen).toEqual(['tableFunction']);
  });

  it('should return the absorbed rows at execution', async () => {
    const { rows } = await database().query(filter(tableFunction('ticks', [1]), eq(col('k'), 7)));

    expect(rows).toEqual([
      { tick: 0, k: 7 },
      { tick: 1, k: 7 },
    ]);
  });
});

describe('explain', () => {
  it('should format every predicate kind', () => {
    expect(
      formatPredicate(
        and_(
          or_(eq(col('a'), "it's"), not_(isNull(col('b'), true))),
          between(col('c', 't'), 1, 2),
          inList(col('d'), [1, null])
        )
      )
    ).toBe("(a = 'it''s' OR (NOT (b IS NOT NULL))) AND t.c BETWEEN 1 AND 2 AND d IN (1, NULL)");
  });

  it('should format expressions', () => {
    expect(formatExpression(param('n'))).toBe(':n');
    expect(formatExpression(lit(new Date(Date.UTC(2024, 0, 15))))).toBe("'2024-01-15T00:00:00.000Z'");
    expect(formatExpression({ type: 'unary', op: 'neg', operand: col('x') })).toBe('-x');
  });

  it('should indent children under their parents', () => {
    const plan = limit(
      sort(
        project(
          join(values(['a'], [{ a: 1 }], 'v'), tableFunction('ticks'), 'inner', eq(col('a', 'v'), col('k', 'ticks'))),
          ['a', { expr: col('tick'), alias: 'n' }]
        ),
        ['n'],
        'desc'
      ),
      5,
      1
    );

    expect(database().explain(plan)).toBe(
      [
        'Limit 5 OFFSET 1',
        '  Sort [n DESC]',
        '    Project [a, tick AS n]',
        '      INNER Join ON v.a = ticks.k',
        '        Values [a] AS v (~1 rows)',
        '        TableFunction ticks() [k=any] (~6 rows)',
      ].join('\n')
    );
  });
});
