/**
 * Limit Operator
 *
 * Returns at most `limit` rows from the input after skipping `offset`.
 * A limit given as a parameter or expression is evaluated when the operator
 * opens.
 */

import { PlanError, PlanErrorCode } from '../../errors/index.js';
import type { ExecutionContext, LimitPlan, Operator, Row, SqlValue } from '../types.js';
import { evaluateExpression } from './filter.js';

function toCount(value: SqlValue, what: string): number {
  const count = typeof value === 'bigint' ? Number(value) : value;
  if (typeof count === 'number' && Number.isInteger(count) && count >= 0) {
    return count;
  }
  throw new PlanError(
    PlanErrorCode.INVALID_LIMIT,
    `${what} must be a non-negative integer, got ${String(value)}`
  );
}

/**
 * Resolve a plan's LIMIT to a row count
 */
export function resolveLimit(plan: LimitPlan, ctx: Pick<ExecutionContext, 'functions' | 'parameters'>): number {
  const value = typeof plan.limit === 'number' ? plan.limit : evaluateExpression(plan.limit, {}, ctx);
  return toCount(value, 'LIMIT');
}

export class LimitOperator implements Operator {
  private plan: LimitPlan;
  private input: Operator;
  private limit = 0;
  private offset = 0;
  private emitted = 0;
  private skipped = 0;

  constructor(plan: LimitPlan, input: Operator) {
    this.plan = plan;
    this.input = input;
  }

  async open(ctx: ExecutionContext): Promise<void> {
    this.limit = resolveLimit(this.plan, ctx);
    this.offset = toCount(this.plan.offset ?? 0, 'OFFSET');
    this.emitted = 0;
    this.skipped = 0;
    await this.input.open(ctx);
  }

  async next(): Promise<Row | null> {
    if (this.emitted >= this.limit) return null;

    while (this.skipped < this.offset) {
      const row = await this.input.next();
      if (row === null) return null;
      this.skipped++;
    }

    const row = await this.input.next();
    if (row === null) return null;

    this.emitted++;
    return row;
  }

  async close(): Promise<void> {
    await this.input.close();
  }

  columns(): string[] {
    return this.input.columns();
  }
}
