/**
 * Sort Operator
 *
 * Materializes all input rows and sorts them by the ORDER BY specification.
 */

import type { ExecutionContext, Operator, Row, SortPlan } from '../types.js';
import { compareValues, evaluateExpression } from './filter.js';

export class SortOperator implements Operator {
  private plan: SortPlan;
  private input: Operator;
  private sortedRows: Row[] = [];
  private index = 0;

  constructor(plan: SortPlan, input: Operator) {
    this.plan = plan;
    this.input = input;
  }

  async open(ctx: ExecutionContext): Promise<void> {
    this.sortedRows = [];
    this.index = 0;

    await this.input.open(ctx);

    let row: Row | null;
    while ((row = await this.input.next()) !== null) {
      this.sortedRows.push(row);
    }

    const keyed = this.sortedRows.map((r) => ({
      row: r,
      keys: this.plan.orderBy.map((spec) => evaluateExpression(spec.expr, r, ctx)),
    }));

    keyed.sort((a, b) => {
      for (let i = 0; i < this.plan.orderBy.length; i++) {
        const spec = this.plan.orderBy[i];
        const aVal = a.keys[i];
        const bVal = b.keys[i];

        if (aVal === null && bVal === null) continue;
        // Nulls sort last unless asked otherwise
        if (aVal === null) return spec.nullsFirst ? -1 : 1;
        if (bVal === null) return spec.nullsFirst ? 1 : -1;

        const cmp = compareValues(aVal, bVal) ?? 0;
        if (cmp !== 0) return spec.direction === 'desc' ? -cmp : cmp;
      }
      return 0;
    });

    this.sortedRows = keyed.map((k) => k.row);
  }

  async next(): Promise<Row | null> {
    if (this.index >= this.sortedRows.length) return null;
    return this.sortedRows[this.index++];
  }

  async close(): Promise<void> {
    await this.input.close();
    this.sortedRows = [];
    this.index = 0;
  }

  columns(): string[] {
    return this.input.columns();
  }
}
