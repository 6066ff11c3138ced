/**
 * Project Operator
 *
 * Selects columns from input rows, computes expressions and applies
 * aliases.
 */

import type { ExecutionContext, Operator, ProjectPlan, Row } from '../types.js';
import { evaluateExpression } from './filter.js';

export class ProjectOperator implements Operator {
  private plan: ProjectPlan;
  private input: Operator;
  private ctx: ExecutionContext;
  private outputColumns: string[];

  constructor(plan: ProjectPlan, input: Operator, ctx: ExecutionContext) {
    this.plan = plan;
    this.input = input;
    this.ctx = ctx;
    this.outputColumns = plan.expressions.map((e) => e.alias);
  }

  async open(ctx: ExecutionContext): Promise<void> {
    this.ctx = ctx;
    await this.input.open(ctx);
  }

  async next(): Promise<Row | null> {
    const inputRow = await this.input.next();
    if (inputRow === null) return null;

    const outputRow: Row = {};
    for (const { expr, alias } of this.plan.expressions) {
      outputRow[alias] = evaluateExpression(expr, inputRow, this.ctx);
    }
    return outputRow;
  }

  async close(): Promise<void> {
    await this.input.close();
  }

  columns(): string[] {
    return this.outputColumns;
  }
}
