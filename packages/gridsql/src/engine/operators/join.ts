/**
 * Join Operator
 *
 * Nested loop join of two inputs. The right side is materialized when the
 * operator opens; output rows carry keys prefixed with each side's name
 * (its alias, or the table function name).
 *
 * Supports INNER, LEFT OUTER and CROSS joins.
 */

import type { ExecutionContext, JoinPlan, Operator, QueryPlan, Row } from '../types.js';
import { evaluatePredicate } from './filter.js';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

function prefixRow(row: Row, tableName: string): Row {
  const result: Row = {};
  for (const [key, value] of Object.entries(row)) {
    result[`${tableName}.${key}`] = value;
  }
  return result;
}

function createNullRow(columns: string[], tableName: string): Row {
  const result: Row = {};
  for (const col of columns) {
    result[`${tableName}.${col}`] = null;
  }
  return result;
}

/**
 * Name a join side's columns are prefixed with
 */
export function relationName(plan: QueryPlan): string {
  switch (plan.type) {
    case 'tableFunction':
      return plan.alias ?? plan.function;
    case 'values':
      return plan.alias ?? `values_${plan.id}`;
    default:
      return `rel_${plan.id}`;
  }
}

// =============================================================================
// JOIN OPERATOR
// =============================================================================

export class JoinOperator implements Operator {
  private plan: JoinPlan;
  private leftInput: Operator;
  private rightInput: Operator;
  private ctx: ExecutionContext;

  private currentLeftRow: Row | null = null;
  private rightRows: Row[] = [];
  private rightIndex = 0;
  private leftMatched = false;

  private leftTableName: string;
  private rightTableName: string;

  constructor(plan: JoinPlan, leftInput: Operator, rightInput: Operator, ctx: ExecutionContext) {
    this.plan = plan;
    this.leftInput = leftInput;
    this.rightInput = rightInput;
    this.ctx = ctx;
    this.leftTableName = relationName(plan.left);
    this.rightTableName = relationName(plan.right);
  }

  async open(ctx: ExecutionContext): Promise<void> {
    this.ctx = ctx;
    this.currentLeftRow = null;
    this.rightRows = [];
    this.rightIndex = 0;
    this.leftMatched = false;

    await this.leftInput.open(ctx);
    await this.rightInput.open(ctx);

    let row: Row | null;
    while ((row = await this.rightInput.next()) !== null) {
      this.rightRows.push(prefixRow(row, this.rightTableName));
    }
  }

  async next(): Promise<Row | null> {
    while (true) {
      if (this.currentLeftRow === null) {
        const left = await this.leftInput.next();
        if (left === null) return null;
        this.currentLeftRow = prefixRow(left, this.leftTableName);
        this.rightIndex = 0;
        this.leftMatched = false;
      }

      while (this.rightIndex < this.rightRows.length) {
        const combined = { ...this.currentLeftRow, ...this.rightRows[this.rightIndex++] };
        if (!this.plan.condition || evaluatePredicate(this.plan.condition, combined, this.ctx)) {
          this.leftMatched = true;
          return combined;
        }
      }

      const unmatched = this.currentLeftRow;
      this.currentLeftRow = null;
      if (this.plan.joinType === 'left' && !this.leftMatched) {
        return { ...unmatched, ...createNullRow(this.rightInput.columns(), this.rightTableName) };
      }
    }
  }

  async close(): Promise<void> {
    await Promise.all([this.leftInput.close(), this.rightInput.close()]);
    this.rightRows = [];
    this.currentLeftRow = null;
  }

  columns(): string[] {
    return [
      ...this.leftInput.columns().map((c) => `${this.leftTableName}.${c}`),
      ...this.rightInput.columns().map((c) => `${this.rightTableName}.${c}`),
    ];
  }
}
