import type { Operator, Row, ValuesPlan } from '../types.js';

/**
 * Emits the inline rows of a VALUES node
 */
export class ValuesOperator implements Operator {
  private index = 0;

  constructor(private readonly plan: ValuesPlan) {}

  async open(): Promise<void> {
    this.index = 0;
  }

  async next(): Promise<Row | null> {
    if (this.index >= this.plan.rows.length) return null;
    return { ...this.plan.rows[this.index++] };
  }

  async close(): Promise<void> {
    this.index = this.plan.rows.length;
  }

  columns(): string[] {
    return this.plan.columns;
  }
}
