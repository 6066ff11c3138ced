/**
 * Table Function Operator
 *
 * Drives a bound table function: initializes its scan when opened, pulls
 * row batches on demand and hands them out one row at a time.
 */

import { PlanError, PlanErrorCode, QueryCancelledError } from '../../errors/index.js';
import type { TableFunctionScan } from '../../functions/table-function.js';
import type { ExecutionContext, Operator, Row, TableFunctionPlan } from '../types.js';

export class TableFunctionOperator implements Operator {
  private plan: TableFunctionPlan;
  private scan: TableFunctionScan | null = null;
  private buffer: Row[] = [];
  private position = 0;
  private exhausted = false;
  private signal: AbortSignal | null = null;
  private finalProgress = -1;

  constructor(plan: TableFunctionPlan) {
    this.plan = plan;
  }

  async open(ctx: ExecutionContext): Promise<void> {
    const bound = this.plan.bound;
    if (!bound) {
      throw new PlanError(
        PlanErrorCode.UNBOUND_SCAN,
        `Table function ${this.plan.function}() was not bound; prepare the plan first`
      );
    }
    this.signal = ctx.signal;
    this.buffer = [];
    this.position = 0;
    this.exhausted = false;
    this.scan = await bound.init({
      signal: ctx.signal,
      logger: ctx.logger.child({ node: this.plan.id }),
    });
  }

  async next(): Promise<Row | null> {
    while (this.position >= this.buffer.length) {
      if (this.exhausted || this.scan === null) return null;
      if (this.signal?.aborted) {
        throw new QueryCancelledError();
      }
      this.buffer = await this.scan.next();
      this.position = 0;
      if (this.buffer.length === 0) {
        this.exhausted = true;
      }
    }
    return this.buffer[this.position++];
  }

  /**
   * Percentage complete of the running scan, or -1 when unknown
   */
  progress(): number {
    return this.scan?.progress() ?? this.finalProgress;
  }

  async close(): Promise<void> {
    const scan = this.scan;
    this.scan = null;
    this.buffer = [];
    if (scan !== null) {
      this.finalProgress = scan.progress();
      await scan.close();
    }
  }

  columns(): string[] {
    return this.plan.bound?.columns.map((c) => c.name) ?? [];
  }
}
