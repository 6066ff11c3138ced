/**
 * GridSQL Query Executor
 *
 * Executes prepared plans using a pull-based iterator model. Each operator
 * reads from its child(ren) and produces rows on demand, so a LIMIT above a
 * scan stops pulling as soon as it is satisfied.
 */

import { PlanError, PlanErrorCode } from '../errors/index.js';
import type { StructuredLogger } from '../logging/index.js';
import { FilterOperator } from './operators/filter.js';
import { JoinOperator } from './operators/join.js';
import { LimitOperator } from './operators/limit.js';
import { ProjectOperator } from './operators/project.js';
import { SortOperator } from './operators/sort.js';
import { TableFunctionOperator } from './operators/table-function.js';
import { ValuesOperator } from './operators/values.js';
import type { ExecutionContext, Operator, QueryPlan, QueryResult, Row, SqlValue } from './types.js';

// =============================================================================
// OPERATOR FACTORY
// =============================================================================

/**
 * Create the operator tree for a plan; table function operators are also
 * collected into `scans` so the execution can report their progress.
 */
export function createOperator(
  plan: QueryPlan,
  ctx: ExecutionContext,
  scans: TableFunctionOperator[] = []
): Operator {
  switch (plan.type) {
    case 'tableFunction': {
      const operator = new TableFunctionOperator(plan);
      scans.push(operator);
      return operator;
    }

    case 'values':
      return new ValuesOperator(plan);

    case 'filter':
      return new FilterOperator(plan, createOperator(plan.input, ctx, scans), ctx);

    case 'project':
      return new ProjectOperator(plan, createOperator(plan.input, ctx, scans), ctx);

    case 'join':
      return new JoinOperator(
        plan,
        createOperator(plan.left, ctx, scans),
        createOperator(plan.right, ctx, scans),
        ctx
      );

    case 'sort':
      return new SortOperator(plan, createOperator(plan.input, ctx, scans));

    case 'limit':
      return new LimitOperator(plan, createOperator(plan.input, ctx, scans));

    default:
      throw new PlanError(PlanErrorCode.UNKNOWN_NODE, `Unknown plan type: ${describeNode(plan)}`);
  }
}

function describeNode(plan: never): string {
  const value: unknown = plan;
  if (typeof value === 'object' && value !== null && 'type' in value) {
    return String(value.type);
  }
  return String(value);
}

// =============================================================================
// QUERY EXECUTION
// =============================================================================

export interface QueryExecutionOptions {
  functions: ExecutionContext['functions'];
  parameters?: Map<string, SqlValue>;
  logger: StructuredLogger;
  /** External cancellation, in addition to `cancel()` */
  signal?: AbortSignal;
  /** Time already spent binding and optimizing (ms) */
  planningTime?: number;
}

/**
 * One run of a prepared plan
 *
 * Rows are streamed through async iteration; the operator tree is closed
 * however the iteration ends. An execution can be iterated once.
 *
 * @example
 * ```typescript
 * const execution = db.execute(plan);
 * for await (const row of execution) {
 *   console.log(row.value, execution.progress());
 * }
 * ```
 */
export class QueryExecution implements AsyncIterable<Row> {
  private readonly controller = new AbortController();
  private readonly ctx: ExecutionContext;
  private readonly root: Operator;
  private readonly scans: TableFunctionOperator[] = [];
  private readonly planningTime: number;
  private started = false;
  private rowsReturned = 0;
  private executionTime = 0;

  constructor(plan: QueryPlan, options: QueryExecutionOptions) {
    this.ctx = {
      functions: options.functions,
      parameters: options.parameters ?? new Map(),
      signal: this.controller.signal,
      logger: options.logger,
    };
    this.planningTime = options.planningTime ?? 0;

    const external = options.signal;
    if (external) {
      if (external.aborted) {
        this.controller.abort(external.reason);
      } else {
        external.addEventListener('abort', () => this.controller.abort(external.reason), { once: true });
      }
    }

    this.root = createOperator(plan, this.ctx, this.scans);
  }

  columns(): string[] {
    return this.root.columns();
  }

  /**
   * Request cancellation; scans stop at their next batch or resource
   * boundary and the iteration throws QueryCancelledError.
   */
  cancel(reason?: string): void {
    this.ctx.logger.info('Cancellation requested', { reason });
    this.controller.abort(reason);
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Average percentage complete of the scans that know their progress, or
   * -1 when none does.
   */
  progress(): number {
    const known = this.scans.map((scan) => scan.progress()).filter((p) => p >= 0);
    if (known.length === 0) return -1;
    return known.reduce((sum, p) => sum + p, 0) / known.length;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Row> {
    if (this.started) {
      throw new PlanError(PlanErrorCode.EXECUTION_STARTED, 'A query execution can only be iterated once');
    }
    this.started = true;

    const startTime = performance.now();
    this.ctx.logger.debug('Execution started');
    try {
      await this.root.open(this.ctx);
      while (true) {
        const row = await this.root.next();
        if (row === null) break;
        this.rowsReturned++;
        yield row;
      }
    } finally {
      await this.root.close();
      this.executionTime = performance.now() - startTime;
      this.ctx.logger.debug('Execution finished after {ms}ms with {rows} rows', {
        ms: Math.round(this.executionTime),
        rows: this.rowsReturned,
      });
    }
  }

  /**
   * Run to completion and collect every row
   */
  async collect(): Promise<QueryResult> {
    const rows: Row[] = [];
    for await (const row of this) {
      rows.push(row);
    }
    return {
      rows,
      columns: this.columns(),
      stats: {
        planningTime: this.planningTime,
        executionTime: this.executionTime,
        rowsReturned: rows.length,
      },
    };
  }
}
