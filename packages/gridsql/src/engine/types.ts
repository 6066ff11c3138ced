/**
 * GridSQL Execution Engine - Core Types
 *
 * Defines types for query plans, predicates, execution context, and the
 * pull-based operator interface. Plans are built programmatically (see
 * builders.ts); there is no SQL text front end.
 */

import type { FunctionRegistry } from '../functions/registry.js';
import type { BoundTableFunction } from '../functions/table-function.js';
import type { StructuredLogger } from '../logging/index.js';

// =============================================================================
// VALUE TYPES
// =============================================================================

/**
 * Supported SQL value types at runtime
 */
export type SqlValue = string | number | bigint | boolean | Date | null | Uint8Array;

/**
 * A row is a record with string keys and SQL values
 */
export type Row = Record<string, SqlValue>;

/**
 * Values accepted as table function arguments; lists are allowed there only
 */
export type ArgumentValue = SqlValue | SqlValue[];

/**
 * Declared column type of a table function output
 */
export type ColumnType = 'integer' | 'real' | 'text' | 'date' | 'timestamp' | 'boolean';

export interface ColumnDef {
  name: string;
  type: ColumnType;
  nullable?: boolean;
}

// =============================================================================
// EXPRESSION TYPES
// =============================================================================

/**
 * Comparison operators for predicates
 */
export type ComparisonOp = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge' | 'like';

/**
 * Logical operators for combining predicates
 */
export type LogicalOp = 'and' | 'or' | 'not';

/**
 * Arithmetic operators
 */
export type ArithmeticOp = 'add' | 'sub' | 'mul' | 'div' | 'mod';

/**
 * Expression types for the query plan
 */
export type Expression =
  | ColumnRef
  | Literal
  | ParameterRef
  | ListExpr
  | BinaryExpr
  | UnaryExpr
  | FunctionCall;

/**
 * Column reference expression
 */
export interface ColumnRef {
  type: 'columnRef';
  table?: string;
  column: string;
}

/**
 * Literal value expression
 */
export interface Literal {
  type: 'literal';
  value: SqlValue;
  dataType: 'string' | 'number' | 'bigint' | 'boolean' | 'date' | 'bytes' | 'null';
}

/**
 * Query parameter, resolved from the execution's parameter map
 */
export interface ParameterRef {
  type: 'parameter';
  name: string;
}

/**
 * List of expressions; only valid as a table function argument
 */
export interface ListExpr {
  type: 'list';
  items: Expression[];
}

/**
 * Binary arithmetic expression
 */
export interface BinaryExpr {
  type: 'binary';
  op: ArithmeticOp;
  left: Expression;
  right: Expression;
}

/**
 * Unary expression (NOT, negation)
 */
export interface UnaryExpr {
  type: 'unary';
  op: 'not' | 'neg';
  operand: Expression;
}

/**
 * Scalar function call expression
 */
export interface FunctionCall {
  type: 'function';
  name: string;
  args: Expression[];
}

// =============================================================================
// PREDICATE TYPES
// =============================================================================

/**
 * Comparison predicate
 */
export interface ComparisonPredicate {
  type: 'comparison';
  op: ComparisonOp;
  left: Expression;
  right: Expression;
}

/**
 * Logical predicate (AND, OR, NOT)
 */
export interface LogicalPredicate {
  type: 'logical';
  op: LogicalOp;
  operands: Predicate[];
}

/**
 * BETWEEN predicate
 */
export interface BetweenPredicate {
  type: 'between';
  expr: Expression;
  low: Expression;
  high: Expression;
}

/**
 * IN predicate over a literal list
 */
export interface InPredicate {
  type: 'in';
  expr: Expression;
  values: Expression[];
}

/**
 * IS NULL / IS NOT NULL predicate
 */
export interface IsNullPredicate {
  type: 'isNull';
  expr: Expression;
  isNot: boolean;
}

export type Predicate = ComparisonPredicate | LogicalPredicate | BetweenPredicate | InPredicate | IsNullPredicate;

// =============================================================================
// QUERY PLAN TYPES
// =============================================================================

/**
 * Sort direction
 */
export type SortDirection = 'asc' | 'desc';

/**
 * Sort specification
 */
export interface SortSpec {
  expr: Expression;
  direction: SortDirection;
  nullsFirst?: boolean;
}

/**
 * Join type
 */
export type JoinType = 'inner' | 'left' | 'cross';

/**
 * Base query plan node
 */
export interface BasePlanNode {
  /** Unique identifier for this plan node; builders leave 0 and the binder renumbers */
  id: number;
  /** Estimated row count for this node */
  estimatedRows?: number;
}

/**
 * Table function scan, e.g. gfs_forecast(...)
 */
export interface TableFunctionPlan extends BasePlanNode {
  type: 'tableFunction';
  function: string;
  /** Positional arguments; must be constant */
  args: Expression[];
  /** Named arguments; must be constant */
  namedArgs?: Record<string, Expression>;
  alias?: string;
  /** Filled in by the binder */
  bound?: BoundTableFunction;
}

/**
 * Inline rows
 */
export interface ValuesPlan extends BasePlanNode {
  type: 'values';
  columns: string[];
  rows: Row[];
  alias?: string;
}

/**
 * Filter plan node
 */
export interface FilterPlan extends BasePlanNode {
  type: 'filter';
  input: QueryPlan;
  predicate: Predicate;
}

/**
 * Project plan node (column selection and expressions)
 */
export interface ProjectPlan extends BasePlanNode {
  type: 'project';
  input: QueryPlan;
  expressions: { expr: Expression; alias: string }[];
}

/**
 * Join plan node (nested loop)
 */
export interface JoinPlan extends BasePlanNode {
  type: 'join';
  joinType: JoinType;
  left: QueryPlan;
  right: QueryPlan;
  condition?: Predicate;
}

/**
 * Sort plan node
 */
export interface SortPlan extends BasePlanNode {
  type: 'sort';
  input: QueryPlan;
  orderBy: SortSpec[];
}

/**
 * Limit plan node. A bare number or a literal is a constant bound; a
 * parameter or other expression is evaluated when execution starts.
 */
export interface LimitPlan extends BasePlanNode {
  type: 'limit';
  input: QueryPlan;
  limit: number | Expression;
  offset?: number;
}

/**
 * All query plan types
 */
export type QueryPlan =
  | TableFunctionPlan
  | ValuesPlan
  | FilterPlan
  | ProjectPlan
  | JoinPlan
  | SortPlan
  | LimitPlan;

// =============================================================================
// EXECUTION CONTEXT
// =============================================================================

/**
 * Per-execution state shared by all operators of one query
 */
export interface ExecutionContext {
  /** Scalar functions available to expressions */
  functions: FunctionRegistry;
  /** Query parameters */
  parameters: Map<string, SqlValue>;
  /** Cooperative cancellation, checked at batch and resource boundaries */
  signal: AbortSignal;
  logger: StructuredLogger;
}

/**
 * The part of the context expression evaluation needs
 */
export type EvaluationContext = Pick<ExecutionContext, 'functions' | 'parameters'>;

// =============================================================================
// OPERATOR INTERFACE
// =============================================================================

/**
 * Pull-based operator interface
 * Each operator produces rows on demand
 */
export interface Operator {
  /** Open the operator (initialize state) */
  open(ctx: ExecutionContext): Promise<void>;
  /** Get the next row (null = no more rows) */
  next(): Promise<Row | null>;
  /** Close the operator (cleanup); safe to call more than once */
  close(): Promise<void>;
  /** Get output columns */
  columns(): string[];
}

// =============================================================================
// QUERY RESULT
// =============================================================================

/**
 * Query execution result
 */
export interface QueryResult<T = Row> {
  rows: T[];
  columns: string[];
  stats: ExecutionStats;
}

/**
 * Execution statistics
 */
export interface ExecutionStats {
  /** Time to bind and optimize the plan (ms) */
  planningTime: number;
  /** Time to execute the plan (ms) */
  executionTime: number;
  rowsReturned: number;
}
