/**
 * Plan and expression builders
 *
 * Plans are assembled in code rather than parsed from SQL text. Every plan
 * node is created with id 0; the binder assigns ids when the plan is
 * prepared.
 *
 * @example
 * ```typescript
 * const plan = limit(
 *   project(
 *     filter(tableFunction('gfs_forecast'), and_(
 *       eq(col('variable'), lit('temperature')),
 *       eq(col('forecast_hour'), lit(6)),
 *     )),
 *     ['latitude', 'longitude', 'value']
 *   ),
 *   10
 * );
 * ```
 */

import type {
  ComparisonOp,
  ComparisonPredicate,
  Expression,
  FilterPlan,
  JoinPlan,
  JoinType,
  LimitPlan,
  ListExpr,
  Literal,
  ParameterRef,
  Predicate,
  ProjectPlan,
  QueryPlan,
  Row,
  SortDirection,
  SortPlan,
  SortSpec,
  SqlValue,
  TableFunctionPlan,
  ValuesPlan,
} from './types.js';

// =============================================================================
// EXPRESSIONS
// =============================================================================

export function col(column: string, table?: string): Expression {
  return table === undefined ? { type: 'columnRef', column } : { type: 'columnRef', table, column };
}

function literalType(value: SqlValue): Literal['dataType'] {
  if (value === null) return 'null';
  if (value instanceof Date) return 'date';
  if (value instanceof Uint8Array) return 'bytes';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'bigint':
      return 'bigint';
    case 'boolean':
      return 'boolean';
    default:
      return 'number';
  }
}

export function lit(value: SqlValue): Literal {
  return { type: 'literal', value, dataType: literalType(value) };
}

export function param(name: string): ParameterRef {
  return { type: 'parameter', name };
}

/**
 * List argument, e.g. `read_grib(['a.grib2', 'b.grib2'])`
 */
export function list(items: Array<Expression | SqlValue>): ListExpr {
  return { type: 'list', items: items.map(toExpression) };
}

export function fn(name: string, ...args: Expression[]): Expression {
  return { type: 'function', name, args };
}

function isExpression(value: Expression | SqlValue): value is Expression {
  return (
    typeof value === 'object' &&
    value !== null &&
    !(value instanceof Date) &&
    !(value instanceof Uint8Array) &&
    'type' in value
  );
}

function toExpression(value: Expression | SqlValue): Expression {
  return isExpression(value) ? value : lit(value);
}

// =============================================================================
// PREDICATES
// =============================================================================

function comparison(op: ComparisonOp, left: Expression, right: Expression | SqlValue): ComparisonPredicate {
  return { type: 'comparison', op, left, right: toExpression(right) };
}

export const eq = (left: Expression, right: Expression | SqlValue) => comparison('eq', left, right);
export const ne = (left: Expression, right: Expression | SqlValue) => comparison('ne', left, right);
export const lt = (left: Expression, right: Expression | SqlValue) => comparison('lt', left, right);
export const le = (left: Expression, right: Expression | SqlValue) => comparison('le', left, right);
export const gt = (left: Expression, right: Expression | SqlValue) => comparison('gt', left, right);
export const ge = (left: Expression, right: Expression | SqlValue) => comparison('ge', left, right);
export const like = (left: Expression, pattern: string) => comparison('like', left, pattern);

export function inList(expr: Expression, values: Array<Expression | SqlValue>): Predicate {
  return { type: 'in', expr, values: values.map(toExpression) };
}

export function between(expr: Expression, low: Expression | SqlValue, high: Expression | SqlValue): Predicate {
  return { type: 'between', expr, low: toExpression(low), high: toExpression(high) };
}

export function isNull(expr: Expression, isNot = false): Predicate {
  return { type: 'isNull', expr, isNot };
}

export function and_(...operands: Predicate[]): Predicate {
  return operands.length === 1 ? operands[0] : { type: 'logical', op: 'and', operands };
}

export function or_(...operands: Predicate[]): Predicate {
  return operands.length === 1 ? operands[0] : { type: 'logical', op: 'or', operands };
}

export function not_(operand: Predicate): Predicate {
  return { type: 'logical', op: 'not', operands: [operand] };
}

// =============================================================================
// PLANS
// =============================================================================

export function tableFunction(
  name: string,
  args: Array<Expression | SqlValue> = [],
  namedArgs?: Record<string, Expression | SqlValue>
): TableFunctionPlan {
  const plan: TableFunctionPlan = { id: 0, type: 'tableFunction', function: name, args: args.map(toExpression) };
  if (namedArgs) {
    plan.namedArgs = Object.fromEntries(
      Object.entries(namedArgs).map(([key, value]) => [key, toExpression(value)])
    );
  }
  return plan;
}

export function values(columns: string[], rows: Row[], alias?: string): ValuesPlan {
  return { id: 0, type: 'values', columns, rows, alias };
}

export function filter(input: QueryPlan, predicate: Predicate): FilterPlan {
  return { id: 0, type: 'filter', input, predicate };
}

/**
 * Projection; a bare string selects the column under its own name
 */
export function project(
  input: QueryPlan,
  expressions: Array<string | { expr: Expression; alias: string }>
): ProjectPlan {
  return {
    id: 0,
    type: 'project',
    input,
    expressions: expressions.map((e) => (typeof e === 'string' ? { expr: col(e), alias: e } : e)),
  };
}

export function limit(input: QueryPlan, count: number | Expression, offset?: number): LimitPlan {
  return offset === undefined
    ? { id: 0, type: 'limit', input, limit: count }
    : { id: 0, type: 'limit', input, limit: count, offset };
}

export function sort(
  input: QueryPlan,
  orderBy: Array<string | SortSpec>,
  direction: SortDirection = 'asc'
): SortPlan {
  return {
    id: 0,
    type: 'sort',
    input,
    orderBy: orderBy.map((o) => (typeof o === 'string' ? { expr: col(o), direction } : o)),
  };
}

export function join(left: QueryPlan, right: QueryPlan, joinType: JoinType = 'inner', condition?: Predicate): JoinPlan {
  return { id: 0, type: 'join', joinType, left, right, condition };
}
