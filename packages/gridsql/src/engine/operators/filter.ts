/**
 * Filter Operator
 *
 * Evaluates predicates the table functions did not absorb and drops rows
 * that don't match. Also home to expression evaluation, shared by every
 * operator that computes values.
 */

import { PlanError, PlanErrorCode } from '../../errors/index.js';
import type {
  ComparisonPredicate,
  EvaluationContext,
  ExecutionContext,
  Expression,
  FilterPlan,
  Operator,
  Predicate,
  Row,
  SqlValue,
} from '../types.js';

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Three-valued SQL truth: null stands for UNKNOWN
 */
type Truth = boolean | null;

function sqlToBool(value: SqlValue): boolean {
  if (value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'bigint') return value !== 0n;
  if (typeof value === 'string') return value.length > 0;
  return true;
}

function comparable(value: SqlValue): number | bigint | string | boolean | null {
  if (value === null || value instanceof Uint8Array) return null;
  if (value instanceof Date) return value.getTime();
  return value;
}

/**
 * Order two values, or null when they cannot be compared
 */
export function compareValues(a: SqlValue, b: SqlValue): number | null {
  const left = comparable(a);
  const right = comparable(b);
  if (left === null || right === null) return null;

  if (typeof left === 'string' || typeof right === 'string') {
    if (typeof left !== 'string' || typeof right !== 'string') return null;
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (typeof left === 'boolean' || typeof right === 'boolean') {
    if (typeof left !== 'boolean' || typeof right !== 'boolean') return null;
    return Number(left) - Number(right);
  }
  // number and bigint compare numerically
  const l = Number(left);
  const r = Number(right);
  return l < r ? -1 : l > r ? 1 : 0;
}

/**
 * SQL LIKE pattern matching
 */
function likeMatch(value: string, pattern: string): boolean {
  // % matches any sequence, _ matches single character
  const regexPattern = pattern
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/%/g, '.*')
    .replace(/_/g, '.');

  return new RegExp(`^${regexPattern}$`, 'i').test(value);
}

// =============================================================================
// EXPRESSION EVALUATION
// =============================================================================

/**
 * Evaluate an expression against a row
 */
export function evaluateExpression(expr: Expression, row: Row, ctx: EvaluationContext): SqlValue {
  switch (expr.type) {
    case 'columnRef': {
      if (expr.table) {
        const fullKey = `${expr.table}.${expr.column}`;
        if (fullKey in row) return row[fullKey];
      }
      if (expr.column in row) return row[expr.column];
      // Joined rows carry prefixed keys
      for (const key of Object.keys(row)) {
        if (key.endsWith(`.${expr.column}`)) {
          return row[key];
        }
      }
      return null;
    }

    case 'literal':
      return expr.value;

    case 'parameter': {
      const value = ctx.parameters.get(expr.name);
      if (value === undefined) {
        throw new PlanError(PlanErrorCode.MISSING_PARAMETER, `No value supplied for parameter :${expr.name}`);
      }
      return value;
    }

    case 'list':
      throw new PlanError(
        PlanErrorCode.UNKNOWN_NODE,
        'List expressions are only valid as table function arguments'
      );

    case 'binary': {
      const left = evaluateExpression(expr.left, row, ctx);
      const right = evaluateExpression(expr.right, row, ctx);

      if (typeof left === 'number' && typeof right === 'number') {
        switch (expr.op) {
          case 'add':
            return left + right;
          case 'sub':
            return left - right;
          case 'mul':
            return left * right;
          case 'div':
            return right !== 0 ? left / right : null;
          case 'mod':
            return right !== 0 ? left % right : null;
        }
      }
      if (typeof left === 'bigint' && typeof right === 'bigint') {
        switch (expr.op) {
          case 'add':
            return left + right;
          case 'sub':
            return left - right;
          case 'mul':
            return left * right;
          case 'div':
            return right !== 0n ? left / right : null;
          case 'mod':
            return right !== 0n ? left % right : null;
        }
      }
      return null;
    }

    case 'unary': {
      const operand = evaluateExpression(expr.operand, row, ctx);
      if (expr.op === 'not') {
        // NOT NULL returns NULL in SQL
        if (operand === null) return null;
        return sqlToBool(operand) ? 0 : 1;
      }
      if (typeof operand === 'number') return -operand;
      if (typeof operand === 'bigint') return -operand;
      return null;
    }

    case 'function':
      return ctx.functions.invoke(
        expr.name,
        expr.args.map((arg) => evaluateExpression(arg, row, ctx))
      );
  }
}

// =============================================================================
// PREDICATE EVALUATION
// =============================================================================

function evaluateComparison(predicate: ComparisonPredicate, row: Row, ctx: EvaluationContext): Truth {
  const left = evaluateExpression(predicate.left, row, ctx);
  const right = evaluateExpression(predicate.right, row, ctx);
  if (left === null || right === null) return null;

  const op = predicate.op;
  if (op === 'like') {
    return likeMatch(String(left), String(right));
  }

  const cmp = compareValues(left, right);
  // Values of different kinds are never equal
  if (cmp === null) return op === 'ne' ? true : op === 'eq' ? false : null;

  switch (op) {
    case 'eq':
      return cmp === 0;
    case 'ne':
      return cmp !== 0;
    case 'lt':
      return cmp < 0;
    case 'le':
      return cmp <= 0;
    case 'gt':
      return cmp > 0;
    case 'ge':
      return cmp >= 0;
  }
}

function evaluateTruth(predicate: Predicate, row: Row, ctx: EvaluationContext): Truth {
  switch (predicate.type) {
    case 'comparison':
      return evaluateComparison(predicate, row, ctx);

    case 'logical': {
      if (predicate.op === 'not') {
        const inner = evaluateTruth(predicate.operands[0], row, ctx);
        return inner === null ? null : !inner;
      }
      // AND: any false wins; OR: any true wins; otherwise unknown beats the identity
      const dominant = predicate.op === 'or';
      let unknown = false;
      for (const operand of predicate.operands) {
        const value = evaluateTruth(operand, row, ctx);
        if (value === dominant) return dominant;
        if (value === null) unknown = true;
      }
      return unknown ? null : !dominant;
    }

    case 'between': {
      const value = evaluateExpression(predicate.expr, row, ctx);
      const low = compareValues(value, evaluateExpression(predicate.low, row, ctx));
      const high = compareValues(value, evaluateExpression(predicate.high, row, ctx));
      if (low === null || high === null) return null;
      return low >= 0 && high <= 0;
    }

    case 'in': {
      const value = evaluateExpression(predicate.expr, row, ctx);
      if (value === null) return null;
      let unknown = false;
      for (const candidate of predicate.values) {
        const other = evaluateExpression(candidate, row, ctx);
        if (other === null) {
          unknown = true;
          continue;
        }
        if (compareValues(value, other) === 0) return true;
      }
      return unknown ? null : false;
    }

    case 'isNull': {
      const isNullValue = evaluateExpression(predicate.expr, row, ctx) === null;
      return predicate.isNot ? !isNullValue : isNullValue;
    }
  }
}

/**
 * Evaluate a predicate against a row; UNKNOWN counts as no match
 */
export function evaluatePredicate(predicate: Predicate, row: Row, ctx: EvaluationContext): boolean {
  return evaluateTruth(predicate, row, ctx) === true;
}

// =============================================================================
// FILTER OPERATOR
// =============================================================================

export class FilterOperator implements Operator {
  private plan: FilterPlan;
  private input: Operator;
  private ctx: ExecutionContext;

  constructor(plan: FilterPlan, input: Operator, ctx: ExecutionContext) {
    this.plan = plan;
    this.input = input;
    this.ctx = ctx;
  }

  async open(ctx: ExecutionContext): Promise<void> {
    this.ctx = ctx;
    await this.input.open(ctx);
  }

  async next(): Promise<Row | null> {
    while (true) {
      const row = await this.input.next();
      if (row === null) return null;
      if (evaluatePredicate(this.plan.predicate, row, this.ctx)) {
        return row;
      }
    }
  }

  async close(): Promise<void> {
    await this.input.close();
  }

  columns(): string[] {
    return this.input.columns();
  }
}
