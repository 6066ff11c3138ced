/**
 * EXPLAIN output
 *
 * Formats a plan as an indented tree, one node per line. Bound table
 * function nodes show what the function absorbed (its `describe()` facts,
 * such as a pushed limit) next to the estimated row count.
 */

import type { Expression, Predicate, QueryPlan, SqlValue } from './types.js';

const COMPARISON_SYMBOLS = {
  eq: '=',
  ne: '<>',
  lt: '<',
  le: '<=',
  gt: '>',
  ge: '>=',
  like: 'LIKE',
} as const;

const ARITHMETIC_SYMBOLS = {
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
  mod: '%',
} as const;

function formatValue(value: SqlValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'string') return `'${value.replace(/'/g, "''")}'`;
  if (value instanceof Date) return `'${value.toISOString()}'`;
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  return String(value);
}

export function formatExpression(expr: Expression): string {
  switch (expr.type) {
    case 'columnRef':
      return expr.table ? `${expr.table}.${expr.column}` : expr.column;
    case 'literal':
      return formatValue(expr.value);
    case 'parameter':
      return `:${expr.name}`;
    case 'list':
      return `[${expr.items.map(formatExpression).join(', ')}]`;
    case 'binary':
      return `(${formatExpression(expr.left)} ${ARITHMETIC_SYMBOLS[expr.op]} ${formatExpression(expr.right)})`;
    case 'unary':
      return expr.op === 'not' ? `NOT ${formatExpression(expr.operand)}` : `-${formatExpression(expr.operand)}`;
    case 'function':
      return `${expr.name}(${expr.args.map(formatExpression).join(', ')})`;
  }
}

export function formatPredicate(predicate: Predicate): string {
  switch (predicate.type) {
    case 'comparison':
      return `${formatExpression(predicate.left)} ${COMPARISON_SYMBOLS[predicate.op]} ${formatExpression(predicate.right)}`;
    case 'logical':
      if (predicate.op === 'not') return `NOT (${formatPredicate(predicate.operands[0])})`;
      return predicate.operands
        .map((p) => (p.type === 'logical' ? `(${formatPredicate(p)})` : formatPredicate(p)))
        .join(predicate.op === 'and' ? ' AND ' : ' OR ');
    case 'between':
      return `${formatExpression(predicate.expr)} BETWEEN ${formatExpression(predicate.low)} AND ${formatExpression(predicate.high)}`;
    case 'in':
      return `${formatExpression(predicate.expr)} IN (${predicate.values.map(formatExpression).join(', ')})`;
    case 'isNull':
      return `${formatExpression(predicate.expr)} IS ${predicate.isNot ? 'NOT ' : ''}NULL`;
  }
}

function formatDetail(value: unknown): string {
  if (Array.isArray(value)) return value.map(formatDetail).join(',');
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

function estimate(plan: QueryPlan): string {
  return plan.estimatedRows === undefined ? '' : ` (~${plan.estimatedRows} rows)`;
}

function formatNode(plan: QueryPlan): string {
  switch (plan.type) {
    case 'tableFunction': {
      const args = plan.args.map(formatExpression);
      for (const [key, expr] of Object.entries(plan.namedArgs ?? {})) {
        args.push(`${key} := ${formatExpression(expr)}`);
      }
      let line = `TableFunction ${plan.function}(${args.join(', ')})`;
      if (plan.alias) line += ` AS ${plan.alias}`;
      const details = Object.entries(plan.bound?.describe() ?? {});
      if (details.length > 0) {
        line += ` [${details.map(([key, value]) => `${key}=${formatDetail(value)}`).join(' ')}]`;
      }
      return line;
    }
    case 'values':
      return `Values [${plan.columns.join(', ')}]${plan.alias ? ` AS ${plan.alias}` : ''}`;
    case 'filter':
      return `Filter ${formatPredicate(plan.predicate)}`;
    case 'project':
      return `Project [${plan.expressions
        .map(({ expr, alias }) => {
          const text = formatExpression(expr);
          return text === alias ? text : `${text} AS ${alias}`;
        })
        .join(', ')}]`;
    case 'join':
      return `${plan.joinType.toUpperCase()} Join${plan.condition ? ` ON ${formatPredicate(plan.condition)}` : ''}`;
    case 'sort':
      return `Sort [${plan.orderBy.map((o) => `${formatExpression(o.expr)} ${o.direction.toUpperCase()}`).join(', ')}]`;
    case 'limit': {
      const count = typeof plan.limit === 'number' ? String(plan.limit) : formatExpression(plan.limit);
      return `Limit ${count}${plan.offset ? ` OFFSET ${plan.offset}` : ''}`;
    }
  }
}

/**
 * Format a plan as a string, one node per line
 */
export function formatPlan(plan: QueryPlan, indent = 0): string {
  const line = `${'  '.repeat(indent)}${formatNode(plan)}${estimate(plan)}`;
  switch (plan.type) {
    case 'filter':
    case 'project':
    case 'sort':
    case 'limit':
      return `${line}\n${formatPlan(plan.input, indent + 1)}`;
    case 'join':
      return `${line}\n${formatPlan(plan.left, indent + 1)}\n${formatPlan(plan.right, indent + 1)}`;
    case 'tableFunction':
    case 'values':
      return line;
  }
}
