/**
 * Plan binder
 *
 * Copies a built plan, numbers its nodes and binds every table function
 * call: arguments are evaluated to constants, the function is looked up and
 * its `bind` fixes the output columns. The caller's plan is never mutated,
 * so one built plan can be prepared many times.
 */

import type { Settings } from '../config/settings.js';
import { BindError, BindErrorCode } from '../errors/index.js';
import type { FunctionRegistry } from '../functions/registry.js';
import type { TableFunctionRegistry } from '../functions/table-function.js';
import type { StructuredLogger } from '../logging/index.js';
import { evaluateExpression } from './operators/filter.js';
import type { ArgumentValue, Expression, QueryPlan, SqlValue, TableFunctionPlan } from './types.js';

export interface BindContext {
  tableFunctions: TableFunctionRegistry;
  functions: FunctionRegistry;
  settings: Readonly<Settings>;
  logger: StructuredLogger;
  now: Date;
}

/**
 * True when an expression can be evaluated without a row or parameters
 */
export function isConstantExpression(expr: Expression): boolean {
  switch (expr.type) {
    case 'literal':
      return true;
    case 'list':
      return expr.items.every(isConstantExpression);
    case 'binary':
      return isConstantExpression(expr.left) && isConstantExpression(expr.right);
    case 'unary':
      return isConstantExpression(expr.operand);
    case 'function':
      return expr.args.every(isConstantExpression);
    case 'columnRef':
    case 'parameter':
      return false;
  }
}

function evaluateArgument(fn: string, name: string, expr: Expression, ctx: BindContext): ArgumentValue {
  if (!isConstantExpression(expr)) {
    throw new BindError(
      BindErrorCode.INVALID_ARGUMENT,
      `${fn}() argument "${name}" must be a constant`,
      { context: { function: fn, argument: name } }
    );
  }
  const evaluation = { functions: ctx.functions, parameters: new Map<string, SqlValue>() };
  if (expr.type === 'list') {
    return expr.items.map((item) => evaluateExpression(item, {}, evaluation));
  }
  return evaluateExpression(expr, {}, evaluation);
}

function bindTableFunction(plan: TableFunctionPlan, id: number, ctx: BindContext): TableFunctionPlan {
  const registered = ctx.tableFunctions.get(plan.function);
  if (!registered) {
    throw new BindError(BindErrorCode.UNKNOWN_FUNCTION, `Unknown table function: ${plan.function}`, {
      context: { function: plan.function },
    });
  }

  const args = plan.args.map((arg, i) => evaluateArgument(plan.function, String(i + 1), arg, ctx));
  const namedArgs: Record<string, ArgumentValue> = {};
  for (const [key, expr] of Object.entries(plan.namedArgs ?? {})) {
    namedArgs[key] = evaluateArgument(plan.function, key, expr, ctx);
  }

  const bound = registered.bind({
    args,
    namedArgs,
    settings: ctx.settings,
    logger: ctx.logger.child({ function: registered.name }),
    now: ctx.now,
  });
  ctx.logger.debug('Bound {function}', { function: registered.name, node: id });

  return { ...plan, id, bound, estimatedRows: bound.cardinality() };
}

/**
 * Bind a plan, returning a numbered copy with every table function bound
 */
export function bindPlan(plan: QueryPlan, ctx: BindContext): QueryPlan {
  let nextId = 1;

  const visit = (node: QueryPlan): QueryPlan => {
    const id = nextId++;
    switch (node.type) {
      case 'tableFunction':
        return bindTableFunction(node, id, ctx);
      case 'values':
        return { ...node, id, estimatedRows: node.rows.length };
      case 'filter':
        return { ...node, id, input: visit(node.input) };
      case 'project':
        return { ...node, id, input: visit(node.input) };
      case 'sort':
        return { ...node, id, input: visit(node.input) };
      case 'limit':
        return { ...node, id, input: visit(node.input) };
      case 'join':
        return { ...node, id, left: visit(node.left), right: visit(node.right) };
    }
  };

  return visit(plan);
}
