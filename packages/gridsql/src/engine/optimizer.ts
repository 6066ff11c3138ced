/**
 * Plan optimizer
 *
 * Runs after binding. The built-in pass hands the conjuncts of a filter
 * sitting directly on a table function to the function, which may absorb
 * some of them; then every registered optimizer extension runs in
 * registration order.
 */

import type { StructuredLogger } from '../logging/index.js';
import { and_ } from './builders.js';
import type { Predicate, QueryPlan } from './types.js';

export interface OptimizerContext {
  logger: StructuredLogger;
}

/**
 * Hook that may rewrite a bound plan, e.g. to push a LIMIT into a scan
 */
export interface OptimizerExtension {
  readonly name: string;
  optimize(plan: QueryPlan, ctx: OptimizerContext): QueryPlan;
}

// =============================================================================
// TREE WALKING
// =============================================================================

/**
 * Apply `fn` to every node, children first
 */
export function transformPlan(plan: QueryPlan, fn: (node: QueryPlan) => QueryPlan): QueryPlan {
  switch (plan.type) {
    case 'filter':
    case 'project':
    case 'sort':
    case 'limit':
      return fn({ ...plan, input: transformPlan(plan.input, fn) });
    case 'join':
      return fn({ ...plan, left: transformPlan(plan.left, fn), right: transformPlan(plan.right, fn) });
    case 'tableFunction':
    case 'values':
      return fn(plan);
  }
}

/**
 * Visit every node, parents first
 */
export function walkPlan(plan: QueryPlan, fn: (node: QueryPlan) => void): void {
  fn(plan);
  switch (plan.type) {
    case 'filter':
    case 'project':
    case 'sort':
    case 'limit':
      walkPlan(plan.input, fn);
      break;
    case 'join':
      walkPlan(plan.left, fn);
      walkPlan(plan.right, fn);
      break;
  }
}

// =============================================================================
// FILTER PUSHDOWN
// =============================================================================

/**
 * Split a predicate into its top-level AND conjuncts
 */
export function splitConjuncts(predicate: Predicate): Predicate[] {
  if (predicate.type === 'logical' && predicate.op === 'and') {
    return predicate.operands.flatMap(splitConjuncts);
  }
  return [predicate];
}

export function pushdownFilters(plan: QueryPlan, ctx: OptimizerContext): QueryPlan {
  return transformPlan(plan, (node) => {
    if (node.type !== 'filter' || node.input.type !== 'tableFunction') return node;
    const bound = node.input.bound;
    if (!bound || !bound.supportsFilterPushdown) return node;

    const conjuncts = splitConjuncts(node.predicate);
    const remaining = bound.pushdownFilters(conjuncts);
    ctx.logger.debug('Filter pushdown into {function} kept {kept} of {total} predicates', {
      function: bound.name,
      kept: remaining.length,
      total: conjuncts.length,
    });

    if (remaining.length === 0) return node.input;
    return { ...node, predicate: and_(...remaining) };
  });
}

/**
 * Built-in pushdown followed by the extensions
 */
export function optimizePlan(
  plan: QueryPlan,
  extensions: readonly OptimizerExtension[],
  ctx: OptimizerContext
): QueryPlan {
  let optimized = pushdownFilters(plan, ctx);
  for (const extension of extensions) {
    optimized = extension.optimize(optimized, ctx);
  }
  return optimized;
}
