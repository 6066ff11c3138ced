/**
 * LIMIT pushdown for weather scans
 *
 * A LIMIT with a numeric constant that sits on a table function scan, with
 * nothing but projections in between, is pushed into the scan as its row
 * limit (LIMIT + OFFSET rows). Filters, sorts and joins stop the walk. The
 * LIMIT node itself stays in the plan, and the scan's cardinality estimate is
 * left alone.
 */

import type { Expression, QueryPlan } from '../engine/types.js';
import { walkPlan, type OptimizerExtension } from '../engine/optimizer.js';

export const LIMIT_REWRITER_NAME = 'weather_limit_pushdown';

/**
 * The row count of a constant LIMIT, or null for parameters and expressions
 */
export function constantLimit(limit: number | Expression): number | null {
  const value = typeof limit === 'number' ? limit : limit.type === 'literal' ? limit.value : null;
  const count = typeof value === 'bigint' ? Number(value) : value;
  return typeof count === 'number' && Number.isInteger(count) ? count : null;
}

function skipProjections(plan: QueryPlan): QueryPlan {
  let node = plan;
  while (node.type === 'project') {
    node = node.input;
  }
  return node;
}

export const limitRewriter: OptimizerExtension = {
  name: LIMIT_REWRITER_NAME,

  optimize(plan, ctx) {
    walkPlan(plan, (node) => {
      if (node.type !== 'limit') return;

      const count = constantLimit(node.limit);
      if (count === null || count <= 0) return;

      const target = skipProjections(node.input);
      if (target.type !== 'tableFunction' || !target.bound?.supportsLimitPushdown) return;

      const rowLimit = count + (node.offset ?? 0);
      target.bound.pushdownLimit(rowLimit);
      ctx.logger.debug('Pushed LIMIT {limit} into {function}', {
        limit: rowLimit,
        function: target.bound.name,
      });
    });
    return plan;
  },
};
