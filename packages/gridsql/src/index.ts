/**
 * GridSQL - relational table functions over gridded forecast data
 *
 * Plans are built in code, bound against registered table functions and
 * optimized with filter and limit pushdown before they run.
 *
 * @packageDocumentation
 */

// =============================================================================
// DATABASE
// =============================================================================

export { Database, PreparedQuery, type DatabaseOptions, type ExecuteOptions } from './database.js';

// =============================================================================
// ENGINE
// =============================================================================

export type * from './engine/types.js';
export * from './engine/builders.js';
export { bindPlan, isConstantExpression, type BindContext } from './engine/binder.js';
export {
  optimizePlan,
  pushdownFilters,
  splitConjuncts,
  transformPlan,
  walkPlan,
  type OptimizerContext,
  type OptimizerExtension,
} from './engine/optimizer.js';
export { QueryExecution, createOperator, type QueryExecutionOptions } from './engine/executor.js';
export { formatPlan, formatExpression, formatPredicate } from './engine/explain.js';
export { evaluateExpression, evaluatePredicate, compareValues } from './engine/operators/filter.js';

// =============================================================================
// FUNCTIONS
// =============================================================================

export {
  FunctionRegistry,
  type SqlFunction,
  type FunctionParam,
  type FunctionSignature,
} from './functions/registry.js';
export {
  TableFunctionRegistry,
  defineTableFunction,
  numberArgument,
  stringListArgument,
  type TableFunction,
  type TableFunctionBindInput,
  type TableFunctionBindResult,
  type TableFunctionScanContext,
  type TableFunctionState,
  type TableFunctionScan,
  type BoundTableFunction,
  type RegisteredTableFunction,
} from './functions/table-function.js';

// =============================================================================
// FETCH, CONFIG, ERRORS, LOGGING
// =============================================================================

export * from './fetch/index.js';
export * from './config/settings.js';
export * from './errors/index.js';
export * from './logging/index.js';

// =============================================================================
// WEATHER EXTENSION
// =============================================================================

export * from './weather/index.js';
