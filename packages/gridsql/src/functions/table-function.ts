/**
 * Table functions
 *
 * A table function produces rows from something other than a stored table,
 * such as a remote forecast feed or a file. The host drives it in phases:
 *
 * 1. `bind` validates the call's constant arguments and fixes the columns.
 * 2. `pushdownFilters` and `pushdownLimit` let the function absorb parts of
 *    the surrounding plan into its bind data before execution.
 * 3. `initGlobal` creates the per-execution state, then `scan` is called
 *    until it returns no rows.
 *
 * `defineTableFunction` erases the bind and state types so functions with
 * different data can live in one registry.
 */

import type { Settings } from '../config/settings.js';
import type { ArgumentValue, ColumnDef, ExecutionContext, Predicate, Row } from '../engine/types.js';
import type { StructuredLogger } from '../logging/index.js';
import { BindError, BindErrorCode } from '../errors/index.js';

// =============================================================================
// Definition
// =============================================================================

export interface TableFunctionBindInput {
  /** Positional arguments, already evaluated */
  args: ArgumentValue[];
  namedArgs: Record<string, ArgumentValue>;
  /** Snapshot of the database settings at bind time */
  settings: Readonly<Settings>;
  logger: StructuredLogger;
  /** Clock used for defaults such as today's run date */
  now: Date;
}

export interface TableFunctionBindResult<TBind> {
  bindData: TBind;
  columns: ColumnDef[];
}

export type TableFunctionScanContext = Pick<ExecutionContext, 'signal' | 'logger'>;

/**
 * Per-execution state of one scan. Scans run on a single task.
 */
export interface TableFunctionState {
  /** Release everything the scan holds; called once however it ends */
  close(): Promise<void>;
}

export interface TableFunction<TBind, TState extends TableFunctionState> {
  readonly name: string;
  /** Named arguments the function accepts */
  readonly namedParameters?: readonly string[];

  bind(input: TableFunctionBindInput): TableFunctionBindResult<TBind>;

  /** Absorb what it can and return the predicates still to be evaluated */
  pushdownFilters?(bindData: TBind, predicates: Predicate[]): Predicate[];
  /** Bound the number of rows the scan needs to produce */
  pushdownLimit?(bindData: TBind, limit: number): void;
  /** Estimated rows, for plan decisions only */
  cardinality?(bindData: TBind): number;
  /** Key facts shown by EXPLAIN */
  describe?(bindData: TBind): Record<string, unknown>;

  initGlobal(bindData: TBind, ctx: TableFunctionScanContext): TState | Promise<TState>;
  /** Next rows; an empty array ends the scan */
  scan(bindData: TBind, state: TState, ctx: TableFunctionScanContext): Promise<Row[]>;
  /** Percentage complete, or -1 when unknown */
  progress?(bindData: TBind, state: TState): number;
}

// =============================================================================
// Type-erased handles
// =============================================================================

/**
 * A running scan of a bound table function
 */
export interface TableFunctionScan {
  next(): Promise<Row[]>;
  progress(): number;
  close(): Promise<void>;
}

/**
 * A table function call bound to its arguments, attached to a plan node
 */
export interface BoundTableFunction {
  readonly name: string;
  readonly columns: readonly ColumnDef[];
  readonly supportsFilterPushdown: boolean;
  readonly supportsLimitPushdown: boolean;
  pushdownFilters(predicates: Predicate[]): Predicate[];
  /** False when the function cannot take a limit */
  pushdownLimit(limit: number): boolean;
  cardinality(): number | undefined;
  describe(): Record<string, unknown>;
  init(ctx: TableFunctionScanContext): Promise<TableFunctionScan>;
}

export interface RegisteredTableFunction {
  readonly name: string;
  bind(input: TableFunctionBindInput): BoundTableFunction;
}

export function defineTableFunction<TBind, TState extends TableFunctionState>(
  definition: TableFunction<TBind, TState>
): RegisteredTableFunction {
  return {
    name: definition.name,
    bind(input: TableFunctionBindInput): BoundTableFunction {
      const accepted = definition.namedParameters ?? [];
      for (const key of Object.keys(input.namedArgs)) {
        if (!accepted.includes(key)) {
          throw new BindError(
            BindErrorCode.UNKNOWN_ARGUMENT,
            `${definition.name}() does not accept a named argument "${key}"`
          );
        }
      }

      const { bindData, columns } = definition.bind(input);
      return {
        name: definition.name,
        columns,
        supportsFilterPushdown: definition.pushdownFilters !== undefined,
        supportsLimitPushdown: definition.pushdownLimit !== undefined,
        pushdownFilters: (predicates) =>
          definition.pushdownFilters ? definition.pushdownFilters(bindData, predicates) : predicates,
        pushdownLimit: (limit) => {
          if (!definition.pushdownLimit) return false;
          definition.pushdownLimit(bindData, limit);
          return true;
        },
        cardinality: () => definition.cardinality?.(bindData),
        describe: () => definition.describe?.(bindData) ?? {},
        init: async (ctx) => {
          const state = await definition.initGlobal(bindData, ctx);
          return {
            next: () => definition.scan(bindData, state, ctx),
            progress: () => definition.progress?.(bindData, state) ?? -1,
            close: () => state.close(),
          };
        },
      };
    },
  };
}

// =============================================================================
// Registry
// =============================================================================

export class TableFunctionRegistry {
  private functions = new Map<string, RegisteredTableFunction>();

  register(fn: RegisteredTableFunction): void {
    this.functions.set(fn.name.toLowerCase(), fn);
  }

  get(name: string): RegisteredTableFunction | undefined {
    return this.functions.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.functions.has(name.toLowerCase());
  }

  getFunctionNames(): string[] {
    return Array.from(this.functions.keys()).sort();
  }
}

// =============================================================================
// Argument helpers
// =============================================================================

/**
 * Number argument, or BindError
 */
export function numberArgument(fn: string, name: string, value: ArgumentValue): number {
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  throw new BindError(BindErrorCode.INVALID_ARGUMENT, `${fn}() argument "${name}" must be a number`);
}

/**
 * String or list-of-strings argument, as a list
 */
export function stringListArgument(fn: string, name: string, value: ArgumentValue): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) {
    const strings = value.filter((v): v is string => typeof v === 'string');
    if (strings.length === value.length) return strings;
  }
  throw new BindError(
    BindErrorCode.INVALID_ARGUMENT,
    `${fn}() argument "${name}" must be a string or a list of strings`
  );
}
