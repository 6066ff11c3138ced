/**
 * Database Class for GridSQL
 *
 * Owns the settings, the scalar and table function registries and the
 * optimizer extensions, and turns built plans into executions:
 * bind → filter pushdown → extensions → operators.
 */

import {
  loadSettings,
  updateSetting,
  type SettingName,
  type Settings,
} from './config/settings.js';
import { bindPlan } from './engine/binder.js';
import { QueryExecution } from './engine/executor.js';
import { formatPlan } from './engine/explain.js';
import { optimizePlan, type OptimizerExtension } from './engine/optimizer.js';
import type { QueryPlan, QueryResult, SqlValue } from './engine/types.js';
import { FunctionRegistry } from './functions/registry.js';
import { TableFunctionRegistry, type RegisteredTableFunction } from './functions/table-function.js';
import { createLogger, type StructuredLogger } from './logging/index.js';

// =============================================================================
// TYPES
// =============================================================================

export interface DatabaseOptions {
  /** Explicit settings; environment variables fill the rest */
  settings?: Partial<Record<SettingName, unknown>>;
  env?: NodeJS.ProcessEnv;
  /** Defaults to a console logger at the `log_level` setting */
  logger?: StructuredLogger;
  /** Clock for defaults such as today's run date */
  clock?: () => Date;
}

export interface ExecuteOptions {
  /** Values for `param()` references */
  parameters?: Record<string, SqlValue> | Map<string, SqlValue>;
  signal?: AbortSignal;
}

/**
 * A bound and optimized plan, ready to execute
 */
export class PreparedQuery {
  constructor(
    readonly plan: QueryPlan,
    readonly planningTime: number
  ) {}

  explain(): string {
    return formatPlan(this.plan);
  }
}

// =============================================================================
// DATABASE IMPLEMENTATION
// =============================================================================

/**
 * GridSQL Database
 *
 * @example
 * ```typescript
 * const db = new Database();
 * loadWeatherExtension(db);
 *
 * const { rows } = await db.query(
 *   limit(filter(tableFunction('gfs_forecast'), eq(col('forecast_hour'), lit(6))), 10)
 * );
 * ```
 */
export class Database {
  readonly functions = new FunctionRegistry();
  readonly tableFunctions = new TableFunctionRegistry();

  private readonly extensions: OptimizerExtension[] = [];
  private readonly logger: StructuredLogger;
  private readonly clock: () => Date;
  private settings: Settings;
  private queryCount = 0;

  constructor(options: DatabaseOptions = {}) {
    this.settings = loadSettings(options.settings, options.env);
    this.logger = options.logger ?? createLogger({ level: this.settings.log_level });
    this.clock = options.clock ?? (() => new Date());
  }

  // ===========================================================================
  // Settings
  // ===========================================================================

  get<K extends SettingName>(name: K): Settings[K] {
    return this.settings[name];
  }

  /**
   * Change one setting; table functions bound afterwards see the new value
   */
  set(name: string, value: unknown): void {
    this.settings = updateSetting(this.settings, name, value);
    if (name === 'log_level') {
      this.logger.setLevel(this.settings.log_level);
    }
    this.logger.debug('Setting {name} changed', { name });
  }

  getSettings(): Readonly<Settings> {
    return Object.freeze({ ...this.settings });
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  registerTableFunction(fn: RegisteredTableFunction): this {
    this.tableFunctions.register(fn);
    return this;
  }

  registerOptimizerExtension(extension: OptimizerExtension): this {
    if (!this.extensions.some((e) => e.name === extension.name)) {
      this.extensions.push(extension);
    }
    return this;
  }

  getOptimizerExtensions(): string[] {
    return this.extensions.map((e) => e.name);
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  prepare(plan: QueryPlan): PreparedQuery {
    const start = performance.now();
    const logger = this.logger.child({ query: ++this.queryCount });

    const bound = bindPlan(plan, {
      tableFunctions: this.tableFunctions,
      functions: this.functions,
      settings: this.getSettings(),
      logger,
      now: this.clock(),
    });
    const optimized = optimizePlan(bound, this.extensions, { logger });

    return new PreparedQuery(optimized, performance.now() - start);
  }

  /**
   * Start an execution; rows are produced as the result is iterated
   */
  execute(query: QueryPlan | PreparedQuery, options: ExecuteOptions = {}): QueryExecution {
    const prepared = query instanceof PreparedQuery ? query : this.prepare(query);
    const parameters =
      options.parameters instanceof Map
        ? options.parameters
        : new Map(Object.entries(options.parameters ?? {}));

    return new QueryExecution(prepared.plan, {
      functions: this.functions,
      parameters,
      logger: this.logger.child({ query: this.queryCount }),
      signal: options.signal,
      planningTime: prepared.planningTime,
    });
  }

  /**
   * Execute and collect every row
   */
  query(query: QueryPlan | PreparedQuery, options?: ExecuteOptions): Promise<QueryResult> {
    return this.execute(query, options).collect();
  }

  explain(query: QueryPlan | PreparedQuery): string {
    const prepared = query instanceof PreparedQuery ? query : this.prepare(query);
    return prepared.explain();
  }

  async close(): Promise<void> {
    await this.logger.flush();
  }
}
