/**
 * Function Registry
 *
 * Central registry for the scalar functions callable from plan expressions.
 * Provides:
 * - Registration of the core functions
 * - Type signatures for each function
 * - Extensibility for extension-provided functions
 * - Function lookup and invocation
 */

import type { SqlValue } from '../engine/types.js';
import { PlanError, PlanErrorCode } from '../errors/index.js';
import { coreFunctions, coreSignatures } from './core.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * SQL function implementation
 */
export interface SqlFunction {
  /** The function implementation */
  fn: (...args: SqlValue[]) => SqlValue;
  /** Minimum number of arguments */
  minArgs: number;
  /** Maximum number of arguments (Infinity for variadic) */
  maxArgs: number;
  /** Whether this is deterministic (same inputs = same output) */
  deterministic?: boolean;
}

/**
 * Parameter definition for function signature
 */
export interface FunctionParam {
  name: string;
  type: 'any' | 'string' | 'number' | 'boolean' | 'date';
  optional?: boolean;
  variadic?: boolean;
}

/**
 * Function signature for documentation and type checking
 */
export interface FunctionSignature {
  name: string;
  params: FunctionParam[];
  returnType: 'any' | 'string' | 'number' | 'boolean' | 'date' | 'null';
  description: string;
}

// =============================================================================
// FUNCTION REGISTRY
// =============================================================================

/**
 * Registry of all available scalar functions
 */
export class FunctionRegistry {
  private functions = new Map<string, SqlFunction>();
  private signatures = new Map<string, FunctionSignature>();

  constructor() {
    this.registerAll(coreFunctions, coreSignatures);
  }

  /**
   * Register a family of functions and their signatures
   */
  registerAll(
    functions: Record<string, SqlFunction>,
    signatures: Record<string, FunctionSignature> = {}
  ): void {
    for (const [name, fn] of Object.entries(functions)) {
      this.functions.set(name.toLowerCase(), fn);
    }
    for (const [name, sig] of Object.entries(signatures)) {
      this.signatures.set(name.toLowerCase(), sig);
    }
  }

  /**
   * Register a user-defined function
   */
  register(name: string, fn: SqlFunction, signature?: FunctionSignature): void {
    const lowerName = name.toLowerCase();
    this.functions.set(lowerName, fn);
    if (signature) {
      this.signatures.set(lowerName, signature);
    }
  }

  unregister(name: string): boolean {
    const lowerName = name.toLowerCase();
    const existed = this.functions.has(lowerName);
    this.functions.delete(lowerName);
    this.signatures.delete(lowerName);
    return existed;
  }

  has(name: string): boolean {
    return this.functions.has(name.toLowerCase());
  }

  getSignature(name: string): FunctionSignature | undefined {
    return this.signatures.get(name.toLowerCase());
  }

  /**
   * Get all registered function names, sorted
   */
  getFunctionNames(): string[] {
    return Array.from(this.functions.keys()).sort();
  }

  /**
   * Invoke a scalar function
   */
  invoke(name: string, args: SqlValue[]): SqlValue {
    const fn = this.functions.get(name.toLowerCase());

    if (!fn) {
      throw new PlanError(PlanErrorCode.FUNCTION_ERROR, `Unknown function: ${name}`);
    }

    // Validate argument count
    if (args.length < fn.minArgs) {
      throw new PlanError(
        PlanErrorCode.FUNCTION_ERROR,
        `${name}() requires at least ${fn.minArgs} argument(s), got ${args.length}`
      );
    }
    if (args.length > fn.maxArgs) {
      throw new PlanError(
        PlanErrorCode.FUNCTION_ERROR,
        `${name}() accepts at most ${fn.maxArgs} argument(s), got ${args.length}`
      );
    }

    return fn.fn(...args);
  }
}
