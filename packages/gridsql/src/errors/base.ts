/**
 * GridSQL Error Hierarchy
 *
 * All errors raised by the engine and its table functions extend
 * GridSQLError which provides:
 * - Required error codes
 * - Timestamps
 * - Context preservation
 * - Recovery hints
 * - Structured logging support
 *
 * @packageDocumentation
 */

// =============================================================================
// Error Context
// =============================================================================

/**
 * Context that can be attached to any error
 */
export interface ErrorContext {
  /** Trace ID of the query that failed */
  traceId?: string;
  /** Table function involved */
  function?: string;
  /** Argument name involved */
  argument?: string;
  /** Column name involved */
  column?: string;
  /** Resource locator (URL or path) */
  locator?: string;
  /** Resource label, e.g. the forecast hour */
  resource?: string;
  /** Additional metadata */
  metadata?: Record<string, unknown>;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  name: string;
  code: string;
  message: string;
  timestamp: number;
  context?: ErrorContext;
  stack?: string;
  cause?: SerializedError;
}

/**
 * Log entry format for structured logging
 */
export interface ErrorLogEntry {
  level: 'error' | 'warn';
  /** ISO timestamp */
  timestamp: string;
  error: {
    name: string;
    code: string;
    message: string;
    stack?: string;
  };
  metadata: Record<string, unknown>;
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories for consistent handling
 */
export enum ErrorCategory {
  /** Network and remote resource errors */
  CONNECTION = 'CONNECTION',
  /** Query execution errors */
  EXECUTION = 'EXECUTION',
  /** Input validation errors */
  VALIDATION = 'VALIDATION',
  /** Cancellation and timeouts */
  TIMEOUT = 'TIMEOUT',
  /** Internal errors (bugs, unexpected states) */
  INTERNAL = 'INTERNAL',
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for all GridSQL errors
 *
 * @example
 * ```typescript
 * try {
 *   await db.query(plan);
 * } catch (error) {
 *   if (error instanceof GridSQLError) {
 *     console.log(error.code);          // 'FETCH_HTTP_STATUS'
 *     console.log(error.isRetryable()); // true for 5xx
 *     logger.error(error.message, error, error.toLogEntry().metadata);
 *   }
 * }
 * ```
 */
export abstract class GridSQLError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Error category for consistent handling */
  abstract readonly category: ErrorCategory;

  /** Timestamp when error occurred */
  readonly timestamp: number;

  context?: ErrorContext;

  /** Recovery hint for developers */
  recoveryHint?: string;

  constructor(message: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, { cause: options?.cause });
    this.timestamp = Date.now();
    this.context = options?.context;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Check if this error is retryable
   * Override in subclasses for specific retry logic
   */
  isRetryable(): boolean {
    return false;
  }

  /**
   * Get a user-friendly error message
   */
  toUserMessage(): string {
    return this.message;
  }

  toJSON(): SerializedError {
    const result: SerializedError = {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp,
    };

    if (this.context) {
      result.context = this.context;
    }

    if (this.stack) {
      result.stack = this.stack;
    }

    if (this.cause instanceof GridSQLError) {
      result.cause = this.cause.toJSON();
    } else if (this.cause instanceof Error) {
      result.cause = {
        name: this.cause.name,
        code: 'UNKNOWN',
        message: this.cause.message,
        timestamp: this.timestamp,
        stack: this.cause.stack,
      };
    }

    return result;
  }

  /**
   * Format error for structured logging
   */
  toLogEntry(): ErrorLogEntry {
    return {
      level: 'error',
      timestamp: new Date(this.timestamp).toISOString(),
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        stack: this.stack,
      },
      metadata: {
        category: this.category,
        recoveryHint: this.recoveryHint,
        ...this.context,
      },
    };
  }

  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }

  withRecoveryHint(hint: string): this {
    this.recoveryHint = hint;
    return this;
  }
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
