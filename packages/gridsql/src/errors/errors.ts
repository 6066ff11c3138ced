/**
 * Concrete GridSQL error classes
 *
 * @packageDocumentation
 */

import { ErrorCategory, GridSQLError, type ErrorContext } from './base.js';
import {
  BindErrorCode,
  DecodeErrorCode,
  FetchErrorCode,
  PlanErrorCode,
  QUERY_CANCELLED,
} from './codes.js';

// =============================================================================
// Bind Error
// =============================================================================

/**
 * Error thrown when a table function invocation or a setting is malformed
 *
 * @example
 * ```typescript
 * try {
 *   db.prepare(tableFunction('read_grib', [lit([])]));
 * } catch (error) {
 *   if (error instanceof BindError) {
 *     console.log(error.code); // 'BIND_INVALID_ARGUMENT'
 *   }
 * }
 * ```
 */
export class BindError extends GridSQLError {
  readonly code: BindErrorCode;
  readonly category = ErrorCategory.VALIDATION;

  constructor(code: BindErrorCode, message: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, options);
    this.name = 'BindError';
    this.code = code;

    switch (code) {
      case BindErrorCode.UNKNOWN_FUNCTION:
        this.recoveryHint = 'Load the weather extension or register the table function first';
        break;
      case BindErrorCode.UNKNOWN_SETTING:
        this.recoveryHint = 'Check the setting name against the documented settings';
        break;
    }
  }
}

// =============================================================================
// Fetch Error
// =============================================================================

/**
 * Error thrown when a resource cannot be retrieved
 *
 * `status` is the HTTP status, or 0 when no response was received.
 */
export class FetchError extends GridSQLError {
  readonly code: FetchErrorCode;
  readonly category = ErrorCategory.CONNECTION;
  readonly status: number;
  readonly locator: string;

  constructor(
    code: FetchErrorCode,
    message: string,
    details: { status: number; locator: string },
    options?: { cause?: unknown; context?: ErrorContext }
  ) {
    super(message, options);
    this.name = 'FetchError';
    this.code = code;
    this.status = details.status;
    this.locator = details.locator;
  }

  isRetryable(): boolean {
    if (this.code === FetchErrorCode.TRANSPORT) return true;
    return this.code === FetchErrorCode.HTTP_STATUS && (this.status >= 500 || this.status === 429);
  }

  toUserMessage(): string {
    if (this.code === FetchErrorCode.HTTP_STATUS && this.status === 404) {
      return 'The requested forecast run is not available (yet) on the server.';
    }
    return this.message;
  }
}

// =============================================================================
// Decode Error
// =============================================================================

/**
 * Error thrown when fetched bytes cannot be decoded
 */
export class DecodeError extends GridSQLError {
  readonly code: DecodeErrorCode;
  readonly category = ErrorCategory.EXECUTION;

  constructor(code: DecodeErrorCode, message: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, options);
    this.name = 'DecodeError';
    this.code = code;
  }
}

// =============================================================================
// Plan Error
// =============================================================================

/**
 * Error thrown for malformed or unexecutable plans
 */
export class PlanError extends GridSQLError {
  readonly code: PlanErrorCode;
  readonly category = ErrorCategory.EXECUTION;

  constructor(code: PlanErrorCode, message: string, options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, options);
    this.name = 'PlanError';
    this.code = code;
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Error thrown when a running query observes its abort signal
 */
export class QueryCancelledError extends GridSQLError {
  readonly code = QUERY_CANCELLED;
  readonly category = ErrorCategory.TIMEOUT;

  constructor(message = 'Query was cancelled', options?: { cause?: unknown; context?: ErrorContext }) {
    super(message, options);
    this.name = 'QueryCancelledError';
  }
}
