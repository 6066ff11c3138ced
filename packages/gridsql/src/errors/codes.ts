/**
 * GridSQL Error Code Enumerations
 *
 * Standardized error codes following the pattern: CATEGORY_SPECIFIC
 *
 * @packageDocumentation
 */

// =============================================================================
// Bind Error Codes
// =============================================================================

/**
 * Error codes for table function invocation and settings
 */
export enum BindErrorCode {
  /** Table function is not registered */
  UNKNOWN_FUNCTION = 'BIND_UNKNOWN_FUNCTION',
  /** Wrong number of positional arguments */
  ARGUMENT_COUNT = 'BIND_ARGUMENT_COUNT',
  /** Argument has the wrong type or an invalid value */
  INVALID_ARGUMENT = 'BIND_INVALID_ARGUMENT',
  /** Named argument is not accepted by the function */
  UNKNOWN_ARGUMENT = 'BIND_UNKNOWN_ARGUMENT',
  /** Setting name is not defined */
  UNKNOWN_SETTING = 'BIND_UNKNOWN_SETTING',
  /** Setting value failed validation */
  INVALID_SETTING = 'BIND_INVALID_SETTING',
}

// =============================================================================
// Fetch Error Codes
// =============================================================================

/**
 * Error codes for resource retrieval
 */
export enum FetchErrorCode {
  /** Server answered with a non-success status */
  HTTP_STATUS = 'FETCH_HTTP_STATUS',
  /** Connection failed, reset or timed out */
  TRANSPORT = 'FETCH_TRANSPORT',
  /** Local file could not be read */
  FILE = 'FETCH_FILE',
  /** Response body did not have the expected shape */
  INVALID_RESPONSE = 'FETCH_INVALID_RESPONSE',
}

// =============================================================================
// Decode Error Codes
// =============================================================================

/**
 * Error codes for binary decoding
 */
export enum DecodeErrorCode {
  /** Decoder rejected the bytes on open */
  OPEN_FAILED = 'DECODE_OPEN_FAILED',
  /** Decoder failed while reading a batch */
  READ_FAILED = 'DECODE_READ_FAILED',
}

// =============================================================================
// Plan Error Codes
// =============================================================================

/**
 * Error codes for plan preparation and execution
 */
export enum PlanErrorCode {
  /** Plan node type is not known to the executor */
  UNKNOWN_NODE = 'PLAN_UNKNOWN_NODE',
  /** Table function node was executed before binding */
  UNBOUND_SCAN = 'PLAN_UNBOUND_SCAN',
  /** Query parameter referenced but not supplied */
  MISSING_PARAMETER = 'PLAN_MISSING_PARAMETER',
  /** Scalar function is not registered or got bad arity */
  FUNCTION_ERROR = 'PLAN_FUNCTION_ERROR',
  /** LIMIT or OFFSET did not evaluate to a non-negative integer */
  INVALID_LIMIT = 'PLAN_INVALID_LIMIT',
  /** A query execution can only be iterated once */
  EXECUTION_STARTED = 'PLAN_EXECUTION_STARTED',
}

/**
 * Code for cooperative cancellation
 */
export const QUERY_CANCELLED = 'QUERY_CANCELLED';
