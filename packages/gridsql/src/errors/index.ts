/**
 * GridSQL errors
 *
 * @packageDocumentation
 */

export {
  GridSQLError,
  ErrorCategory,
  toError,
  type ErrorContext,
  type ErrorLogEntry,
  type SerializedError,
} from './base.js';
export {
  BindErrorCode,
  DecodeErrorCode,
  FetchErrorCode,
  PlanErrorCode,
  QUERY_CANCELLED,
} from './codes.js';
export { BindError, DecodeError, FetchError, PlanError, QueryCancelledError } from './errors.js';
