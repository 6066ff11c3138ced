/**
 * Error reporting for the CLI.
 */

import { GridSQLError, toError } from 'gridsql';

/**
 * One-line description of a failure for the terminal, with the recovery hint
 * when the error carries one.
 *
 * @example
 * ```ts
 * describeError(new FetchError(FetchErrorCode.HTTP_STATUS, 'HTTP 404', { status: 404, locator }));
 * // 'The requested forecast run is not available (yet) on the server.'
 * ```
 */
export function describeError(error: unknown): string {
  if (error instanceof GridSQLError) {
    const message = error.toUserMessage();
    return error.recoveryHint ? `${message} (${error.recoveryHint})` : message;
  }
  return toError(error).message;
}
