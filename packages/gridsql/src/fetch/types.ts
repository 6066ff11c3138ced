/**
 * Resource retrieval
 */

export interface FetchOptions {
  /** Extra request headers; ignored for local files */
  headers?: Record<string, string>;
}

/**
 * Retrieves the raw bytes behind one locator (URL or path).
 *
 * Implementations throw FetchError, with `status` 0 when no response was
 * received. A single attempt is made; callers do not retry.
 */
export interface ResourceFetcher {
  fetch(locator: string, options?: FetchOptions): Promise<Uint8Array>;
}
