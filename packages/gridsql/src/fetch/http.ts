/**
 * HTTP resource fetcher
 *
 * One GET per locator through the global fetch. Non-2xx responses and
 * transport failures become FetchError; nothing is retried here.
 */

import { FetchError, FetchErrorCode, toError } from '../errors/index.js';
import type { FetchOptions, ResourceFetcher } from './types.js';

export interface HttpFetcherOptions {
  /** Headers sent with every request */
  headers?: Record<string, string>;
  /** Abort a request after this many milliseconds; 0 disables */
  timeoutMs?: number;
}

export class HttpResourceFetcher implements ResourceFetcher {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;

  constructor(options: HttpFetcherOptions = {}) {
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  /**
   * The timeout covers the whole exchange, body included
   */
  async fetch(locator: string, options: FetchOptions = {}): Promise<Uint8Array> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    if (this.timeoutMs > 0) {
      timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    }

    try {
      const response = await this.request(locator, options, controller.signal);

      if (!response.ok) {
        throw new FetchError(
          FetchErrorCode.HTTP_STATUS,
          `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''} for ${locator}`,
          { status: response.status, locator }
        );
      }

      try {
        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw new FetchError(
          FetchErrorCode.TRANSPORT,
          `Failed reading response body of ${locator}: ${this.reason(error, controller.signal)}`,
          { status: response.status, locator },
          { cause: error }
        );
      }
    } finally {
      if (timeoutId) {
        clearTimeout(timeoutId);
      }
    }
  }

  private async request(locator: string, options: FetchOptions, signal: AbortSignal): Promise<Response> {
    try {
      return await fetch(locator, {
        method: 'GET',
        headers: { ...this.headers, ...options.headers },
        redirect: 'follow',
        signal,
      });
    } catch (error) {
      throw new FetchError(
        FetchErrorCode.TRANSPORT,
        `Request to ${locator} failed: ${this.reason(error, signal)}`,
        { status: 0, locator },
        { cause: error }
      );
    }
  }

  private reason(error: unknown, signal: AbortSignal): string {
    return signal.aborted ? `timed out after ${this.timeoutMs}ms` : toError(error).message;
  }
}
