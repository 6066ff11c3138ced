/**
 * Resource fetchers
 *
 * @packageDocumentation
 */

import { FetchError, FetchErrorCode } from '../errors/index.js';
import { HttpResourceFetcher, type HttpFetcherOptions } from './http.js';
import { LocalFileFetcher } from './file.js';
import type { FetchOptions, ResourceFetcher } from './types.js';

export { HttpResourceFetcher, type HttpFetcherOptions } from './http.js';
export { LocalFileFetcher } from './file.js';
export type { FetchOptions, ResourceFetcher } from './types.js';

export function isHttpUrl(locator: string): boolean {
  return locator.startsWith('http://') || locator.startsWith('https://');
}

/**
 * Routes http(s) locators to HTTP and everything else to the filesystem
 */
export class RoutingFetcher implements ResourceFetcher {
  constructor(
    private readonly http: ResourceFetcher,
    private readonly file: ResourceFetcher
  ) {}

  fetch(locator: string, options?: FetchOptions): Promise<Uint8Array> {
    return isHttpUrl(locator) ? this.http.fetch(locator, options) : this.file.fetch(locator, options);
  }
}

export function createDefaultFetcher(options: HttpFetcherOptions = {}): ResourceFetcher {
  return new RoutingFetcher(new HttpResourceFetcher(options), new LocalFileFetcher());
}

/**
 * Fetch a resource and parse it as JSON
 */
export async function fetchJson(
  fetcher: ResourceFetcher,
  locator: string,
  options?: FetchOptions
): Promise<unknown> {
  const text = new TextDecoder().decode(await fetcher.fetch(locator, options));
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new FetchError(
      FetchErrorCode.INVALID_RESPONSE,
      `Response from ${locator} is not valid JSON`,
      { status: 200, locator },
      { cause: error }
    );
  }
}
