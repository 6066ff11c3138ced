import { readFile } from 'node:fs/promises';
import { FetchError, FetchErrorCode, toError } from '../errors/index.js';
import type { ResourceFetcher } from './types.js';

/**
 * Reads resources from the local filesystem; `file://` URLs are accepted
 */
export class LocalFileFetcher implements ResourceFetcher {
  async fetch(locator: string): Promise<Uint8Array> {
    const path = locator.startsWith('file://') ? new URL(locator) : locator;
    try {
      const buffer = await readFile(path);
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (error) {
      throw new FetchError(
        FetchErrorCode.FILE,
        `Cannot read ${locator}: ${toError(error).message}`,
        { status: 0, locator },
        { cause: error }
      );
    }
  }
}
