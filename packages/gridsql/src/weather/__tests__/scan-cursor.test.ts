import { describe, it, expect, vi } from 'vitest';
import { DecodeError, DecodeErrorCode, FetchError, FetchErrorCode, QueryCancelledError } from '../../errors/index.js';
import type { ResourceFetcher } from '../../fetch/types.js';
import { createSilentLogger } from '../../logging/index.js';
import { ScanCursor, type GridDecoder, type ResourcePlan } from '../scan-cursor.js';

// =============================================================================
// FAKES
// =============================================================================

interface FakePoint {
  resource: number;
  n: number;
}

interface FakeHandle {
  resource: number;
  size: number;
  position: number;
}

/**
 * Each resource is one byte: [resource index, point count]
 */
class FakeDecoder implements GridDecoder<FakeHandle, FakePoint> {
  readonly closed: number[] = [];
  readonly requests: number[] = [];

  open(bytes: Uint8Array): FakeHandle {
    return { resource: bytes[0], size: bytes[1], position: 0 };
  }

  readBatch(handle: FakeHandle, maxRows: number): { points: FakePoint[]; hasMore: boolean } {
    this.requests.push(maxRows);
    const points: FakePoint[] = [];
    while (points.length < maxRows && handle.position < handle.size) {
      points.push({ resource: handle.resource, n: handle.position++ });
    }
    return { points, hasMore: handle.position < handle.size };
  }

  close(handle: FakeHandle): void {
    this.closed.push(handle.resource);
  }
}

function fakeFetcher(sizes: number[]) {
  return {
    fetch: vi.fn(async (locator: string) => {
      const index = Number(locator.split('/').pop());
      return Uint8Array.of(index, sizes[index]);
    }),
  };
}

const HOURS = [0, 3, 6, 9];

function plan(count: number): ResourcePlan<FakePoint> {
  return {
    count,
    locator: (i) => `mem://resource/${i}`,
    label: (i) => `forecast hour ${HOURS[i]}`,
    projectRow: (point, i) => ({ resource: i, n: point.n }),
  };
}

function cursor(
  sizes: number[],
  options: { batchSize?: number; rowLimit?: number; decoder?: GridDecoder<FakeHandle, FakePoint>; fetcher?: ResourceFetcher; signal?: AbortSignal } = {}
) {
  return new ScanCursor({
    plan: plan(sizes.length),
    fetcher: options.fetcher ?? fakeFetcher(sizes),
    decoder: options.decoder ?? new FakeDecoder(),
    batchSize: options.batchSize ?? 2048,
    rowLimit: options.rowLimit ?? 0,
    logger: createSilentLogger(),
    signal: options.signal,
  });
}

async function drain(scan: ScanCursor<FakeHandle, FakePoint>): Promise<Array<Record<string, unknown>>> {
  const rows: Array<Record<string, unknown>> = [];
  while (true) {
    const batch = await scan.nextBatch();
    if (batch.length === 0) return rows;
    rows.push(...batch);
  }
}

// =============================================================================
// TESTS
// =============================================================================

describe('ScanCursor', () => {
  it('should emit every row of every resource when unlimited', async () => {
    const decoder = new FakeDecoder();
    const scan = cursor([5, 5], { decoder });

    const rows = await drain(scan);

    expect(rows).toHaveLength(10);
    expect(rows.map((r) => r.resource)).toEqual([0, 0, 0, 0, 0, 1, 1, 1, 1, 1]);
    expect(scan.resourceIndex).toBe(2);
    expect(scan.finished).toBe(true);
    expect(scan.currentResourceOpen).toBe(false);
    expect(decoder.closed).toEqual([0, 1]);
    expect(scan.progress.value()).toBe(100);
  });

  it('should stop at exactly the row limit mid-resource', async () => {
    const decoder = new FakeDecoder();
    const scan = cursor([5, 5], { decoder, rowLimit: 7 });

    const rows = await drain(scan);

    expect(rows).toHaveLength(7);
    expect(rows.slice(5)).toEqual([
      { resource: 1, n: 0 },
      { resource: 1, n: 1 },
    ]);
    expect(decoder.requests).toEqual([7, 2]);
    expect(scan.resourceIndex).toBe(1);
    expect(scan.finished).toBe(true);
    expect(decoder.closed).toEqual([0, 1]);
  });

  it('should report complete progress when the row limit stops the scan', async () => {
    const scan = cursor([5, 5, 5], { rowLimit: 7 });

    await drain(scan);

    expect(scan.progress.completedResources).toBe(3);
    expect(scan.progress.value()).toBe(100);
  });

  it('should not fetch the next resource once the limit is met at a boundary', async () => {
    const fetcher = fakeFetcher([5, 5]);
    const scan = cursor([5, 5], { fetcher, rowLimit: 5 });

    expect(await drain(scan)).toHaveLength(5);
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
  });

  it('should read in batches of at most batchSize', async () => {
    const decoder = new FakeDecoder();
    const scan = cursor([5], { decoder, batchSize: 2 });

    expect((await scan.nextBatch()).length).toBe(2);
    expect((await scan.nextBatch()).length).toBe(2);
    expect((await scan.nextBatch()).length).toBe(1);
    expect(await scan.nextBatch()).toEqual([]);
    expect(decoder.requests).toEqual([2, 2, 2]);
  });

  it('should skip empty resources without returning an empty batch early', async () => {
    const scan = cursor([0, 0, 3]);

    const first = await scan.nextBatch();

    expect(first.map((r) => r.resource)).toEqual([2, 2, 2]);
    expect(scan.progress.completedResources).toBe(3);
  });

  it('should finish immediately without resources', async () => {
    const scan = cursor([]);

    expect(await scan.nextBatch()).toEqual([]);
    expect(scan.finished).toBe(true);
    expect(scan.progress.value()).toBe(-1);
  });

  it('should advance progress without ever going backwards', async () => {
    const scan = cursor([4, 4, 4], { batchSize: 2 });
    const seen: number[] = [];
    while ((await scan.nextBatch()).length > 0) {
      seen.push(scan.progress.value());
    }

    for (let i = 1; i < seen.length; i++) {
      expect(seen[i]).toBeGreaterThanOrEqual(seen[i - 1]);
    }
    expect(scan.progress.value()).toBe(100);
  });

  // ===========================================================================
  // Failures
  // ===========================================================================

  describe('failures', () => {
    it('should name the forecast hour when a fetch fails', async () => {
      const fetcher: ResourceFetcher = {
        fetch: async (locator) => {
          if (locator.endsWith('/1')) {
            throw new FetchError(FetchErrorCode.HTTP_STATUS, `HTTP 404 for ${locator}`, { status: 404, locator });
          }
          return Uint8Array.of(0, 2);
        },
      };
      const scan = cursor([2, 2], { fetcher });

      expect(await scan.nextBatch()).toHaveLength(2);
      const error = await scan.nextBatch().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (!(error instanceof FetchError)) return;
      expect(error.code).toBe(FetchErrorCode.HTTP_STATUS);
      expect(error.status).toBe(404);
      expect(error.message).toBe('Failed to fetch forecast hour 3: HTTP 404 for mem://resource/1');
      expect(error.context).toEqual({ resource: 'forecast hour 3', locator: 'mem://resource/1' });
      expect(scan.finished).toBe(true);
    });

    it('should report transport failures with status 0', async () => {
      const fetcher: ResourceFetcher = {
        fetch: async () => {
          throw new TypeError('fetch failed');
        },
      };

      const error = await cursor([1], { fetcher }).nextBatch().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (!(error instanceof FetchError)) return;
      expect(error.code).toBe(FetchErrorCode.TRANSPORT);
      expect(error.status).toBe(0);
      expect(error.message).toBe('Failed to fetch forecast hour 0: fetch failed');
    });

    it('should wrap decoder open failures', async () => {
      const decoder = new FakeDecoder();
      vi.spyOn(decoder, 'open').mockImplementation(() => {
        throw new Error('bad magic');
      });

      const error = await cursor([1], { decoder }).nextBatch().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      if (!(error instanceof DecodeError)) return;
      expect(error.code).toBe(DecodeErrorCode.OPEN_FAILED);
      expect(error.message).toBe('Failed to decode forecast hour 0: bad magic');
    });

    it('should release the resource before a read failure propagates', async () => {
      const decoder = new FakeDecoder();
      vi.spyOn(decoder, 'readBatch').mockImplementation(() => {
        throw new Error('truncated section');
      });
      const scan = cursor([3], { decoder });

      const error = await scan.nextBatch().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      if (!(error instanceof DecodeError)) return;
      expect(error.code).toBe(DecodeErrorCode.READ_FAILED);
      expect(error.message).toBe('Failed to read forecast hour 0: truncated section');
      expect(decoder.closed).toEqual([0]);
      expect(scan.currentResourceOpen).toBe(false);
      expect(await scan.nextBatch()).toEqual([]);
    });
  });

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  describe('lifecycle', () => {
    it('should release the open resource on close', async () => {
      const decoder = new FakeDecoder();
      const scan = cursor([5], { decoder, batchSize: 2 });

      await scan.nextBatch();
      expect(scan.currentResourceOpen).toBe(true);

      await scan.close();
      await scan.close();

      expect(decoder.closed).toEqual([0]);
      expect(await scan.nextBatch()).toEqual([]);
    });

    it('should stop with QueryCancelledError once aborted', async () => {
      const controller = new AbortController();
      const decoder = new FakeDecoder();
      const scan = cursor([5], { decoder, batchSize: 2, signal: controller.signal });

      await scan.nextBatch();
      controller.abort();

      await expect(scan.nextBatch()).rejects.toBeInstanceOf(QueryCancelledError);
      expect(decoder.closed).toEqual([0]);
      expect(scan.finished).toBe(true);
    });
  });
});
