/**
 * Multi-resource scan cursor
 *
 * Walks an ordered sequence of resources (one per forecast hour, or one per
 * file) and turns them into row batches: fetch the bytes, open them with the
 * decoder, read bounded batches until the resource is drained, release it and
 * move on. Resource boundaries are invisible to the caller: a call to
 * `nextBatch()` only returns an empty array once the scan is finished.
 *
 * A positive row limit is a hard stop. Batch reads are capped so the limit is
 * never exceeded, and whatever the current resource still holds is discarded.
 */

import type { Row } from '../engine/types.js';
import {
  DecodeError,
  DecodeErrorCode,
  FetchError,
  FetchErrorCode,
  GridSQLError,
  QueryCancelledError,
  toError,
} from '../errors/index.js';
import type { FetchOptions, ResourceFetcher } from '../fetch/types.js';
import type { TableFunctionState } from '../functions/table-function.js';
import type { StructuredLogger } from '../logging/index.js';
import {
  PHASE_DECODING,
  PHASE_FETCHING,
  PHASE_READY,
  PHASE_START,
  ProgressTracker,
} from './progress.js';

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Decodes the bytes of one resource into point records
 */
export interface GridDecoder<H, P> {
  open(bytes: Uint8Array): H | Promise<H>;
  /** At most `maxRows` points; an empty batch means the resource is drained */
  readBatch(handle: H, maxRows: number): { points: P[]; hasMore: boolean } | Promise<{ points: P[]; hasMore: boolean }>;
  close(handle: H): void | Promise<void>;
}

/**
 * The ordered resources of one scan and how their points become rows
 */
export interface ResourcePlan<P> {
  readonly count: number;
  locator(index: number): string;
  /** Human readable name used in errors and logs, e.g. "forecast hour 6" */
  label(index: number): string;
  projectRow(point: P, index: number): Row;
  fetchOptions?: FetchOptions;
}

export interface ScanCursorOptions<H, P> {
  plan: ResourcePlan<P>;
  fetcher: ResourceFetcher;
  decoder: GridDecoder<H, P>;
  /** Maximum rows per decoder read */
  batchSize: number;
  /** 0 means unlimited */
  rowLimit: number;
  logger: StructuredLogger;
  signal?: AbortSignal;
}

// =============================================================================
// Cursor
// =============================================================================

export class ScanCursor<H, P> {
  readonly progress: ProgressTracker;

  private readonly plan: ResourcePlan<P>;
  private readonly fetcher: ResourceFetcher;
  private readonly decoder: GridDecoder<H, P>;
  private readonly batchSize: number;
  private readonly rowLimit: number;
  private readonly logger: StructuredLogger;
  private readonly signal: AbortSignal | undefined;

  private index = 0;
  private current: { handle: H } | null = null;
  private emitted = 0;
  private done = false;

  constructor(options: ScanCursorOptions<H, P>) {
    this.plan = options.plan;
    this.fetcher = options.fetcher;
    this.decoder = options.decoder;
    this.batchSize = Math.max(1, options.batchSize);
    this.rowLimit = options.rowLimit;
    this.logger = options.logger;
    this.signal = options.signal;
    this.progress = ProgressTracker.create(options.plan.count);
  }

  /** Position in the resource sequence */
  get resourceIndex(): number {
    return this.index;
  }

  get currentResourceOpen(): boolean {
    return this.current !== null;
  }

  get rowsEmitted(): number {
    return this.emitted;
  }

  get finished(): boolean {
    return this.done;
  }

  /**
   * Next batch of rows; empty only once the scan is finished
   */
  async nextBatch(): Promise<Row[]> {
    while (!this.done) {
      if (this.limitReached()) {
        await this.finish();
        break;
      }
      if (this.index >= this.plan.count) {
        this.done = true;
        break;
      }
      await this.checkCancelled();

      const current = this.current ?? (await this.openResource());
      const batch = await this.readBatch(current.handle);

      if (batch.points.length === 0) {
        await this.completeResource();
        continue;
      }

      const index = this.index;
      const rows = batch.points.map((point) => this.plan.projectRow(point, index));
      this.emitted += rows.length;
      this.progress.advanceBatch();

      if (!batch.hasMore) {
        await this.completeResource();
      } else if (this.limitReached()) {
        await this.finish();
      }
      return rows;
    }
    return [];
  }

  /**
   * Release the open resource, if any. Safe to call more than once.
   */
  async close(): Promise<void> {
    this.done = true;
    await this.releaseResource();
  }

  // ===========================================================================
  // Resource lifecycle
  // ===========================================================================

  private async openResource(): Promise<{ handle: H }> {
    const label = this.plan.label(this.index);
    const locator = this.plan.locator(this.index);
    this.logger.debug('Opening {resource}', { resource: label, locator });

    this.progress.setPhase(PHASE_START);
    this.progress.setPhase(PHASE_FETCHING);
    let bytes: Uint8Array;
    try {
      bytes = await this.fetcher.fetch(locator, this.plan.fetchOptions);
    } catch (error) {
      throw this.fail(fetchFailure(error, label, locator));
    }

    this.progress.setPhase(PHASE_DECODING);
    let handle: H;
    try {
      handle = await this.decoder.open(bytes);
    } catch (error) {
      throw this.fail(
        new DecodeError(DecodeErrorCode.OPEN_FAILED, `Failed to decode ${label}: ${toError(error).message}`, {
          cause: error,
          context: { resource: label, locator },
        })
      );
    }

    this.progress.setPhase(PHASE_READY);
    this.current = { handle };
    return this.current;
  }

  private async readBatch(handle: H): Promise<{ points: P[]; hasMore: boolean }> {
    const remaining = this.rowLimit > 0 ? this.rowLimit - this.emitted : this.batchSize;
    try {
      return await this.decoder.readBatch(handle, Math.min(this.batchSize, remaining));
    } catch (error) {
      const label = this.plan.label(this.index);
      const failure = new DecodeError(
        DecodeErrorCode.READ_FAILED,
        `Failed to read ${label}: ${toError(error).message}`,
        { cause: error, context: { resource: label, locator: this.plan.locator(this.index) } }
      );
      await this.releaseQuietly();
      throw this.fail(failure);
    }
  }

  private async completeResource(): Promise<void> {
    await this.releaseResource();
    this.progress.completeResource();
    this.index++;
  }

  private async finish(): Promise<void> {
    this.done = true;
    await this.releaseResource();
    this.progress.finish();
  }

  private async releaseResource(): Promise<void> {
    const current = this.current;
    if (current === null) return;
    this.current = null;
    await this.decoder.close(current.handle);
    this.logger.debug('Released {resource}', { resource: this.plan.label(this.index) });
  }

  /**
   * Release on a failure path; the original error wins over a close failure
   */
  private async releaseQuietly(): Promise<void> {
    try {
      await this.releaseResource();
    } catch (error) {
      this.logger.warn('Failed to release {resource}', {
        resource: this.plan.label(this.index),
        reason: toError(error).message,
      });
    }
  }

  private fail(error: GridSQLError): GridSQLError {
    this.done = true;
    this.logger.error('Scan failed on {resource}', error, { resource: this.plan.label(this.index) });
    return error;
  }

  private limitReached(): boolean {
    return this.rowLimit > 0 && this.emitted >= this.rowLimit;
  }

  private async checkCancelled(): Promise<void> {
    if (this.signal?.aborted) {
      await this.finish();
      throw new QueryCancelledError();
    }
  }
}

function fetchFailure(error: unknown, label: string, locator: string): FetchError {
  const status = error instanceof FetchError ? error.status : 0;
  const code = error instanceof FetchError ? error.code : FetchErrorCode.TRANSPORT;
  return new FetchError(
    code,
    `Failed to fetch ${label}: ${toError(error).message}`,
    { status, locator },
    { cause: error, context: { resource: label, locator } }
  );
}

/**
 * Table function state wrapping a cursor
 */
export class CursorScanState<H, P> implements TableFunctionState {
  constructor(readonly cursor: ScanCursor<H, P>) {}

  close(): Promise<void> {
    return this.cursor.close();
  }
}
