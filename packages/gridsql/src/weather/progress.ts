/**
 * Scan progress counters
 *
 * Three independent 32-bit counters in a SharedArrayBuffer: total resources,
 * completed resources and the phase (0-100) of the current one. The scan
 * writes them; any thread holding the buffer may read them at any time
 * without locking.
 *
 * Reads are not a consistent snapshot. `completeResource()` sets the phase to
 * 100, increments `completed` and then resets the phase to 0, so a reader
 * between the last two steps sees one resource counted twice. The value
 * overshoots by at most one resource's share and settles on the next read.
 */

const TOTAL = 0;
const COMPLETED = 1;
const PHASE = 2;

export const PHASE_START = 0;
export const PHASE_FETCHING = 10;
export const PHASE_DECODING = 40;
export const PHASE_READY = 50;
export const PHASE_BATCH_STEP = 5;
export const PHASE_BATCH_CEILING = 95;
export const PHASE_DONE = 100;

/** Reported when the resource count is zero */
export const PROGRESS_UNKNOWN = -1;

export class ProgressTracker {
  private readonly counters: Int32Array;

  private constructor(readonly buffer: SharedArrayBuffer) {
    this.counters = new Int32Array(buffer);
  }

  static create(totalResources: number): ProgressTracker {
    const tracker = new ProgressTracker(new SharedArrayBuffer(3 * Int32Array.BYTES_PER_ELEMENT));
    Atomics.store(tracker.counters, TOTAL, totalResources);
    return tracker;
  }

  /**
   * Read-only view over counters owned by another tracker, e.g. in a worker
   */
  static attach(buffer: SharedArrayBuffer): ProgressTracker {
    return new ProgressTracker(buffer);
  }

  get totalResources(): number {
    return Atomics.load(this.counters, TOTAL);
  }

  get completedResources(): number {
    return Atomics.load(this.counters, COMPLETED);
  }

  get phase(): number {
    return Atomics.load(this.counters, PHASE);
  }

  setPhase(phase: number): void {
    Atomics.store(this.counters, PHASE, phase);
  }

  /**
   * Advance the phase by one batch step, capped below completion
   */
  advanceBatch(): void {
    const next = Math.min(this.phase + PHASE_BATCH_STEP, PHASE_BATCH_CEILING);
    Atomics.store(this.counters, PHASE, next);
  }

  completeResource(): void {
    Atomics.store(this.counters, PHASE, PHASE_DONE);
    Atomics.add(this.counters, COMPLETED, 1);
    Atomics.store(this.counters, PHASE, PHASE_START);
  }

  /**
   * Count every resource as done, for a scan a row limit stops early
   */
  finish(): void {
    Atomics.store(this.counters, COMPLETED, this.totalResources);
    Atomics.store(this.counters, PHASE, PHASE_START);
  }

  /**
   * Percentage in [0, 100], or PROGRESS_UNKNOWN
   */
  value(): number {
    const total = this.totalResources;
    if (total === 0) return PROGRESS_UNKNOWN;
    // completed × (100 / total) + (phase / 100) × (100 / total), exact at completion
    return (this.completedResources * 100 + this.phase) / total;
  }
}
