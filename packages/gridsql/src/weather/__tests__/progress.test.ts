import { describe, it, expect } from 'vitest';
import {
  PHASE_DECODING,
  PHASE_FETCHING,
  PHASE_READY,
  PROGRESS_UNKNOWN,
  ProgressTracker,
} from '../progress.js';

describe('ProgressTracker', () => {
  it('should report unknown progress without resources', () => {
    expect(ProgressTracker.create(0).value()).toBe(PROGRESS_UNKNOWN);
  });

  it('should weight the phase by one resource share', () => {
    const tracker = ProgressTracker.create(4);
    tracker.setPhase(PHASE_READY);

    expect(tracker.value()).toBe(12.5);
  });

  it('should cap batch advances below completion', () => {
    const tracker = ProgressTracker.create(1);
    tracker.setPhase(PHASE_READY);
    for (let i = 0; i < 20; i++) tracker.advanceBatch();

    expect(tracker.phase).toBe(95);
    expect(tracker.value()).toBe(95);
  });

  it('should count a completed resource and reset the phase', () => {
    const tracker = ProgressTracker.create(3);
    tracker.setPhase(PHASE_READY);
    tracker.completeResource();

    expect(tracker.completedResources).toBe(1);
    expect(tracker.phase).toBe(0);
  });

  it('should be exactly 100 once every resource completes', () => {
    const tracker = ProgressTracker.create(3);
    for (let i = 0; i < 3; i++) tracker.completeResource();

    expect(tracker.value()).toBe(100);
  });

  it('should be exactly 100 once finished early', () => {
    const tracker = ProgressTracker.create(4);
    tracker.completeResource();
    tracker.setPhase(PHASE_READY);
    tracker.finish();

    expect(tracker.completedResources).toBe(4);
    expect(tracker.phase).toBe(0);
    expect(tracker.value()).toBe(100);
  });

  it('should never decrease across a scan', () => {
    const tracker = ProgressTracker.create(3);
    const seen: number[] = [tracker.value()];
    for (let i = 0; i < 3; i++) {
      for (const phase of [0, PHASE_FETCHING, PHASE_DECODING, PHASE_READY]) {
        tracker.setPhase(phase);
        seen.push(tracker.value());
      }
      tracker.advanceBatch();
      seen.push(tracker.value());
      tracker.completeResource();
      seen.push(tracker.value());
    }

    for (let i = 1; i < seen.length; i++) {
      expect(seen[i]).toBeGreaterThanOrEqual(seen[i - 1]);
    }
    expect(seen[seen.length - 1]).toBe(100);
  });

  it('should share counters with an attached view', () => {
    const tracker = ProgressTracker.create(2);
    const view = ProgressTracker.attach(tracker.buffer);

    tracker.completeResource();

    expect(view.totalResources).toBe(2);
    expect(view.value()).toBe(50);
  });
});
