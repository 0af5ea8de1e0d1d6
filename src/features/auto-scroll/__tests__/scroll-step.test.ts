import { describe, it, expect } from 'vitest';
import { computeScrollStep } from '../scroll-step';

describe('computeScrollStep', () => {
  it('caps the duration at 100ms and scales the distance down', () => {
    // 10000px at 1px/ms would take 10s
    const step = computeScrollStep(10_000, 1);
    expect(step.durationMs).toBe(100);
    expect(step.distance).toBe(100);
  });

  it('covers a short distance in one step without scaling', () => {
    expect(computeScrollStep(5, 1)).toEqual({ durationMs: 5, distance: 5 });
  });

  it('never returns a duration below 1ms', () => {
    // 0.2px at 1px/ms: ideal 0.2ms, clamped up to 1ms
    const step = computeScrollStep(0.2, 1);
    expect(step.durationMs).toBe(1);
    expect(step.distance).toBeCloseTo(1, 10);
  });

  it('keeps the effective speed constant when the duration is clamped', () => {
    // 0.5px/ms over 4000px: ideal 8000ms
    const step = computeScrollStep(4000, 0.5);
    expect(step.durationMs).toBe(100);
    expect(step.distance / step.durationMs).toBeCloseTo(0.5, 10);
  });

  it('rounds the ideal duration to whole milliseconds', () => {
    // 30px at 0.4px/ms: ideal 75ms exactly
    expect(computeScrollStep(30, 0.4).durationMs).toBe(75);
    // 10px at 0.3px/ms: ideal 33.33ms, rounds to 33
    const step = computeScrollStep(10, 0.3);
    expect(step.durationMs).toBe(33);
    expect(step.distance).toBeCloseTo(9.9, 10);
  });

  it('uses the speed directly when the distance is unbounded', () => {
    expect(computeScrollStep(Number.POSITIVE_INFINITY, 2)).toEqual({
      durationMs: 100,
      distance: 200,
    });
  });

  it('returns an idle step for a non-positive speed', () => {
    expect(computeScrollStep(500, 0)).toEqual({ durationMs: 100, distance: 0 });
    expect(computeScrollStep(500, -1)).toEqual({ durationMs: 100, distance: 0 });
    expect(computeScrollStep(500, Number.NaN)).toEqual({ durationMs: 100, distance: 0 });
  });

  it('respects a custom maximum duration', () => {
    expect(computeScrollStep(1000, 1, 16)).toEqual({ durationMs: 16, distance: 16 });
  });
});
