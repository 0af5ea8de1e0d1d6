/**
 * Per-tick step sizing for the scroll loop.
 *
 * A tick never animates for longer than `maxDurationMs`, so direction and
 * speed changes take effect quickly, and never for less than 1ms. The
 * distance is scaled to the clamped duration so the effective speed stays
 * at `pixelsPerMs` however much distance remains.
 */

import { MAX_SCROLL_DURATION_MS } from '@/lib/constants';
import { clamp } from '@/lib/utils';

export interface ScrollStep {
  /** Animation length for this tick. */
  durationMs: number;
  /** Unsigned distance to cover during `durationMs`. */
  distance: number;
}

export function computeScrollStep(
  maxDistance: number,
  pixelsPerMs: number,
  maxDurationMs: number = MAX_SCROLL_DURATION_MS
): ScrollStep {
  if (!(pixelsPerMs > 0)) {
    return { durationMs: maxDurationMs, distance: 0 };
  }

  const idealDurationMs = maxDistance / pixelsPerMs;
  const durationMs = clamp(Math.round(idealDurationMs), 1, maxDurationMs);

  // Unbounded remaining distance: the ratio below would be Infinity * 0
  if (!Number.isFinite(idealDurationMs)) {
    return { durationMs, distance: pixelsPerMs * durationMs };
  }

  return {
    durationMs,
    distance: maxDistance * (durationMs / idealDurationMs),
  };
}
