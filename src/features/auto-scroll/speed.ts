/**
 * Speed sources for the scroller.
 *
 * The controller only understands pixels per second. These helpers cover
 * the other ways callers think about speed: a fixed rate, or "N pixels every
 * D milliseconds" where N may itself change over time.
 */

import { DEFAULT_SCROLL_DURATION_MS } from '@/lib/constants';
import type { ScrollerSpeed, SpeedSource } from '@/lib/types';
import { ScrollerConfigError } from './errors';

export function fixedSpeed(pixelsPerSecond: number): SpeedSource {
  return () => pixelsPerSecond;
}

export function speedFromPixelAmount(
  pixelAmount: number | (() => number),
  durationMs: number = DEFAULT_SCROLL_DURATION_MS
): SpeedSource {
  if (!(durationMs > 0)) {
    throw new ScrollerConfigError('durationMs', 'must be a positive number');
  }
  const amount = typeof pixelAmount === 'function' ? pixelAmount : () => pixelAmount;
  return () => amount() / (durationMs / 1000);
}

/**
 * Evaluate a `ScrollerSpeed` config to pixels per second.
 */
export function resolveSpeed(speed: ScrollerSpeed): number {
  if ('pixelsPerSecond' in speed) return speed.pixelsPerSecond;
  return speedFromPixelAmount(speed.pixelAmount, speed.durationMs)();
}
