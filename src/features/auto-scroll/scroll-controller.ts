/**
 * ScrollController - drives continuous, direction-aware scrolling of a
 * surface, e.g. while a dragged item hovers near the edge of a list.
 *
 * One intent (direction + speed multiplier) and at most one loop exist at
 * a time. Re-starting with the same intent is a no-op, so callers can call
 * `start` on every pointer move. A different intent aborts the running loop
 * before anything else happens.
 *
 * Each tick:
 * 1. runs the caller's `onTick`
 * 2. ends the loop if the surface can no longer move that way
 * 3. waits `zeroScrollWaitMs` if no distance remains (the intent is kept)
 * 4. otherwise animates one bounded step (see `computeScrollStep`); a step
 *    with no distance (zero speed) is waited out on a timer instead
 *
 * Failures inside a tick end the loop and are logged, never thrown: from the
 * caller's side a failed loop looks like a stopped one.
 */

import { MAX_SCROLL_DURATION_MS, ZERO_SCROLL_WAIT_MS } from '@/lib/constants';
import { createLogger } from '@/lib/logger';
import type {
  MaxDistanceProvider,
  ScrollableSurface,
  ScrollDirection,
  ScrollEasing,
  ScrollIntent,
  ScrollLogger,
  SpeedSource,
  TickCallback,
} from '@/lib/types';
import { abortableDelay } from '@/lib/utils';
import { directionSign } from './direction';
import { ScrollerConfigError } from './errors';
import { computeScrollStep } from './scroll-step';

export const linearEasing: ScrollEasing = (t) => t;

export interface ScrollControllerOptions {
  surface: ScrollableSurface;
  /** Read on every tick; changes apply without restarting the loop. */
  pixelsPerSecond: SpeedSource;
  maxScrollDurationMs?: number;
  zeroScrollWaitMs?: number;
  easing?: ScrollEasing;
  logger?: ScrollLogger;
}

interface RunningLoop {
  intent: ScrollIntent;
  abortController: AbortController;
  finished: Promise<void>;
}

const noop = () => {};
const unbounded: MaxDistanceProvider = () => Number.POSITIVE_INFINITY;

function sameIntent(a: ScrollIntent | null, b: ScrollIntent): boolean {
  return (
    a !== null &&
    a.direction === b.direction &&
    a.speedMultiplier === b.speedMultiplier
  );
}

export class ScrollController {
  private readonly surface: ScrollableSurface;
  private readonly pixelsPerSecond: SpeedSource;
  private readonly maxScrollDurationMs: number;
  private readonly zeroScrollWaitMs: number;
  private readonly easing: ScrollEasing;
  private readonly log: ScrollLogger;

  private currentIntent: ScrollIntent | null = null;
  private currentLoop: RunningLoop | null = null;

  constructor({
    surface,
    pixelsPerSecond,
    maxScrollDurationMs = MAX_SCROLL_DURATION_MS,
    zeroScrollWaitMs = ZERO_SCROLL_WAIT_MS,
    easing = linearEasing,
    logger = createLogger('scroller'),
  }: ScrollControllerOptions) {
    if (!Number.isFinite(maxScrollDurationMs) || maxScrollDurationMs < 1) {
      throw new ScrollerConfigError(
        'maxScrollDurationMs',
        'must be a finite number of at least 1'
      );
    }
    if (!Number.isFinite(zeroScrollWaitMs) || zeroScrollWaitMs < 0) {
      throw new ScrollerConfigError(
        'zeroScrollWaitMs',
        'must be a finite, non-negative number'
      );
    }

    this.surface = surface;
    this.pixelsPerSecond = pixelsPerSecond;
    this.maxScrollDurationMs = maxScrollDurationMs;
    this.zeroScrollWaitMs = zeroScrollWaitMs;
    this.easing = easing;
    this.log = logger;
  }

  get isScrolling(): boolean {
    return this.currentIntent !== null;
  }

  get intent(): ScrollIntent | null {
    return this.currentIntent;
  }

  /** Resolves once the current loop (if any) has exited. */
  get settled(): Promise<void> {
    return this.currentLoop?.finished ?? Promise.resolve();
  }

  start(
    direction: ScrollDirection,
    speedMultiplier = 1,
    maxDistanceProvider: MaxDistanceProvider = unbounded,
    onTick: TickCallback = noop
  ): void {
    const intent: ScrollIntent = { direction, speedMultiplier };
    if (sameIntent(this.currentIntent, intent)) return;

    this.cancelLoop();

    if (!this.surface.canScroll(direction)) {
      this.log.debug('not starting, surface cannot scroll', direction);
      return;
    }

    const loop: RunningLoop = {
      intent,
      abortController: new AbortController(),
      finished: Promise.resolve(),
    };
    this.currentIntent = intent;
    this.currentLoop = loop;
    this.log.debug('starting', direction, 'x' + speedMultiplier);

    loop.finished = this.runLoop(loop, maxDistanceProvider, onTick);
  }

  stop(): void {
    this.cancelLoop();
  }

  /** Stop for good; called by owners that are being torn down. */
  dispose(): void {
    this.cancelLoop();
  }

  private cancelLoop(): void {
    this.currentLoop?.abortController.abort();
    this.currentLoop = null;
    this.currentIntent = null;
  }

  /** Clear state for a loop that ended on its own, unless superseded. */
  private release(loop: RunningLoop): void {
    if (this.currentLoop !== loop) return;
    this.currentLoop = null;
    this.currentIntent = null;
  }

  private async runLoop(
    loop: RunningLoop,
    maxDistanceProvider: MaxDistanceProvider,
    onTick: TickCallback
  ): Promise<void> {
    const { direction, speedMultiplier } = loop.intent;
    const { signal } = loop.abortController;

    try {
      while (!signal.aborted) {
        await onTick();
        if (signal.aborted) break;

        if (!this.surface.canScroll(direction)) {
          this.log.debug('reached the end', direction);
          break;
        }

        const maxDistance = maxDistanceProvider();
        if (!(maxDistance > 0)) {
          this.log.debug('no distance left, waiting', this.zeroScrollWaitMs);
          await abortableDelay(this.zeroScrollWaitMs, signal);
          continue;
        }

        const pixelsPerMs = (this.pixelsPerSecond() * speedMultiplier) / 1000;
        const step = computeScrollStep(
          maxDistance,
          pixelsPerMs,
          this.maxScrollDurationMs
        );

        // Zero or invalid speed: idle for the step instead of animating nothing
        if (step.distance === 0) {
          await abortableDelay(step.durationMs, signal);
          continue;
        }

        await this.surface.animateScrollBy(step.distance * directionSign(direction), {
          durationMs: step.durationMs,
          easing: this.easing,
          signal,
        });
      }
    } catch (error) {
      // Aborted loops reject out of the pending animation or wait
      if (!signal.aborted) {
        this.log.warn('scroll loop failed', error);
      }
    } finally {
      this.release(loop);
    }
  }
}
