/**
 * Shared TypeScript types for the scroller and the drag glue that drives it.
 */

/** The two directions a surface can travel along its scroll axis. */
export enum ScrollDirection {
  Backward = 'backward',
  Forward = 'forward',
}

/** Maps normalized time (0–1) to normalized progress (0–1). */
export type ScrollEasing = (t: number) => number;

export interface ScrollAnimation {
  durationMs: number;
  easing: ScrollEasing;
  /** Aborting must stop the animation and reject the pending promise. */
  signal?: AbortSignal;
}

/**
 * Anything that can report whether it has room to move and animate its
 * scroll offset by a signed distance.
 */
export interface ScrollableSurface {
  canScroll(direction: ScrollDirection): boolean;
  animateScrollBy(distance: number, animation: ScrollAnimation): Promise<void>;
}

/** Current speed in pixels per second. May change between calls. */
export type SpeedSource = () => number;

/** Remaining scrollable distance in the direction of travel. */
export type MaxDistanceProvider = () => number;

/** Per-tick side effect, invoked before scrollability checks. */
export type TickCallback = () => void | Promise<void>;

export interface ScrollIntent {
  readonly direction: ScrollDirection;
  readonly speedMultiplier: number;
}

/**
 * Speed configuration accepted by `useScroller`: either a plain rate, or an
 * amount of pixels to cover per duration.
 */
export type ScrollerSpeed =
  | { pixelsPerSecond: number }
  | { pixelAmount: number | (() => number); durationMs?: number };

export interface ScrollLogger {
  debug(...params: unknown[]): void;
  warn(...params: unknown[]): void;
}
