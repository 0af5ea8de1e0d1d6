/**
 * Element surface - adapts a scrollable DOM element to the scroller.
 *
 * Offsets are animated with framer-motion's `animate`, writing each frame
 * straight to scrollTop/scrollLeft. The target may be a getter so the
 * surface can be created before a ref is attached.
 */

import { animate } from 'framer-motion';
import {
  ScrollDirection,
  type ScrollAnimation,
  type ScrollableSurface,
} from '@/lib/types';

export type ScrollAxis = 'vertical' | 'horizontal';

export interface ElementScrollSurface extends ScrollableSurface {
  /** Pixels left before the edge in `direction` (0 without an element). */
  remainingDistance(direction: ScrollDirection): number;
}

/** Sub-pixel offsets (zoom, DPR) can leave the end a fraction short. */
const EDGE_TOLERANCE_PX = 1;

interface AxisMetrics {
  offset: number;
  maxOffset: number;
}

function readMetrics(el: HTMLElement, axis: ScrollAxis): AxisMetrics {
  if (axis === 'vertical') {
    return {
      offset: el.scrollTop,
      maxOffset: Math.max(0, el.scrollHeight - el.clientHeight),
    };
  }
  return {
    offset: el.scrollLeft,
    maxOffset: Math.max(0, el.scrollWidth - el.clientWidth),
  };
}

function writeOffset(el: HTMLElement, axis: ScrollAxis, value: number): void {
  if (axis === 'vertical') {
    el.scrollTop = value;
  } else {
    el.scrollLeft = value;
  }
}

export function createElementScrollSurface(
  target: HTMLElement | (() => HTMLElement | null),
  axis: ScrollAxis = 'vertical'
): ElementScrollSurface {
  const resolve = typeof target === 'function' ? target : () => target;

  function remainingDistance(direction: ScrollDirection): number {
    const el = resolve();
    if (!el) return 0;
    const { offset, maxOffset } = readMetrics(el, axis);
    return direction === ScrollDirection.Forward
      ? Math.max(0, maxOffset - offset)
      : Math.max(0, offset);
  }

  return {
    remainingDistance,

    canScroll(direction) {
      return remainingDistance(direction) >= EDGE_TOLERANCE_PX;
    },

    animateScrollBy(distance, { durationMs, easing, signal }: ScrollAnimation) {
      const el = resolve();
      if (!el || distance === 0) return Promise.resolve();

      return new Promise<void>((done, fail) => {
        if (signal?.aborted) {
          fail(signal.reason);
          return;
        }

        const from = readMetrics(el, axis).offset;
        const controls = animate(from, from + distance, {
          duration: durationMs / 1000,
          ease: easing,
          onUpdate: (value) => writeOffset(el, axis, value),
        });

        const onAbort = () => {
          controls.stop();
          fail(signal?.reason);
        };
        signal?.addEventListener('abort', onAbort, { once: true });

        void controls.then(() => {
          signal?.removeEventListener('abort', onAbort);
          done();
        });
      });
    },
  };
}
