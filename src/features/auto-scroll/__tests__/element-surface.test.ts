import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createElementScrollSurface } from '../element-surface';
import { linearEasing } from '../scroll-controller';
import { ScrollDirection } from '@/lib/types';

const { animateMock } = vi.hoisted(() => ({ animateMock: vi.fn() }));

vi.mock('framer-motion', () => ({
  animate: animateMock,
}));

interface AnimateOptions {
  onUpdate: (value: number) => void;
}

/** framer-motion stand-in that jumps to the target and completes. */
function completeImmediately() {
  animateMock.mockImplementation(
    (_from: number, to: number, options: AnimateOptions) => {
      options.onUpdate(to);
      return {
        stop: vi.fn(),
        then: (onResolve: () => void) => Promise.resolve().then(onResolve),
      };
    }
  );
}

/** framer-motion stand-in that never completes on its own. */
function neverComplete() {
  const stop = vi.fn();
  animateMock.mockImplementation(() => ({
    stop,
    then: () => new Promise<void>(() => {}),
  }));
  return stop;
}

function scrollableDiv({
  scrollTop = 0,
  scrollLeft = 0,
  scrollHeight = 1000,
  clientHeight = 400,
  scrollWidth = 300,
  clientWidth = 300,
} = {}): HTMLElement {
  const el = document.createElement('div');
  Object.defineProperties(el, {
    scrollHeight: { value: scrollHeight, configurable: true },
    clientHeight: { value: clientHeight, configurable: true },
    scrollWidth: { value: scrollWidth, configurable: true },
    clientWidth: { value: clientWidth, configurable: true },
    scrollTop: { value: scrollTop, writable: true, configurable: true },
    scrollLeft: { value: scrollLeft, writable: true, configurable: true },
  });
  return el;
}

describe('createElementScrollSurface', () => {
  beforeEach(() => {
    animateMock.mockReset();
  });

  describe('canScroll / remainingDistance', () => {
    it('can only scroll forward from the top', () => {
      const surface = createElementScrollSurface(scrollableDiv());

      expect(surface.canScroll(ScrollDirection.Forward)).toBe(true);
      expect(surface.canScroll(ScrollDirection.Backward)).toBe(false);
      expect(surface.remainingDistance(ScrollDirection.Forward)).toBe(600);
      expect(surface.remainingDistance(ScrollDirection.Backward)).toBe(0);
    });

    it('can only scroll backward from the bottom', () => {
      const surface = createElementScrollSurface(scrollableDiv({ scrollTop: 600 }));

      expect(surface.canScroll(ScrollDirection.Forward)).toBe(false);
      expect(surface.canScroll(ScrollDirection.Backward)).toBe(true);
      expect(surface.remainingDistance(ScrollDirection.Backward)).toBe(600);
    });

    it('treats less than a pixel of room as the end', () => {
      const surface = createElementScrollSurface(scrollableDiv({ scrollTop: 599.5 }));

      expect(surface.remainingDistance(ScrollDirection.Forward)).toBe(0.5);
      expect(surface.canScroll(ScrollDirection.Forward)).toBe(false);
    });

    it('measures the horizontal axis when asked to', () => {
      const el = scrollableDiv({ scrollLeft: 50, scrollWidth: 900, clientWidth: 300 });
      const surface = createElementScrollSurface(el, 'horizontal');

      expect(surface.remainingDistance(ScrollDirection.Forward)).toBe(550);
      expect(surface.remainingDistance(ScrollDirection.Backward)).toBe(50);
    });

    it('cannot scroll without an element', () => {
      const surface = createElementScrollSurface(() => null);

      expect(surface.canScroll(ScrollDirection.Forward)).toBe(false);
      expect(surface.canScroll(ScrollDirection.Backward)).toBe(false);
      expect(surface.remainingDistance(ScrollDirection.Forward)).toBe(0);
    });

    it('resolves the element lazily through a getter', () => {
      let el: HTMLElement | null = null;
      const surface = createElementScrollSurface(() => el);

      expect(surface.canScroll(ScrollDirection.Forward)).toBe(false);
      el = scrollableDiv();
      expect(surface.canScroll(ScrollDirection.Forward)).toBe(true);
    });
  });

  describe('animateScrollBy', () => {
    it('animates from the current offset by the signed distance', async () => {
      completeImmediately();
      const el = scrollableDiv({ scrollTop: 100 });
      const surface = createElementScrollSurface(el);

      await surface.animateScrollBy(-40, { durationMs: 80, easing: linearEasing });

      expect(animateMock).toHaveBeenCalledWith(
        100,
        60,
        expect.objectContaining({ duration: 0.08, ease: linearEasing })
      );
      expect(el.scrollTop).toBe(60);
    });

    it('writes horizontal offsets to scrollLeft', async () => {
      completeImmediately();
      const el = scrollableDiv({ scrollWidth: 900 });
      const surface = createElementScrollSurface(el, 'horizontal');

      await surface.animateScrollBy(25, { durationMs: 100, easing: linearEasing });

      expect(el.scrollLeft).toBe(25);
      expect(el.scrollTop).toBe(0);
    });

    it('stops the animation and rejects when aborted', async () => {
      const stop = neverComplete();
      const surface = createElementScrollSurface(scrollableDiv());
      const controller = new AbortController();
      const reason = new Error('superseded');

      const pending = surface.animateScrollBy(100, {
        durationMs: 100,
        easing: linearEasing,
        signal: controller.signal,
      });
      controller.abort(reason);

      await expect(pending).rejects.toBe(reason);
      expect(stop).toHaveBeenCalledTimes(1);
    });

    it('rejects without animating when the signal is already aborted', async () => {
      const surface = createElementScrollSurface(scrollableDiv());
      const controller = new AbortController();
      const reason = new Error('too late');
      controller.abort(reason);

      await expect(
        surface.animateScrollBy(100, {
          durationMs: 100,
          easing: linearEasing,
          signal: controller.signal,
        })
      ).rejects.toBe(reason);
      expect(animateMock).not.toHaveBeenCalled();
    });

    it('resolves at once for a zero distance or a missing element', async () => {
      const animation = { durationMs: 100, easing: linearEasing };

      await createElementScrollSurface(scrollableDiv()).animateScrollBy(0, animation);
      await createElementScrollSurface(() => null).animateScrollBy(50, animation);

      expect(animateMock).not.toHaveBeenCalled();
    });
  });
});
