/**
 * useScroller - a ScrollController bound to a component's lifetime.
 *
 * The controller is created once per surface and disposed on unmount (or
 * when the surface changes), so no scroll loop outlives the component that
 * started it. The latest `speed` is read through a ref on every tick, so
 * re-rendering with a new speed retunes a running loop instead of
 * restarting it. `logger` is read the same way, so an inline logger does
 * not re-create the controller.
 */

import { useEffect, useMemo, useRef } from 'react';
import { createLogger } from '@/lib/logger';
import type { ScrollableSurface, ScrollerSpeed, ScrollLogger } from '@/lib/types';
import { ScrollController } from './scroll-controller';
import { resolveSpeed } from './speed';

const defaultLogger = createLogger('scroller');

interface UseScrollerOptions {
  maxScrollDurationMs?: number;
  zeroScrollWaitMs?: number;
  logger?: ScrollLogger;
}

export function useScroller(
  surface: ScrollableSurface,
  speed: ScrollerSpeed,
  { maxScrollDurationMs, zeroScrollWaitMs, logger }: UseScrollerOptions = {}
): ScrollController {
  const speedRef = useRef(speed);
  const loggerRef = useRef(logger ?? defaultLogger);

  useEffect(() => {
    speedRef.current = speed;
    loggerRef.current = logger ?? defaultLogger;
  });

  const controller = useMemo(
    () =>
      new ScrollController({
        surface,
        pixelsPerSecond: () => resolveSpeed(speedRef.current),
        maxScrollDurationMs,
        zeroScrollWaitMs,
        logger: {
          debug: (...params) => loggerRef.current.debug(...params),
          warn: (...params) => loggerRef.current.warn(...params),
        },
      }),
    [surface, maxScrollDurationMs, zeroScrollWaitMs]
  );

  useEffect(() => {
    return () => controller.dispose();
  }, [controller]);

  return controller;
}
