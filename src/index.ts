/**
 * Public entry point.
 */

export * from './features/auto-scroll';
export { useDragAndDrop, findDropIndex } from './features/drag-drop/useDragAndDrop';
export type { DragTouchEvent } from './features/drag-drop/useDragAndDrop';
export { useDragStore } from './stores/drag-store';
export { ScrollDirection } from './lib/types';
export type {
  MaxDistanceProvider,
  ScrollAnimation,
  ScrollableSurface,
  ScrollEasing,
  ScrollerSpeed,
  ScrollIntent,
  ScrollLogger,
  SpeedSource,
  TickCallback,
} from './lib/types';
export { createLogger, getLogLevel, setLogLevel, LOG_LEVEL_KEY } from './lib/logger';
export type { LevelOption, LogLevel, ScopedLogger } from './lib/logger';
