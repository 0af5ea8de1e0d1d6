/**
 * Auto-scroll feature - barrel export.
 *
 * The scroll controller, its step sizing and speed helpers, the DOM surface
 * adapter, edge-zone detection and the React hook.
 */

export { ScrollController, linearEasing } from './scroll-controller';
export type { ScrollControllerOptions } from './scroll-controller';
export { computeScrollStep } from './scroll-step';
export type { ScrollStep } from './scroll-step';
export { directionSign, oppositeDirection } from './direction';
export { ScrollerConfigError } from './errors';
export { fixedSpeed, speedFromPixelAmount, resolveSpeed } from './speed';
export { createElementScrollSurface } from './element-surface';
export type { ElementScrollSurface, ScrollAxis } from './element-surface';
export { effectiveEdgeZone, edgeScrollIntent } from './edge-zone';
export { useScroller } from './useScroller';
