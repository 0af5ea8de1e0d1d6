/**
 * Scroller and drag constants.
 */

/** Upper bound on a single animated scroll step (ms) */
export const MAX_SCROLL_DURATION_MS = 100;

/** Wait before re-checking when no scrollable distance remains (ms) */
export const ZERO_SCROLL_WAIT_MS = 100;

/** Default period for pixel-amount speed configuration (ms) */
export const DEFAULT_SCROLL_DURATION_MS = 100;

/** Long-press duration for drag activation */
export const DRAG_LONG_PRESS_MS = 480;

/** Movement (px) during the long press that cancels it */
export const DRAG_MOVE_CANCEL_PX = 10;

/** Auto-scroll trigger zone bounds in px */
export const DRAG_EDGE_ZONE_PX = 40;
export const DRAG_EDGE_ZONE_MAX_PX = 80;

/** Trigger zone as a share of the container size */
export const DRAG_EDGE_ZONE_RATIO = 0.1;

/** Max auto-scroll speed (12px/frame at 60fps) */
export const DRAG_SCROLL_SPEED_PX_PER_SECOND = 720;

/** Edge speed multipliers are rounded up to this step */
export const DRAG_SPEED_MULTIPLIER_STEP = 0.1;

/** Haptic vibration duration for drag start */
export const HAPTIC_DURATION_MS = 50;
