/**
 * Edge zones for drag auto-scroll.
 *
 * When the pointer is dragged near the start or end edge of the scroll
 * container, an intent is produced for the scroller: which way to go and
 * how fast relative to the base speed.
 *
 * - Proportional trigger zones (10% of container, 40–80px)
 * - The start zone extends past the container edge (into a header or safe area)
 * - Speed proportional to depth into the trigger zone, in 0.1 steps
 */

import {
  DRAG_EDGE_ZONE_MAX_PX,
  DRAG_EDGE_ZONE_PX,
  DRAG_EDGE_ZONE_RATIO,
  DRAG_SPEED_MULTIPLIER_STEP,
} from '@/lib/constants';
import { ScrollDirection, type ScrollIntent } from '@/lib/types';
import { clamp, roundUpToStep } from '@/lib/utils';

/**
 * Effective trigger zone size for a container.
 *
 * Short containers (heavy browser chrome on mobile) would otherwise be
 * dominated by fixed-size zones, so the zone scales with the container and
 * is clamped between the fixed minimum and a cap.
 */
export function effectiveEdgeZone(containerSize: number): number {
  return clamp(
    containerSize * DRAG_EDGE_ZONE_RATIO,
    DRAG_EDGE_ZONE_PX,
    DRAG_EDGE_ZONE_MAX_PX
  );
}

/**
 * Work out the scroll intent for a pointer coordinate along the scroll axis.
 *
 * Start zone: within `edgeZone` px of the container start, or beyond it.
 * Dragging past the start edge gives full speed: the user clearly wants to
 * go back and shouldn't have to hunt for a narrow band.
 *
 * End zone: within `edgeZone` px of the container end. Positions past the
 * end are ignored (a tab bar usually sits there).
 *
 * @returns null when the pointer is outside both zones
 */
export function edgeScrollIntent(
  pointer: number,
  containerStart: number,
  containerEnd: number
): ScrollIntent | null {
  const edgeZone = effectiveEdgeZone(containerEnd - containerStart);

  const distFromStart = pointer - containerStart;
  const distFromEnd = containerEnd - pointer;

  if (distFromStart < edgeZone) {
    const ratio = Math.min(1, 1 - distFromStart / edgeZone);
    return {
      direction: ScrollDirection.Backward,
      speedMultiplier: roundUpToStep(ratio, DRAG_SPEED_MULTIPLIER_STEP),
    };
  }

  if (distFromEnd < edgeZone && distFromEnd >= 0) {
    const ratio = 1 - distFromEnd / edgeZone;
    return {
      direction: ScrollDirection.Forward,
      speedMultiplier: roundUpToStep(ratio, DRAG_SPEED_MULTIPLIER_STEP),
    };
  }

  return null;
}
