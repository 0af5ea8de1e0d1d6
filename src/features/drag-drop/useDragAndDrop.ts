/**
 * useDragAndDrop - touch drag-to-reorder with edge auto-scroll.
 *
 * - Long press (480ms) activates; moving more than 10px first cancels it
 * - Ghost follows the finger, anchored where the card was grabbed
 * - Live reordering: the drop slot moves one neighbor at a time
 * - Near the container edges a ScrollController scrolls the list; every
 *   scroll tick re-evaluates the drop slot, since the cards move under a
 *   finger that is holding still
 * - Page scroll is locked while dragging
 */

import { useCallback, useEffect, useMemo, useRef, type RefObject } from 'react';
import { useDragStore } from '@/stores/drag-store';
import { createElementScrollSurface } from '@/features/auto-scroll/element-surface';
import { edgeScrollIntent } from '@/features/auto-scroll/edge-zone';
import { useScroller } from '@/features/auto-scroll/useScroller';
import {
  DRAG_LONG_PRESS_MS,
  DRAG_MOVE_CANCEL_PX,
  DRAG_SCROLL_SPEED_PX_PER_SECOND,
  HAPTIC_DURATION_MS,
} from '@/lib/constants';
import type { ScrollerSpeed } from '@/lib/types';
import { moveItem } from '@/lib/utils';

const DEFAULT_SPEED: ScrollerSpeed = {
  pixelsPerSecond: DRAG_SCROLL_SPEED_PX_PER_SECOND,
};

/** The parts of a touch event the hook reads; React's TouchEvent fits. */
export interface DragTouchEvent {
  touches: ArrayLike<{ clientX: number; clientY: number }>;
  cancelable?: boolean;
  preventDefault?: () => void;
}

interface UseDragAndDropOptions {
  /** Ordered item ids. */
  itemIds: string[];
  /** Called with the new order after a drop that changed it. */
  onReorder: (newOrder: string[]) => void;
  enabled?: boolean;
  /** The scrolling list container; auto-scroll drives this element. */
  scrollContainerRef: RefObject<HTMLElement | null>;
  /** Auto-scroll speed at full depth into an edge zone. */
  scrollSpeed?: ScrollerSpeed;
}

interface DragHandlers {
  onTouchStart: (index: number, e: DragTouchEvent) => void;
  onTouchMove: (e: DragTouchEvent) => void;
  onTouchEnd: () => void;
}

interface Point {
  x: number;
  y: number;
}

/**
 * Next drop slot for the ghost center, checking only the neighbors of the
 * current slot. After a swap the moved card is a full card away from the
 * ghost center, so it cannot immediately swap back.
 */
export function findDropIndex(
  ghostCenterY: number,
  cardElements: readonly (HTMLElement | null | undefined)[],
  currentDropIndex: number
): number {
  const next = cardElements[currentDropIndex + 1];
  if (next) {
    const rect = next.getBoundingClientRect();
    if (ghostCenterY > rect.top + rect.height / 2) return currentDropIndex + 1;
  }

  const prev = currentDropIndex > 0 ? cardElements[currentDropIndex - 1] : null;
  if (prev) {
    const rect = prev.getBoundingClientRect();
    if (ghostCenterY < rect.top + rect.height / 2) return currentDropIndex - 1;
  }

  return currentDropIndex;
}

export function useDragAndDrop({
  itemIds,
  onReorder,
  enabled = true,
  scrollContainerRef,
  scrollSpeed = DEFAULT_SPEED,
}: UseDragAndDropOptions): {
  handlers: DragHandlers;
  registerCard: (index: number, el: HTMLElement | null) => void;
} {
  const longPressTimer = useRef<ReturnType<typeof setTimeout> | null>(null);
  const touchStart = useRef<Point | null>(null);
  const lastTouch = useRef<Point | null>(null);
  const grabOffset = useRef<Point>({ x: 0, y: 0 });
  const dragCardHeight = useRef(0);
  const cardRefs = useRef<(HTMLElement | null)[]>([]);
  const dragOrigin = useRef<{ index: number; order: string[] } | null>(null);
  const nativePreventScroll = useRef<((e: TouchEvent) => void) | null>(null);

  const startDrag = useDragStore((s) => s.startDrag);
  const moveGhost = useDragStore((s) => s.moveGhost);
  const updateDrop = useDragStore((s) => s.updateDrop);
  const setActiveEdge = useDragStore((s) => s.setActiveEdge);
  const endDragAction = useDragStore((s) => s.endDrag);

  const surface = useMemo(
    () => createElementScrollSurface(() => scrollContainerRef.current),
    [scrollContainerRef]
  );
  const scroller = useScroller(surface, scrollSpeed);

  const registerCard = useCallback((index: number, el: HTMLElement | null) => {
    cardRefs.current[index] = el;
  }, []);

  const releaseScrollLock = useCallback(() => {
    if (nativePreventScroll.current) {
      document.removeEventListener('touchmove', nativePreventScroll.current);
      nativePreventScroll.current = null;
    }
    if (scrollContainerRef.current) {
      scrollContainerRef.current.style.touchAction = '';
    }
    document.body.style.overflow = '';
  }, [scrollContainerRef]);

  useEffect(() => {
    return () => {
      if (longPressTimer.current) clearTimeout(longPressTimer.current);
      releaseScrollLock();
    };
  }, [releaseScrollLock]);

  const cancelLongPress = useCallback(() => {
    if (longPressTimer.current) {
      clearTimeout(longPressTimer.current);
      longPressTimer.current = null;
    }
  }, []);

  /** Move the drop slot to follow the last known finger position. */
  const reevaluateDrop = useCallback(() => {
    const origin = dragOrigin.current;
    const touch = lastTouch.current;
    const { dropIndex, isDragging } = useDragStore.getState();
    if (!isDragging || !origin || !touch || dropIndex === null) return;

    const ghostCenterY = touch.y - grabOffset.current.y + dragCardHeight.current / 2;
    const newDropIndex = findDropIndex(ghostCenterY, cardRefs.current, dropIndex);
    if (newDropIndex !== dropIndex) {
      updateDrop(newDropIndex, moveItem(origin.order, origin.index, newDropIndex));
    }
  }, [updateDrop]);

  const updateAutoScroll = useCallback(
    (clientY: number) => {
      const container = scrollContainerRef.current;
      if (!container) return;

      const rect = container.getBoundingClientRect();
      const intent = edgeScrollIntent(clientY, rect.top, rect.bottom);
      if (!intent) {
        scroller.stop();
        setActiveEdge(null);
        return;
      }

      const { direction, speedMultiplier } = intent;
      scroller.start(
        direction,
        speedMultiplier,
        () => surface.remainingDistance(direction),
        reevaluateDrop
      );
      setActiveEdge(scroller.isScrolling ? direction : null);
    },
    [scrollContainerRef, scroller, surface, reevaluateDrop, setActiveEdge]
  );

  const activateDrag = useCallback(
    (index: number, touch: Point) => {
      const cardEl = cardRefs.current[index];
      if (!cardEl) return;

      const rect = cardEl.getBoundingClientRect();
      dragCardHeight.current = rect.height;
      grabOffset.current = { x: touch.x - rect.left, y: touch.y - rect.top };
      dragOrigin.current = { index, order: [...itemIds] };
      lastTouch.current = touch;

      // A native non-passive listener is the only reliable way to call
      // preventDefault on touchmove; React may register it as passive.
      const preventScroll = (e: TouchEvent) => {
        if (e.cancelable) e.preventDefault();
      };
      nativePreventScroll.current = preventScroll;
      document.addEventListener('touchmove', preventScroll, { passive: false });

      // touchAction only: overflow on the container breaks iOS momentum
      // scrolling after the drag.
      if (scrollContainerRef.current) {
        scrollContainerRef.current.style.touchAction = 'none';
      }
      document.body.style.overflow = 'hidden';

      if (typeof navigator.vibrate === 'function') {
        navigator.vibrate(HAPTIC_DURATION_MS);
      }

      startDrag({
        index,
        ghost: { x: rect.left, y: rect.top, width: rect.width },
        orderedIds: [...itemIds],
      });
    },
    [itemIds, startDrag, scrollContainerRef]
  );

  const onTouchStart = useCallback(
    (index: number, e: DragTouchEvent) => {
      if (!enabled) return;

      const touch = e.touches[0];
      if (!touch) return;

      const point = { x: touch.clientX, y: touch.clientY };
      touchStart.current = point;

      cancelLongPress();
      longPressTimer.current = setTimeout(() => {
        longPressTimer.current = null;
        activateDrag(index, point);
      }, DRAG_LONG_PRESS_MS);
    },
    [enabled, activateDrag, cancelLongPress]
  );

  const onTouchMove = useCallback(
    (e: DragTouchEvent) => {
      const touch = e.touches[0];
      if (!touch) return;

      if (!useDragStore.getState().isDragging) {
        const start = touchStart.current;
        if (
          start &&
          Math.hypot(touch.clientX - start.x, touch.clientY - start.y) >
            DRAG_MOVE_CANCEL_PX
        ) {
          cancelLongPress();
        }
        return;
      }

      if (e.cancelable) e.preventDefault?.();

      lastTouch.current = { x: touch.clientX, y: touch.clientY };
      moveGhost(
        touch.clientX - grabOffset.current.x,
        touch.clientY - grabOffset.current.y
      );

      reevaluateDrop();
      updateAutoScroll(touch.clientY);
    },
    [cancelLongPress, moveGhost, reevaluateDrop, updateAutoScroll]
  );

  const onTouchEnd = useCallback(() => {
    cancelLongPress();
    touchStart.current = null;

    const state = useDragStore.getState();
    if (!state.isDragging) return;

    scroller.stop();
    releaseScrollLock();

    const finalOrder = state.orderedIds;
    endDragAction();
    dragOrigin.current = null;
    lastTouch.current = null;

    if (
      finalOrder.length > 0 &&
      !finalOrder.every((id, i) => id === itemIds[i])
    ) {
      onReorder(finalOrder);
    }
  }, [cancelLongPress, scroller, releaseScrollLock, endDragAction, onReorder, itemIds]);

  return {
    handlers: { onTouchStart, onTouchMove, onTouchEnd },
    registerCard,
  };
}
