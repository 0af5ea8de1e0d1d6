/**
 * Drag Store - Zustand store for drag-to-reorder state.
 *
 * Kept apart from anything else so the drag system can update at pointer
 * frequency without re-rendering unrelated UI.
 */

import { create } from 'zustand';
import type { ScrollDirection } from '@/lib/types';

interface GhostRect {
  x: number;
  y: number;
  width: number;
}

interface DragState {
  isDragging: boolean;

  /** Index of the dragged item in the list as it was when the drag began. */
  dragIndex: number | null;

  /** Where the item would land if dropped now. */
  dropIndex: number | null;

  /** Ghost position (viewport coordinates) and width copied from the source. */
  ghost: GhostRect;

  /** Item ids in their live order (shuffled during the drag). */
  orderedIds: string[];

  /** Edge the pointer is currently auto-scrolling toward, if any. */
  activeEdge: ScrollDirection | null;

  // Actions
  startDrag: (params: {
    index: number;
    ghost: GhostRect;
    orderedIds: string[];
  }) => void;
  moveGhost: (x: number, y: number) => void;
  updateDrop: (dropIndex: number, orderedIds: string[]) => void;
  setActiveEdge: (edge: ScrollDirection | null) => void;
  endDrag: () => void;
}

type DragData = Pick<
  DragState,
  'isDragging' | 'dragIndex' | 'dropIndex' | 'ghost' | 'orderedIds' | 'activeEdge'
>;

const initialState: DragData = {
  isDragging: false,
  dragIndex: null,
  dropIndex: null,
  ghost: { x: 0, y: 0, width: 0 },
  orderedIds: [],
  activeEdge: null,
};

export const useDragStore = create<DragState>((set) => ({
  ...initialState,

  startDrag: ({ index, ghost, orderedIds }) =>
    set({
      isDragging: true,
      dragIndex: index,
      dropIndex: index,
      ghost,
      orderedIds,
      activeEdge: null,
    }),

  moveGhost: (x, y) => set((state) => ({ ghost: { ...state.ghost, x, y } })),

  updateDrop: (dropIndex, orderedIds) => set({ dropIndex, orderedIds }),

  setActiveEdge: (activeEdge) => set({ activeEdge }),

  endDrag: () => set(initialState),
}));
