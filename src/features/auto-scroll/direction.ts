import { ScrollDirection } from '@/lib/types';

/**
 * Sign applied to an unsigned scroll distance for the given direction.
 */
export function directionSign(direction: ScrollDirection): 1 | -1 {
  switch (direction) {
    case ScrollDirection.Backward:
      return -1;
    case ScrollDirection.Forward:
      return 1;
  }
}

export function oppositeDirection(direction: ScrollDirection): ScrollDirection {
  return direction === ScrollDirection.Forward
    ? ScrollDirection.Backward
    : ScrollDirection.Forward;
}
