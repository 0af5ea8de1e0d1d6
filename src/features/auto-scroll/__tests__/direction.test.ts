import { describe, it, expect } from 'vitest';
import { directionSign, oppositeDirection } from '../direction';
import { ScrollDirection } from '@/lib/types';

describe('directionSign', () => {
  it('is negative for backward', () => {
    expect(directionSign(ScrollDirection.Backward)).toBe(-1);
  });

  it('is positive for forward', () => {
    expect(directionSign(ScrollDirection.Forward)).toBe(1);
  });
});

describe('oppositeDirection', () => {
  it('flips between the two directions', () => {
    expect(oppositeDirection(ScrollDirection.Forward)).toBe(ScrollDirection.Backward);
    expect(oppositeDirection(ScrollDirection.Backward)).toBe(ScrollDirection.Forward);
  });
});
