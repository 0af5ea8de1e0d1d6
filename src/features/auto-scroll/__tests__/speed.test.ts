import { describe, it, expect } from 'vitest';
import { fixedSpeed, resolveSpeed, speedFromPixelAmount } from '../speed';
import { ScrollerConfigError } from '../errors';

describe('fixedSpeed', () => {
  it('always returns the configured rate', () => {
    const speed = fixedSpeed(600);
    expect(speed()).toBe(600);
    expect(speed()).toBe(600);
  });
});

describe('speedFromPixelAmount', () => {
  it('converts pixels per duration to pixels per second', () => {
    // 20px every 100ms
    expect(speedFromPixelAmount(20)()).toBe(200);
    // 30px every 50ms
    expect(speedFromPixelAmount(30, 50)()).toBe(600);
  });

  it('re-reads a pixel amount provider on each call', () => {
    let amount = 10;
    const speed = speedFromPixelAmount(() => amount, 250);

    expect(speed()).toBe(40);
    amount = 25;
    expect(speed()).toBe(100);
  });

  it('rejects a non-positive duration', () => {
    expect(() => speedFromPixelAmount(10, 0)).toThrow(ScrollerConfigError);
  });
});

describe('resolveSpeed', () => {
  it('passes a plain rate through', () => {
    expect(resolveSpeed({ pixelsPerSecond: 450 })).toBe(450);
  });

  it('evaluates a pixel amount config', () => {
    expect(resolveSpeed({ pixelAmount: 8, durationMs: 16 })).toBe(500);
    expect(resolveSpeed({ pixelAmount: () => 5 })).toBe(50);
  });
});
