import { describe, expect, it } from 'vitest';
import { EASINGS, ease, isEasing } from './easing';

describe('ease', () => {
  it.each(EASINGS)('%s maps the endpoints and midpoint', (easing) => {
    expect(ease(easing, 0)).toBe(0);
    expect(ease(easing, 1)).toBe(1);
    expect(ease(easing, 0.5)).toBeCloseTo(0.5, 12);
  });

  it.each(EASINGS)('%s starts and stops with zero slope', (easing) => {
    const h = 1e-4;
    expect(ease(easing, h) / h).toBeLessThan(0.01);
    expect((1 - ease(easing, 1 - h)) / h).toBeLessThan(0.01);
  });

  it('clamps out-of-range progress', () => {
    expect(ease('smoothstep', -1)).toBe(0);
    expect(ease('sine', 2)).toBe(1);
  });

  it('recognises easing names', () => {
    expect(isEasing('smootherstep')).toBe(true);
    expect(isEasing('linear')).toBe(false);
  });
});
