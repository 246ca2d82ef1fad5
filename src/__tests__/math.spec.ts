import { describe, it, expect } from 'vitest';
import { boundsOf, bottom, centerX, clamp, rectsOverlap } from '../math';

describe('math utils', () => {
  it('clamp clamps low/high', () => {
    expect(clamp(5, 10, 20)).toBe(10);
    expect(clamp(25, 10, 20)).toBe(20);
    expect(clamp(15, 10, 20)).toBe(15);
  });
  it('rectsOverlap detects intersection', () => {
    expect(rectsOverlap({ x: 0, y: 0, w: 10, h: 10 }, { x: 5, y: 5, w: 10, h: 10 })).toBe(true);
    expect(rectsOverlap({ x: 0, y: 0, w: 10, h: 10 }, { x: 20, y: 0, w: 5, h: 5 })).toBe(false);
  });
  it('touching edges do not overlap', () => {
    expect(rectsOverlap({ x: 0, y: 0, w: 10, h: 10 }, { x: 10, y: 0, w: 10, h: 10 })).toBe(false);
    expect(rectsOverlap({ x: 0, y: 0, w: 10, h: 10 }, { x: 0, y: 10, w: 10, h: 10 })).toBe(false);
  });
  it('centerX and bottom', () => {
    const r = { x: 10, y: 20, w: 30, h: 40 };
    expect(centerX(r)).toBe(25);
    expect(bottom(r)).toBe(60);
  });
  it('boundsOf encloses all rects, null when empty', () => {
    expect(boundsOf([])).toBeNull();
    expect(boundsOf([{ x: 10, y: 5, w: 10, h: 10 }, { x: 50, y: 30, w: 20, h: 5 }])).toEqual({ x: 10, y: 5, w: 60, h: 30 });
  });
});
