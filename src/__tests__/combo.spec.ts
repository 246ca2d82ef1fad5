import { describe, it, expect } from 'vitest';
import { createCombo, registerKill, tickCombo } from '../combo';

describe('combo tracker', () => {
  it('first kill scores at x1', () => {
    const c = createCombo();
    expect(registerKill(c, 10)).toBe(10);
    expect(c.multiplier).toBe(1);
  });
  it('kills inside the window chain the multiplier', () => {
    const c = createCombo();
    const points: number[] = [];
    for (let i = 0; i < 3; i++) {
      points.push(registerKill(c, 10));
      tickCombo(c, 0.5);
    }
    expect(points).toEqual([10, 20, 30]);
  });
  it('a kill exactly at the window edge still chains', () => {
    const c = createCombo();
    registerKill(c, 10);
    tickCombo(c, 1.0);
    expect(c.multiplier).toBe(1);
    expect(registerKill(c, 10)).toBe(20);
  });
  it('multiplier is capped', () => {
    const c = createCombo();
    for (let i = 0; i < 20; i++) registerKill(c, 10);
    expect(c.multiplier).toBe(8);
    expect(registerKill(c, 10)).toBe(80);
  });
  it('a gap longer than the window resets before scoring', () => {
    const c = createCombo();
    registerKill(c, 10);
    registerKill(c, 10);
    c.timeSinceLastKill = 1.2;
    expect(registerKill(c, 30)).toBe(30);
    expect(c.multiplier).toBe(1);
  });
  it('idle decay resets the multiplier without another kill', () => {
    const c = createCombo();
    registerKill(c, 10);
    registerKill(c, 10);
    registerKill(c, 10);
    expect(c.multiplier).toBe(3);
    tickCombo(c, 0.75);
    expect(c.multiplier).toBe(3);
    tickCombo(c, 0.75);
    expect(c.multiplier).toBe(1);
  });
});
