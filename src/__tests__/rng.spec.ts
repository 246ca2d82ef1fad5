import { describe, it, expect } from 'vitest';
import { forkRng, randInt, randomRng, randRange } from '../rng';

describe('randomRng', () => {
    it('produces deterministic sequence for same seed', () => {
        const a = randomRng(123);
        const b = randomRng(123);
        const seqA = Array.from({ length: 5 }, () => a());
        const seqB = Array.from({ length: 5 }, () => b());
        expect(seqA).toEqual(seqB);
    });
    it('different seeds differ', () => {
        const a = randomRng(123)();
        const b = randomRng(124)();
        expect(a).not.toBe(b);
    });
    it('values in [0,1)', () => {
        const r = randomRng(999);
        for (let i = 0; i < 10; i++) {
            const v = r();
            expect(v).toBeGreaterThanOrEqual(0);
            expect(v).toBeLessThan(1);
        }
    });
});

describe('forkRng', () => {
    it('is deterministic given the parent seed', () => {
        const a = forkRng(randomRng(7));
        const b = forkRng(randomRng(7));
        expect([a(), a(), a()]).toEqual([b(), b(), b()]);
    });
    it('does not replay the parent stream', () => {
        const parent = randomRng(7);
        const child = forkRng(parent);
        expect([child(), child()]).not.toEqual([parent(), parent()]);
    });
    it('draws its seed from the parent', () => {
        expect(forkRng(() => 0)()).toBe(randomRng(0)());
    });
});

describe('range helpers', () => {
    it('randRange scales into [min,max)', () => {
        expect(randRange(() => 0, 20, 30)).toBe(20);
        expect(randRange(() => 0.5, 20, 30)).toBe(25);
    });
    it('randInt is inclusive on both ends', () => {
        expect(randInt(() => 0, 6, 12)).toBe(6);
        expect(randInt(() => 0.999, 6, 12)).toBe(12);
    });
});
