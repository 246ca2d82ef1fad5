export type Rng = () => number;

// Weyl sequence through the murmur3 finalizer: a run replays exactly from its seed
export function randomRng(seed: number): Rng {
    let state = seed | 0;
    return () => {
        state = (state + 0x9e3779b9) | 0;
        let z = state;
        z = Math.imul(z ^ (z >>> 16), 0x85ebca6b);
        z = Math.imul(z ^ (z >>> 13), 0xc2b2ae35);
        z ^= z >>> 16;
        return (z >>> 0) / 0x100000000;
    };
}

// Independent stream seeded from `rng`, e.g. for cosmetics that must not shift gameplay draws
export function forkRng(rng: Rng): Rng {
    return randomRng(Math.floor(rng() * 0x100000000));
}

export function randRange(rng: Rng, min: number, max: number): number {
    return min + rng() * (max - min);
}

export function randInt(rng: Rng, min: number, max: number): number {
    return min + Math.floor(rng() * (max - min + 1));
}
