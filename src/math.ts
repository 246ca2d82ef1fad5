import { Rect } from './types';

export function clamp(v: number, min: number, max: number): number {
    return v < min ? min : (v > max ? max : v);
}

// Axis-aligned overlap; touching edges do not count
export function rectsOverlap(a: Rect, b: Rect): boolean {
    return a.x < b.x + b.w && b.x < a.x + a.w && a.y < b.y + b.h && b.y < a.y + a.h;
}

export function centerX(r: Rect): number { return r.x + r.w / 2; }
export function bottom(r: Rect): number { return r.y + r.h; }

// Smallest rect enclosing all given rects, or null for an empty set
export function boundsOf(rects: readonly Rect[]): Rect | null {
    if (!rects.length) return null;
    let left = Infinity, top = Infinity, right = -Infinity, bot = -Infinity;
    for (const r of rects) {
        if (r.x < left) left = r.x;
        if (r.y < top) top = r.y;
        if (r.x + r.w > right) right = r.x + r.w;
        if (r.y + r.h > bot) bot = r.y + r.h;
    }
    return { x: left, y: top, w: right - left, h: bot - top };
}
