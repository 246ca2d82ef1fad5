import { GameSnapshot, Vector2 } from '../types';
import { Rng, randInt, randRange } from '../rng';
import { centerX } from '../math';

// Cosmetic only: the core never sees these

export interface Particle { x: number; y: number; vx: number; vy: number; life: number; }

export interface Effects { particles: Particle[]; shake: number; }

const GRAVITY = 180;
const SHAKE_TIME = 0.28;
export const SHAKE_PX = 6;
export const PARTICLE_LIFE_MAX = 0.4;

export function createEffects(): Effects { return { particles: [], shake: 0 }; }

export function spawnBurst(fx: Effects, x: number, y: number, rng: Rng) {
  const count = randInt(rng, 6, 12);
  for (let i = 0; i < count; i++) {
    const ang = rng() * Math.PI * 2;
    const speed = randRange(rng, 80, 220);
    fx.particles.push({ x, y, vx: Math.cos(ang) * speed, vy: Math.sin(ang) * speed, life: randRange(rng, 0.15, PARTICLE_LIFE_MAX) });
  }
}

export function updateEffects(fx: Effects, dt: number) {
  for (const p of fx.particles) {
    p.life -= dt;
    p.x += p.vx * dt;
    p.y += p.vy * dt;
    p.vy += GRAVITY * dt;
  }
  fx.particles = fx.particles.filter(p => p.life > 0);
  if (fx.shake > 0) fx.shake = Math.max(0, fx.shake - dt);
}

// Hit positions come from the previous snapshot: the bullets involved are gone from the new one
export function reactToSnapshot(fx: Effects, prev: GameSnapshot, snap: GameSnapshot, rng: Rng) {
  const bulletPos = (id: number): Vector2 | null => {
    const b = prev.bullets.find(x => x.id === id);
    return b ? { x: centerX(b), y: b.y } : null;
  };
  for (const ev of snap.events) {
    switch (ev.kind) {
      case 'bulletHitsEnemy':
      case 'bulletHitsBoss':
      case 'bulletHitsShield': {
        const at = bulletPos(ev.bulletId);
        if (at) spawnBurst(fx, at.x, at.y, rng);
        break;
      }
      case 'bulletHitsPlayer':
      case 'enemyReachesPlayerLine':
        fx.shake = SHAKE_TIME;
        break;
    }
  }
}

// Horizontal jitter in world pixels for the playfield layer
export function shakeOffset(fx: Effects, rng: Rng): number {
  return fx.shake > 0 ? Math.round(randRange(rng, -SHAKE_PX, SHAKE_PX)) : 0;
}
