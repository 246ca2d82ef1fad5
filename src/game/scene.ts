import { EnemyVariant, GameSnapshot, Rect } from '../types';
import { ENEMY_STATS, SHIELD } from '../constants/balance';
import { clamp } from '../math';
import { Effects, PARTICLE_LIFE_MAX } from './particles';

// A filled rectangle in world pixels, ready for PIXI.Graphics
export interface SceneRect extends Rect { color: number; alpha: number; }

export const PALETTE = {
  player: 0x4caf50,
  common: 0x4dd0e1,
  tough: 0xffb300,
  shooter: 0x9ccc65,
  boss: 0xe040fb,
  playerBullet: 0xfff176,
  enemyBullet: 0xff5252,
  shield: 0x43a047,
  particle: 0xffe082,
} as const;

const PARTICLE_SIZE = 3;

function enemyAlpha(variant: EnemyVariant, hp: number): number {
  return hp < ENEMY_STATS[variant].hp ? 0.55 : 1;
}

// Back to front: shields, grid, boss, bullets, ship, particles
export function buildScene(snap: GameSnapshot, fx: Effects | null): SceneRect[] {
  const out: SceneRect[] = [];
  const push = (r: Rect, color: number, alpha = 1) => { out.push({ x: r.x, y: r.y, w: r.w, h: r.h, color, alpha }); };
  for (const s of snap.shields) push(s, PALETTE.shield, s.durability / SHIELD.DURABILITY);
  for (const e of snap.enemies) push(e, PALETTE[e.variant], enemyAlpha(e.variant, e.hp));
  if (snap.boss) push(snap.boss, PALETTE.boss);
  for (const b of snap.bullets) push(b, b.owner === 'player' ? PALETTE.playerBullet : PALETTE.enemyBullet);
  // blink while invulnerable
  if (!snap.invulnerable || Math.floor(snap.time * 10) % 2 === 0) push(snap.player, PALETTE.player);
  if (fx) {
    for (const p of fx.particles) {
      const half = PARTICLE_SIZE / 2;
      push({ x: p.x - half, y: p.y - half, w: PARTICLE_SIZE, h: PARTICLE_SIZE }, PALETTE.particle, clamp(p.life / PARTICLE_LIFE_MAX, 0, 1));
    }
  }
  return out;
}
