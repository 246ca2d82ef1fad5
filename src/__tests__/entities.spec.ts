import { describe, it, expect } from 'vitest';
import { absorbHit, createBoss, createBullet, createEnemy, createPlayer, createShields, damageEnemy, DEFENSE_LINE_Y, enemyPoints, hitPlayer, updateBoss, updateBullet, updateEnemy, updatePlayer } from '../entities';
import { buildTuning } from '../balanceUtils';

const tuning = buildTuning(false);
const idle = { left: false, right: false, shoot: false };

describe('player', () => {
  it('spawns centered above the bottom edge', () => {
    const p = createPlayer(0);
    expect(p.x).toBe(375);
    expect(p.y).toBe(540);
    expect(DEFENSE_LINE_Y).toBe(540);
  });
  it('moves and clamps to the side margin', () => {
    const p = createPlayer(0);
    updatePlayer(p, { ...idle, left: true }, 0.1, tuning, 0);
    expect(p.x).toBe(345);
    p.x = 12;
    updatePlayer(p, { ...idle, left: true }, 0.1, tuning, 0);
    expect(p.x).toBe(10);
  });
  it('fires from the nose then waits for the cooldown', () => {
    const p = createPlayer(0);
    expect(updatePlayer(p, { ...idle, shoot: true }, 0, tuning, 0)).toEqual({ x: 400, y: 534 });
    expect(p.shotTimer).toBe(0.25);
    expect(updatePlayer(p, { ...idle, shoot: true }, 0.1, tuning, 1)).toBeNull();
  });
  it('ignores shoot while the bullet cap is reached', () => {
    const p = createPlayer(0);
    expect(updatePlayer(p, { ...idle, shoot: true }, 0, tuning, 3)).toBeNull();
    expect(p.shotTimer).toBe(0);
  });
  it('loses one life per hit and is protected during the grace period', () => {
    const p = createPlayer(0);
    expect(hitPlayer(p)).toBe(true);
    expect(p.lives).toBe(2);
    expect(p.invuln).toBe(1.5);
    expect(hitPlayer(p)).toBe(false);
    expect(p.lives).toBe(2);
  });
  it('god mode blocks hits', () => {
    const p = createPlayer(0);
    p.godMode = true;
    expect(hitPlayer(p)).toBe(false);
    expect(p.lives).toBe(3);
  });
});

describe('bullets', () => {
  it('centres on the muzzle', () => {
    const b = createBullet(1, 'player', { x: 400, y: 534 });
    expect(b).toMatchObject({ x: 398, y: 526, w: 4, h: 12, vy: -500, damage: 1 });
  });
  it('drops once off screen', () => {
    const b = createBullet(1, 'player', { x: 400, y: 13 });
    expect(b.y).toBe(5);
    expect(updateBullet(b, 0.01)).toBe(true);
    expect(updateBullet(b, 0.1)).toBe(false);
  });
});

describe('enemies', () => {
  it('shooter fires when its timer runs out and re-arms', () => {
    const e = createEnemy(1, 'shooter', 0, 0, () => 0, 1);
    expect(e.variant === 'shooter' && e.fireTimer).toBe(1.5);
    expect(updateEnemy(e, { dx: 5, dy: 0 }, 1, () => 0, 1)).toBeNull();
    expect(e.x).toBe(65);
    expect(updateEnemy(e, { dx: 0, dy: 0 }, 0.5, () => 0, 1)).toEqual({ x: 87, y: 104 });
    expect(e.variant === 'shooter' && e.fireTimer).toBe(1.5);
  });
  it('common enemies never fire', () => {
    const e = createEnemy(1, 'common', 1, 2, () => 0, 1);
    expect(e).toMatchObject({ x: 200, y: 120, hp: 1 });
    expect(updateEnemy(e, { dx: 0, dy: 20 }, 10, () => 0, 1)).toBeNull();
    expect(e.y).toBe(140);
  });
  it('tough enemies take two hits; hp never goes negative', () => {
    const e = createEnemy(1, 'tough', 0, 0, () => 0, 1);
    expect(damageEnemy(e, 1)).toBe(false);
    expect(damageEnemy(e, 5)).toBe(true);
    expect(e.hp).toBe(0);
    expect(enemyPoints(e)).toBe(20);
  });
});

describe('boss', () => {
  it('turns inactive once past the right edge', () => {
    const b = createBoss(9);
    updateBoss(b, 4.5);
    expect(b.x).toBe(820);
    expect(b.active).toBe(true);
    updateBoss(b, 0.25);
    expect(b.active).toBe(false);
  });
});

describe('shields', () => {
  it('durability is non-increasing and stops at zero', () => {
    const [s] = createShields(() => 1);
    expect(absorbHit(s)).toBe(false);
    expect(absorbHit(s)).toBe(false);
    expect(absorbHit(s)).toBe(true);
    expect(absorbHit(s)).toBe(true);
    expect(s.durability).toBe(0);
  });
  it('builds four arched bunkers', () => {
    let id = 0;
    const shields = createShields(() => id++);
    expect(shields).toHaveLength(64);
    expect(shields[0]).toMatchObject({ x: 44, y: 420, w: 12, h: 12, group: 0 });
    expect(shields.some(s => s.group === 0 && s.x === 44 && s.y === 444)).toBe(false);
    expect(shields.filter(s => s.group === 3)).toHaveLength(16);
  });
});
