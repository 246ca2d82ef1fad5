import { describe, it, expect } from 'vitest';
import { buildTuning, killSpeedIncrement, shooterInterval, spawnTableFor, waveBaseSpeed, waveFireRate } from '../balanceUtils';
import { ENEMY, HARD_MODE, PLAYER, WAVE } from '../constants/balance';

describe('balance utils', () => {
  it('normal tuning uses the base constants', () => {
    const t = buildTuning(false);
    expect(t.playerSpeed).toBe(PLAYER.SPEED);
    expect(t.maxPlayerBullets).toBe(3);
    expect(t.maxEnemyBullets).toBe(6);
    expect(t.enemySpeedMult).toBe(1);
  });
  it('hard mode scales speed, cooldown and caps', () => {
    const t = buildTuning(true);
    expect(t.playerSpeed).toBeCloseTo(PLAYER.SPEED * HARD_MODE.PLAYER_SPEED_MULT);
    expect(t.shotCooldown).toBeCloseTo(0.2);
    expect(t.maxPlayerBullets).toBe(4);
    expect(t.maxEnemyBullets).toBe(7);
  });
  it('wave 1 is a 3x8 grid of common enemies', () => {
    expect(spawnTableFor(1)).toEqual({ rows: 3, cols: 8, shooter: 0, tough: 0, common: 24 });
  });
  it('wave 2 adds a row and mixes in toughs and shooters', () => {
    expect(spawnTableFor(2)).toEqual({ rows: 4, cols: 8, shooter: 2, tough: 3, common: 27 });
  });
  it('grid stops growing at the row cap', () => {
    expect(spawnTableFor(10).rows).toBe(ENEMY.MAX_ROWS);
    expect(spawnTableFor(10).tough).toBe(Math.round(48 * WAVE.TOUGH_RATIO_MAX));
  });
  it('enemy count and speed never decrease from one wave to the next', () => {
    const t = buildTuning(false);
    for (let w = 1; w < 12; w++) {
      const a = spawnTableFor(w), b = spawnTableFor(w + 1);
      expect(b.rows * b.cols).toBeGreaterThanOrEqual(a.rows * a.cols);
      expect(waveBaseSpeed(w + 1, t)).toBeGreaterThan(waveBaseSpeed(w, t));
    }
  });
  it('wave scaling of speed and fire rate', () => {
    const t = buildTuning(false);
    expect(waveBaseSpeed(1, t)).toBe(72);
    expect(waveBaseSpeed(3, t)).toBeCloseTo(72 * 1.21);
    expect(waveFireRate(1, t)).toBeCloseTo(0.28);
    expect(waveFireRate(2, t)).toBeCloseTo(0.294);
  });
  it('shooter interval is divided by the fire multiplier', () => {
    expect(shooterInterval(() => 0, 1)).toBe(1.5);
    expect(shooterInterval(() => 0.5, 2)).toBe(1.25);
  });
  it('kill increment spreads the acceleration over the grid', () => {
    expect(killSpeedIncrement(24)).toBeCloseTo(0.025);
    expect(killSpeedIncrement(0)).toBe(0);
  });
});
