// Pure helper functions for balance calculations to aid testing.
import { PLAYER, ENEMY, WAVE, HARD_MODE } from './constants/balance';
import { SpawnTable, Tuning } from './types';
import { Rng, randRange } from './rng';

export function buildTuning(hardMode = false): Tuning {
    if (!hardMode) {
        return {
            playerSpeed: PLAYER.SPEED,
            shotCooldown: PLAYER.SHOT_COOLDOWN,
            maxPlayerBullets: PLAYER.MAX_BULLETS,
            enemySpeedMult: 1,
            enemyFireMult: 1,
            maxEnemyBullets: ENEMY.MAX_BULLETS,
        };
    }
    return {
        playerSpeed: PLAYER.SPEED * HARD_MODE.PLAYER_SPEED_MULT,
        shotCooldown: PLAYER.SHOT_COOLDOWN * HARD_MODE.SHOT_COOLDOWN_MULT,
        maxPlayerBullets: PLAYER.MAX_BULLETS + HARD_MODE.EXTRA_PLAYER_BULLETS,
        enemySpeedMult: HARD_MODE.ENEMY_SPEED_MULT,
        enemyFireMult: HARD_MODE.ENEMY_FIRE_MULT,
        maxEnemyBullets: ENEMY.MAX_BULLETS + HARD_MODE.EXTRA_ENEMY_BULLETS,
    };
}

export function waveBaseSpeed(wave: number, tuning: Tuning): number {
    return ENEMY.START_SPEED * tuning.enemySpeedMult * Math.pow(WAVE.SPEED_MULT, Math.max(0, wave - 1));
}

export function waveFireMult(wave: number, tuning: Tuning): number {
    return tuning.enemyFireMult * Math.pow(WAVE.FIRE_MULT, Math.max(0, wave - 1));
}

export function waveFireRate(wave: number, tuning: Tuning): number {
    return ENEMY.FIRE_RATE * waveFireMult(wave, tuning);
}

// Grid size grows with the wave; variant mix shifts toward toughs and shooters
export function spawnTableFor(wave: number): SpawnTable {
    const w = Math.max(1, wave);
    const rows = Math.min(ENEMY.MAX_ROWS, ENEMY.MIN_ROWS + w - 1);
    const cols = ENEMY.COLS;
    const total = rows * cols;
    const toughRatio = Math.min(WAVE.TOUGH_RATIO_MAX, WAVE.TOUGH_RATIO_STEP * (w - 1));
    const shooterRatio = Math.min(WAVE.SHOOTER_RATIO_MAX, WAVE.SHOOTER_RATIO_STEP * (w - 1));
    const shooter = Math.round(total * shooterRatio);
    const tough = Math.round(total * toughRatio);
    return { rows, cols, shooter, tough, common: total - shooter - tough };
}

export function shooterInterval(rng: Rng, fireMult: number): number {
    return randRange(rng, ENEMY.SHOOTER_FIRE_MIN, ENEMY.SHOOTER_FIRE_MAX) / fireMult;
}

export function killSpeedIncrement(total: number): number {
    return total > 0 ? ENEMY.KILL_ACCEL / total : 0;
}
