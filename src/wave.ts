import { AudioCue, CollisionEvent, Enemy, EnemyVariant, GameSession, Tuning, WaveState, WaveStats } from './types';
import { BOSS, ENEMY, WAVE, WORLD } from './constants/balance';
import { spawnTableFor, waveBaseSpeed, waveFireMult, waveFireRate, killSpeedIncrement } from './balanceUtils';
import { createBoss, createBullet, createEnemy, DEFENSE_LINE_Y, GridMarch, updateBoss, updateEnemy } from './entities';
import { boundsOf, bottom, centerX } from './math';
import { randRange } from './rng';

export function allocId(gs: GameSession): number { return gs.nextEntityId++; }

export function createWaveState(wave: number, tuning: Tuning): WaveState {
    const spawnTable = spawnTableFor(wave);
    const total = spawnTable.rows * spawnTable.cols;
    return {
        wave,
        total,
        remaining: total,
        baseSpeed: waveBaseSpeed(wave, tuning),
        speedMultiplier: 1,
        speedIncrement: killSpeedIncrement(total),
        fireRate: waveFireRate(wave, tuning),
        direction: 1,
        spawnTable,
        transitionTimer: null,
    };
}

// Shooters fill the top of the grid, then toughs, the rest are common
export function spawnGrid(gs: GameSession): Enemy[] {
    const { rows, cols, shooter, tough } = gs.wave.spawnTable;
    const fireMult = waveFireMult(gs.wave.wave, gs.tuning);
    const enemies: Enemy[] = [];
    for (let row = 0; row < rows; row++) {
        for (let col = 0; col < cols; col++) {
            const slot = row * cols + col;
            const variant: EnemyVariant = slot < shooter ? 'shooter' : (slot < shooter + tough ? 'tough' : 'common');
            enemies.push(createEnemy(allocId(gs), variant, row, col, gs.rng, fireMult));
        }
    }
    return enemies;
}

export function startWave(gs: GameSession, wave: number, cues: AudioCue[]): void {
    gs.wave = createWaveState(wave, gs.tuning);
    gs.enemies = spawnGrid(gs);
    gs.bullets = [];
    cues.push('waveStart');
}

export function currentSpeed(w: WaveState): number { return w.baseSpeed * w.speedMultiplier; }

// Horizontal sweep; touching a side margin reverses the grid and steps it down
export function planMarch(gs: GameSession, dt: number): GridMarch {
    const w = gs.wave;
    const dx = w.direction * currentSpeed(w) * dt;
    const b = boundsOf(gs.enemies);
    if (!b) return { dx: 0, dy: 0 };
    const left = b.x + dx;
    const right = b.x + b.w + dx;
    const hitEdge = (w.direction < 0 && left <= ENEMY.EDGE_MARGIN) || (w.direction > 0 && right >= WORLD.WIDTH - ENEMY.EDGE_MARGIN);
    if (!hitEdge) return { dx, dy: 0 };
    w.direction = w.direction > 0 ? -1 : 1;
    return { dx, dy: ENEMY.STEP_DOWN };
}

function enemyBulletsInFlight(gs: GameSession): number {
    let n = 0;
    for (const b of gs.bullets) if (b.owner === 'enemy') n++;
    return n;
}

function fireEnemyBullet(gs: GameSession, x: number, y: number, cues: AudioCue[]): boolean {
    if (enemyBulletsInFlight(gs) >= gs.tuning.maxEnemyBullets) return false;
    gs.bullets.push(createBullet(allocId(gs), 'enemy', { x, y }));
    cues.push('enemyShoot');
    return true;
}

// Random shot from the lowest enemy of a random column
export function tryVolley(gs: GameSession, dt: number, cues: AudioCue[]): boolean {
    if (!gs.enemies.length || gs.rng() >= gs.wave.fireRate * dt) return false;
    const lowest = new Map<number, Enemy>();
    for (const e of gs.enemies) {
        const cur = lowest.get(e.col);
        if (!cur || bottom(e) > bottom(cur)) lowest.set(e.col, e);
    }
    const candidates = [...lowest.values()];
    const shooter = candidates[Math.floor(gs.rng() * candidates.length)];
    return fireEnemyBullet(gs, centerX(shooter), bottom(shooter) + 6, cues);
}

export function advanceWave(gs: GameSession, dt: number, cues: AudioCue[]): void {
    const w = gs.wave;
    if (w.transitionTimer !== null) {
        w.transitionTimer -= dt;
        if (w.transitionTimer <= 0) startWave(gs, w.wave + 1, cues);
        return;
    }
    const march = planMarch(gs, dt);
    const fireMult = waveFireMult(w.wave, gs.tuning);
    for (const e of gs.enemies) {
        const muzzle = updateEnemy(e, march, dt, gs.rng, fireMult);
        if (muzzle) fireEnemyBullet(gs, muzzle.x, muzzle.y, cues);
    }
    tryVolley(gs, dt, cues);
}

export function advanceBoss(gs: GameSession, dt: number): void {
    if (gs.boss) {
        updateBoss(gs.boss, dt);
        if (!gs.boss.active) gs.boss = null;
        return;
    }
    gs.bossTimer -= dt;
    if (gs.bossTimer <= 0) {
        gs.boss = createBoss(allocId(gs));
        gs.bossTimer = randRange(gs.rng, BOSS.COOLDOWN_MIN, BOSS.COOLDOWN_MAX);
    }
}

export function onEnemyKilled(gs: GameSession): void {
    const w = gs.wave;
    w.remaining = Math.max(0, w.remaining - 1);
    w.speedMultiplier += w.speedIncrement;
}

// Starts the inter-wave delay the first time the grid is found empty
export function checkWaveCleared(gs: GameSession): boolean {
    if (gs.enemies.length > 0 || gs.wave.transitionTimer !== null) return false;
    gs.wave.remaining = 0;
    gs.wave.transitionTimer = WAVE.TRANSITION_DELAY;
    return true;
}

export function checkDefenseLine(gs: GameSession): CollisionEvent[] {
    const events: CollisionEvent[] = [];
    for (const e of gs.enemies) {
        if (bottom(e) >= DEFENSE_LINE_Y) events.push({ kind: 'enemyReachesPlayerLine', enemyId: e.id });
    }
    return events;
}

export function skipWave(gs: GameSession): void {
    gs.enemies = [];
    checkWaveCleared(gs);
}

export function waveStats(gs: GameSession): WaveStats {
    const w = gs.wave;
    return { wave: w.wave, remaining: gs.enemies.length, total: w.total, speed: currentSpeed(w), fireRate: w.fireRate, bounds: boundsOf(gs.enemies) };
}
