import { Boss, Bullet, BulletOwner, Enemy, EnemyVariant, Player, Shield, Tuning, Vector2 } from './types';
import { BOSS, BULLET, ENEMY, ENEMY_STATS, PLAYER, SHIELD, WORLD } from './constants/balance';
import { clamp, bottom, centerX } from './math';
import { Rng } from './rng';
import { shooterInterval } from './balanceUtils';

// Per-tick entity rules. Nothing here touches a second entity; cross-entity
// effects go through the collision resolver and the wave director.

export interface PlayerInput { left: boolean; right: boolean; shoot: boolean; }

export interface GridMarch { dx: number; dy: number; }

export function createPlayer(id: number): Player {
    return {
        id,
        x: WORLD.WIDTH / 2 - PLAYER.WIDTH / 2,
        y: WORLD.HEIGHT - PLAYER.BOTTOM_OFFSET - PLAYER.HEIGHT,
        w: PLAYER.WIDTH,
        h: PLAYER.HEIGHT,
        lives: PLAYER.LIVES,
        shotTimer: 0,
        invuln: 0,
        godMode: false,
    };
}

// Top edge of the ship; an enemy reaching it ends the run
export const DEFENSE_LINE_Y = WORLD.HEIGHT - PLAYER.BOTTOM_OFFSET - PLAYER.HEIGHT;

export function createBullet(id: number, owner: BulletOwner, muzzle: Vector2): Bullet {
    const vy = owner === 'player' ? BULLET.PLAYER_SPEED : BULLET.ENEMY_SPEED;
    return { id, owner, vy, damage: BULLET.DAMAGE, x: muzzle.x - BULLET.WIDTH / 2, y: muzzle.y - BULLET.HEIGHT / 2 - 2, w: BULLET.WIDTH, h: BULLET.HEIGHT };
}

// Moves the ship, ticks its timers, and returns a muzzle position when a shot is fired
export function updatePlayer(p: Player, input: PlayerInput, dt: number, tuning: Tuning, bulletsInFlight: number): Vector2 | null {
    let move = 0;
    if (input.left) move -= 1;
    if (input.right) move += 1;
    p.x = clamp(p.x + move * tuning.playerSpeed * dt, PLAYER.EDGE_MARGIN, WORLD.WIDTH - PLAYER.EDGE_MARGIN - p.w);
    if (p.shotTimer > 0) p.shotTimer = Math.max(0, p.shotTimer - dt);
    if (p.invuln > 0) p.invuln = Math.max(0, p.invuln - dt);
    if (!input.shoot || p.shotTimer > 0 || bulletsInFlight >= tuning.maxPlayerBullets) return null;
    p.shotTimer = tuning.shotCooldown;
    return { x: centerX(p), y: p.y - 6 };
}

export function isInvulnerable(p: Player): boolean { return p.godMode || p.invuln > 0; }

// Returns true when a life was actually lost
export function hitPlayer(p: Player): boolean {
    if (isInvulnerable(p)) return false;
    p.lives = Math.max(0, p.lives - 1);
    p.invuln = PLAYER.HIT_GRACE;
    return true;
}

// Off-screen bullets report false and should be dropped
export function updateBullet(b: Bullet, dt: number): boolean {
    b.y += b.vy * dt;
    return bottom(b) >= 0 && b.y <= WORLD.HEIGHT;
}

export function createEnemy(id: number, variant: EnemyVariant, row: number, col: number, rng: Rng, fireMult: number): Enemy {
    const base = {
        id, row, col,
        x: ENEMY.START_X + col * ENEMY.SPACING_X,
        y: ENEMY.START_Y + row * ENEMY.SPACING_Y,
        w: ENEMY.WIDTH,
        h: ENEMY.HEIGHT,
        hp: ENEMY_STATS[variant].hp,
    };
    switch (variant) {
        case 'common': return { ...base, variant };
        case 'tough': return { ...base, variant };
        case 'shooter': return { ...base, variant, fireTimer: shooterInterval(rng, fireMult) };
    }
}

// Applies the grid's shared march; shooters return a muzzle position when their timer fires
export function updateEnemy(e: Enemy, march: GridMarch, dt: number, rng: Rng, fireMult: number): Vector2 | null {
    e.x = clamp(e.x + march.dx, 0, WORLD.WIDTH - e.w);
    e.y = clamp(e.y + march.dy, 0, WORLD.HEIGHT - e.h);
    switch (e.variant) {
        case 'common':
        case 'tough':
            return null;
        case 'shooter':
            e.fireTimer -= dt;
            if (e.fireTimer > 0) return null;
            e.fireTimer = shooterInterval(rng, fireMult);
            return { x: centerX(e), y: bottom(e) + 6 };
    }
}

export function damageEnemy(e: Enemy, dmg: number): boolean {
    e.hp = Math.max(0, e.hp - dmg);
    return e.hp <= 0;
}

export function enemyPoints(e: Enemy): number { return ENEMY_STATS[e.variant].points; }

export function createBoss(id: number): Boss {
    return { id, x: BOSS.START_X, y: BOSS.Y, w: BOSS.WIDTH, h: BOSS.HEIGHT, vx: BOSS.SPEED, points: BOSS.POINTS, active: true };
}

export function updateBoss(b: Boss, dt: number): void {
    b.x += b.vx * dt;
    if (b.x > WORLD.WIDTH + BOSS.EXIT_MARGIN) b.active = false;
}

export function absorbHit(s: Shield, damage: number = BULLET.DAMAGE): boolean {
    s.durability = Math.max(0, s.durability - damage);
    return s.durability <= 0;
}

// Four bunkers of segments, bottom corners carved out to form an arch
export function createShields(nextId: () => number): Shield[] {
    const shields: Shield[] = [];
    const spacing = Math.floor((WORLD.WIDTH - 2 * SHIELD.MARGIN_X) / (SHIELD.COUNT - 1));
    const top = WORLD.HEIGHT - SHIELD.OFFSET_FROM_BOTTOM;
    for (let i = 0; i < SHIELD.COUNT; i++) {
        const left = SHIELD.MARGIN_X + i * spacing - (SHIELD.SEG_COLS * SHIELD.SEG_SIZE) / 2;
        for (let r = 0; r < SHIELD.SEG_ROWS; r++) {
            for (let c = 0; c < SHIELD.SEG_COLS; c++) {
                if (r === SHIELD.SEG_ROWS - 1 && (c === 0 || c === SHIELD.SEG_COLS - 1)) continue;
                shields.push({
                    id: nextId(), group: i, durability: SHIELD.DURABILITY,
                    x: left + c * SHIELD.SEG_SIZE, y: top + r * SHIELD.SEG_SIZE, w: SHIELD.SEG_SIZE, h: SHIELD.SEG_SIZE,
                });
            }
        }
    }
    return shields;
}
