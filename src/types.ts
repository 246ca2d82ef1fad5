import type { Rng } from './rng';

export interface Vector2 { x: number; y: number; }
export interface Rect { x: number; y: number; w: number; h: number; }

export type GameState = 'menu' | 'playing' | 'paused' | 'gameover';

// Named actions delivered by the input collaborator; the core never sees key codes
export type Action =
    | 'moveLeft' | 'moveRight' | 'shoot'
    | 'pause' | 'confirm' | 'quit' | 'toggleSound'
    | 'printWaveStats' | 'toggleGodMode' | 'skipWave';

// Sampled every tick while the key is down; every other action fires once per press
export const HELD_ACTIONS: readonly Action[] = ['moveLeft', 'moveRight', 'shoot'];

export type AudioCue = 'shoot' | 'enemyShoot' | 'hit' | 'enemyDeath' | 'shieldBreak' | 'waveStart' | 'gameOver' | 'highscore';

export type BulletOwner = 'player' | 'enemy';
export type EnemyVariant = 'common' | 'tough' | 'shooter';

export interface Player extends Rect {
    id: number;
    lives: number;
    shotTimer: number; // seconds until the next shot is allowed
    invuln: number;    // post-hit grace remaining
    godMode: boolean;
}

export interface Bullet extends Rect { id: number; vy: number; owner: BulletOwner; damage: number; }

interface EnemyBase extends Rect { id: number; hp: number; row: number; col: number; }
export interface CommonEnemy extends EnemyBase { variant: 'common'; }
export interface ToughEnemy extends EnemyBase { variant: 'tough'; }
export interface ShooterEnemy extends EnemyBase { variant: 'shooter'; fireTimer: number; }
export type Enemy = CommonEnemy | ToughEnemy | ShooterEnemy;

export interface Boss extends Rect { id: number; vx: number; points: number; active: boolean; }

export interface Shield extends Rect { id: number; durability: number; group: number; }

export interface ComboState {
    multiplier: number;
    timeSinceLastKill: number;
}

export interface SpawnTable { rows: number; cols: number; common: number; tough: number; shooter: number; }

export interface WaveState {
    wave: number;
    total: number;
    remaining: number;
    baseSpeed: number;
    speedMultiplier: number; // only grows within a wave
    speedIncrement: number;  // added per kill
    fireRate: number;        // grid volley shots/s
    direction: 1 | -1;
    spawnTable: SpawnTable;
    transitionTimer: number | null; // set while waiting to spawn the next grid
}

export interface Tuning {
    playerSpeed: number;
    shotCooldown: number;
    maxPlayerBullets: number;
    enemySpeedMult: number;
    enemyFireMult: number;
    maxEnemyBullets: number;
}

export interface GameSession {
    state: GameState;
    time: number;
    nextEntityId: number;
    rng: Rng;
    tuning: Tuning;
    player: Player;
    bullets: Bullet[];
    enemies: Enemy[];
    boss: Boss | null;
    bossTimer: number;
    shields: Shield[];
    wave: WaveState;
    combo: ComboState;
    score: number;
}

export type CollisionEvent =
    | { kind: 'bulletHitsEnemy'; bulletId: number; enemyId: number; damage: number; destroyed: boolean; }
    | { kind: 'bulletHitsShield'; bulletId: number; shieldId: number; damage: number; destroyed: boolean; }
    | { kind: 'bulletHitsPlayer'; bulletId: number; }
    | { kind: 'bulletHitsBoss'; bulletId: number; bossId: number; }
    | { kind: 'enemyReachesPlayerLine'; enemyId: number; };

export interface HighscoreEntry { name: string; score: number; }

export interface WaveStats {
    wave: number;
    remaining: number;
    total: number;
    speed: number;
    fireRate: number;
    bounds: Rect | null;
}

// Read-only view handed to the renderer each tick
export interface GameSnapshot {
    state: GameState;
    time: number;
    wave: number;
    waveTransition: boolean;
    score: number;
    multiplier: number;
    lives: number;
    godMode: boolean;
    invulnerable: boolean;
    player: Rect;
    enemies: ReadonlyArray<Readonly<Rect & { id: number; variant: EnemyVariant; hp: number; }>>;
    bullets: ReadonlyArray<Readonly<Rect & { id: number; owner: BulletOwner; }>>;
    boss: Readonly<Rect & { id: number; }> | null;
    shields: ReadonlyArray<Readonly<Rect & { id: number; durability: number; }>>;
    events: ReadonlyArray<CollisionEvent>;
    cues: ReadonlyArray<AudioCue>;
    highscores: ReadonlyArray<HighscoreEntry>;
    newHighscore: boolean;
}
