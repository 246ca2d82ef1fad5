// Centralized balance & tuning constants.
// Adjust these values to rebalance the game without hunting through logic files.

// Logical playfield (pixels); the renderer scales it to fit the canvas
export const WORLD = {
    WIDTH: 800,
    HEIGHT: 600,
};

// The simulation always advances in slices of at most this many seconds,
// whatever the display refresh rate
export const SIM = {
    STEP: 1 / 60,
    MAX_CATCH_UP: 8,     // steps per frame before the backlog is dropped
};

export const PLAYER = {
    WIDTH: 50,
    HEIGHT: 30,
    SPEED: 300,          // px/s
    EDGE_MARGIN: 10,
    BOTTOM_OFFSET: 30,   // distance from the bottom of the playfield
    SHOT_COOLDOWN: 0.25, // seconds
    MAX_BULLETS: 3,
    LIVES: 3,
    HIT_GRACE: 1.5,      // seconds of invulnerability after a hit
};

export const BULLET = {
    WIDTH: 4,
    HEIGHT: 12,
    PLAYER_SPEED: -500, // negative = up
    ENEMY_SPEED: 300,
    DAMAGE: 1,
};

export const ENEMY = {
    WIDTH: 44,
    HEIGHT: 28,
    COLS: 8,
    MIN_ROWS: 3,
    MAX_ROWS: 6,
    START_X: 60,
    START_Y: 70,
    SPACING_X: 70,
    SPACING_Y: 50,
    START_SPEED: 72,       // px/s at wave 1
    STEP_DOWN: 20,
    EDGE_MARGIN: 20,
    KILL_ACCEL: 0.6,       // grid speed grows by up to +60% as it thins out
    FIRE_RATE: 0.28,       // grid volley shots/s at wave 1
    MAX_BULLETS: 6,
    SHOOTER_FIRE_MIN: 1.5, // seconds
    SHOOTER_FIRE_MAX: 3.5,
};

export const ENEMY_STATS = {
    common: { hp: 1, points: 10 },
    tough: { hp: 2, points: 20 },
    shooter: { hp: 1, points: 30 },
} as const;

export const BOSS = {
    WIDTH: 60,
    HEIGHT: 24,
    Y: 50,
    START_X: -80,
    SPEED: 200,
    EXIT_MARGIN: 40,
    POINTS: 100,
    COOLDOWN_MIN: 20,
    COOLDOWN_MAX: 30,
};

export const SHIELD = {
    COUNT: 4,
    SEG_ROWS: 3,
    SEG_COLS: 6,
    SEG_SIZE: 12,
    DURABILITY: 3,
    MARGIN_X: 80,
    OFFSET_FROM_BOTTOM: 180,
};

// Per-wave difficulty curve
export const WAVE = {
    SPEED_MULT: 1.10,
    FIRE_MULT: 1.05,
    TOUGH_RATIO_STEP: 0.1,
    TOUGH_RATIO_MAX: 0.4,
    SHOOTER_RATIO_STEP: 0.05,
    SHOOTER_RATIO_MAX: 0.2,
    TRANSITION_DELAY: 1.5, // seconds between a cleared grid and the next spawn
};

export const COMBO = {
    WINDOW: 1.0, // seconds of simulated time
    MAX_MULTIPLIER: 8,
};

// Hard mode scaling
export const HARD_MODE = {
    PLAYER_SPEED_MULT: 1.2,
    SHOT_COOLDOWN_MULT: 0.8,
    EXTRA_PLAYER_BULLETS: 1,
    ENEMY_SPEED_MULT: 1.2,
    ENEMY_FIRE_MULT: 1.2,
    EXTRA_ENEMY_BULLETS: 1,
};

export const HIGHSCORE_LIMIT = 5;
