import { GameSnapshot } from '../types';

// Bare playing-state snapshot with the ship in its spawn position
export function makeSnapshot(overrides: Partial<GameSnapshot> = {}): GameSnapshot {
  return {
    state: 'playing',
    time: 0,
    wave: 1,
    waveTransition: false,
    score: 0,
    multiplier: 1,
    lives: 3,
    godMode: false,
    invulnerable: false,
    player: { x: 375, y: 540, w: 50, h: 30 },
    enemies: [],
    bullets: [],
    boss: null,
    shields: [],
    events: [],
    cues: [],
    highscores: [],
    newHighscore: false,
    ...overrides,
  };
}
