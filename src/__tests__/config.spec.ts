import { describe, it, expect, afterEach } from 'vitest';
import { loadConfig } from '../config';
import { setLogLevel, setLogSink } from '../logger';

const silence = () => { };

describe('loadConfig', () => {
  afterEach(() => { setLogSink(silence); setLogLevel('info'); });

  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      highscoreKey: 'invaders.highscores',
      sound: true,
      hardMode: false,
      seed: undefined,
      maxFps: 60,
      logLevel: 'info',
    });
  });

  it('parses flags, numbers and the log level', () => {
    const cfg = loadConfig({
      VITE_HIGHSCORE_KEY: 'scores',
      VITE_SOUND: 'off',
      VITE_HARD_MODE: '1',
      VITE_SEED: '42',
      VITE_MAX_FPS: '30',
      VITE_LOG_LEVEL: 'debug',
    });
    expect(cfg).toEqual({
      highscoreKey: 'scores',
      sound: false,
      hardMode: true,
      seed: 42,
      maxFps: 30,
      logLevel: 'debug',
    });
  });

  it('an invalid value resets only its own field and warns', () => {
    const lines: string[] = [];
    setLogSink(l => lines.push(l));
    setLogLevel('debug');
    const cfg = loadConfig({ VITE_MAX_FPS: '1000', VITE_SOUND: 'off' });
    expect(cfg.maxFps).toBe(60);
    expect(cfg.sound).toBe(false);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('WARN [config] Invalid config value, using default');
    expect(lines[0]).toContain('"key":"VITE_MAX_FPS"');
  });

  it('blank and non-string values count as unset', () => {
    expect(loadConfig({ VITE_SEED: '  ' }).seed).toBeUndefined();
    expect(loadConfig({ VITE_HARD_MODE: true }).hardMode).toBe(false);
  });

  it('query parameters override the env', () => {
    const cfg = loadConfig({ VITE_HARD_MODE: 'false', VITE_SEED: '1' }, '?hard=yes&seed=99&fps=30&unknown=1');
    expect(cfg.hardMode).toBe(true);
    expect(cfg.seed).toBe(99);
    expect(cfg.maxFps).toBe(30);
  });
});
