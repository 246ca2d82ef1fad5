import { z } from 'zod';
import { LogLevel, createLogger } from './logger';

const log = createLogger('config');

export interface AppConfig {
    highscoreKey: string;
    sound: boolean;
    hardMode: boolean;
    seed: number | undefined;
    maxFps: number;
    logLevel: LogLevel;
}

const flag = z.enum(['1', '0', 'true', 'false', 'on', 'off', 'yes', 'no']).transform(v => v === '1' || v === 'true' || v === 'on' || v === 'yes');

const fields = {
    VITE_HIGHSCORE_KEY: z.string().min(1).default('invaders.highscores'),
    VITE_SOUND: flag.default('on'),
    VITE_HARD_MODE: flag.default('false'),
    VITE_SEED: z.coerce.number().int().optional(),
    VITE_MAX_FPS: z.coerce.number().int().min(10).max(240).default(60),
    VITE_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
};

const envSchema = z.object(fields);
type Env = z.infer<typeof envSchema>;
type EnvKey = keyof typeof fields;
const ENV_KEYS: readonly EnvKey[] = ['VITE_HIGHSCORE_KEY', 'VITE_SOUND', 'VITE_HARD_MODE', 'VITE_SEED', 'VITE_MAX_FPS', 'VITE_LOG_LEVEL'];

// ?hard=1&seed=42 on the page URL wins over the build-time env
export const QUERY_KEYS: Readonly<Record<string, EnvKey>> = {
    sound: 'VITE_SOUND',
    hard: 'VITE_HARD_MODE',
    seed: 'VITE_SEED',
    fps: 'VITE_MAX_FPS',
    log: 'VITE_LOG_LEVEL',
};

// A bad value only resets its own field to the default
function parseEnv(raw: Partial<Record<EnvKey, string>>): Env {
    const first = envSchema.safeParse(raw);
    if (first.success) return first.data;
    for (const issue of first.error.issues) {
        const key = ENV_KEYS.find(k => k === issue.path[0]);
        if (!key) continue;
        log.warn('Invalid config value, using default', { key, value: raw[key], reason: issue.message });
        delete raw[key];
    }
    return envSchema.parse(raw);
}

function collect(env: Readonly<Record<string, unknown>>, search: string): Partial<Record<EnvKey, string>> {
    const raw: Partial<Record<EnvKey, string>> = {};
    for (const key of ENV_KEYS) {
        const v = env[key];
        if (typeof v === 'string' && v.trim()) raw[key] = v.trim();
    }
    for (const [name, value] of new URLSearchParams(search)) {
        const key = QUERY_KEYS[name];
        if (key && value.trim()) raw[key] = value.trim();
    }
    return raw;
}

export function loadConfig(env: Readonly<Record<string, unknown>>, search: string = ''): AppConfig {
    const parsed = parseEnv(collect(env, search));
    return {
        highscoreKey: parsed.VITE_HIGHSCORE_KEY,
        sound: parsed.VITE_SOUND,
        hardMode: parsed.VITE_HARD_MODE,
        seed: parsed.VITE_SEED,
        maxFps: parsed.VITE_MAX_FPS,
        logLevel: parsed.VITE_LOG_LEVEL,
    };
}

// Vite has already merged .env files into import.meta.env at build time
export function loadBrowserConfig(): AppConfig {
    return loadConfig(import.meta.env, window.location.search);
}
