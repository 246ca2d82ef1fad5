import { z } from 'zod';
import { HighscoreEntry } from './types';
import { HIGHSCORE_LIMIT } from './constants/balance';
import { createLogger, Logger } from './logger';

export const ANONYMOUS = 'anonymous';

export interface HighscoreStore {
    load(): HighscoreEntry[];
    submit(score: number, name?: string): HighscoreEntry[];
}

const entrySchema = z.object({ name: z.string().min(1).catch(ANONYMOUS), score: z.number().int().nonnegative() });
// Older saves stored bare integers
const legacyEntry = z.number().int().nonnegative().transform((score): HighscoreEntry => ({ name: ANONYMOUS, score }));
const payloadSchema = z.object({
    top: z.array(z.union([entrySchema, legacyEntry])),
    lastUpdated: z.string().optional(),
});

export type HighscorePayload = z.infer<typeof payloadSchema>;

// Equal scores keep submission order: the newcomer goes after existing ties
export function insertScore(list: readonly HighscoreEntry[], entry: HighscoreEntry, limit: number = HIGHSCORE_LIMIT): HighscoreEntry[] {
    const next = [...list];
    let i = next.findIndex(e => e.score < entry.score);
    if (i < 0) i = next.length;
    next.splice(i, 0, entry);
    return next.slice(0, limit);
}

export function qualifies(list: readonly HighscoreEntry[], score: number, limit: number = HIGHSCORE_LIMIT): boolean {
    if (score <= 0) return false;
    return list.length < limit || score > list[limit - 1].score;
}

export function normalize(entries: readonly HighscoreEntry[], limit: number = HIGHSCORE_LIMIT): HighscoreEntry[] {
    let out: HighscoreEntry[] = [];
    for (const e of entries) out = insertScore(out, e, limit);
    return out;
}

export class MemoryHighscoreStore implements HighscoreStore {
    private top: HighscoreEntry[];
    constructor(initial: readonly HighscoreEntry[] = []) { this.top = normalize(initial); }
    load(): HighscoreEntry[] { return [...this.top]; }
    submit(score: number, name: string = ANONYMOUS): HighscoreEntry[] {
        this.top = insertScore(this.top, { name, score });
        return [...this.top];
    }
}

export type HighscoreStorage = Pick<Storage, 'getItem' | 'setItem'>;

// localStorage-backed store. A missing or malformed entry reads as an empty
// list; a failed write is logged and the session carries on without persistence.
export class StorageHighscoreStore implements HighscoreStore {
    constructor(private readonly storage: HighscoreStorage, private readonly key: string, private readonly log: Logger = createLogger('highscores')) { }

    load(): HighscoreEntry[] {
        let raw: string | null;
        try {
            raw = this.storage.getItem(this.key);
        } catch (err) {
            this.log.warn('Could not read highscores', { key: this.key, error: String(err) });
            return [];
        }
        if (raw === null) return [];
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            this.log.warn('Stored highscores are not valid JSON, starting empty', { key: this.key });
            return [];
        }
        const parsed = payloadSchema.safeParse(json);
        if (!parsed.success) {
            this.log.warn('Stored highscores have an unexpected shape, starting empty', { key: this.key, issues: parsed.error.issues.length });
            return [];
        }
        return normalize(parsed.data.top);
    }

    submit(score: number, name: string = ANONYMOUS): HighscoreEntry[] {
        const top = insertScore(this.load(), { name, score });
        const payload: HighscorePayload = { top, lastUpdated: new Date().toISOString() };
        try {
            this.storage.setItem(this.key, JSON.stringify(payload));
        } catch (err) {
            this.log.warn('Could not save highscores, continuing without persistence', { key: this.key, error: String(err) });
        }
        return top;
    }
}
