import { GameState, WaveStats } from './types';

export type GameEventMap = {
    stateChange: { from: GameState; to: GameState };
    waveStart: { wave: number };
    gameover: { score: number; wave: number; newHighscore: boolean };
    soundToggle: Record<string, never>;
    godMode: { enabled: boolean };
    waveStats: WaveStats;
};

export type GameEvent = keyof GameEventMap;
type Handler<T> = (payload: T) => void;

// Subscriptions live as long as the Game: the host wires them once at startup
export class EventBus {
    private listeners: { [K in GameEvent]?: Handler<GameEventMap[K]>[] } = {};

    on<K extends GameEvent>(type: K, fn: Handler<GameEventMap[K]>) {
        const list: NonNullable<EventBus["listeners"][K]> = this.listeners[type] ?? [];
        list.push(fn);
        this.listeners[type] = list;
    }

    emit<K extends GameEvent>(type: K, payload: GameEventMap[K]) {
        for (const fn of this.listeners[type] ?? []) fn(payload);
    }
}
