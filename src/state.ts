import { Action, GameState } from './types';

// 'defeat' is raised by the frame loop (no lives left, or the grid reached the defense line)
export type Trigger = Action | 'defeat';
export type Transition = GameState | 'exit';

const TRANSITIONS: { [S in GameState]: Partial<Record<Trigger, Transition>> } = {
    menu: { confirm: 'playing', quit: 'exit' },
    playing: { pause: 'paused', quit: 'paused', defeat: 'gameover' },
    paused: { pause: 'playing', confirm: 'playing', quit: 'exit' },
    gameover: { confirm: 'menu', quit: 'menu' },
};

// Actions the current state accepts without changing state
const IN_STATE_ACTIONS: { [S in GameState]: readonly Action[] } = {
    menu: ['toggleSound', 'toggleGodMode', 'printWaveStats'],
    playing: ['moveLeft', 'moveRight', 'shoot', 'toggleGodMode', 'printWaveStats', 'skipWave'],
    paused: ['toggleGodMode', 'printWaveStats'],
    gameover: ['printWaveStats'],
};

// Returns the target of a transition, or null when the trigger does not move the machine
export function nextState(state: GameState, trigger: Trigger): Transition | null {
    return TRANSITIONS[state][trigger] ?? null;
}

export function accepts(state: GameState, action: Action): boolean {
    return nextState(state, action) !== null || IN_STATE_ACTIONS[state].includes(action);
}
