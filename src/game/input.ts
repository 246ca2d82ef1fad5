import { Action, HELD_ACTIONS } from '../types';

// KeyboardEvent.key values; single characters are matched case-insensitively
export const KEY_BINDINGS: Readonly<Record<string, Action>> = {
  ArrowLeft: 'moveLeft', a: 'moveLeft',
  ArrowRight: 'moveRight', d: 'moveRight',
  ' ': 'shoot',
  p: 'pause',
  Enter: 'confirm',
  Escape: 'quit',
  s: 'toggleSound',
  F1: 'printWaveStats', F2: 'toggleGodMode', F3: 'skipWave',
};

export interface InputState {
  held: Partial<Record<Action, boolean>>;
  queue: Action[];
}

export function createInputState(): InputState { return { held: {}, queue: [] }; }

export function keyToAction(key: string): Action | null {
  return KEY_BINDINGS[key.length === 1 ? key.toLowerCase() : key] ?? null;
}

export function handleKeyDown(input: InputState, key: string, repeat = false): Action | null {
  const action = keyToAction(key);
  if (!action) return null;
  if (HELD_ACTIONS.includes(action)) input.held[action] = true;
  // auto-repeat never re-fires a one-shot; a double press within one frame counts once
  else if (!repeat && !input.queue.includes(action)) input.queue.push(action);
  return action;
}

export function handleKeyUp(input: InputState, key: string) {
  const action = keyToAction(key);
  if (action && HELD_ACTIONS.includes(action)) input.held[action] = false;
}

// Focus loss swallows the keyup events
export function releaseAll(input: InputState) { input.held = {}; }

// Actions for one tick: everything held plus the queued one-shots
export function sampleActions(input: InputState): Action[] {
  const out: Action[] = HELD_ACTIONS.filter(a => input.held[a]);
  out.push(...input.queue);
  input.queue = [];
  return out;
}

export type KeyTarget = Pick<Window, 'addEventListener' | 'removeEventListener'>;

export function setupKeyboard(target: KeyTarget, input: InputState): () => void {
  const onDown = (e: KeyboardEvent) => {
    // bound keys would otherwise scroll the page or open browser help
    if (handleKeyDown(input, e.key, e.repeat)) e.preventDefault();
  };
  const onUp = (e: KeyboardEvent) => { handleKeyUp(input, e.key); };
  const onBlur = () => { releaseAll(input); };
  target.addEventListener('keydown', onDown);
  target.addEventListener('keyup', onUp);
  target.addEventListener('blur', onBlur);
  return () => {
    target.removeEventListener('keydown', onDown);
    target.removeEventListener('keyup', onUp);
    target.removeEventListener('blur', onBlur);
  };
}
