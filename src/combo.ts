import { ComboState } from './types';
import { COMBO } from './constants/balance';

export interface ComboRules { window: number; maxMultiplier: number; }

export const DEFAULT_COMBO_RULES: ComboRules = { window: COMBO.WINDOW, maxMultiplier: COMBO.MAX_MULTIPLIER };

export function createCombo(): ComboState {
    return { multiplier: 1, timeSinceLastKill: Infinity };
}

// Idle decay: once the window has elapsed without a kill the streak is gone
export function tickCombo(c: ComboState, dt: number, rules: ComboRules = DEFAULT_COMBO_RULES): void {
    c.timeSinceLastKill += dt;
    if (c.timeSinceLastKill > rules.window) c.multiplier = 1;
}

// Returns the points earned for this kill
export function registerKill(c: ComboState, basePoints: number, rules: ComboRules = DEFAULT_COMBO_RULES): number {
    if (c.timeSinceLastKill <= rules.window) c.multiplier = Math.min(rules.maxMultiplier, c.multiplier + 1);
    else c.multiplier = 1;
    c.timeSinceLastKill = 0;
    return basePoints * c.multiplier;
}
