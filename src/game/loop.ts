import { SIM } from '../constants/balance';

export interface StepperOptions {
  stepSeconds?: number;
  // upper bound on catch-up steps in one frame; a larger backlog is dropped
  maxSteps?: number;
}

export interface Stepper {
  // Feeds wall-clock time in; returns how many steps ran
  advance(elapsedMs: number): number;
  reset(): void;
}

// Absorbs float drift when frames are an exact multiple of the step
const EPSILON_MS = 1e-6;

// Fixed-timestep accumulator: the display frame rate decides how many steps
// run per frame, never how long a step is
export function createStepper(step: (dt: number) => void, opts: StepperOptions = {}): Stepper {
  const dt = opts.stepSeconds ?? SIM.STEP;
  const stepMs = dt * 1000;
  const maxSteps = opts.maxSteps ?? SIM.MAX_CATCH_UP;
  let acc = 0;
  return {
    advance(elapsedMs) {
      if (!(elapsedMs > 0)) return 0;
      acc += elapsedMs;
      let steps = 0;
      while (acc + EPSILON_MS >= stepMs && steps < maxSteps) {
        step(dt);
        acc -= stepMs;
        steps++;
      }
      acc = acc + EPSILON_MS >= stepMs ? 0 : Math.max(0, acc);
      return steps;
    },
    reset() { acc = 0; },
  };
}
