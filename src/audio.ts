// Procedural sound with the Web Audio API: every cue is a few short
// oscillator tones, so the game ships no audio assets.
import { AudioCue } from './types';
import { createLogger } from './logger';

const log = createLogger('audio');

export interface ToneOpts {
    freq: number;
    dur: number;          // seconds
    type?: OscillatorType;
    vol?: number;
    at?: number;          // start offset in seconds
}

export type ToneFn = (opts: ToneOpts) => void;

interface CueSound { gapMs: number; tones: readonly ToneOpts[]; }

// gapMs throttles repeats of the same cue so rapid fire does not turn into a drone
export const CUE_SOUNDS: Record<AudioCue, CueSound> = {
    shoot: { gapMs: 40, tones: [{ freq: 880, dur: 0.06, type: 'square', vol: 0.12 }] },
    enemyShoot: { gapMs: 90, tones: [{ freq: 220, dur: 0.05, type: 'square', vol: 0.06 }] },
    hit: { gapMs: 60, tones: [{ freq: 180, dur: 0.12, type: 'sawtooth', vol: 0.18 }] },
    enemyDeath: {
        gapMs: 30, tones: [
            { freq: 520, dur: 0.05, type: 'triangle', vol: 0.16 },
            { freq: 260, dur: 0.08, type: 'triangle', vol: 0.12, at: 0.04 },
        ],
    },
    shieldBreak: { gapMs: 100, tones: [{ freq: 120, dur: 0.15, type: 'sawtooth', vol: 0.14 }] },
    waveStart: {
        gapMs: 500, tones: [
            { freq: 520, dur: 0.18, type: 'triangle', vol: 0.2 },
            { freq: 780, dur: 0.22, type: 'triangle', vol: 0.18, at: 0.06 },
        ],
    },
    gameOver: {
        gapMs: 1000, tones: [
            { freq: 392, dur: 0.25, type: 'square', vol: 0.14 },
            { freq: 330, dur: 0.25, type: 'square', vol: 0.14, at: 0.22 },
            { freq: 262, dur: 0.45, type: 'square', vol: 0.14, at: 0.44 },
        ],
    },
    highscore: {
        gapMs: 1000, tones: [
            { freq: 523, dur: 0.12, type: 'triangle', vol: 0.18, at: 0.7 },
            { freq: 659, dur: 0.12, type: 'triangle', vol: 0.18, at: 0.82 },
            { freq: 784, dur: 0.3, type: 'triangle', vol: 0.18, at: 0.94 },
        ],
    },
};

let ctx: AudioContext | null = null;

function ensureCtx(): AudioContext | null {
    if (typeof AudioContext === 'undefined') return null;
    if (!ctx) ctx = new AudioContext();
    if (ctx.state === 'suspended') void ctx.resume().catch(err => log.debug('Audio resume refused', { error: String(err) }));
    return ctx;
}

// Browsers keep the context suspended until the first user gesture
export function unlockAudioOnInput(target: EventTarget) {
    for (const ev of ['pointerdown', 'keydown']) target.addEventListener(ev, () => { ensureCtx(); }, { once: true });
}

export const webAudioTone: ToneFn = ({ freq, dur, type = 'sine', vol = 0.2, at = 0 }) => {
    const c = ensureCtx();
    if (!c) return;
    const start = c.currentTime + at;
    const osc = c.createOscillator();
    const gain = c.createGain();
    osc.type = type;
    osc.frequency.value = freq;
    gain.gain.setValueAtTime(vol, start);
    gain.gain.exponentialRampToValueAtTime(Math.max(0.0001, vol * 0.001), start + dur);
    osc.connect(gain).connect(c.destination);
    osc.start(start);
    osc.stop(start + dur);
};

export interface Audio {
    play(cue: AudioCue): boolean;
    toggleMuted(): boolean;
    isMuted(): boolean;
}

export function createAudio(opts: { muted?: boolean; now?: () => number; tone?: ToneFn } = {}): Audio {
    let muted = opts.muted ?? false;
    const now = opts.now ?? (() => performance.now());
    const tone = opts.tone ?? webAudioTone;
    const lastPlay: Partial<Record<AudioCue, number>> = {};
    const throttle = (cue: AudioCue, gapMs: number) => {
        const t = now();
        const last = lastPlay[cue];
        if (last !== undefined && last + gapMs > t) return false;
        lastPlay[cue] = t; return true;
    };
    return {
        play(cue) {
            const sound = CUE_SOUNDS[cue];
            if (muted || !throttle(cue, sound.gapMs)) return false;
            for (const t of sound.tones) tone(t);
            return true;
        },
        toggleMuted() { muted = !muted; return muted; },
        isMuted() { return muted; },
    };
}
