import * as PIXI from 'pixi.js';
import { Game } from './game';
import { GameSnapshot } from './types';
import { buildTuning } from './balanceUtils';
import { loadBrowserConfig } from './config';
import { StorageHighscoreStore } from './highscores';
import { createLogger, setLogLevel } from './logger';
import { forkRng, randomRng } from './rng';
import { createAudio, unlockAudioOnInput } from './audio';
import { createInputState, sampleActions, setupKeyboard } from './game/input';
import { PixiRenderer } from './game/render';
import { createEffects, reactToSnapshot, shakeOffset, updateEffects } from './game/particles';
import { createStepper } from './game/loop';

const log = createLogger('main');

async function bootstrap(root: HTMLElement) {
    const config = loadBrowserConfig();
    setLogLevel(config.logLevel);
    const seed = config.seed ?? Date.now();
    log.info('Starting', { seed, hardMode: config.hardMode, maxFps: config.maxFps });

    const rng = randomRng(seed);
    // particles get their own stream so cosmetics never shift gameplay
    const fxRng = forkRng(rng);
    const game = new Game({
        store: new StorageHighscoreStore(window.localStorage, config.highscoreKey, createLogger('highscores')),
        tuning: buildTuning(config.hardMode),
        rng,
    });
    const audio = createAudio({ muted: !config.sound });
    unlockAudioOnInput(window);
    game.events.on('soundToggle', () => { log.info('Sound toggled', { muted: audio.toggleMuted() }); });
    game.events.on('stateChange', e => log.debug('State change', e));
    game.events.on('waveStart', e => log.debug('Wave start', e));

    const app = new PIXI.Application();
    await app.init({ resizeTo: root, background: '#05070d', antialias: false });
    root.appendChild(app.canvas);
    const renderer = new PixiRenderer(app);

    const input = createInputState();
    const stopKeyboard = setupKeyboard(window, input);
    const fx = createEffects();
    let snap: GameSnapshot = game.snapshot();

    const stepper = createStepper(dt => {
        const next = game.tick(sampleActions(input), dt);
        for (const cue of next.cues) audio.play(cue);
        reactToSnapshot(fx, snap, next, fxRng);
        updateEffects(fx, dt);
        snap = next;
    });

    const frame = (ticker: PIXI.Ticker) => {
        stepper.advance(ticker.deltaMS);
        if (game.quitRequested) {
            app.ticker.remove(frame);
            stopKeyboard();
            renderer.farewell();
            log.info('Exiting', { score: snap.score });
            return;
        }
        renderer.draw(snap, fx, { soundOn: !audio.isMuted(), shake: shakeOffset(fx, fxRng) });
    };
    app.ticker.maxFPS = config.maxFps;
    app.ticker.add(frame);

    window.addEventListener('error', e => log.error('Uncaught error', { message: e.message }));
    window.addEventListener('unhandledrejection', e => log.error('Unhandled rejection', { reason: String(e.reason) }));
}

const root = document.getElementById('app');
if (!root) throw new Error('Missing #app element');
void bootstrap(root).catch(err => log.error('Startup failed', { error: String(err) }));
