import { Action, AudioCue, HELD_ACTIONS, CollisionEvent, Enemy, GameSession, GameSnapshot, GameState, HighscoreEntry, Shield, Tuning } from './types';
import { BOSS, SIM } from './constants/balance';
import { buildTuning } from './balanceUtils';
import { randomRng, randRange, Rng } from './rng';
import { absorbHit, createBullet, createPlayer, createShields, damageEnemy, enemyPoints, hitPlayer, isInvulnerable, PlayerInput, updateBullet, updatePlayer } from './entities';
import { resolveCollisions } from './collision';
import { advanceBoss, advanceWave, allocId, checkDefenseLine, checkWaveCleared, createWaveState, onEnemyKilled, skipWave, startWave, waveStats } from './wave';
import { createCombo, registerKill, tickCombo } from './combo';
import { accepts, nextState } from './state';
import { EventBus } from './events';
import { HighscoreStore, qualifies } from './highscores';
import { createLogger, Logger } from './logger';

export interface GameOptions {
    store: HighscoreStore;
    tuning?: Tuning;
    rng?: Rng;
    events?: EventBus;
    logger?: Logger;
}

export function createSession(state: GameState, rng: Rng, tuning: Tuning): GameSession {
    const gs: GameSession = {
        state,
        time: 0,
        nextEntityId: 1,
        rng,
        tuning,
        player: createPlayer(0),
        bullets: [],
        enemies: [],
        boss: null,
        bossTimer: randRange(rng, BOSS.COOLDOWN_MIN, BOSS.COOLDOWN_MAX),
        shields: [],
        wave: createWaveState(1, tuning),
        combo: createCombo(),
        score: 0,
    };
    gs.shields = createShields(() => allocId(gs));
    return gs;
}

export function substeps(dt: number): number {
    return dt > 0 ? Math.ceil(dt / SIM.STEP - 1e-9) : 0;
}

// Owns the current session and runs one atomic tick at a time:
// input -> entity update -> collisions -> score -> snapshot.
export class Game {
    gs: GameSession;
    readonly events: EventBus;
    highscores: HighscoreEntry[];
    newHighscore = false;
    quitRequested = false;
    private readonly store: HighscoreStore;
    private readonly rng: Rng;
    private readonly tuning: Tuning;
    private readonly log: Logger;

    constructor(opts: GameOptions) {
        this.store = opts.store;
        this.rng = opts.rng ?? randomRng(Date.now());
        this.tuning = opts.tuning ?? buildTuning(false);
        this.events = opts.events ?? new EventBus();
        this.log = opts.logger ?? createLogger('game');
        this.gs = createSession('menu', this.rng, this.tuning);
        this.highscores = this.store.load();
    }

    get state(): GameState { return this.gs.state; }

    // A long dt is split into equal slices no longer than SIM.STEP so fast
    // bullets cannot pass through a target between two collision passes
    tick(actions: readonly Action[], dt: number): GameSnapshot {
        const total = Number.isFinite(dt) && dt > 0 ? dt : 0;
        const cues: AudioCue[] = [];
        for (const a of actions) {
            if (!HELD_ACTIONS.includes(a)) this.handleAction(a, cues);
        }
        const events: CollisionEvent[] = [];
        if (this.gs.state === 'playing') {
            const input: PlayerInput = { left: actions.includes('moveLeft'), right: actions.includes('moveRight'), shoot: actions.includes('shoot') };
            const slices = substeps(total);
            const slice = slices > 0 ? total / slices : 0;
            for (let i = 0; i < Math.max(1, slices) && this.gs.state === 'playing'; i++) events.push(...this.step(input, slice, cues));
        }
        return this.snapshot(events, cues);
    }

    private handleAction(a: Action, cues: AudioCue[]) {
        const gs = this.gs;
        if (!accepts(gs.state, a)) return;
        const next = nextState(gs.state, a);
        if (next === 'exit') { this.quitRequested = true; return; }
        if (next) { this.transition(next, cues); return; }
        switch (a) {
            case 'toggleSound':
                this.events.emit('soundToggle', {});
                break;
            case 'toggleGodMode':
                gs.player.godMode = !gs.player.godMode;
                this.log.info('God mode toggled', { enabled: gs.player.godMode });
                this.events.emit('godMode', { enabled: gs.player.godMode });
                break;
            case 'printWaveStats': {
                const stats = waveStats(gs);
                this.log.info('Wave stats', { ...stats });
                this.events.emit('waveStats', stats);
                break;
            }
            case 'skipWave':
                skipWave(gs);
                this.log.debug('Wave skipped', { wave: gs.wave.wave });
                break;
        }
    }

    private transition(to: GameState, cues: AudioCue[]) {
        const from = this.gs.state;
        if (from === 'menu' && to === 'playing') {
            const godMode = this.gs.player.godMode;
            this.gs = createSession('playing', this.rng, this.tuning);
            this.gs.player.godMode = godMode;
            this.newHighscore = false;
            startWave(this.gs, 1, cues);
            this.events.emit('waveStart', { wave: 1 });
        } else if (to === 'gameover') {
            this.newHighscore = qualifies(this.highscores, this.gs.score);
            cues.push('gameOver');
            if (this.newHighscore) cues.push('highscore');
            this.log.info('Game over', { score: this.gs.score, wave: this.gs.wave.wave });
            this.events.emit('gameover', { score: this.gs.score, wave: this.gs.wave.wave, newHighscore: this.newHighscore });
        } else if (from === 'gameover' && to === 'menu' && this.newHighscore) {
            this.highscores = this.store.submit(this.gs.score);
            this.log.info('Highscore saved', { score: this.gs.score });
        }
        this.gs.state = to;
        this.events.emit('stateChange', { from, to });
    }

    private step(input: PlayerInput, dt: number, cues: AudioCue[]): CollisionEvent[] {
        const gs = this.gs;
        gs.time += dt;

        // entities
        let playerBullets = 0;
        for (const b of gs.bullets) if (b.owner === 'player') playerBullets++;
        const muzzle = updatePlayer(gs.player, input, dt, gs.tuning, playerBullets);
        if (muzzle) { gs.bullets.push(createBullet(allocId(gs), 'player', muzzle)); cues.push('shoot'); }
        const waveBefore = gs.wave.wave;
        advanceWave(gs, dt, cues);
        if (gs.wave.wave !== waveBefore) this.events.emit('waveStart', { wave: gs.wave.wave });
        advanceBoss(gs, dt);
        gs.bullets = gs.bullets.filter(b => updateBullet(b, dt));

        // collisions against a stable snapshot, removals applied afterwards
        const events = [...resolveCollisions(gs), ...checkDefenseLine(gs)];
        const { kills, breached } = this.applyEvents(events, cues);

        // score
        tickCombo(gs.combo, dt);
        for (const points of kills) gs.score += registerKill(gs.combo, points);

        const defeat = breached || gs.player.lives <= 0 ? nextState(gs.state, 'defeat') : null;
        if (defeat && defeat !== 'exit') this.transition(defeat, cues);
        else checkWaveCleared(gs);
        return events;
    }

    private applyEvents(events: readonly CollisionEvent[], cues: AudioCue[]): { kills: number[]; breached: boolean } {
        const gs = this.gs;
        const spentBullets = new Set<number>();
        const deadEnemies = new Set<number>();
        const brokenShields = new Set<number>();
        const enemies = new Map<number, Enemy>(gs.enemies.map(e => [e.id, e]));
        const shields = new Map<number, Shield>(gs.shields.map(s => [s.id, s]));
        const kills: number[] = [];
        let breached = false;
        for (const ev of events) {
            switch (ev.kind) {
                case 'bulletHitsEnemy': {
                    spentBullets.add(ev.bulletId);
                    const e = enemies.get(ev.enemyId);
                    if (!e || deadEnemies.has(e.id)) break;
                    cues.push('hit');
                    if (damageEnemy(e, ev.damage)) {
                        deadEnemies.add(e.id);
                        onEnemyKilled(gs);
                        kills.push(enemyPoints(e));
                        cues.push('enemyDeath');
                    }
                    break;
                }
                case 'bulletHitsShield': {
                    spentBullets.add(ev.bulletId);
                    const s = shields.get(ev.shieldId);
                    if (!s || brokenShields.has(s.id)) break;
                    if (absorbHit(s, ev.damage)) { brokenShields.add(s.id); cues.push('shieldBreak'); }
                    break;
                }
                case 'bulletHitsPlayer':
                    spentBullets.add(ev.bulletId);
                    if (hitPlayer(gs.player)) cues.push('hit');
                    break;
                case 'bulletHitsBoss':
                    spentBullets.add(ev.bulletId);
                    if (gs.boss && gs.boss.id === ev.bossId && gs.boss.active) {
                        gs.boss.active = false;
                        kills.push(gs.boss.points);
                        cues.push('enemyDeath');
                    }
                    break;
                case 'enemyReachesPlayerLine':
                    breached = true;
                    break;
            }
        }
        if (spentBullets.size) gs.bullets = gs.bullets.filter(b => !spentBullets.has(b.id));
        if (deadEnemies.size) gs.enemies = gs.enemies.filter(e => !deadEnemies.has(e.id));
        if (brokenShields.size) gs.shields = gs.shields.filter(s => !brokenShields.has(s.id));
        if (gs.boss && !gs.boss.active) gs.boss = null;
        return { kills, breached };
    }

    snapshot(events: readonly CollisionEvent[] = [], cues: readonly AudioCue[] = []): GameSnapshot {
        const gs = this.gs;
        const p = gs.player;
        return {
            state: gs.state,
            time: gs.time,
            wave: gs.wave.wave,
            waveTransition: gs.wave.transitionTimer !== null,
            score: gs.score,
            multiplier: gs.combo.multiplier,
            lives: p.lives,
            godMode: p.godMode,
            invulnerable: isInvulnerable(p),
            player: { x: p.x, y: p.y, w: p.w, h: p.h },
            enemies: gs.enemies.map(e => ({ id: e.id, x: e.x, y: e.y, w: e.w, h: e.h, variant: e.variant, hp: e.hp })),
            bullets: gs.bullets.map(b => ({ id: b.id, x: b.x, y: b.y, w: b.w, h: b.h, owner: b.owner })),
            boss: gs.boss ? { id: gs.boss.id, x: gs.boss.x, y: gs.boss.y, w: gs.boss.w, h: gs.boss.h } : null,
            shields: gs.shields.map(s => ({ id: s.id, x: s.x, y: s.y, w: s.w, h: s.h, durability: s.durability })),
            events: [...events],
            cues: [...cues],
            highscores: this.highscores.map(h => ({ ...h })),
            newHighscore: this.newHighscore,
        };
    }
}
