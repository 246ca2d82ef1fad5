import { GameSnapshot, HighscoreEntry } from '../types';

export const TITLE = 'Space Invaders';

export function formatLives(lives: number): string { return lives > 0 ? '♥'.repeat(lives) : '-'; }

export function formatScore(score: number, multiplier: number): string {
    return multiplier > 1 ? `Score: ${score} x${multiplier}` : `Score: ${score}`;
}

export function hudLine(snap: GameSnapshot): string {
    const high = snap.highscores.length ? snap.highscores[0].score : 0;
    const parts = [formatScore(snap.score, snap.multiplier), `High: ${high}`, `Wave: ${snap.wave}`, `Lives: ${formatLives(snap.lives)}`];
    if (snap.godMode) parts.push('GODMODE');
    return parts.join('   ');
}

export function highscoreLines(list: readonly HighscoreEntry[]): string[] {
    if (!list.length) return ['No scores yet'];
    return list.map((h, i) => `${i + 1}. ${String(h.score).padStart(6)}  ${h.name}`);
}

export function menuLines(snap: GameSnapshot, soundOn: boolean): string[] {
    return [
        TITLE,
        '',
        'Press Enter to Start',
        '',
        'Top-5 Highscores:',
        ...highscoreLines(snap.highscores),
        '',
        'Left/Right or A/D - Move',
        'Space - Shoot',
        'P - Pause   Esc - Quit',
        `S - Sound (${soundOn ? 'on' : 'off'})`,
    ];
}

export function pausedLines(): string[] {
    return ['Paused', '', 'Press P or Enter to continue', 'Esc to quit'];
}

export function gameOverLines(snap: GameSnapshot): string[] {
    const lines = ['Game Over', '', `Your score: ${snap.score}`, `Wave reached: ${snap.wave}`];
    if (snap.newHighscore) lines.push('New Highscore!');
    lines.push('', 'Press Enter for Menu');
    return lines;
}

// Centre-screen text for the current state, or null during plain play
export function overlayLines(snap: GameSnapshot, soundOn: boolean): string[] | null {
    switch (snap.state) {
        case 'menu': return menuLines(snap, soundOn);
        case 'paused': return pausedLines();
        case 'gameover': return gameOverLines(snap);
        case 'playing': return snap.waveTransition ? [`Wave ${snap.wave} cleared`] : null;
    }
}

export function farewellLines(): string[] {
    return ['Thanks for playing', '', 'Reload the page to play again'];
}
