import { Boss, Bullet, CollisionEvent, Enemy, Rect, Shield } from './types';
import { rectsOverlap } from './math';

export interface CollisionWorld {
    readonly bullets: readonly Readonly<Bullet>[];
    readonly enemies: readonly Readonly<Enemy>[];
    readonly shields: readonly Readonly<Shield>[];
    readonly boss: Readonly<Boss> | null;
    readonly player: Readonly<Rect>;
}

// Scans one tick's snapshot and reports every overlap as an event. Nothing is
// removed here: damage already assigned during the scan is tracked so a target
// that is used up cannot be hit (or destroyed) a second time by a later bullet.
export function resolveCollisions(world: CollisionWorld): CollisionEvent[] {
    const events: CollisionEvent[] = [];
    const shieldHp = new Map<number, number>();
    const enemyHp = new Map<number, number>();
    for (const s of world.shields) shieldHp.set(s.id, s.durability);
    for (const e of world.enemies) enemyHp.set(e.id, e.hp);
    let bossTaken = false;

    const hitShield = (b: Readonly<Bullet>): boolean => {
        for (const s of world.shields) {
            const hp = shieldHp.get(s.id) ?? 0;
            if (hp <= 0 || !rectsOverlap(b, s)) continue;
            const left = Math.max(0, hp - b.damage);
            shieldHp.set(s.id, left);
            events.push({ kind: 'bulletHitsShield', bulletId: b.id, shieldId: s.id, damage: b.damage, destroyed: left === 0 });
            return true;
        }
        return false;
    };

    for (const b of world.bullets) {
        // shields first so a bullet never passes through a segment it just broke
        if (hitShield(b)) continue;
        if (b.owner === 'player') {
            const boss = world.boss;
            if (boss && boss.active && !bossTaken && rectsOverlap(b, boss)) {
                bossTaken = true;
                events.push({ kind: 'bulletHitsBoss', bulletId: b.id, bossId: boss.id });
                continue;
            }
            for (const e of world.enemies) {
                const hp = enemyHp.get(e.id) ?? 0;
                if (hp <= 0 || !rectsOverlap(b, e)) continue;
                const left = Math.max(0, hp - b.damage);
                enemyHp.set(e.id, left);
                events.push({ kind: 'bulletHitsEnemy', bulletId: b.id, enemyId: e.id, damage: b.damage, destroyed: left === 0 });
                break;
            }
        } else if (rectsOverlap(b, world.player)) {
            events.push({ kind: 'bulletHitsPlayer', bulletId: b.id });
        }
    }
    return events;
}
