import { readFileSync } from 'node:fs';
import { beforeEach, describe, expect, it } from 'vitest';
import { parseCombatConfig } from '../data/combat';
import { EffectManager } from '../systems/effect-manager';
import { createEffect } from '../systems/effects';
import { createBufferedLogger } from '../systems/engine-messages';
import { StatsLedger } from '../systems/stats-ledger';
import type { EffectEvent } from '../types';

describe('effect manager', () => {
    let ledger: StatsLedger;
    let manager: EffectManager;
    let events: EffectEvent[];

    beforeEach(() => {
        ledger = new StatsLedger();
        manager = new EffectManager({ ledger });
        events = [];
        manager.subscribe(event => events.push(event));
    });

    it('applies and tracks a new effect', () => {
        expect(manager.addEffect(createEffect('spread_shot'))).toBe(true);

        expect(manager.hasEffect('spread_shot')).toBe(true);
        expect(manager.getEffect('spread_shot')?.active).toBe(true);
        expect(ledger.snapshot().spreadEnabled).toBe(true);
        expect(events).toEqual([{ type: 'EffectAdded', name: 'spread_shot' }]);
    });

    it('refreshes a non-stackable effect instead of stacking it', () => {
        const first = createEffect('fire_rate_boost');
        const second = createEffect('fire_rate_boost');
        manager.addEffect(first);
        manager.update(5);
        expect(first.timeRemaining).toBe(3);

        manager.addEffect(second);

        expect(manager.count).toBe(1);
        expect(manager.getEffect('fire_rate_boost')).toBe(first);
        expect(first.timeRemaining).toBe(8);
        expect(second.active).toBe(false);
        expect(events).toEqual([
            { type: 'EffectAdded', name: 'fire_rate_boost' },
            { type: 'EffectRefreshed', name: 'fire_rate_boost', timeRemaining: 8 }
        ]);
    });

    it('stacks effects that opt in', () => {
        manager.addEffect(createEffect('fire_rate_boost', { stackable: true }));
        manager.addEffect(createEffect('fire_rate_boost', { stackable: true }));

        expect(manager.count).toBe(2);
        expect(manager.listEffects().every(effect => effect.active)).toBe(true);
    });

    it('rejects adding the same instance twice', () => {
        const effect = createEffect('fire_rate_boost', { stackable: true });
        manager.addEffect(effect);

        expect(manager.addEffect(effect)).toBe(false);
        expect(manager.count).toBe(1);
    });

    it('expires effects whose timer ran out and rolls them back', () => {
        manager.addEffect(createEffect('invincibility'));
        manager.addEffect(createEffect('spread_shot'));
        events.length = 0;

        manager.update(5);

        expect(manager.hasEffect('invincibility')).toBe(false);
        expect(manager.getEffect('spread_shot')?.timeRemaining).toBe(5);
        expect(ledger.snapshot().invulnerable).toBe(false);
        expect(ledger.snapshot().spreadEnabled).toBe(true);
        expect(events).toEqual([{ type: 'EffectExpired', name: 'invincibility' }]);
    });

    it('advances every effect before removing any', () => {
        const invincibility = createEffect('invincibility', { duration: 2 });
        const boost = createEffect('fire_rate_boost', { duration: 2 });
        manager.addEffect(invincibility);
        manager.addEffect(boost);
        events.length = 0;

        manager.update(2);

        expect(invincibility.timeRemaining).toBe(0);
        expect(boost.timeRemaining).toBe(0);
        expect(manager.count).toBe(0);
        expect(events).toEqual([
            { type: 'EffectExpired', name: 'invincibility' },
            { type: 'EffectExpired', name: 'fire_rate_boost' }
        ]);
    });

    it('keeps permanent effects across any number of ticks', () => {
        manager.addEffect(createEffect('shield_recharge'));

        for (let i = 0; i < 50; i++) manager.update(10);

        expect(manager.hasEffect('shield_recharge')).toBe(true);
    });

    it('removes an effect by name and runs its rollback', () => {
        manager.addEffect(createEffect('spread_shot'));
        events.length = 0;

        expect(manager.removeEffect('spread_shot')).toBe(true);
        expect(manager.removeEffect('spread_shot')).toBe(false);
        expect(ledger.snapshot().spreadEnabled).toBe(false);
        expect(events).toEqual([{ type: 'EffectRemoved', name: 'spread_shot' }]);
    });

    it('clears every effect with rollback', () => {
        manager.addEffect(createEffect('invincibility'));
        manager.addEffect(createEffect('fire_rate_boost'));
        manager.addEffect(createEffect('spread_shot'));
        events.length = 0;

        manager.clearAllEffects();

        const snap = ledger.snapshot();
        expect(manager.count).toBe(0);
        expect(snap.invulnerable).toBe(false);
        expect(snap.fireRateEffectMultiplier).toBe(1);
        expect(snap.spreadEnabled).toBe(false);
        expect(events).toEqual([
            { type: 'EffectRemoved', name: 'invincibility' },
            { type: 'EffectRemoved', name: 'fire_rate_boost' },
            { type: 'EffectRemoved', name: 'spread_shot' }
        ]);
    });

    it('skips work and warns when no ledger is attached', () => {
        const logger = createBufferedLogger();
        const detached = new EffectManager({ logger });

        expect(detached.addEffect(createEffect('invincibility'))).toBe(false);
        expect(() => detached.update(1)).not.toThrow();
        expect(detached.count).toBe(0);
        expect(logger.messages[0]).toBe('[WARN|EFFECTS] No ledger attached; skipped invincibility.');
    });

    it('accepts a ledger attached after construction', () => {
        const detached = new EffectManager();
        detached.attachLedger(ledger);

        expect(detached.addEffect(createEffect('fire_rate_boost'))).toBe(true);
        expect(ledger.snapshot().fireRateEffectMultiplier).toBe(0.5);
    });

    describe('stacked copies', () => {
        const hardcore = parseCombatConfig(
            JSON.parse(readFileSync(new URL('../data/examples/combat-config.hardcore.v1.json', import.meta.url), 'utf8'))
        );

        it('keeps a stacked fire-rate boost active when the older copy expires', () => {
            const stackedLedger = new StatsLedger({ config: hardcore });
            const stacked = new EffectManager({ ledger: stackedLedger });

            stacked.addEffect(createEffect('fire_rate_boost', {}, hardcore));
            stacked.update(3);
            stacked.addEffect(createEffect('fire_rate_boost', {}, hardcore));
            stacked.update(3);

            expect(stacked.count).toBe(1);
            expect(stackedLedger.snapshot().fireRateEffectMultiplier).toBe(0.75);

            stacked.update(3);

            expect(stacked.count).toBe(0);
            expect(stackedLedger.snapshot().fireRateEffectMultiplier).toBe(1);
        });

        it('stays invulnerable while a stacked invincibility copy remains', () => {
            manager.addEffect(createEffect('invincibility', { stackable: true }));
            manager.update(3);
            manager.addEffect(createEffect('invincibility', { stackable: true }));
            manager.update(2);

            expect(manager.count).toBe(1);
            expect(ledger.snapshot().invulnerable).toBe(true);
            expect(ledger.snapshot().invulnerabilityTimeRemaining).toBe(3);
            expect(ledger.takeDamage(10)).toBe(false);
            expect(ledger.currentShields).toBe(50);

            manager.update(3);

            expect(ledger.snapshot().invulnerable).toBe(false);
        });
    });
});
