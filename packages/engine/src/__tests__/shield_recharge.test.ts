import { beforeEach, describe, expect, it } from 'vitest';
import { resolveCombatConfig } from '../data/combat';
import { EffectManager } from '../systems/effect-manager';
import type { Effect } from '../systems/effects';
import { createEffect } from '../systems/effects';
import { StatsLedger } from '../systems/stats-ledger';

describe('shield recharge', () => {
    let ledger: StatsLedger;
    let manager: EffectManager;
    let recharge: Effect<'shield_recharge'>;

    beforeEach(() => {
        ledger = new StatsLedger();
        manager = new EffectManager({ ledger });
        recharge = createEffect('shield_recharge');
        manager.addEffect(recharge);
    });

    it('uses the configured rate and delay', () => {
        expect(recharge.data.rate).toBe(5);
        expect(recharge.data.delay).toBe(3);
        expect(recharge.permanent).toBe(true);
    });

    it('waits out the delay after damage before regenerating', () => {
        ledger.takeDamage(20);
        expect(ledger.currentShields).toBe(30);

        manager.update(1);
        manager.update(1);
        manager.update(1);
        expect(ledger.currentShields).toBe(30);
        expect(manager.hasEffect('shield_recharge')).toBe(true);

        manager.update(1);
        expect(ledger.currentShields).toBe(35);
    });

    it('restarts the delay when damaged again', () => {
        ledger.takeDamage(20);
        manager.update(4);
        expect(ledger.currentShields).toBe(35);

        ledger.takeDamage(5);
        expect(recharge.data.timeSinceDamage).toBe(0);

        manager.update(3);
        expect(ledger.currentShields).toBe(30);

        manager.update(1);
        expect(ledger.currentShields).toBe(35);
    });

    it('credits whole points and carries the fraction', () => {
        ledger.takeDamage(20);
        manager.update(3);

        manager.update(0.5);
        expect(ledger.currentShields).toBe(32);
        expect(recharge.data.accumulator).toBe(0.5);

        manager.update(0.5);
        expect(ledger.currentShields).toBe(35);
        expect(recharge.data.accumulator).toBe(0);
    });

    it('does not treat its own credits as damage', () => {
        ledger.takeDamage(20);
        manager.update(4);
        manager.update(1);

        expect(ledger.currentShields).toBe(40);
        expect(recharge.data.timeSinceDamage).toBe(5);
    });

    it('caps at max shields and drops the accumulator while full', () => {
        ledger.takeDamage(2);
        manager.update(3);
        manager.update(1);
        expect(ledger.currentShields).toBe(50);

        manager.update(0.5);
        expect(ledger.currentShields).toBe(50);
        expect(recharge.data.accumulator).toBe(0);
    });

    it('pauses on health loss even when shields are already empty', () => {
        const config = resolveCombatConfig({ ledger: { maxShields: 10 } });
        const small = new StatsLedger({ config });
        const smallManager = new EffectManager({ ledger: small });
        const effect = createEffect('shield_recharge', {}, config);
        smallManager.addEffect(effect);

        small.takeDamage(10);
        smallManager.update(2);
        expect(effect.data.timeSinceDamage).toBe(2);

        small.takeDamage(5);
        expect(small.currentHealth).toBe(95);
        expect(effect.data.timeSinceDamage).toBe(0);

        smallManager.update(3);
        expect(small.currentShields).toBe(0);
        smallManager.update(1);
        expect(small.currentShields).toBe(5);
    });

    it('unsubscribes when removed', () => {
        ledger.takeDamage(10);
        manager.update(2);

        expect(manager.removeEffect('shield_recharge')).toBe(true);
        expect(recharge.data.unsubscribe).toBeUndefined();

        ledger.takeDamage(10);
        expect(recharge.data.timeSinceDamage).toBe(2);
    });
});
