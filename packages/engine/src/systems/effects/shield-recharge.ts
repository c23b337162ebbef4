/**
 * SHIELD RECHARGE
 * Permanent passive. Regenerates shields after `delay` seconds without
 * damage, crediting whole points and carrying the fraction between ticks.
 *
 * Damage is detected through the ledger's own notifications, so any source
 * (pipeline, scripted hit, debug command) pauses the recharge.
 */
import type { LedgerEvent } from '../../types';
import type { EffectBehavior, EffectDataMap } from './types';

type RechargeData = EffectDataMap['shield_recharge'];

const markDamaged = (data: RechargeData) => {
    data.timeSinceDamage = 0;
};

const observe = (data: RechargeData, event: LedgerEvent) => {
    if (event.type === 'ShieldsChanged') {
        if (!data.crediting && event.current < data.lastShields) markDamaged(data);
        data.lastShields = event.current;
    } else if (event.type === 'HealthChanged') {
        if (event.current < data.lastHealth) markDamaged(data);
        data.lastHealth = event.current;
    }
};

export const shieldRechargeBehavior: EffectBehavior<'shield_recharge'> = {
    createData: preset => ({
        rate: preset.rate,
        delay: preset.delay,
        accumulator: 0,
        timeSinceDamage: 0,
        lastShields: 0,
        lastHealth: 0,
        crediting: false
    }),
    onApply: (effect, ledger) => {
        const data = effect.data;
        data.unsubscribe?.();
        data.lastShields = ledger.currentShields;
        data.lastHealth = ledger.currentHealth;
        data.timeSinceDamage = 0;
        data.accumulator = 0;
        data.unsubscribe = ledger.subscribe(event => observe(data, event));
    },
    onUpdate: (effect, dt, ledger) => {
        const data = effect.data;
        const elapsed = Math.max(0, dt);
        data.timeSinceDamage += elapsed;

        // Only the slice of this tick that lies past the delay counts.
        const eligible = Math.min(elapsed, Math.max(0, data.timeSinceDamage - data.delay));
        if (eligible <= 0) return;

        if (ledger.currentShields >= ledger.maxShields) {
            data.accumulator = 0;
            return;
        }

        data.accumulator += data.rate * eligible;
        const whole = Math.floor(data.accumulator);
        if (whole < 1) return;

        data.accumulator -= whole;
        data.crediting = true;
        try {
            ledger.addShields(whole);
        } finally {
            data.crediting = false;
        }
    },
    onExpire: effect => {
        effect.data.unsubscribe?.();
        effect.data.unsubscribe = undefined;
    }
};
