import type { EffectBehavior } from './types';

const DEFAULT_FIRE_RATE_MULTIPLIER = 1;

export const fireRateBoostBehavior: EffectBehavior<'fire_rate_boost'> = {
    createData: preset => ({ factor: preset.factor }),
    onApply: (effect, ledger) => {
        ledger.setFireRateEffectMultiplier(effect.data.factor);
    },
    onExpire: (_effect, ledger) => {
        ledger.setFireRateEffectMultiplier(DEFAULT_FIRE_RATE_MULTIPLIER);
    }
};
