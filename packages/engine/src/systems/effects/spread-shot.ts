import type { EffectBehavior } from './types';

export const spreadShotBehavior: EffectBehavior<'spread_shot'> = {
    createData: preset => ({ count: preset.count, angleDegrees: preset.angleDegrees }),
    onApply: (effect, ledger) => {
        ledger.configureSpread(effect.data.count, effect.data.angleDegrees);
        ledger.setSpreadEnabled(true);
    },
    // Count and angle are inert once spread is off.
    onExpire: (_effect, ledger) => {
        ledger.setSpreadEnabled(false);
    }
};
