import type { EffectBehavior } from './types';

export const invincibilityBehavior: EffectBehavior<'invincibility'> = {
    createData: preset => ({ totalDuration: preset.duration }),
    onApply: (effect, ledger) => {
        effect.data.totalDuration = effect.duration;
        ledger.setInvulnerable(true);
        ledger.setInvulnerabilityTimeRemaining(effect.timeRemaining);
    },
    // Countdown is for the HUD only.
    onUpdate: (effect, _dt, ledger) => {
        ledger.setInvulnerabilityTimeRemaining(effect.timeRemaining);
    },
    onExpire: (_effect, ledger) => {
        ledger.setInvulnerable(false);
        ledger.setInvulnerabilityTimeRemaining(0);
    }
};
