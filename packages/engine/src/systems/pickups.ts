import type { PickupKind } from '../types';
import type { CombatConfig } from '../data/combat';
import { getDefaultCombatConfig } from '../data/combat';
import type { EffectManager } from './effect-manager';
import { createEffect } from './effects';
import type { EngineLogger } from './engine-messages';
import { silentLogger } from './engine-messages';
import type { StatsLedger } from './stats-ledger';

export interface PickupContext {
    ledger: StatsLedger;
    effects: EffectManager;
    config?: Pick<CombatConfig, 'effects' | 'pickups'>;
    logger?: EngineLogger;
}

/**
 * Routes a collected pickup to the ledger or the effect manager.
 * Returns false when the pickup could not be applied.
 */
export const applyPickup = (context: PickupContext, pickup: PickupKind): boolean => {
    const config = context.config || getDefaultCombatConfig();
    const logger = context.logger || silentLogger;
    const amounts = config.pickups;
    logger.log('INFO', 'PICKUP', `Collected ${pickup}.`);

    switch (pickup) {
        case 'health':
            context.ledger.heal(amounts.health);
            return true;
        case 'shield':
            context.ledger.addShields(amounts.shield);
            return true;
        case 'score':
            context.ledger.addScore(amounts.score);
            return true;
        case 'experience':
            context.ledger.addExperience(amounts.experience);
            return true;
        case 'invincibility':
        case 'fire_rate_boost':
        case 'spread_shot':
            return context.effects.addEffect(createEffect(pickup, {}, config));
    }
};
