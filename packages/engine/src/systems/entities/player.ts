/**
 * PLAYER COMBATANT
 * Composes the ledger, effect manager and damage receiver for the
 * player ship. Collaborators are wired here explicitly; nothing looks the
 * player up by tag.
 */
import type { CombatEntity, Damageable, EntityCategory, PickupKind } from '../../types';
import type { CombatConfig } from '../../data/combat';
import { getDefaultCombatConfig } from '../../data/combat';
import { DamageReceiver } from '../combat/damage-receiver';
import { EffectManager } from '../effect-manager';
import { createEffect } from '../effects';
import type { EngineLogger } from '../engine-messages';
import { silentLogger } from '../engine-messages';
import { applyPickup } from '../pickups';
import { StatsLedger } from '../stats-ledger';

export interface PlayerCombatantOptions {
    id?: string;
    config?: CombatConfig;
    logger?: EngineLogger;
    damageOverride?: number;
    ignoredCategories?: EntityCategory[];
}

export interface PlayerCombatant extends CombatEntity, Damageable {
    readonly ledger: StatsLedger;
    readonly effects: EffectManager;
    readonly receiver: DamageReceiver;
    /** Variable-rate tick: advances effect timers. */
    tick(dt: number): void;
    /** Fixed-rate tick entry for collision contacts. */
    handleContact(source: CombatEntity): void;
    applyPickup(pickup: PickupKind): boolean;
    reset(): void;
}

const DEFAULT_IGNORED: EntityCategory[] = ['player', 'player-projectile'];

export const createPlayerCombatant = (options: PlayerCombatantOptions = {}): PlayerCombatant => {
    const config = options.config || getDefaultCombatConfig();
    const logger = options.logger || silentLogger;
    const ledger = new StatsLedger({ config, logger });
    const effects = new EffectManager({ ledger, logger });

    const installPassives = () => {
        effects.addEffect(createEffect('shield_recharge', {}, config));
    };

    const entity: CombatEntity = {
        id: options.id || 'player',
        category: 'player',
        ledger
    };

    const pickup = (kind: PickupKind) => applyPickup({ ledger, effects, config, logger }, kind);

    const receiver = new DamageReceiver({
        owner: entity,
        damageOverride: options.damageOverride,
        ignoredCategories: options.ignoredCategories || DEFAULT_IGNORED,
        config,
        onPickup: kind => {
            pickup(kind);
        },
        logger
    });

    installPassives();

    return {
        ...entity,
        ledger,
        effects,
        receiver,
        takeDamage: amount => ledger.takeDamage(amount),
        damageCapacity: () => ledger.damageCapacity(),
        tick: dt => effects.update(dt),
        handleContact: source => {
            receiver.handleContact(source);
        },
        applyPickup: pickup,
        reset: () => {
            effects.clearAllEffects();
            ledger.reset();
            installPassives();
            logger.log('INFO', 'SYSTEM', `${entity.id} reset.`);
        }
    };
};
