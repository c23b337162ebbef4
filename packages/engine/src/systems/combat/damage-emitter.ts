import type { CombatEntity, EmitterEvent, EntityCategory, Listener, Unsubscribe } from '../../types';
import type { EngineLogger } from '../engine-messages';
import { silentLogger } from '../engine-messages';
import { EventChannel } from '../event-channel';
import type { DamageHit } from './damageable';
import { resolveDamageable, toDamageAmount } from './damageable';

export interface DamageEmitterOptions {
    owner: CombatEntity;
    /** 0 = use the owner's own damage. */
    damage?: number;
    destroyOwnerOnHit?: boolean;
    ignoredCategories?: Iterable<EntityCategory>;
    logger?: EngineLogger;
}

/**
 * Attacker side of contact damage (projectiles, rammers).
 */
export class DamageEmitter {
    readonly owner: CombatEntity;
    readonly damage: number;
    readonly destroyOwnerOnHit: boolean;
    readonly ignoredCategories: ReadonlySet<EntityCategory>;
    private readonly logger: EngineLogger;
    private readonly events: EventChannel<EmitterEvent>;

    constructor(options: DamageEmitterOptions) {
        this.owner = options.owner;
        this.damage = toDamageAmount(options.damage);
        this.destroyOwnerOnHit = options.destroyOwnerOnHit ?? false;
        this.ignoredCategories = new Set(options.ignoredCategories || []);
        this.logger = options.logger || silentLogger;
        this.events = new EventChannel<EmitterEvent>('COMBAT', this.logger);
    }

    subscribe(listener: Listener<EmitterEvent>): Unsubscribe {
        return this.events.subscribe(listener);
    }

    resolveDamage(): number {
        return this.damage > 0 ? this.damage : toDamageAmount(this.owner.damage);
    }

    handleContact(target: CombatEntity): DamageHit | null {
        if (target.id === this.owner.id) return null;
        if (this.ignoredCategories.has(target.category)) return null;

        const amount = this.resolveDamage();
        if (amount <= 0) {
            this.logger.log('DEBUG', 'COMBAT', `${this.owner.id} has no damage to deal.`);
            return null;
        }

        const damageable = resolveDamageable(target);
        if (!damageable) {
            this.logger.log('DEBUG', 'COMBAT', `${target.id} cannot take damage.`);
            return null;
        }

        const capacity = damageable.damageCapacity?.();
        const applied = capacity === undefined ? amount : Math.min(amount, capacity);
        const killed = damageable.takeDamage(amount);
        const hit: DamageHit = { targetId: target.id, amount: applied, killed };
        if (applied > 0) this.events.emit({ type: 'TargetHit', ...hit });
        else this.logger.log('DEBUG', 'COMBAT', `${target.id} took nothing from ${this.owner.id}.`);

        if (this.destroyOwnerOnHit) {
            if (this.owner.requestDestroy) this.owner.requestDestroy();
            else this.logger.log('WARN', 'COMBAT', `${this.owner.id} should be destroyed on hit but has no destroy hook.`);
        }
        return hit;
    }
}
