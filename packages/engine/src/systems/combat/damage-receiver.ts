import type { CombatEntity, EntityCategory, Listener, PickupKind, ReceiverEvent, Unsubscribe } from '../../types';
import type { CombatConfig } from '../../data/combat';
import { getDefaultCombatConfig } from '../../data/combat';
import type { EngineLogger } from '../engine-messages';
import { silentLogger } from '../engine-messages';
import { EventChannel } from '../event-channel';
import type { DamageHit } from './damageable';
import { resolveDamageable, toDamageAmount } from './damageable';

export type PickupHandler = (pickup: PickupKind, source: CombatEntity) => void;

export interface DamageReceiverOptions {
    owner: CombatEntity;
    /** Who actually takes the damage; defaults to `owner`. */
    target?: CombatEntity;
    /** 0 = derive from the source. */
    damageOverride?: number;
    ignoredCategories?: Iterable<EntityCategory>;
    config?: Pick<CombatConfig, 'damage'>;
    onPickup?: PickupHandler;
    logger?: EngineLogger;
}

/**
 * Defender side of contact damage. Resolution order:
 * receiver override -> source damage -> category default.
 * Pickups never resolve to damage; they go to `onPickup`.
 */
export class DamageReceiver {
    readonly owner: CombatEntity;
    readonly target: CombatEntity;
    readonly damageOverride: number;
    readonly ignoredCategories: ReadonlySet<EntityCategory>;
    private readonly categoryDefaults: Partial<Record<EntityCategory, number>>;
    private readonly onPickup?: PickupHandler;
    private readonly logger: EngineLogger;
    private readonly events: EventChannel<ReceiverEvent>;

    constructor(options: DamageReceiverOptions) {
        this.owner = options.owner;
        this.target = options.target ?? options.owner;
        this.damageOverride = toDamageAmount(options.damageOverride);
        this.ignoredCategories = new Set(options.ignoredCategories || []);
        this.categoryDefaults = (options.config || getDefaultCombatConfig()).damage.categoryDefaults;
        this.onPickup = options.onPickup;
        this.logger = options.logger || silentLogger;
        this.events = new EventChannel<ReceiverEvent>('COMBAT', this.logger);
    }

    subscribe(listener: Listener<ReceiverEvent>): Unsubscribe {
        return this.events.subscribe(listener);
    }

    resolveDamage(source: CombatEntity): number {
        if (source.category === 'pickup') return 0;
        if (this.damageOverride > 0) return this.damageOverride;
        const provided = toDamageAmount(source.damage);
        if (provided > 0) return provided;
        return toDamageAmount(this.categoryDefaults[source.category]);
    }

    handleContact(source: CombatEntity): DamageHit | null {
        if (source.id === this.owner.id) return null;
        if (this.ignoredCategories.has(source.category)) return null;

        if (source.category === 'pickup') {
            this.collect(source);
            return null;
        }

        const amount = this.resolveDamage(source);
        if (amount <= 0) {
            this.logger.log('DEBUG', 'COMBAT', `Contact with ${source.id} resolved to no damage.`);
            return null;
        }

        const damageable = resolveDamageable(this.target);
        if (!damageable) {
            this.logger.log('WARN', 'COMBAT', `${this.target.id} has no damage entry point.`);
            return null;
        }

        const killed = damageable.takeDamage(amount);
        this.events.emit({ type: 'DamageReceived', sourceId: source.id, amount, killed });
        this.events.emit({ type: 'HitDetected', sourceId: source.id });
        return { targetId: this.target.id, amount, killed };
    }

    private collect(source: CombatEntity): void {
        const pickup = source.pickup;
        if (!pickup) {
            this.logger.log('DEBUG', 'PICKUP', `${source.id} is a pickup without a kind.`);
            return;
        }
        if (!this.onPickup) {
            this.logger.log('DEBUG', 'PICKUP', `No pickup handler for ${pickup}.`);
            return;
        }
        this.onPickup(pickup, source);
        this.events.emit({ type: 'PickupCollected', sourceId: source.id, pickup });
    }
}
