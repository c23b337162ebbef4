/**
 * CORE TYPES
 * Shared vocabulary between the combat core and its collaborators
 * (HUD, audio, spawners, collision wiring).
 */

/** Categories used for contact filtering and default-damage lookup. */
export type EntityCategory =
    | 'player'
    | 'player-projectile'
    | 'enemy'
    | 'enemy-projectile'
    | 'wall'
    | 'pickup';

export type EffectKind = 'invincibility' | 'fire_rate_boost' | 'spread_shot' | 'shield_recharge';

export type PickupKind =
    | 'health'
    | 'shield'
    | 'invincibility'
    | 'fire_rate_boost'
    | 'spread_shot'
    | 'score'
    | 'experience';

export type LedgerUpgrade = 'speed' | 'fire_rate' | 'projectile' | 'max_health' | 'max_shields';

/**
 * Ledger notifications. Firing order is part of the contract:
 * ShieldsChanged -> HealthChanged -> Died within one hit,
 * ExperienceChanged -> (LevelUp -> ExperienceChanged)* within one grant.
 */
export type LedgerEvent =
    | { type: 'HealthChanged'; current: number; max: number }
    | { type: 'ShieldsChanged'; current: number; max: number }
    | { type: 'Died' }
    | { type: 'ScoreChanged'; score: number }
    | { type: 'ExperienceChanged'; current: number; threshold: number; level: number }
    | { type: 'LevelUp'; level: number };

export type EffectEvent =
    | { type: 'EffectAdded'; name: string }
    | { type: 'EffectRefreshed'; name: string; timeRemaining: number }
    | { type: 'EffectRemoved'; name: string }
    | { type: 'EffectExpired'; name: string };

export type EmitterEvent = { type: 'TargetHit'; targetId: string; amount: number; killed: boolean };

export type ReceiverEvent =
    | { type: 'DamageReceived'; sourceId: string; amount: number; killed: boolean }
    | { type: 'HitDetected'; sourceId: string }
    | { type: 'PickupCollected'; sourceId: string; pickup: PickupKind };

/** Anything that can take damage. The ledger is one; custom handlers are others. */
export interface Damageable {
    /** Returns true when the target is dead after this hit. */
    takeDamage(amount: number): boolean;
    /** Most damage a hit could apply right now; 0 while invulnerable. */
    damageCapacity?(): number;
}

/**
 * Collision-facing view of a world entity. Collaborators build these; the
 * core never scans a global registry for them.
 */
export interface CombatEntity {
    id: string;
    category: EntityCategory;
    /** The entity's own contact/projectile damage. */
    damage?: number;
    /** Direct damage handler; preferred over `ledger`. */
    damageable?: Damageable;
    ledger?: Damageable;
    /** Set on collectibles. */
    pickup?: PickupKind;
    requestDestroy?: () => void;
}

export type Listener<E> = (event: E) => void;
export type Unsubscribe = () => void;
