import type { EffectKind, EntityCategory } from '../../types';

export interface LedgerConfig {
    maxHealth: number;
    maxShields: number;
    baseSpeed: number;
    /** Seconds between shots before modifiers. */
    baseFireDelay: number;
    minFireDelay: number;
    maxProjectiles: number;
    experienceToNextLevel: number;
    /** Threshold multiplier applied on every level-up (floored). */
    experienceGrowth: number;
    spreadCount: number;
    spreadAngleDegrees: number;
}

export interface UpgradeConfig {
    speedStep: number;
    fireRateStep: number;
    maxHealthStep: number;
    maxShieldsStep: number;
}

export interface EffectPresetBase {
    name: string;
    /** Seconds; negative means permanent. */
    duration: number;
    stackable: boolean;
}

export interface EffectPresets {
    invincibility: EffectPresetBase;
    fire_rate_boost: EffectPresetBase & { factor: number };
    spread_shot: EffectPresetBase & { count: number; angleDegrees: number };
    shield_recharge: EffectPresetBase & { rate: number; delay: number };
}

export interface DamageConfig {
    categoryDefaults: Partial<Record<EntityCategory, number>>;
}

export interface PickupConfig {
    health: number;
    shield: number;
    score: number;
    experience: number;
}

export interface CombatConfig {
    version: string;
    ledger: LedgerConfig;
    upgrades: UpgradeConfig;
    effects: EffectPresets;
    damage: DamageConfig;
    pickups: PickupConfig;
}

export interface CombatConfigOverrides {
    ledger?: Partial<LedgerConfig>;
    upgrades?: Partial<UpgradeConfig>;
    effects?: { [K in EffectKind]?: Partial<EffectPresets[K]> };
    damage?: Partial<DamageConfig>;
    pickups?: Partial<PickupConfig>;
}
