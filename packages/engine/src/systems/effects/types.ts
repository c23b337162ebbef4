import type { EffectKind, Unsubscribe } from '../../types';
import type { EffectPresets } from '../../data/combat';
import type { StatsLedger } from '../stats-ledger';
import type { Effect } from './effect';

/** Kind-specific runtime data carried by each effect instance. */
export interface EffectDataMap {
    invincibility: { totalDuration: number };
    fire_rate_boost: { factor: number };
    spread_shot: { count: number; angleDegrees: number };
    shield_recharge: {
        /** Shield points per second. */
        rate: number;
        /** Seconds without damage before recharge resumes. */
        delay: number;
        accumulator: number;
        timeSinceDamage: number;
        lastShields: number;
        lastHealth: number;
        /** True while the effect is crediting its own points. */
        crediting: boolean;
        unsubscribe?: Unsubscribe;
    };
}

/**
 * Per-kind lifecycle hooks. `onExpire` resets fields to their defaults
 * instead of undoing a delta.
 */
export interface EffectBehavior<K extends EffectKind> {
    createData(preset: EffectPresets[K]): EffectDataMap[K];
    onApply(effect: Effect<K>, ledger: StatsLedger): void;
    onUpdate?(effect: Effect<K>, dt: number, ledger: StatsLedger): void;
    onExpire(effect: Effect<K>, ledger: StatsLedger): void;
}

export type EffectBehaviorRegistry = { [K in EffectKind]: EffectBehavior<K> };
