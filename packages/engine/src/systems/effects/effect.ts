import type { EffectKind } from '../../types';
import type { StatsLedger } from '../stats-ledger';
import { EFFECT_BEHAVIORS } from './registry';
import type { EffectDataMap } from './types';

export interface EffectInit<K extends EffectKind> {
    kind: K;
    name: string;
    /** Seconds; negative means permanent. */
    duration: number;
    stackable: boolean;
    data: EffectDataMap[K];
}

/**
 * One timed (or permanent) modifier. Lifecycle: Inactive -> Active -> Expired.
 * Kind-specific work is dispatched through EFFECT_BEHAVIORS.
 */
export class Effect<K extends EffectKind = EffectKind> {
    readonly kind: K;
    readonly name: string;
    readonly duration: number;
    readonly stackable: boolean;
    readonly data: EffectDataMap[K];
    timeRemaining: number;
    active = false;

    constructor(init: EffectInit<K>) {
        this.kind = init.kind;
        this.name = init.name;
        this.duration = init.duration;
        this.stackable = init.stackable;
        this.data = init.data;
        this.timeRemaining = init.duration;
    }

    get permanent(): boolean {
        return this.duration < 0;
    }

    apply(ledger: StatsLedger): void {
        if (this.active) return;
        this.active = true;
        this.timeRemaining = this.duration;
        EFFECT_BEHAVIORS[this.kind].onApply(this, ledger);
    }

    update(dt: number, ledger: StatsLedger): void {
        if (!this.active) return;
        if (!this.permanent) this.timeRemaining -= dt;
        EFFECT_BEHAVIORS[this.kind].onUpdate?.(this, dt, ledger);
    }

    isExpired(): boolean {
        return !this.permanent && this.timeRemaining <= 0;
    }

    /** Restarts the countdown without re-running apply. */
    refresh(duration: number): void {
        if (this.permanent) return;
        this.timeRemaining = duration;
    }

    /** Re-runs the kind's setup on a live effect, keeping its countdown. */
    reapply(ledger: StatsLedger): void {
        if (!this.active) return;
        EFFECT_BEHAVIORS[this.kind].onApply(this, ledger);
    }

    /** Runs the rollback once; later calls are no-ops. */
    expire(ledger: StatsLedger): void {
        if (!this.active) return;
        this.active = false;
        EFFECT_BEHAVIORS[this.kind].onExpire(this, ledger);
    }
}
