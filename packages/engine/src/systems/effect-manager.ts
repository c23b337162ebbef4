import type { EffectEvent, Listener, Unsubscribe } from '../types';
import type { Effect } from './effects';
import type { EngineLogger } from './engine-messages';
import { silentLogger } from './engine-messages';
import { EventChannel } from './event-channel';
import type { StatsLedger } from './stats-ledger';

export interface EffectManagerOptions {
    ledger?: StatsLedger;
    logger?: EngineLogger;
}

/**
 * EFFECT MANAGER
 * Owns the active effects of one entity and resolves refresh / stack / expiry.
 *
 * Tick contract: every effect advances before any expired effect is removed,
 * and every removal (natural, manual or forced) runs the effect's rollback.
 */
export class EffectManager {
    private effects: Effect[] = [];
    private ledger?: StatsLedger;
    private readonly logger: EngineLogger;
    private readonly events: EventChannel<EffectEvent>;

    constructor(options: EffectManagerOptions = {}) {
        this.ledger = options.ledger;
        this.logger = options.logger || silentLogger;
        this.events = new EventChannel<EffectEvent>('EFFECTS', this.logger);
    }

    attachLedger(ledger: StatsLedger): void {
        if (this.ledger && this.ledger !== ledger && this.effects.length > 0) {
            this.logger.log('WARN', 'EFFECTS', 'Cannot swap ledger while effects are active.');
            return;
        }
        this.ledger = ledger;
    }

    subscribe(listener: Listener<EffectEvent>): Unsubscribe {
        return this.events.subscribe(listener);
    }

    /**
     * Non-stackable effects refresh the active instance of the same name
     * instead of applying a second copy. Returns false when skipped.
     */
    addEffect(effect: Effect): boolean {
        const ledger = this.ledger;
        if (!ledger) {
            this.logger.log('WARN', 'EFFECTS', `No ledger attached; skipped ${effect.name}.`);
            return false;
        }
        if (this.effects.includes(effect)) {
            this.logger.log('WARN', 'EFFECTS', `${effect.name} instance is already active.`);
            return false;
        }

        if (!effect.stackable) {
            const existing = this.getEffect(effect.name);
            if (existing) {
                existing.refresh(effect.duration);
                this.logger.log('VERBOSE', 'EFFECTS', `Refreshed ${existing.name}.`);
                this.events.emit({ type: 'EffectRefreshed', name: existing.name, timeRemaining: existing.timeRemaining });
                return true;
            }
        }

        effect.apply(ledger);
        this.effects = [...this.effects, effect];
        this.logger.log('VERBOSE', 'EFFECTS', `Applied ${effect.name}.`);
        this.events.emit({ type: 'EffectAdded', name: effect.name });
        return true;
    }

    update(dt: number): void {
        const ledger = this.ledger;
        if (!ledger) {
            this.logger.log('DEBUG', 'EFFECTS', 'No ledger attached; effect tick skipped.');
            return;
        }
        const step = Number.isFinite(dt) && dt > 0 ? dt : 0;

        const current = this.effects;
        for (const effect of current) {
            effect.update(step, ledger);
        }

        const expired = current.filter(effect => effect.isExpired());
        for (const effect of expired) {
            this.detach(effect, ledger, 'EffectExpired');
        }
    }

    removeEffect(name: string): boolean {
        const effect = this.getEffect(name);
        if (!effect || !this.ledger) return false;
        this.detach(effect, this.ledger, 'EffectRemoved');
        return true;
    }

    hasEffect(name: string): boolean {
        return this.effects.some(effect => effect.name === name);
    }

    getEffect(name: string): Effect | undefined {
        return this.effects.find(effect => effect.name === name);
    }

    listEffects(): readonly Effect[] {
        return [...this.effects];
    }

    get count(): number {
        return this.effects.length;
    }

    /** Forced removal of everything, e.g. on entity reset. */
    clearAllEffects(): void {
        const ledger = this.ledger;
        if (!ledger) return;
        for (const effect of [...this.effects]) {
            this.detach(effect, ledger, 'EffectRemoved');
        }
    }

    private detach(effect: Effect, ledger: StatsLedger, reason: 'EffectExpired' | 'EffectRemoved'): void {
        effect.expire(ledger);
        this.effects = this.effects.filter(e => e !== effect);
        // Stacked copies share ledger fields; the rollback must not outlive a live copy.
        const survivor = this.getEffect(effect.name);
        if (survivor) survivor.reapply(ledger);
        this.logger.log('VERBOSE', 'EFFECTS', `${reason === 'EffectExpired' ? 'Expired' : 'Removed'} ${effect.name}.`);
        this.events.emit({ type: reason, name: effect.name });
    }
}
