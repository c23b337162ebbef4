/**
 * STATS LEDGER
 * Authoritative health / shield / progression record for one entity.
 *
 * Every mutation goes through a method here so the invariants
 * (0 <= current <= max, threshold > 0, shields absorb before health)
 * hold by construction, and observers are notified in a fixed order.
 */
import type { Damageable, LedgerEvent, LedgerUpgrade, Listener, Unsubscribe } from '../types';
import type { CombatConfig, LedgerConfig, UpgradeConfig } from '../data/combat';
import { getDefaultCombatConfig } from '../data/combat';
import type { EngineLogger } from './engine-messages';
import { silentLogger } from './engine-messages';
import { EventChannel } from './event-channel';

export interface LedgerState {
    maxHealth: number;
    currentHealth: number;
    maxShields: number;
    currentShields: number;
    speedMultiplier: number;
    speedBonus: number;
    fireRateMultiplier: number;
    fireRateBonus: number;
    fireRateEffectMultiplier: number;
    maxProjectiles: number;
    maxProjectilesBonus: number;
    score: number;
    level: number;
    experience: number;
    experienceToNextLevel: number;
    invulnerable: boolean;
    invulnerabilityTimeRemaining: number;
    spreadEnabled: boolean;
    spreadCount: number;
    spreadAngleDegrees: number;
}

export type LedgerSnapshot = Readonly<LedgerState>;

export interface StatsLedgerOptions {
    config?: Pick<CombatConfig, 'ledger' | 'upgrades'>;
    logger?: EngineLogger;
}

/** Whole, non-negative amount; anything else counts as zero. */
const toAmount = (value: number): number => (Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0);

const createInitialState = (config: LedgerConfig): LedgerState => ({
    maxHealth: config.maxHealth,
    currentHealth: config.maxHealth,
    maxShields: config.maxShields,
    currentShields: config.maxShields,
    speedMultiplier: 1,
    speedBonus: 0,
    fireRateMultiplier: 1,
    fireRateBonus: 0,
    fireRateEffectMultiplier: 1,
    maxProjectiles: config.maxProjectiles,
    maxProjectilesBonus: 0,
    score: 0,
    level: 1,
    experience: 0,
    experienceToNextLevel: config.experienceToNextLevel,
    invulnerable: false,
    invulnerabilityTimeRemaining: 0,
    spreadEnabled: false,
    spreadCount: config.spreadCount,
    spreadAngleDegrees: config.spreadAngleDegrees
});

export class StatsLedger implements Damageable {
    private state: LedgerState;
    private readonly ledgerConfig: LedgerConfig;
    private readonly upgradeConfig: UpgradeConfig;
    private readonly logger: EngineLogger;
    private readonly events: EventChannel<LedgerEvent>;

    constructor(options: StatsLedgerOptions = {}) {
        const config = options.config || getDefaultCombatConfig();
        this.ledgerConfig = config.ledger;
        this.upgradeConfig = config.upgrades;
        this.logger = options.logger || silentLogger;
        this.events = new EventChannel<LedgerEvent>('COMBAT', this.logger);
        this.state = createInitialState(this.ledgerConfig);
    }

    subscribe(listener: Listener<LedgerEvent>): Unsubscribe {
        return this.events.subscribe(listener);
    }

    // --- Damage & healing ---

    /**
     * Shields absorb first, the overflow hits health. Returns true when
     * health is 0 after the call; `Died` only fires on the alive -> dead edge.
     */
    takeDamage(amount: number): boolean {
        if (this.state.invulnerable) return false;

        const damage = toAmount(amount);
        if (damage === 0) return this.isDead;

        const wasAlive = this.state.currentHealth > 0;
        const shieldDamage = Math.min(damage, this.state.currentShields);
        const remaining = damage - shieldDamage;

        this.state.currentShields -= shieldDamage;
        if (remaining > 0) {
            this.state.currentHealth = Math.max(0, this.state.currentHealth - remaining);
        }

        if (shieldDamage > 0) this.emitShields();
        if (remaining > 0) this.emitHealth();

        const dead = this.isDead;
        if (dead && wasAlive) {
            this.logger.log('INFO', 'COMBAT', `Lethal hit for ${damage} (${shieldDamage} absorbed by shields).`);
            this.events.emit({ type: 'Died' });
        }
        return dead;
    }

    damageCapacity(): number {
        return this.state.invulnerable ? 0 : this.state.currentShields + this.state.currentHealth;
    }

    heal(amount: number): void {
        this.state.currentHealth = Math.min(this.state.maxHealth, this.state.currentHealth + toAmount(amount));
        this.emitHealth();
    }

    addShields(amount: number): void {
        this.state.currentShields = Math.min(this.state.maxShields, this.state.currentShields + toAmount(amount));
        this.emitShields();
    }

    // --- Progression ---

    addScore(amount: number): void {
        this.state.score += toAmount(amount);
        this.events.emit({ type: 'ScoreChanged', score: this.state.score });
    }

    addExperience(amount: number): void {
        this.state.experience += toAmount(amount);
        this.emitExperience();

        while (this.state.experience >= this.state.experienceToNextLevel) {
            this.state.experience -= this.state.experienceToNextLevel;
            this.state.level += 1;
            // Growth >= 1 keeps the threshold positive.
            this.state.experienceToNextLevel = Math.max(
                1,
                Math.floor(this.state.experienceToNextLevel * this.ledgerConfig.experienceGrowth)
            );
            this.logger.log('INFO', 'PROGRESSION', `Reached level ${this.state.level}.`);
            this.events.emit({ type: 'LevelUp', level: this.state.level });
            this.emitExperience();
        }
    }

    applyUpgrade(upgrade: LedgerUpgrade): void {
        const steps = this.upgradeConfig;
        switch (upgrade) {
            case 'speed':
                this.state.speedBonus += steps.speedStep;
                break;
            case 'fire_rate':
                this.state.fireRateBonus += steps.fireRateStep;
                break;
            case 'projectile':
                this.state.maxProjectilesBonus += 1;
                break;
            case 'max_health':
                this.state.maxHealth += steps.maxHealthStep;
                this.state.currentHealth = Math.min(this.state.maxHealth, this.state.currentHealth + steps.maxHealthStep);
                this.emitHealth();
                break;
            case 'max_shields':
                this.state.maxShields += steps.maxShieldsStep;
                this.state.currentShields = Math.min(this.state.maxShields, this.state.currentShields + steps.maxShieldsStep);
                this.emitShields();
                break;
        }
        this.logger.log('VERBOSE', 'PROGRESSION', `Upgrade applied: ${upgrade}.`);
    }

    /** Back to the constructed state; observers get a full resync. */
    reset(): void {
        this.state = createInitialState(this.ledgerConfig);
        this.emitHealth();
        this.emitShields();
        this.events.emit({ type: 'ScoreChanged', score: this.state.score });
        this.emitExperience();
    }

    // --- Effect-writable fields ---

    setInvulnerable(invulnerable: boolean): void {
        this.state.invulnerable = invulnerable;
    }

    /** Display-only countdown. */
    setInvulnerabilityTimeRemaining(seconds: number): void {
        this.state.invulnerabilityTimeRemaining = Number.isFinite(seconds) ? Math.max(0, seconds) : 0;
    }

    setFireRateEffectMultiplier(multiplier: number): void {
        if (!Number.isFinite(multiplier) || multiplier <= 0) {
            this.logger.log('WARN', 'EFFECTS', `Ignored fire-rate multiplier ${multiplier}.`);
            return;
        }
        this.state.fireRateEffectMultiplier = multiplier;
    }

    configureSpread(count: number, angleDegrees: number): void {
        this.state.spreadCount = Math.max(1, Math.floor(count));
        this.state.spreadAngleDegrees = Math.max(0, angleDegrees);
    }

    setSpreadEnabled(enabled: boolean): void {
        this.state.spreadEnabled = enabled;
    }

    // --- Derived values ---

    effectiveSpeed(): number {
        return this.ledgerConfig.baseSpeed * (this.state.speedMultiplier + this.state.speedBonus);
    }

    effectiveFireDelay(): number {
        const { fireRateMultiplier, fireRateBonus, fireRateEffectMultiplier } = this.state;
        const delay = (this.ledgerConfig.baseFireDelay * fireRateMultiplier - fireRateBonus) * fireRateEffectMultiplier;
        return Math.max(this.ledgerConfig.minFireDelay, delay);
    }

    effectiveMaxProjectiles(): number {
        return this.state.maxProjectiles + this.state.maxProjectilesBonus;
    }

    snapshot(): LedgerSnapshot {
        return { ...this.state };
    }

    get currentHealth(): number {
        return this.state.currentHealth;
    }

    get maxHealth(): number {
        return this.state.maxHealth;
    }

    get currentShields(): number {
        return this.state.currentShields;
    }

    get maxShields(): number {
        return this.state.maxShields;
    }

    get isDead(): boolean {
        return this.state.currentHealth <= 0;
    }

    private emitHealth(): void {
        this.events.emit({ type: 'HealthChanged', current: this.state.currentHealth, max: this.state.maxHealth });
    }

    private emitShields(): void {
        this.events.emit({ type: 'ShieldsChanged', current: this.state.currentShields, max: this.state.maxShields });
    }

    private emitExperience(): void {
        this.events.emit({
            type: 'ExperienceChanged',
            current: this.state.experience,
            threshold: this.state.experienceToNextLevel,
            level: this.state.level
        });
    }
}
