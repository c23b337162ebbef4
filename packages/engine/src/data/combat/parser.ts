import type { EffectKind, EntityCategory } from '../../types';
import type {
    CombatConfig,
    CombatConfigOverrides,
    DamageConfig,
    EffectPresetBase,
    EffectPresets,
    LedgerConfig,
    PickupConfig,
    UpgradeConfig
} from './contracts';

export interface CombatConfigValidationIssue {
    path: string;
    message: string;
}

export class CombatConfigValidationError extends Error {
    readonly issues: CombatConfigValidationIssue[];
    constructor(issues: CombatConfigValidationIssue[]) {
        super(`Combat config validation failed:\n${issues.map(i => `${i.path}: ${i.message}`).join('\n')}`);
        this.name = 'CombatConfigValidationError';
        this.issues = issues;
    }
}

const CATEGORIES: readonly EntityCategory[] = ['player', 'player-projectile', 'enemy', 'enemy-projectile', 'wall', 'pickup'];

const isRecord = (v: unknown): v is Record<string, unknown> => typeof v === 'object' && v !== null && !Array.isArray(v);
const isNum = (v: unknown): v is number => typeof v === 'number' && Number.isFinite(v);
const isStr = (v: unknown): v is string => typeof v === 'string';
const isCategory = (v: string): v is EntityCategory => CATEGORIES.some(c => c === v);

type NumberRule = { min?: number; above?: number; max?: number; integer?: boolean };

/**
 * Field reader that records issues instead of throwing, so one pass reports
 * every problem in the document.
 */
class FieldReader {
    constructor(
        private readonly source: Record<string, unknown>,
        private readonly path: string,
        private readonly issues: CombatConfigValidationIssue[]
    ) { }

    num(key: string, rule: NumberRule = {}): number {
        const value = this.source[key];
        const path = `${this.path}.${key}`;
        if (!isNum(value)) {
            this.issues.push({ path, message: 'Expected number' });
            return 0;
        }
        if (rule.integer && !Number.isInteger(value)) this.issues.push({ path, message: 'Expected integer' });
        if (rule.min !== undefined && value < rule.min) this.issues.push({ path, message: `Expected >= ${rule.min}` });
        if (rule.above !== undefined && value <= rule.above) this.issues.push({ path, message: `Expected > ${rule.above}` });
        if (rule.max !== undefined && value > rule.max) this.issues.push({ path, message: `Expected <= ${rule.max}` });
        return value;
    }

    str(key: string): string {
        const value = this.source[key];
        if (!isStr(value) || value.length === 0) {
            this.issues.push({ path: `${this.path}.${key}`, message: 'Expected non-empty string' });
            return '';
        }
        return value;
    }

    bool(key: string): boolean {
        const value = this.source[key];
        if (typeof value !== 'boolean') {
            this.issues.push({ path: `${this.path}.${key}`, message: 'Expected boolean' });
            return false;
        }
        return value;
    }

    child(key: string): FieldReader {
        const value = this.source[key];
        const path = `${this.path}.${key}`;
        if (!isRecord(value)) {
            this.issues.push({ path, message: 'Expected object' });
            return new FieldReader({}, path, []);
        }
        return new FieldReader(value, path, this.issues);
    }

    entries(): [string, unknown][] {
        return Object.entries(this.source);
    }

    report(key: string, message: string): void {
        this.issues.push({ path: `${this.path}.${key}`, message });
    }
}

const readLedger = (r: FieldReader): LedgerConfig => {
    const ledger: LedgerConfig = {
        maxHealth: r.num('maxHealth', { above: 0, integer: true }),
        maxShields: r.num('maxShields', { min: 0, integer: true }),
        baseSpeed: r.num('baseSpeed', { min: 0 }),
        baseFireDelay: r.num('baseFireDelay', { above: 0 }),
        minFireDelay: r.num('minFireDelay', { min: 0 }),
        maxProjectiles: r.num('maxProjectiles', { min: 1, integer: true }),
        experienceToNextLevel: r.num('experienceToNextLevel', { above: 0, integer: true }),
        experienceGrowth: r.num('experienceGrowth', { min: 1 }),
        spreadCount: r.num('spreadCount', { min: 1, integer: true }),
        spreadAngleDegrees: r.num('spreadAngleDegrees', { min: 0 })
    };
    if (ledger.minFireDelay > ledger.baseFireDelay) r.report('minFireDelay', 'Must be <= baseFireDelay');
    return ledger;
};

const readUpgrades = (r: FieldReader): UpgradeConfig => ({
    speedStep: r.num('speedStep', { min: 0 }),
    fireRateStep: r.num('fireRateStep', { min: 0 }),
    maxHealthStep: r.num('maxHealthStep', { min: 0, integer: true }),
    maxShieldsStep: r.num('maxShieldsStep', { min: 0, integer: true })
});

const readPresetBase = (r: FieldReader, permanent: boolean): EffectPresetBase => {
    const duration = r.num('duration');
    if (permanent && duration >= 0) r.report('duration', 'Expected negative duration (permanent effect)');
    if (!permanent && duration <= 0) r.report('duration', 'Expected > 0');
    return { name: r.str('name'), duration, stackable: r.bool('stackable') };
};

const readEffects = (r: FieldReader): EffectPresets => {
    const invincibility = r.child('invincibility');
    const fireRate = r.child('fire_rate_boost');
    const spread = r.child('spread_shot');
    const recharge = r.child('shield_recharge');
    return {
        invincibility: readPresetBase(invincibility, false),
        fire_rate_boost: { ...readPresetBase(fireRate, false), factor: fireRate.num('factor', { above: 0, max: 1 }) },
        spread_shot: {
            ...readPresetBase(spread, false),
            count: spread.num('count', { min: 1, integer: true }),
            angleDegrees: spread.num('angleDegrees', { min: 0 })
        },
        shield_recharge: {
            ...readPresetBase(recharge, true),
            rate: recharge.num('rate', { min: 0 }),
            delay: recharge.num('delay', { min: 0 })
        }
    };
};

const readDamage = (r: FieldReader): DamageConfig => {
    const defaults = r.child('categoryDefaults');
    const categoryDefaults: Partial<Record<EntityCategory, number>> = {};
    for (const [key] of defaults.entries()) {
        if (!isCategory(key)) {
            defaults.report(key, 'Unknown category');
            continue;
        }
        categoryDefaults[key] = defaults.num(key, { min: 0, integer: true });
    }
    return { categoryDefaults };
};

const readPickups = (r: FieldReader): PickupConfig => ({
    health: r.num('health', { min: 0, integer: true }),
    shield: r.num('shield', { min: 0, integer: true }),
    score: r.num('score', { min: 0, integer: true }),
    experience: r.num('experience', { min: 0, integer: true })
});

export const parseCombatConfig = (input: unknown): CombatConfig => {
    if (!isRecord(input)) throw new CombatConfigValidationError([{ path: '$', message: 'Expected object' }]);
    const issues: CombatConfigValidationIssue[] = [];
    const root = new FieldReader(input, '$', issues);

    const version = root.str('version');
    if (version && !/^1\./.test(version)) root.report('version', 'Expected v1.x version');

    const config: CombatConfig = {
        version,
        ledger: readLedger(root.child('ledger')),
        upgrades: readUpgrades(root.child('upgrades')),
        effects: readEffects(root.child('effects')),
        damage: readDamage(root.child('damage')),
        pickups: readPickups(root.child('pickups'))
    };

    if (issues.length > 0) throw new CombatConfigValidationError(issues);
    return config;
};

const mergeEffect = <K extends EffectKind>(
    base: EffectPresets,
    overrides: CombatConfigOverrides['effects'],
    kind: K
): EffectPresets[K] => ({ ...base[kind], ...overrides?.[kind] });

/** Overlays partial overrides onto `base` and re-validates the result. */
export const mergeCombatConfig = (base: CombatConfig, overrides: CombatConfigOverrides = {}): CombatConfig => {
    const merged: CombatConfig = {
        version: base.version,
        ledger: { ...base.ledger, ...overrides.ledger },
        upgrades: { ...base.upgrades, ...overrides.upgrades },
        effects: {
            invincibility: mergeEffect(base.effects, overrides.effects, 'invincibility'),
            fire_rate_boost: mergeEffect(base.effects, overrides.effects, 'fire_rate_boost'),
            spread_shot: mergeEffect(base.effects, overrides.effects, 'spread_shot'),
            shield_recharge: mergeEffect(base.effects, overrides.effects, 'shield_recharge')
        },
        damage: {
            categoryDefaults: { ...base.damage.categoryDefaults, ...overrides.damage?.categoryDefaults }
        },
        pickups: { ...base.pickups, ...overrides.pickups }
    };
    return parseCombatConfig(merged);
};
