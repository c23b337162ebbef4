import type { CombatConfig } from './contracts';

export const DEFAULT_COMBAT_CONFIG: CombatConfig = {
    version: '1.0.0',
    ledger: {
        maxHealth: 100,
        maxShields: 50,
        baseSpeed: 300,
        baseFireDelay: 0.25,
        minFireDelay: 0.05,
        maxProjectiles: 1,
        experienceToNextLevel: 100,
        experienceGrowth: 1.5,
        spreadCount: 3,
        spreadAngleDegrees: 15
    },
    upgrades: {
        speedStep: 0.1,
        fireRateStep: 0.02,
        maxHealthStep: 20,
        maxShieldsStep: 10
    },
    effects: {
        invincibility: { name: 'invincibility', duration: 5, stackable: false },
        fire_rate_boost: { name: 'fire_rate_boost', duration: 8, stackable: false, factor: 0.5 },
        spread_shot: { name: 'spread_shot', duration: 10, stackable: false, count: 3, angleDegrees: 15 },
        // Permanent passive; only removed on reset.
        shield_recharge: { name: 'shield_recharge', duration: -1, stackable: false, rate: 5, delay: 3 }
    },
    damage: {
        categoryDefaults: {
            'enemy-projectile': 10,
            enemy: 20,
            wall: 15,
            pickup: 0
        }
    },
    pickups: {
        health: 25,
        shield: 25,
        score: 100,
        experience: 50
    }
};
