import { fireRateBoostBehavior } from './fire-rate-boost';
import { invincibilityBehavior } from './invincibility';
import { shieldRechargeBehavior } from './shield-recharge';
import { spreadShotBehavior } from './spread-shot';
import type { EffectBehaviorRegistry } from './types';

/** Closed set: a new kind extends EffectKind and gets an entry here. */
export const EFFECT_BEHAVIORS: EffectBehaviorRegistry = {
    invincibility: invincibilityBehavior,
    fire_rate_boost: fireRateBoostBehavior,
    spread_shot: spreadShotBehavior,
    shield_recharge: shieldRechargeBehavior
};
