import type { EffectKind } from '../../types';
import type { CombatConfig, EffectPresets } from '../../data/combat';
import { getDefaultCombatConfig } from '../../data/combat';
import { Effect } from './effect';
import { EFFECT_BEHAVIORS } from './registry';

/** Builds an inactive effect from the configured preset for `kind`. */
export const createEffect = <K extends EffectKind>(
    kind: K,
    overrides: Partial<EffectPresets[K]> = {},
    config: Pick<CombatConfig, 'effects'> = getDefaultCombatConfig()
): Effect<K> => {
    const preset: EffectPresets[K] = { ...config.effects[kind], ...overrides };
    return new Effect<K>({
        kind,
        name: preset.name,
        duration: preset.duration,
        stackable: preset.stackable,
        data: EFFECT_BEHAVIORS[kind].createData(preset)
    });
};
