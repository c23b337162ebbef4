import { DEFAULT_COMBAT_CONFIG } from './default-config';
import { mergeCombatConfig, parseCombatConfig } from './parser';
import type { CombatConfig, CombatConfigOverrides } from './contracts';

export * from './contracts';
export * from './parser';
export * from './default-config';

const defaults = parseCombatConfig(DEFAULT_COMBAT_CONFIG);

export const getDefaultCombatConfig = (): CombatConfig => defaults;

export const resolveCombatConfig = (overrides?: CombatConfigOverrides): CombatConfig =>
    overrides ? mergeCombatConfig(defaults, overrides) : defaults;
