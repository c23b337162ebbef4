export * from './types';

// Data
export * from './data/combat';

// Systems
export * from './systems/engine-messages';
export * from './systems/event-channel';
export * from './systems/stats-ledger';
export * from './systems/effects';
export * from './systems/effect-manager';
export * from './systems/combat';
export * from './systems/pickups';
export * from './systems/entities/player';
