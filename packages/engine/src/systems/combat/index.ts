export * from './damageable';
export * from './damage-emitter';
export * from './damage-receiver';
