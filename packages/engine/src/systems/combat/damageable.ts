import type { CombatEntity, Damageable } from '../../types';

export interface DamageHit {
    targetId: string;
    amount: number;
    killed: boolean;
}

/** Direct handler first, then the entity's ledger. */
export const resolveDamageable = (entity: CombatEntity): Damageable | undefined =>
    entity.damageable ?? entity.ledger;

export const toDamageAmount = (value: number | undefined): number =>
    value !== undefined && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0;
