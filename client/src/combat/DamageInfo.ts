// ═══════════════════════════════════════════════════════════════════
// DAMAGE INFO / DAMAGE RESULT
//
// DamageInfo describes one incoming hit; DamageResult is what the
// resolver decided about it. Both are frozen when built: a result
// handed to listeners can't be edited by one of them.
// ═══════════════════════════════════════════════════════════════════

import { ZERO_VEC3, isFiniteVec3, normalizeVec3 } from '@riposte/shared';
import type { DamageType, StaggerSeverity, Vec3 } from '@riposte/shared';
import type { Combatant } from './Combatant.js';

export interface DamageInfo {
  readonly amount: number;
  readonly poiseDamage: number;
  readonly type: DamageType;
  /** Null for environmental damage */
  readonly source: Combatant | null;
  readonly hitPoint: Readonly<Vec3>;
  /** Unit length, attacker → defender (zero when unknown) */
  readonly hitDirection: Readonly<Vec3>;
  readonly canBeParried: boolean;
  /** Stagger dealt when this hit breaks poise */
  readonly staggerSeverity: StaggerSeverity;
  readonly timestamp: number;
}

export interface DamageInfoInit {
  amount: number;
  poiseDamage?: number;
  type?: DamageType;
  source?: Combatant | null;
  hitPoint?: Vec3;
  hitDirection?: Vec3;
  canBeParried?: boolean;
  staggerSeverity?: StaggerSeverity;
  timestamp: number;
}

/**
 * Build a frozen DamageInfo. Returns null (and warns) when amount is
 * not a positive finite number or any vector / number is non-finite.
 */
export function createDamageInfo(init: DamageInfoInit): DamageInfo | null {
  const poiseDamage = init.poiseDamage ?? 0;
  const hitPoint = init.hitPoint ?? ZERO_VEC3;
  const hitDirection = init.hitDirection ?? ZERO_VEC3;

  if (!Number.isFinite(init.amount) || init.amount <= 0) {
    console.warn(`[DamageInfo] Rejected damage amount: ${init.amount}`);
    return null;
  }
  if (!Number.isFinite(poiseDamage) || !Number.isFinite(init.timestamp)
    || !isFiniteVec3(hitPoint) || !isFiniteVec3(hitDirection)) {
    console.warn('[DamageInfo] Rejected hit: non-finite input');
    return null;
  }

  return Object.freeze({
    amount: init.amount,
    poiseDamage: Math.max(0, poiseDamage),
    type: init.type ?? 'physical',
    source: init.source ?? null,
    hitPoint: Object.freeze({ x: hitPoint.x, y: hitPoint.y, z: hitPoint.z }),
    hitDirection: Object.freeze(normalizeVec3(hitDirection)),
    canBeParried: init.canBeParried ?? true,
    staggerSeverity: init.staggerSeverity ?? 'heavy',
    timestamp: init.timestamp,
  });
}

// ── Result ────────────────────────────────────────────────────────

export interface DamageResult {
  readonly finalDamage: number;
  readonly finalPoiseDamage: number;
  readonly parried: boolean;
  readonly partiallyParried: boolean;
  readonly dodged: boolean;
  readonly blocked: boolean;
  readonly poiseBroken: boolean;
  readonly causedDeath: boolean;
}

export function createDamageResult(fields: Partial<DamageResult> = {}): DamageResult {
  return Object.freeze({
    finalDamage: fields.finalDamage ?? 0,
    finalPoiseDamage: fields.finalPoiseDamage ?? 0,
    parried: fields.parried ?? false,
    partiallyParried: fields.partiallyParried ?? false,
    dodged: fields.dodged ?? false,
    blocked: fields.blocked ?? false,
    poiseBroken: fields.poiseBroken ?? false,
    causedDeath: fields.causedDeath ?? false,
  });
}

/** Parried, dodged or blocked. A partial parry still lands, so it doesn't count. */
export function wasDefended(result: DamageResult): boolean {
  return result.parried || result.dodged || result.blocked;
}

export function noDamageTaken(result: DamageResult): boolean {
  return result.finalDamage <= 0;
}
