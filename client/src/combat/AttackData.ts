// ═══════════════════════════════════════════════════════════════════
// ATTACK DATA — per-swing profile
//
// Timing fields are normalized over the swing's duration:
//   activeFrameStart..activeFrameEnd  hitbox live
//   comboWindowStart..comboWindowEnd  next light input accepted
//
// Hitbox shape (radius, offset, range) is read by the hit-detection
// integrator; the combat core only needs the timing and damage fields.
// ═══════════════════════════════════════════════════════════════════

import type { StaggerSeverity, Vec3 } from '@riposte/shared';

export interface AttackProfile {
  readonly name: string;
  readonly kind: 'light' | 'heavy';
  /** Applied on top of the attacker's baseDamage × kind multiplier */
  readonly damageMultiplier: number;
  readonly poiseDamage: number;
  readonly hitboxRadius: number;
  readonly hitboxOffset: Readonly<Vec3>;
  readonly range: number;
  readonly activeFrameStart: number;
  readonly activeFrameEnd: number;
  /** Seconds */
  readonly duration: number;
  readonly canCombo: boolean;
  readonly comboWindowStart: number;
  readonly comboWindowEnd: number;
  readonly comboIndex: number;
  readonly canBeParried: boolean;
  /** Swing can't be interrupted by stagger */
  readonly hasSuperArmor: boolean;
  readonly staggerSeverity: StaggerSeverity;
}

export const LIGHT_COMBO_LENGTH = 3;

export function createLightAttack(comboIndex = 0): AttackProfile {
  return Object.freeze({
    name: `lightAttack${comboIndex + 1}`,
    kind: 'light',
    damageMultiplier: 1,
    poiseDamage: 10,
    hitboxRadius: 0.8,
    hitboxOffset: Object.freeze({ x: 0, y: 1, z: 1 }),
    range: 2,
    activeFrameStart: 0.2,
    activeFrameEnd: 0.4,
    duration: 0.6,
    canCombo: comboIndex < LIGHT_COMBO_LENGTH - 1,
    comboWindowStart: 0.5,
    comboWindowEnd: 0.8,
    comboIndex,
    canBeParried: true,
    hasSuperArmor: false,
    staggerSeverity: 'medium',
  });
}

export function createHeavyAttack(comboIndex = 0): AttackProfile {
  return Object.freeze({
    name: `heavyAttack${comboIndex + 1}`,
    kind: 'heavy',
    damageMultiplier: 1,
    poiseDamage: 25,
    hitboxRadius: 1.2,
    hitboxOffset: Object.freeze({ x: 0, y: 1, z: 1.2 }),
    range: 2.5,
    activeFrameStart: 0.35,
    activeFrameEnd: 0.5,
    duration: 1,
    canCombo: false,
    comboWindowStart: 0,
    comboWindowEnd: 0,
    comboIndex,
    canBeParried: true,
    hasSuperArmor: true,
    staggerSeverity: 'heavy',
  });
}

/** AI swing: slower wind-up, no combo chaining */
export function createEnemyAttack(patternIndex = 0): AttackProfile {
  return Object.freeze({
    name: `enemyAttack${patternIndex + 1}`,
    kind: 'light',
    damageMultiplier: 1,
    poiseDamage: 15,
    hitboxRadius: 0.9,
    hitboxOffset: Object.freeze({ x: 0, y: 1, z: 1 }),
    range: 2,
    activeFrameStart: 0.4,
    activeFrameEnd: 0.6,
    duration: 1.2,
    canCombo: false,
    comboWindowStart: 0,
    comboWindowEnd: 0,
    comboIndex: patternIndex,
    canBeParried: true,
    hasSuperArmor: false,
    staggerSeverity: 'medium',
  });
}

/** Swings shared by every actor; profiles are frozen */
export const LIGHT_COMBO: readonly AttackProfile[] = [0, 1, 2].map((i) => createLightAttack(i));
export const HEAVY_ATTACK: AttackProfile = createHeavyAttack();
export const ENEMY_ATTACK_PATTERN: readonly AttackProfile[] = [0, 1].map((i) => createEnemyAttack(i));

export function isHitboxActive(profile: AttackProfile, normalizedTime: number): boolean {
  return normalizedTime >= profile.activeFrameStart && normalizedTime <= profile.activeFrameEnd;
}

export function isInComboWindow(profile: AttackProfile, normalizedTime: number): boolean {
  return profile.canCombo
    && normalizedTime >= profile.comboWindowStart
    && normalizedTime <= profile.comboWindowEnd;
}
