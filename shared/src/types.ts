// ═══════════════════════════════════════════════════════════════════
// SHARED TYPES - Used by both client and server
// ═══════════════════════════════════════════════════════════════════

import { DIRECTION_EPSILON_SQ } from './constants.js';

// --- Math ---
export interface Vec2 {
  x: number;
  y: number;
}

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export const ZERO_VEC3: Readonly<Vec3> = Object.freeze({ x: 0, y: 0, z: 0 });

export function isFiniteVec2(v: Vec2): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y);
}

export function isFiniteVec3(v: Vec3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

/** Unit-length copy of `v`, or the zero vector when `v` has no direction */
export function normalizeVec3(v: Vec3): Vec3 {
  const lenSq = v.x * v.x + v.y * v.y + v.z * v.z;
  if (lenSq < DIRECTION_EPSILON_SQ) return { x: 0, y: 0, z: 0 };
  const inv = 1 / Math.sqrt(lenSq);
  return { x: v.x * inv, y: v.y * inv, z: v.z * inv };
}

// --- Actors ---
export type ActorId = string;

export type Faction = 'player' | 'enemy' | 'neutral';

// --- Intents ---
/**
 * Discrete actions an input or AI driver can buffer.
 * Movement is continuous and is not an intent.
 */
export type ActionKind =
  | 'lightAttack'
  | 'heavyAttack'
  | 'parry'
  | 'block'
  | 'dodge';

export const ACTION_KINDS: readonly ActionKind[] = [
  'lightAttack', 'heavyAttack', 'parry', 'block', 'dodge',
];

// --- Damage ---
export type DamageType = 'physical';

export type LocomotionMode = 'walk' | 'run' | 'sprint';

export type StaggerSeverity = 'light' | 'medium' | 'heavy' | 'knockdown';
