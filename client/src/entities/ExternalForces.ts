// ═══════════════════════════════════════════════════════════════════
// EXTERNAL FORCES
// Knockback, dodge displacement, wind: anything pushing an actor that
// isn't its own movement input.
//
// The movement integrator calls tick(dt) once per fixed step and adds
// the returned vector (units per second) to its velocity. Collision is
// the integrator's business; this only says where the push goes.
//
// PATTERN: fixed slot table, one THREE.Vector3 per slot, reused. When
// every slot is busy a new force must outrank the weakest one present
// (lowest priority, oldest first) to take its slot.
//
// Priorities: instant 0, continuous 0, impulse 1.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import {
  DIRECTION_EPSILON_SQ, FIXED_TIMESTEP, FORCE_THRESHOLD,
  KNOCKBACK_CURVE_COMPENSATION, MAX_ACTIVE_FORCES, MAX_FORCE_DURATION,
  MAX_FORCE_MAGNITUDE, isFiniteVec3,
} from '@riposte/shared';
import type { Vec3 } from '@riposte/shared';

// ── Types ─────────────────────────────────────────────────────────

export type ForceKind = 'instant' | 'impulse' | 'continuous';

/** Normalized lifetime (0..1) → magnitude multiplier */
export type DecayCurve = (t: number) => number;

export const DECAY_CURVES = {
  linear: (t: number) => 1 - t,
  easeOut: (t: number) => (1 - t) * (1 - t),
  /** Smoothstep falloff: holds near full strength early, same area as linear */
  knockback: (t: number) => (1 - t) * (1 - t) * (1 + 2 * t),
} as const satisfies Record<string, DecayCurve>;

export type DecayCurveName = keyof typeof DECAY_CURVES;

export interface ForceSpec {
  kind: ForceKind;
  direction: Vec3;
  /** Units per second */
  magnitude: number;
  /** Seconds */
  duration: number;
  curve?: DecayCurveName;
  priority?: number;
}

const DEFAULT_PRIORITY: Readonly<Record<ForceKind, number>> = {
  instant: 0,
  impulse: 1,
  continuous: 0,
};

interface ForceSlot {
  active: boolean;
  kind: ForceKind;
  /** Unit length */
  readonly direction: THREE.Vector3;
  magnitude: number;
  duration: number;
  elapsed: number;
  curve: DecayCurve;
  priority: number;
  order: number;
}

function createSlot(): ForceSlot {
  return {
    active: false,
    kind: 'instant',
    direction: new THREE.Vector3(),
    magnitude: 0,
    duration: 0,
    elapsed: 0,
    curve: DECAY_CURVES.linear,
    priority: 0,
    order: 0,
  };
}

// ── Manager ───────────────────────────────────────────────────────

export class ExternalForces {
  private readonly _slots: ForceSlot[] = [];
  private readonly _sum = new THREE.Vector3();
  private _count = 0;
  private _nextOrder = 0;

  constructor() {
    for (let i = 0; i < MAX_ACTIVE_FORCES; i++) this._slots.push(createSlot());
  }

  /** Sum returned by the last tick(). Read-only for callers. */
  get current(): THREE.Vector3 { return this._sum; }
  get count(): number { return this._count; }
  get hasActiveForces(): boolean { return this._count > 0; }

  /**
   * Queue a force. Returns false when it was rejected (non-finite input),
   * too weak to matter, or outranked by every force already present.
   */
  addForce(spec: ForceSpec): boolean {
    const priority = spec.priority ?? DEFAULT_PRIORITY[spec.kind];
    if (!isFiniteVec3(spec.direction) || !Number.isFinite(spec.magnitude)
      || !Number.isFinite(spec.duration) || !Number.isFinite(priority)) {
      console.warn(`[ExternalForces] Rejected ${spec.kind} force: non-finite input`);
      return false;
    }
    const d = spec.direction;
    const lenSq = d.x * d.x + d.y * d.y + d.z * d.z;
    if (lenSq < DIRECTION_EPSILON_SQ) return false;

    const magnitude = Math.min(spec.magnitude, MAX_FORCE_MAGNITUDE);
    if (magnitude < FORCE_THRESHOLD) return false;
    const duration = Math.min(spec.duration, MAX_FORCE_DURATION);
    if (duration <= 0) return false;

    const slot = this.claimSlot(priority);
    if (!slot) return false;

    slot.active = true;
    slot.kind = spec.kind;
    slot.direction.set(d.x, d.y, d.z).normalize();
    slot.magnitude = magnitude;
    slot.duration = duration;
    slot.elapsed = 0;
    slot.curve = DECAY_CURVES[spec.curve ?? 'linear'];
    slot.priority = priority;
    slot.order = this._nextOrder++;
    this._count++;
    return true;
  }

  /** Full strength for a single fixed step; `vector` carries both direction and magnitude */
  addInstant(vector: Vec3): boolean {
    if (!isFiniteVec3(vector)) {
      console.warn('[ExternalForces] Rejected instant force: non-finite input');
      return false;
    }
    const magnitude = Math.sqrt(vector.x * vector.x + vector.y * vector.y + vector.z * vector.z);
    return this.addForce({ kind: 'instant', direction: vector, magnitude, duration: FIXED_TIMESTEP });
  }

  addImpulse(direction: Vec3, magnitude: number, duration: number, curve: DecayCurveName = 'linear'): boolean {
    return this.addForce({ kind: 'impulse', direction, magnitude, duration, curve });
  }

  /** Impulse sized so the decayed push covers roughly `distance` */
  addKnockback(direction: Vec3, distance: number, duration: number): boolean {
    if (!Number.isFinite(distance) || !Number.isFinite(duration) || duration <= 0) {
      console.warn(`[ExternalForces] Rejected knockback: distance=${distance} duration=${duration}`);
      return false;
    }
    const magnitude = (distance / duration) * KNOCKBACK_CURVE_COMPENSATION;
    return this.addForce({ kind: 'impulse', direction, magnitude, duration, curve: 'knockback' });
  }

  addContinuous(direction: Vec3, magnitude: number, duration: number): boolean {
    return this.addForce({ kind: 'continuous', direction, magnitude, duration });
  }

  /** Sum every active force, then age them. Returns the shared sum vector. */
  tick(dt: number): THREE.Vector3 {
    this._sum.set(0, 0, 0);
    if (this._count === 0) return this._sum;

    for (const slot of this._slots) {
      if (!slot.active) continue;
      const strength = slot.kind === 'impulse'
        ? slot.magnitude * slot.curve(Math.min(1, slot.elapsed / slot.duration))
        : slot.magnitude;
      this._sum.addScaledVector(slot.direction, strength);
    }

    const step = Number.isFinite(dt) && dt > 0 ? dt : 0;
    for (const slot of this._slots) {
      if (!slot.active) continue;
      slot.elapsed += step;
      if (slot.kind === 'instant' || slot.elapsed >= slot.duration) this.release(slot);
    }
    return this._sum;
  }

  clear(): void {
    for (const slot of this._slots) slot.active = false;
    this._count = 0;
    this._sum.set(0, 0, 0);
  }

  // ── Internal ───────────────────────────────────────────────────

  private claimSlot(priority: number): ForceSlot | null {
    let weakest: ForceSlot | null = null;
    for (const slot of this._slots) {
      if (!slot.active) return slot;
      if (!weakest
        || slot.priority < weakest.priority
        || (slot.priority === weakest.priority && slot.order < weakest.order)) {
        weakest = slot;
      }
    }
    if (!weakest || priority <= weakest.priority) return null;
    this.release(weakest);
    return weakest;
  }

  private release(slot: ForceSlot): void {
    slot.active = false;
    this._count--;
  }
}
