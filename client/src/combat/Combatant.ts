// ═══════════════════════════════════════════════════════════════════
// COMBATANT — what the resolver and the combat system can see of an
// actor. Player and AI actors implement it identically.
// ═══════════════════════════════════════════════════════════════════

import type * as THREE from 'three';
import type {
  ActorId, CombatStats, Faction, StaggerSeverity, TimingWindow, Vec3,
} from '@riposte/shared';
import type { ExternalForces } from '../entities/ExternalForces.js';
import type { AttackProfile } from './AttackData.js';
import type { HealthPool } from './HealthPool.js';
import type { PoiseLedger } from './PoiseLedger.js';
import type { StaminaLedger } from './StaminaLedger.js';
import type { TransitionOutcome } from './StateMachine.js';

export interface Combatant {
  readonly id: ActorId;
  readonly faction: Faction;
  readonly isAlive: boolean;
  readonly stats: CombatStats;

  readonly health: HealthPool;
  readonly poise: PoiseLedger;
  readonly stamina: StaminaLedger;
  readonly forces: ExternalForces;

  /** World position, owned by the movement integrator */
  readonly position: THREE.Vector3;

  // ── Live defensive flags (written by the active state) ─────────
  readonly isInvulnerable: boolean;
  readonly isBlocking: boolean;
  /** Open parry window, or null when not parrying */
  readonly parryWindow: TimingWindow | null;

  // ── Offense ────────────────────────────────────────────────────
  /** Swing in progress, or null */
  readonly activeAttack: AttackProfile | null;
  readonly isHitboxActive: boolean;

  /** Force the stagger state. `direction` points away from the hit. */
  applyStagger(severity: StaggerSeverity, direction: Vec3 | null): TransitionOutcome;
  /** Force the death state. Returns false if already dead. */
  die(killer: Combatant | null): boolean;
}
