// ═══════════════════════════════════════════════════════════════════
// COMBAT ACTOR
//
// One per spawned fighter, player or AI. Bundles identity, validated
// stats, the ledgers (health, poise, stamina), external forces, the
// intent buffer, held input and the behavioral state machine.
//
// The active state writes the combat flags (invulnerable, blocking,
// parry window, swing in progress); the resolver reads them. Only the
// state machine moves the actor between states.
//
// FLOW (per frame):  driver writes input / intents
//                    → update(dt): ledgers tick, machine.execute()
//                    → fixedUpdate(dt): machine.physicsExecute(), forces
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import { createTimingWindow, normalizeVec3 } from '@riposte/shared';
import type {
  ActorId, CombatStats, Faction, LocomotionMode, StaggerSeverity, TimingWindow, Vec3,
} from '@riposte/shared';
import { ExternalForces } from '../entities/ExternalForces.js';
import type { AttackProfile } from './AttackData.js';
import type { Combatant } from './Combatant.js';
import type { CombatContext } from './CombatContext.js';
import { CombatInput } from './CombatInput.js';
import { NO_PERCEPTION } from './EnemyPerception.js';
import type { EnemyPerception } from './EnemyPerception.js';
import { HealthPool } from './HealthPool.js';
import { IntentBuffer } from './IntentBuffer.js';
import { PoiseLedger } from './PoiseLedger.js';
import { StaminaLedger } from './StaminaLedger.js';
import { StateMachine } from './StateMachine.js';
import type { StateTable, TransitionOutcome } from './StateMachine.js';

// ── Types ─────────────────────────────────────────────────────────

/** States every actor type must have, by role */
export interface StateRoles<TId extends string> {
  initial: TId;
  stagger: TId;
  death: TId;
}

export interface CombatActorOptions<TId extends string> {
  id: ActorId;
  faction: Faction;
  stats: CombatStats;
  context: CombatContext;
  table: StateTable<TId, CombatActor<TId>>;
  roles: StateRoles<TId>;
  position?: Vec3;
  /** AI drivers supply one; players don't need it */
  perception?: EnemyPerception;
}

/** Read by the movement integrator each frame */
export interface LocomotionReadout {
  mode: LocomotionMode;
  /** Unit stick direction, zero when standing */
  readonly direction: THREE.Vector2;
  /** Units per second */
  speed: number;
}

// ── Actor ─────────────────────────────────────────────────────────

export class CombatActor<TId extends string = string> implements Combatant {
  readonly id: ActorId;
  readonly faction: Faction;
  readonly stats: CombatStats;
  readonly context: CombatContext;

  readonly health: HealthPool;
  readonly poise: PoiseLedger;
  readonly stamina: StaminaLedger;
  readonly forces = new ExternalForces();
  readonly intents: IntentBuffer;
  readonly input = new CombatInput();
  readonly machine: StateMachine<TId, CombatActor<TId>>;
  readonly roles: Readonly<StateRoles<TId>>;
  perception: EnemyPerception;

  readonly position = new THREE.Vector3();
  /** Facing, unit length on the ground plane */
  readonly forward = new THREE.Vector3(0, 0, 1);
  readonly locomotion: LocomotionReadout = { mode: 'run', direction: new THREE.Vector2(), speed: 0 };

  // Combat flags
  private _alive = true;
  private _invulnerable = false;
  private _blocking = false;
  private _parryWindow: TimingWindow | null = null;

  // Swing
  private _activeAttack: AttackProfile | null = null;
  private _hitboxActive = false;
  private _swingDamageScale = 1;
  private readonly _hitThisSwing = new Set<ActorId>();

  // Last stagger request, read by the stagger state on enter
  private _staggerSeverity: StaggerSeverity = 'light';
  private readonly _staggerDirection = new THREE.Vector3();

  private _deltaTime = 0;

  constructor(options: CombatActorOptions<TId>) {
    const { stats, context } = options;
    this.id = options.id;
    this.faction = options.faction;
    this.stats = stats;
    this.context = context;
    this.roles = Object.freeze({ ...options.roles });
    this.perception = options.perception ?? NO_PERCEPTION;
    if (options.position) this.position.set(options.position.x, options.position.y, options.position.z);

    this.health = new HealthPool(stats.maxHealth);
    this.poise = new PoiseLedger(context.clock, {
      max: stats.maxPoise,
      regenRate: stats.poiseRegenRate,
      regenDelay: stats.poiseRegenDelay,
    });
    this.stamina = new StaminaLedger({
      max: stats.maxStamina,
      regenRate: stats.staminaRegenRate,
      regenDelay: stats.staminaRegenDelay,
    });
    this.intents = new IntentBuffer(context.clock, stats.inputBufferWindow);

    this.machine = new StateMachine(options.table, {
      label: this.id,
      actorId: this.id,
      clock: context.clock,
      events: context.events,
      debug: context.debug,
    });
    this.machine.initialize(this);
    this.machine.start(options.roles.initial);
  }

  // ── Public State ────────────────────────────────────────────────

  get isAlive(): boolean { return this._alive; }
  get isInvulnerable(): boolean { return this._invulnerable; }
  get isBlocking(): boolean { return this._blocking; }
  get parryWindow(): TimingWindow | null { return this._parryWindow; }
  get activeAttack(): AttackProfile | null { return this._activeAttack; }
  get isHitboxActive(): boolean { return this._hitboxActive; }
  get swingDamageScale(): number { return this._swingDamageScale; }
  get staggerSeverity(): StaggerSeverity { return this._staggerSeverity; }
  get staggerDirection(): THREE.Vector3 { return this._staggerDirection; }
  get stateId(): TId { return this.machine.currentStateId; }
  /** dt of the frame being executed */
  get deltaTime(): number { return this._deltaTime; }

  get healthNormalized(): number { return this.health.normalized; }
  get poiseNormalized(): number { return this.poise.normalized; }
  get staminaNormalized(): number { return this.stamina.normalized; }

  // ── Per-frame ───────────────────────────────────────────────────

  update(dt: number): void {
    this._deltaTime = Number.isFinite(dt) && dt > 0 ? dt : 0;
    this.stamina.tick(this._deltaTime);
    this.poise.tick(this._deltaTime);
    this.machine.execute();
    this.input.endFrame();
  }

  fixedUpdate(dt: number): void {
    this.machine.physicsExecute();
    this.forces.tick(dt);
  }

  // ── Forced transitions ──────────────────────────────────────────

  applyStagger(severity: StaggerSeverity, direction: Vec3 | null): TransitionOutcome {
    this._staggerSeverity = severity;
    if (direction) {
      const n = normalizeVec3(direction);
      this._staggerDirection.set(n.x, n.y, n.z);
    } else {
      this._staggerDirection.set(0, 0, 0);
    }
    return this.machine.forceInterrupt(this.roles.stagger);
  }

  die(killer: Combatant | null): boolean {
    if (!this._alive) return false;
    this._alive = false;
    this.clearCombatFlags();
    this.intents.clear();
    this.input.reset();
    this.forces.clear();
    this.machine.forceInterrupt(this.roles.death);
    this.context.events.emit('death', { actor: this.id, killer: killer?.id ?? null });
    return true;
  }

  // ── Flags (written by states) ───────────────────────────────────

  setInvulnerable(value: boolean): void { this._invulnerable = value; }
  setBlocking(value: boolean): void { this._blocking = value; }

  /** Open a parry window starting now */
  openParryWindow(duration: number, perfectDuration: number): void {
    this._parryWindow = createTimingWindow(this.context.clock.now(), duration, perfectDuration);
  }

  closeParryWindow(): void { this._parryWindow = null; }

  beginSwing(profile: AttackProfile, damageScale = 1): void {
    this._activeAttack = profile;
    this._swingDamageScale = damageScale;
    this._hitboxActive = false;
    this._hitThisSwing.clear();
  }

  setHitboxActive(value: boolean): void {
    this._hitboxActive = value && this._activeAttack !== null;
  }

  endSwing(): void {
    this._activeAttack = null;
    this._hitboxActive = false;
    this._swingDamageScale = 1;
    this._hitThisSwing.clear();
  }

  /** Record a hit on `target` for the current swing; false if it was already hit */
  registerSwingHit(target: ActorId): boolean {
    if (this._hitThisSwing.has(target)) return false;
    this._hitThisSwing.add(target);
    return true;
  }

  clearCombatFlags(): void {
    this._invulnerable = false;
    this._blocking = false;
    this._parryWindow = null;
    this.endSwing();
  }

  /** Publish what the movement integrator should do this frame */
  setLocomotion(mode: LocomotionMode, speed: number): void {
    this.locomotion.mode = mode;
    this.locomotion.speed = speed;
    if (speed > 0 && this.input.hasDirection) {
      this.locomotion.direction.copy(this.input.direction).normalize();
    } else {
      this.locomotion.direction.set(0, 0);
    }
  }

  /** Ground-plane direction for dodges and knockback: stick if held, else facing */
  movementDirection(out: THREE.Vector3): THREE.Vector3 {
    if (this.input.hasDirection) {
      out.set(this.input.direction.x, 0, this.input.direction.y).normalize();
    } else {
      out.copy(this.forward);
    }
    return out;
  }
}
