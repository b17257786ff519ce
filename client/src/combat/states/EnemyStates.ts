// ═══════════════════════════════════════════════════════════════════
// ENEMY STATES
//
// The AI mirror of the player set. Perception (target, distance, line
// of sight, ranges) comes from the driver through actor.perception;
// defensive moves arrive through the same intent buffer and held input
// the player uses.
//
// State graph:
//   idle → alert (target detected) → chase → attackPattern → chase | idle
//   chase → idle       (target lost, dead, or beyond maxChaseRange)
//   idle | chase → dodge | block | parry   (driver intents)
//   any  → stagger → chase | idle          (forced)
//   any  → death                           (forced, terminal)
//
// An attack pattern commits: apart from stagger and death nothing
// leaves it before ATTACK_COMMIT_END.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import type { ActionKind, CombatStats, StaggerSeverity, Vec3 } from '@riposte/shared';
import { CombatActor } from '../CombatActor.js';
import type { StateRoles } from '../CombatActor.js';
import type { CombatContext } from '../CombatContext.js';
import { ENEMY_ATTACK_PATTERN, isHitboxActive } from '../AttackData.js';
import type { AttackProfile } from '../AttackData.js';
import { TrackedPerception, targetWithin } from '../EnemyPerception.js';
import type { EnemyPerception } from '../EnemyPerception.js';
import { StateBase, defineStateTable } from '../StateMachine.js';
import { inIFrames, resetsPoise, staggerDuration, takeIntent } from './common.js';

export type EnemyStateId =
  | 'idle'
  | 'alert'
  | 'chase'
  | 'attackPattern'
  | 'parry'
  | 'block'
  | 'dodge'
  | 'stagger'
  | 'death';

export type EnemyActor = CombatActor<EnemyStateId>;

// ── Tuning ────────────────────────────────────────────────────────

const ALERT_SECONDS = 0.8;
const CHASE_SPEED_MULTIPLIER = 1.2;
/** Seconds without line of sight before the chase is dropped */
const LOSE_SIGHT_SECONDS = 3;
/** Normalized attack time before which only stagger / death can interrupt */
const ATTACK_COMMIT_END = 0.9;
const DODGE_RECOVERY_START = 0.7;
/** Enemies recover from light and medium hits faster than players */
const ENEMY_LIGHT_STAGGER = 0.4;
const ENEMY_STAGGER_KNOCKBACK = 0.5;

// ── Base ──────────────────────────────────────────────────────────

abstract class EnemyState extends StateBase<EnemyStateId, EnemyActor> {
  protected get stats(): CombatStats { return this.ctx.stats; }
  protected get perception(): EnemyPerception { return this.ctx.perception; }

  protected take(action: ActionKind, target: EnemyStateId, cost: number): boolean {
    return takeIntent(this.ctx, this.machine, action, target, cost);
  }

  /** Driver-requested defense, in priority order: dodge → block → parry */
  protected takeDefensiveIntent(): boolean {
    const s = this.stats;
    if (this.take('dodge', 'dodge', s.dodgeStaminaCost)) return true;
    if (this.ctx.input.isHeld('block') && this.canTransitionTo('block')
      && this.machine.changeState('block', 'block') === 'accepted') return true;
    if (this.take('block', 'block', 0)) return true;
    return this.take('parry', 'parry', s.parryStaminaCost);
  }

  protected get targetDetected(): boolean {
    const p = this.perception;
    return p.hasLineOfSight && targetWithin(p, p.detectionRange);
  }

  /** Resume the chase if the target is still worth it, otherwise stand down */
  protected reengage(): void {
    const p = this.perception;
    this.machine.changeState(targetWithin(p, p.maxChaseRange) ? 'chase' : 'idle');
  }
}

// ── Idle ──────────────────────────────────────────────────────────

export class EnemyIdleState extends EnemyState {
  readonly id = 'idle';

  enter(): void {
    this.ctx.setLocomotion('run', 0);
  }

  execute(): void {
    if (this.takeDefensiveIntent()) return;
    if (this.targetDetected) this.machine.changeState('alert');
  }

  canTransitionTo(target: EnemyStateId): boolean {
    return target !== 'idle';
  }
}

// ── Alert ─────────────────────────────────────────────────────────

export class EnemyAlertState extends EnemyState {
  readonly id = 'alert';

  get duration(): number { return ALERT_SECONDS; }

  enter(): void {
    this.ctx.setLocomotion('run', 0);
  }

  execute(): void {
    if (this.normalizedTime < 1) return;
    this.machine.changeState(this.targetDetected ? 'chase' : 'idle');
  }

  canTransitionTo(target: EnemyStateId): boolean {
    switch (target) {
      case 'chase':
      case 'idle':
      case 'stagger':
      case 'death':
        return true;
      default:
        return false;
    }
  }
}

// ── Chase ─────────────────────────────────────────────────────────

export class EnemyChaseState extends EnemyState {
  readonly id = 'chase';

  private _lastSeenAt = 0;

  enter(): void {
    this._lastSeenAt = this.ctx.context.clock.now();
  }

  execute(): void {
    const p = this.perception;
    const now = this.ctx.context.clock.now();

    if (!targetWithin(p, p.maxChaseRange)) {
      this.machine.changeState('idle');
      return;
    }
    if (p.hasLineOfSight) {
      this._lastSeenAt = now;
    } else if (now - this._lastSeenAt > LOSE_SIGHT_SECONDS) {
      this.machine.changeState('idle');
      return;
    }

    if (this.takeDefensiveIntent()) return;

    if (targetWithin(p, p.attackRange) && this.ctx.stamina.canAfford(this.stats.lightAttackStaminaCost)) {
      this.machine.changeState('attackPattern');
      return;
    }
    this.ctx.setLocomotion('run', this.stats.moveSpeed * CHASE_SPEED_MULTIPLIER);
  }

  exit(): void {
    this.ctx.setLocomotion('run', 0);
  }

  canTransitionTo(target: EnemyStateId): boolean {
    return target !== 'chase' && target !== 'alert';
  }
}

// ── Attack pattern ────────────────────────────────────────────────

export class EnemyAttackPatternState extends EnemyState {
  readonly id = 'attackPattern';

  private _patternIndex = -1;
  private _profile: AttackProfile = ENEMY_ATTACK_PATTERN[0];

  get duration(): number { return this._profile.duration; }

  private get committed(): boolean { return this.normalizedTime < ATTACK_COMMIT_END; }

  enter(): void {
    this._patternIndex = (this._patternIndex + 1) % ENEMY_ATTACK_PATTERN.length;
    this._profile = ENEMY_ATTACK_PATTERN[this._patternIndex];
    this.ctx.setLocomotion('run', 0);
    this.ctx.stamina.tryConsume(this.stats.lightAttackStaminaCost);
    this.ctx.beginSwing(this._profile);
  }

  execute(): void {
    const t = this.normalizedTime;
    this.ctx.setHitboxActive(isHitboxActive(this._profile, t));
    if (this.committed) return;
    if (this.take('dodge', 'dodge', this.stats.dodgeStaminaCost)) return;
    if (t >= 1) this.reengage();
  }

  exit(): void {
    this.ctx.endSwing();
  }

  canTransitionTo(target: EnemyStateId): boolean {
    switch (target) {
      case 'stagger':
      case 'death':
        return true;
      case 'chase':
      case 'idle':
      case 'dodge':
        return !this.committed;
      default:
        return false;
    }
  }
}

// ── Parry ─────────────────────────────────────────────────────────

export class EnemyParryState extends EnemyState {
  readonly id = 'parry';

  get duration(): number {
    return this.stats.parryWindowDuration + this.stats.parryRecoveryTime;
  }

  private get windowOpen(): boolean { return this.time <= this.stats.parryWindowDuration; }

  enter(): void {
    this.ctx.setLocomotion('run', 0);
    this.ctx.stamina.tryConsume(this.stats.parryStaminaCost);
    this.ctx.openParryWindow(this.stats.parryWindowDuration, this.stats.perfectParryWindow);
  }

  execute(): void {
    if (this.windowOpen) return;
    this.ctx.closeParryWindow();
    if (this.take('dodge', 'dodge', this.stats.dodgeStaminaCost)) return;
    if (this.time >= this.duration) this.reengage();
  }

  exit(): void {
    this.ctx.closeParryWindow();
  }

  canTransitionTo(target: EnemyStateId): boolean {
    switch (target) {
      case 'stagger':
      case 'death':
        return true;
      case 'dodge':
        return !this.windowOpen;
      case 'chase':
      case 'idle':
        return this.time >= this.duration;
      default:
        return false;
    }
  }
}

// ── Block ─────────────────────────────────────────────────────────

export class EnemyBlockState extends EnemyState {
  readonly id = 'block';

  enter(): void {
    this.ctx.setLocomotion('run', 0);
    this.ctx.setBlocking(true);
    this.ctx.openParryWindow(this.stats.blockParryWindow, this.stats.blockPerfectWindow);
  }

  execute(): void {
    const { input, stamina } = this.ctx;
    const s = this.stats;
    if (!input.isHeld('block')) {
      this.reengage();
      return;
    }
    if (this.time > s.blockParryWindow) {
      this.ctx.closeParryWindow();
      if (!stamina.drain(s.blockStaminaDrainPerSecond, this.ctx.deltaTime)) {
        this.reengage();
        return;
      }
    }
    this.take('dodge', 'dodge', s.dodgeStaminaCost);
  }

  exit(): void {
    this.ctx.setBlocking(false);
    this.ctx.closeParryWindow();
  }

  canTransitionTo(target: EnemyStateId): boolean {
    switch (target) {
      case 'stagger':
      case 'death':
      case 'dodge':
      case 'chase':
      case 'idle':
        return true;
      default:
        return false;
    }
  }
}

// ── Dodge ─────────────────────────────────────────────────────────

export class EnemyDodgeState extends EnemyState {
  readonly id = 'dodge';

  private readonly _direction = new THREE.Vector3();

  get duration(): number { return this.stats.dodgeDuration; }

  private get inRecovery(): boolean { return this.normalizedTime >= DODGE_RECOVERY_START; }

  enter(): void {
    const s = this.stats;
    this.ctx.setLocomotion('run', 0);
    this.ctx.stamina.tryConsume(s.dodgeStaminaCost);
    this.ctx.movementDirection(this._direction);
    if (!this.ctx.input.hasDirection) this._direction.negate();
    this.ctx.forces.addKnockback(this._direction, s.dodgeDistance, s.dodgeDuration);
  }

  execute(): void {
    const t = this.normalizedTime;
    this.ctx.setInvulnerable(inIFrames(t, this.stats));
    if (this.inRecovery && this.take('parry', 'parry', this.stats.parryStaminaCost)) return;
    if (t >= 1) this.reengage();
  }

  exit(): void {
    this.ctx.setInvulnerable(false);
  }

  canTransitionTo(target: EnemyStateId): boolean {
    switch (target) {
      case 'stagger':
      case 'death':
        return true;
      case 'parry':
      case 'chase':
      case 'idle':
        return this.inRecovery;
      default:
        return false;
    }
  }
}

// ── Stagger ───────────────────────────────────────────────────────

export function enemyStaggerDuration(severity: StaggerSeverity, stats: CombatStats): number {
  return severity === 'light' || severity === 'medium' ? ENEMY_LIGHT_STAGGER : staggerDuration(severity, stats);
}

export class EnemyStaggerState extends EnemyState {
  readonly id = 'stagger';

  private _duration = 0;

  get duration(): number { return this._duration; }

  enter(): void {
    const actor = this.ctx;
    const severity = actor.staggerSeverity;
    this._duration = enemyStaggerDuration(severity, this.stats);
    actor.clearCombatFlags();
    actor.setLocomotion('run', 0);
    if (resetsPoise(severity)) actor.poise.resetPoise();
    if (actor.staggerDirection.lengthSq() > 0) {
      actor.forces.addKnockback(actor.staggerDirection, ENEMY_STAGGER_KNOCKBACK, this._duration * 0.3);
    }
  }

  execute(): void {
    if (this.normalizedTime >= 1) this.reengage();
  }

  canTransitionTo(target: EnemyStateId): boolean {
    switch (target) {
      case 'stagger':
      case 'death':
        return true;
      case 'chase':
      case 'idle':
        return this.normalizedTime >= 1;
      default:
        return false;
    }
  }
}

// ── Death ─────────────────────────────────────────────────────────

export class EnemyDeathState extends EnemyState {
  readonly id = 'death';

  get canBeInterrupted(): boolean { return false; }

  enter(): void {
    this.ctx.clearCombatFlags();
    this.ctx.setLocomotion('run', 0);
  }

  canTransitionTo(): boolean {
    return false;
  }
}

// ── Table ─────────────────────────────────────────────────────────

export const ENEMY_STATE_IDS: readonly EnemyStateId[] = [
  'idle', 'alert', 'chase', 'attackPattern', 'parry', 'block', 'dodge', 'stagger', 'death',
];

export const ENEMY_STATE_TABLE = defineStateTable<EnemyStateId, EnemyActor>(ENEMY_STATE_IDS, {
  idle: (actor, machine) => new EnemyIdleState(actor, machine),
  alert: (actor, machine) => new EnemyAlertState(actor, machine),
  chase: (actor, machine) => new EnemyChaseState(actor, machine),
  attackPattern: (actor, machine) => new EnemyAttackPatternState(actor, machine),
  parry: (actor, machine) => new EnemyParryState(actor, machine),
  block: (actor, machine) => new EnemyBlockState(actor, machine),
  dodge: (actor, machine) => new EnemyDodgeState(actor, machine),
  stagger: (actor, machine) => new EnemyStaggerState(actor, machine),
  death: (actor, machine) => new EnemyDeathState(actor, machine),
}, 'death');

export const ENEMY_ROLES: StateRoles<EnemyStateId> = Object.freeze({
  initial: 'idle',
  stagger: 'stagger',
  death: 'death',
});

export interface EnemyActorOptions {
  id: string;
  stats: CombatStats;
  context: CombatContext;
  position?: Vec3;
  /** Defaults to a TrackedPerception bound to the new actor */
  perception?: EnemyPerception;
}

export function createEnemyActor(options: EnemyActorOptions): EnemyActor {
  const actor = new CombatActor({
    id: options.id,
    stats: options.stats,
    context: options.context,
    position: options.position,
    perception: options.perception,
    faction: 'enemy',
    table: ENEMY_STATE_TABLE,
    roles: ENEMY_ROLES,
  });
  if (!options.perception) actor.perception = new TrackedPerception(actor);
  return actor;
}
