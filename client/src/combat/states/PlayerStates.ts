// ═══════════════════════════════════════════════════════════════════
// PLAYER STATES
//
// State graph:
//   idle ↔ locomotion (walk / run / sprint)
//   idle | locomotion → dodge | block | parry | lightAttack | heavyAttack
//   lightAttack: 3-hit combo, dodge / heavy cancel in recovery
//   heavyAttack: charge while held, super armor through the swing
//   parry → (window) → recovery → idle
//   block ↔ attacks, dodge; drops on release or empty stamina
//   any  → stagger → idle            (forced)
//   any  → death                     (forced, terminal)
//
// Buffered intents are checked in priority order:
//   dodge → block → parry → light → heavy
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import type { ActionKind, CombatStats, Vec3 } from '@riposte/shared';
import { CombatActor } from '../CombatActor.js';
import type { StateRoles } from '../CombatActor.js';
import type { CombatContext } from '../CombatContext.js';
import { HEAVY_ATTACK, LIGHT_COMBO, isHitboxActive, isInComboWindow } from '../AttackData.js';
import type { AttackProfile } from '../AttackData.js';
import { StateBase, defineStateTable } from '../StateMachine.js';
import {
  STAGGER_KNOCKBACK, STAGGER_RECOVERY_START, inIFrames, resetsPoise, staggerDuration, takeIntent,
} from './common.js';

export type PlayerStateId =
  | 'idle'
  | 'locomotion'
  | 'lightAttack'
  | 'heavyAttack'
  | 'parry'
  | 'block'
  | 'dodge'
  | 'stagger'
  | 'death';

export type PlayerActor = CombatActor<PlayerStateId>;

// ── Tuning ────────────────────────────────────────────────────────

const LIGHT_RECOVERY_START = 0.8;
const HEAVY_RECOVERY_START = 0.75;
const HEAVY_MAX_CHARGE = 1.5;
/** Extra damage at full charge (1 + bonus) */
const HEAVY_CHARGE_BONUS = 0.5;
const DODGE_RECOVERY_START = 0.7;
/** Backstep (no stick input) covers this share of a roll */
const BACKSTEP_RATIO = 2 / 3;
const BLOCK_MOVE_MULTIPLIER = 0.4;

// ── Base ──────────────────────────────────────────────────────────

abstract class PlayerState extends StateBase<PlayerStateId, PlayerActor> {
  protected get stats(): CombatStats { return this.ctx.stats; }
  protected get now(): number { return this.ctx.context.clock.now(); }

  protected take(action: ActionKind, target: PlayerStateId, cost: number): boolean {
    return takeIntent(this.ctx, this.machine, action, target, cost);
  }

  /** Buffered combat actions in priority order */
  protected takeCombatIntent(): boolean {
    const s = this.stats;
    if (this.take('dodge', 'dodge', s.dodgeStaminaCost)) return true;
    if (this.ctx.input.isHeld('block') && this.canTransitionTo('block')
      && this.machine.changeState('block', 'block') === 'accepted') return true;
    if (this.take('block', 'block', 0)) return true;
    if (this.take('parry', 'parry', s.parryStaminaCost)) return true;
    if (this.take('lightAttack', 'lightAttack', s.lightAttackStaminaCost)) return true;
    return this.take('heavyAttack', 'heavyAttack', s.heavyAttackStaminaCost);
  }

  /** Leave for locomotion if the stick is held, otherwise idle */
  protected settle(): void {
    this.machine.changeState(this.ctx.input.hasDirection ? 'locomotion' : 'idle');
  }
}

// ── Idle ──────────────────────────────────────────────────────────

export class PlayerIdleState extends PlayerState {
  readonly id = 'idle';

  enter(): void {
    this.ctx.setLocomotion('run', 0);
  }

  execute(): void {
    if (this.takeCombatIntent()) return;
    if (this.ctx.input.hasDirection) this.machine.changeState('locomotion');
  }

  canTransitionTo(target: PlayerStateId): boolean {
    return target !== 'idle';
  }
}

// ── Locomotion ────────────────────────────────────────────────────

export class PlayerLocomotionState extends PlayerState {
  readonly id = 'locomotion';

  execute(): void {
    if (this.takeCombatIntent()) return;
    const { input, stamina } = this.ctx;
    if (!input.hasDirection) {
      this.machine.changeState('idle');
      return;
    }

    const s = this.stats;
    if (input.isHeld('sprint') && !stamina.isExhausted && stamina.drain(s.sprintStaminaCost, this.ctx.deltaTime)) {
      this.ctx.setLocomotion('sprint', s.moveSpeed * s.sprintMultiplier);
    } else if (input.isHeld('walk')) {
      this.ctx.setLocomotion('walk', s.moveSpeed * s.walkMultiplier);
    } else {
      this.ctx.setLocomotion('run', s.moveSpeed);
    }
  }

  exit(): void {
    this.ctx.setLocomotion('run', 0);
  }

  canTransitionTo(target: PlayerStateId): boolean {
    return target !== 'locomotion';
  }
}

// ── Light attack ──────────────────────────────────────────────────

export class PlayerLightAttackState extends PlayerState {
  readonly id = 'lightAttack';

  private _comboIndex = 0;
  private _comboQueued = false;
  private _swingStart = 0;
  private _profile: AttackProfile = LIGHT_COMBO[0];

  get comboIndex(): number { return this._comboIndex; }

  /** Covers every swing of the chain so far */
  get duration(): number {
    return this._swingStart - (this.now - this.time) + this._profile.duration;
  }

  /** 0..1 through the current swing */
  get swingTime(): number {
    return Math.min(1, Math.max(0, (this.now - this._swingStart) / this._profile.duration));
  }

  private get inRecovery(): boolean { return this.swingTime >= LIGHT_RECOVERY_START; }

  enter(): void {
    this.startSwing(0);
  }

  execute(): void {
    const t = this.swingTime;
    const s = this.stats;
    this.ctx.setHitboxActive(isHitboxActive(this._profile, t));

    if (this.inRecovery && this.take('dodge', 'dodge', s.dodgeStaminaCost)) return;

    const { intents, stamina } = this.ctx;
    if (!this.inRecovery && !this._comboQueued && this._profile.canCombo
      && intents.has('lightAttack') && stamina.canAfford(s.lightAttackStaminaCost)) {
      intents.tryConsume('lightAttack');
      this._comboQueued = true;
    }

    if (this.inRecovery && this.take('heavyAttack', 'heavyAttack', s.heavyAttackStaminaCost)) return;

    if (this._comboQueued && isInComboWindow(this._profile, t) && !this.inRecovery) {
      this.startSwing(this._comboIndex + 1);
      return;
    }

    if (t >= 1) this.settle();
  }

  exit(): void {
    this.ctx.endSwing();
    this._comboQueued = false;
  }

  canTransitionTo(target: PlayerStateId): boolean {
    switch (target) {
      case 'dodge':
      case 'heavyAttack':
        return this.inRecovery;
      case 'stagger':
      case 'death':
        return true;
      case 'idle':
      case 'locomotion':
        return this.inRecovery;
      default:
        return false;
    }
  }

  private startSwing(index: number): void {
    this._comboIndex = index;
    this._profile = LIGHT_COMBO[index];
    this._swingStart = this.now;
    this._comboQueued = false;
    this.ctx.stamina.tryConsume(this.stats.lightAttackStaminaCost);
    this.ctx.beginSwing(this._profile);
  }
}

// ── Heavy attack ──────────────────────────────────────────────────

export class PlayerHeavyAttackState extends PlayerState {
  readonly id = 'heavyAttack';

  private _charging = false;
  private _chargeTime = 0;
  private _releasedAt = 0;

  get chargeTime(): number { return this._chargeTime; }

  get duration(): number {
    if (this._charging) return 0;
    return this._releasedAt - (this.now - this.time) + HEAVY_ATTACK.duration;
  }

  /** Super armor from release until recovery */
  get canBeInterrupted(): boolean {
    return this._charging || !HEAVY_ATTACK.hasSuperArmor || this.inRecovery;
  }

  get swingTime(): number {
    if (this._charging) return 0;
    return Math.min(1, Math.max(0, (this.now - this._releasedAt) / HEAVY_ATTACK.duration));
  }

  private get inRecovery(): boolean {
    return !this._charging && this.swingTime >= HEAVY_RECOVERY_START;
  }

  enter(): void {
    this._charging = true;
    this._chargeTime = 0;
    this._releasedAt = 0;
    this.ctx.stamina.tryConsume(this.stats.heavyAttackStaminaCost);
  }

  execute(): void {
    const s = this.stats;
    if (this._charging) {
      this._chargeTime = Math.min(this.time, HEAVY_MAX_CHARGE);
      if (!this.ctx.input.isHeld('attack') || this._chargeTime >= HEAVY_MAX_CHARGE) {
        this.release();
      } else {
        this.take('dodge', 'dodge', s.dodgeStaminaCost);
      }
      return;
    }

    const t = this.swingTime;
    this.ctx.setHitboxActive(isHitboxActive(HEAVY_ATTACK, t));
    if (this.inRecovery) {
      if (this.take('dodge', 'dodge', s.dodgeStaminaCost)) return;
      if (this.take('lightAttack', 'lightAttack', s.lightAttackStaminaCost)) return;
    }
    if (t >= 1) this.settle();
  }

  exit(): void {
    this.ctx.endSwing();
    this._charging = false;
  }

  canTransitionTo(target: PlayerStateId): boolean {
    switch (target) {
      case 'dodge':
        return this._charging || this.inRecovery;
      case 'lightAttack':
        return this.inRecovery;
      case 'stagger':
      case 'death':
        return true;
      case 'idle':
      case 'locomotion':
        return this.inRecovery;
      default:
        return false;
    }
  }

  private release(): void {
    this._charging = false;
    this._releasedAt = this.now;
    const charge = this._chargeTime / HEAVY_MAX_CHARGE;
    this.ctx.beginSwing(HEAVY_ATTACK, 1 + charge * HEAVY_CHARGE_BONUS);
  }
}

// ── Parry ─────────────────────────────────────────────────────────

export class PlayerParryState extends PlayerState {
  readonly id = 'parry';

  get duration(): number {
    return this.stats.parryWindowDuration + this.stats.parryRecoveryTime;
  }

  private get windowOpen(): boolean { return this.time <= this.stats.parryWindowDuration; }

  enter(): void {
    this.ctx.stamina.tryConsume(this.stats.parryStaminaCost);
    this.ctx.openParryWindow(this.stats.parryWindowDuration, this.stats.perfectParryWindow);
  }

  execute(): void {
    if (this.windowOpen) return;
    this.ctx.closeParryWindow();

    const s = this.stats;
    if (this.take('dodge', 'dodge', s.dodgeStaminaCost)) return;
    if (this.take('lightAttack', 'lightAttack', s.lightAttackStaminaCost)) return;
    if (this.take('heavyAttack', 'heavyAttack', s.heavyAttackStaminaCost)) return;
    if (this.time >= this.duration) this.settle();
  }

  exit(): void {
    this.ctx.closeParryWindow();
  }

  canTransitionTo(target: PlayerStateId): boolean {
    switch (target) {
      case 'stagger':
      case 'death':
        return true;
      case 'dodge':
      case 'lightAttack':
      case 'heavyAttack':
        return !this.windowOpen;
      case 'idle':
      case 'locomotion':
        return this.time >= this.duration;
      default:
        return false;
    }
  }
}

// ── Block ─────────────────────────────────────────────────────────

export class PlayerBlockState extends PlayerState {
  readonly id = 'block';

  enter(): void {
    this.ctx.setBlocking(true);
    this.ctx.openParryWindow(this.stats.blockParryWindow, this.stats.blockPerfectWindow);
  }

  execute(): void {
    const { input, stamina } = this.ctx;
    const s = this.stats;
    if (!input.isHeld('block')) {
      this.settle();
      return;
    }

    if (this.time > s.blockParryWindow) {
      this.ctx.closeParryWindow();
      if (!stamina.drain(s.blockStaminaDrainPerSecond, this.ctx.deltaTime)) {
        this.settle();
        return;
      }
    }

    if (this.take('dodge', 'dodge', s.dodgeStaminaCost)) return;
    if (this.take('lightAttack', 'lightAttack', s.lightAttackStaminaCost)) return;
    if (this.take('heavyAttack', 'heavyAttack', s.heavyAttackStaminaCost)) return;

    this.ctx.setLocomotion('walk', input.hasDirection ? s.moveSpeed * BLOCK_MOVE_MULTIPLIER : 0);
  }

  exit(): void {
    this.ctx.setBlocking(false);
    this.ctx.closeParryWindow();
    this.ctx.setLocomotion('run', 0);
  }

  canTransitionTo(target: PlayerStateId): boolean {
    return target !== 'block' && target !== 'parry';
  }
}

// ── Dodge ─────────────────────────────────────────────────────────

export class PlayerDodgeState extends PlayerState {
  readonly id = 'dodge';

  private readonly _direction = new THREE.Vector3();

  get duration(): number { return this.stats.dodgeDuration; }

  private get inRecovery(): boolean { return this.normalizedTime >= DODGE_RECOVERY_START; }

  enter(): void {
    const s = this.stats;
    this.ctx.stamina.tryConsume(s.dodgeStaminaCost);

    let distance = s.dodgeDistance;
    if (this.ctx.input.hasDirection) {
      this.ctx.movementDirection(this._direction);
    } else {
      this._direction.copy(this.ctx.forward).negate();
      distance *= BACKSTEP_RATIO;
    }
    this.ctx.forces.addKnockback(this._direction, distance, s.dodgeDuration);
  }

  execute(): void {
    const t = this.normalizedTime;
    const s = this.stats;
    this.ctx.setInvulnerable(inIFrames(t, s));

    if (this.inRecovery) {
      if (this.take('lightAttack', 'lightAttack', s.lightAttackStaminaCost)) return;
      if (this.take('heavyAttack', 'heavyAttack', s.heavyAttackStaminaCost)) return;
      if (this.take('parry', 'parry', s.parryStaminaCost)) return;
    }
    if (t >= 1) this.settle();
  }

  exit(): void {
    this.ctx.setInvulnerable(false);
  }

  canTransitionTo(target: PlayerStateId): boolean {
    switch (target) {
      case 'stagger':
      case 'death':
        return true;
      case 'lightAttack':
      case 'heavyAttack':
      case 'parry':
      case 'block':
      case 'idle':
      case 'locomotion':
        return this.inRecovery;
      default:
        return false;
    }
  }
}

// ── Stagger ───────────────────────────────────────────────────────

export class PlayerStaggerState extends PlayerState {
  readonly id = 'stagger';

  private _duration = 0;

  get duration(): number { return this._duration; }

  private get inRecovery(): boolean { return this.normalizedTime >= STAGGER_RECOVERY_START; }

  enter(): void {
    const actor = this.ctx;
    const severity = actor.staggerSeverity;
    this._duration = staggerDuration(severity, this.stats);
    actor.clearCombatFlags();
    actor.setLocomotion('run', 0);
    if (resetsPoise(severity)) actor.poise.resetPoise();
    if (actor.staggerDirection.lengthSq() > 0) {
      actor.forces.addKnockback(actor.staggerDirection, STAGGER_KNOCKBACK[severity], this._duration / 3);
    }
  }

  execute(): void {
    if (this.inRecovery && this.take('dodge', 'dodge', this.stats.dodgeStaminaCost)) return;
    if (this.normalizedTime >= 1) this.machine.changeState('idle');
  }

  canTransitionTo(target: PlayerStateId): boolean {
    switch (target) {
      case 'death':
      case 'stagger':
        return true;
      case 'dodge':
        return this.inRecovery;
      case 'idle':
        return this.normalizedTime >= 1;
      default:
        return false;
    }
  }
}

// ── Death ─────────────────────────────────────────────────────────

export class PlayerDeathState extends PlayerState {
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

export const PLAYER_STATE_IDS: readonly PlayerStateId[] = [
  'idle', 'locomotion', 'lightAttack', 'heavyAttack', 'parry', 'block', 'dodge', 'stagger', 'death',
];

export const PLAYER_STATE_TABLE = defineStateTable<PlayerStateId, PlayerActor>(PLAYER_STATE_IDS, {
  idle: (actor, machine) => new PlayerIdleState(actor, machine),
  locomotion: (actor, machine) => new PlayerLocomotionState(actor, machine),
  lightAttack: (actor, machine) => new PlayerLightAttackState(actor, machine),
  heavyAttack: (actor, machine) => new PlayerHeavyAttackState(actor, machine),
  parry: (actor, machine) => new PlayerParryState(actor, machine),
  block: (actor, machine) => new PlayerBlockState(actor, machine),
  dodge: (actor, machine) => new PlayerDodgeState(actor, machine),
  stagger: (actor, machine) => new PlayerStaggerState(actor, machine),
  death: (actor, machine) => new PlayerDeathState(actor, machine),
}, 'death');

export const PLAYER_ROLES: StateRoles<PlayerStateId> = Object.freeze({
  initial: 'idle',
  stagger: 'stagger',
  death: 'death',
});

export interface PlayerActorOptions {
  id: string;
  stats: CombatStats;
  context: CombatContext;
  position?: Vec3;
}

export function createPlayerActor(options: PlayerActorOptions): PlayerActor {
  return new CombatActor({
    ...options,
    faction: 'player',
    table: PLAYER_STATE_TABLE,
    roles: PLAYER_ROLES,
  });
}
