// ═══════════════════════════════════════════════════════════════════
// STATE HELPERS — timing and tuning shared by player and enemy states
// ═══════════════════════════════════════════════════════════════════

import type { ActionKind, CombatStats, StaggerSeverity } from '@riposte/shared';
import type { CombatActor } from '../CombatActor.js';
import type { StateMachine } from '../StateMachine.js';

/** Stagger lengths in seconds; heavy uses the actor's staggerRecoveryTime */
const STAGGER_SECONDS: Readonly<Record<Exclude<StaggerSeverity, 'heavy'>, number>> = {
  light: 0.3,
  medium: 0.6,
  knockdown: 2,
};

/** Knockback distance per severity */
export const STAGGER_KNOCKBACK: Readonly<Record<StaggerSeverity, number>> = {
  light: 0.3,
  medium: 0.6,
  heavy: 1,
  knockdown: 1.5,
};

/** Normalized stagger time after which a dodge can cut it short */
export const STAGGER_RECOVERY_START = 0.7;

export function staggerDuration(severity: StaggerSeverity, stats: CombatStats): number {
  return severity === 'heavy' ? stats.staggerRecoveryTime : STAGGER_SECONDS[severity];
}

/** Severities that wipe accumulated poise on entry */
export function resetsPoise(severity: StaggerSeverity): boolean {
  return severity === 'heavy' || severity === 'knockdown';
}

export function inIFrames(normalizedTime: number, stats: CombatStats): boolean {
  return normalizedTime >= stats.dodgeIFrameStart && normalizedTime <= stats.dodgeIFrameEnd;
}

/**
 * Take a buffered intent into `target` if it's fresh, affordable and the
 * current state allows it. The intent is consumed only when the move is
 * attempted; stamina is paid by the target state on enter.
 */
export function takeIntent<TId extends string>(
  actor: CombatActor<TId>,
  machine: StateMachine<TId, CombatActor<TId>>,
  action: ActionKind,
  target: TId,
  cost: number,
): boolean {
  if (!actor.intents.has(action) || !actor.stamina.canAfford(cost)) return false;
  if (!machine.currentState.canTransitionTo(target)) return false;
  actor.intents.tryConsume(action);
  return machine.changeState(target, action) === 'accepted';
}
