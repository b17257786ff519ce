// ═══════════════════════════════════════════════════════════════════
// @riposte/client — public surface
// ═══════════════════════════════════════════════════════════════════

export { ExternalForces, DECAY_CURVES } from './entities/ExternalForces.js';
export type { DecayCurve, DecayCurveName, ForceKind, ForceSpec } from './entities/ExternalForces.js';

export { IntentBuffer } from './combat/IntentBuffer.js';
export type { BufferedIntent } from './combat/IntentBuffer.js';
export { PoiseLedger } from './combat/PoiseLedger.js';
export type { PoiseConfig } from './combat/PoiseLedger.js';
export { StaminaLedger } from './combat/StaminaLedger.js';
export type { StaminaConfig } from './combat/StaminaLedger.js';
export { HealthPool } from './combat/HealthPool.js';

export { CombatEvents } from './combat/CombatEvents.js';
export type {
  CombatEventHandler, CombatEventMap, CombatEventName, DamageAppliedEvent, DeathEvent,
  HealthChangedEvent, ParriedEvent, PoiseBrokenEvent, StateChangedEvent, TransitionRejectedEvent,
} from './combat/CombatEvents.js';
export { createCombatContext } from './combat/CombatContext.js';
export type { CombatContext } from './combat/CombatContext.js';
export { CombatInput, createActionState } from './combat/CombatInput.js';
export type { ActionState, HeldAction, HeldActions } from './combat/CombatInput.js';

export {
  createDamageInfo, createDamageResult, noDamageTaken, wasDefended,
} from './combat/DamageInfo.js';
export type { DamageInfo, DamageInfoInit, DamageResult } from './combat/DamageInfo.js';
export {
  ENEMY_ATTACK_PATTERN, HEAVY_ATTACK, LIGHT_COMBO, LIGHT_COMBO_LENGTH,
  createEnemyAttack, createHeavyAttack, createLightAttack, isHitboxActive, isInComboWindow,
} from './combat/AttackData.js';
export type { AttackProfile } from './combat/AttackData.js';

export { StateBase, StateMachine, defineStateTable } from './combat/StateMachine.js';
export type {
  MachineState, StateFactory, StateMachineOptions, StateTable, TransitionOutcome,
} from './combat/StateMachine.js';

export type { Combatant } from './combat/Combatant.js';
export { CombatActor } from './combat/CombatActor.js';
export type { CombatActorOptions, LocomotionReadout, StateRoles } from './combat/CombatActor.js';
export { DEFAULT_RANGES, NO_PERCEPTION, TrackedPerception, targetWithin } from './combat/EnemyPerception.js';
export type { EnemyPerception } from './combat/EnemyPerception.js';
export { CombatResolver } from './combat/CombatResolver.js';
export { CombatSystem } from './combat/CombatSystem.js';
export type { SystemActor } from './combat/CombatSystem.js';

export * from './combat/states/PlayerStates.js';
export * from './combat/states/EnemyStates.js';
