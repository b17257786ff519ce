import { resolveCombatStats } from '@riposte/shared';
import type { CombatStats, Vec3 } from '@riposte/shared';
import { createCombatContext } from '../combat/CombatContext.js';
import type { CombatContext } from '../combat/CombatContext.js';
import type { CombatEventName } from '../combat/CombatEvents.js';
import { createDamageInfo } from '../combat/DamageInfo.js';
import type { DamageInfo, DamageInfoInit } from '../combat/DamageInfo.js';
import { createEnemyActor } from '../combat/states/EnemyStates.js';
import type { EnemyActor } from '../combat/states/EnemyStates.js';
import { createPlayerActor } from '../combat/states/PlayerStates.js';
import type { PlayerActor } from '../combat/states/PlayerStates.js';

const EVENT_NAMES: readonly CombatEventName[] = [
  'stateChanged', 'transitionRejected', 'healthChanged', 'damageApplied', 'poiseBroken', 'parried', 'death',
];

/** Names of every event emitted on `ctx`, in order */
export function recordEvents(ctx: CombatContext, skip: readonly CombatEventName[] = []): string[] {
  const seen: string[] = [];
  for (const name of EVENT_NAMES) {
    if (!skip.includes(name)) ctx.events.on(name, () => seen.push(name));
  }
  return seen;
}

export function player(
  ctx: CombatContext,
  overrides: Partial<CombatStats> = {},
  id = 'hero',
  position?: Vec3,
): PlayerActor {
  return createPlayerActor({ id, stats: resolveCombatStats('player', overrides), context: ctx, position });
}

export function enemy(
  ctx: CombatContext,
  overrides: Partial<CombatStats> = {},
  id = 'grunt',
  position?: Vec3,
): EnemyActor {
  return createEnemyActor({ id, stats: resolveCombatStats('enemy', overrides), context: ctx, position });
}

export function hit(init: Omit<DamageInfoInit, 'timestamp'> & { timestamp?: number }): DamageInfo {
  const info = createDamageInfo({ timestamp: 0, ...init });
  if (!info) throw new Error('hit rejected');
  return info;
}

export { createCombatContext };
