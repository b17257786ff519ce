// ═══════════════════════════════════════════════════════════════════
// ENEMY PERCEPTION — what the AI driver tells enemy states
//
// Target selection, pathing and line-of-sight raycasts happen outside
// the combat core. Enemy states only read this contract; anything that
// can answer these questions can drive an enemy.
// ═══════════════════════════════════════════════════════════════════

import type { Combatant } from './Combatant.js';

export interface EnemyPerception {
  /** Current target, or null */
  readonly target: Combatant | null;
  /** Distance to the target; Infinity without one */
  readonly distanceToTarget: number;
  readonly hasLineOfSight: boolean;
  readonly detectionRange: number;
  readonly attackRange: number;
  /** Beyond this the enemy gives up the chase */
  readonly maxChaseRange: number;
}

export const DEFAULT_RANGES = {
  detectionRange: 15,
  attackRange: 2,
  maxChaseRange: 25,
} as const;

/** Perception that never sees anything (players, idle dummies) */
export const NO_PERCEPTION: EnemyPerception = Object.freeze({
  target: null,
  distanceToTarget: Number.POSITIVE_INFINITY,
  hasLineOfSight: false,
  ...DEFAULT_RANGES,
});

/** Has a live target within `range`? */
export function targetWithin(perception: EnemyPerception, range: number): boolean {
  const target = perception.target;
  return target !== null && target.isAlive && perception.distanceToTarget <= range;
}

/**
 * Mutable perception the driver rewrites every frame. Distance is
 * measured from positions each time it's read.
 */
export class TrackedPerception implements EnemyPerception {
  target: Combatant | null = null;
  hasLineOfSight = true;
  detectionRange: number = DEFAULT_RANGES.detectionRange;
  attackRange: number = DEFAULT_RANGES.attackRange;
  maxChaseRange: number = DEFAULT_RANGES.maxChaseRange;

  private readonly _self: Pick<Combatant, 'position'>;

  constructor(self: Pick<Combatant, 'position'>) {
    this._self = self;
  }

  get distanceToTarget(): number {
    return this.target ? this._self.position.distanceTo(this.target.position) : Number.POSITIVE_INFINITY;
  }
}
