// ═══════════════════════════════════════════════════════════════════
// COMBAT CONTEXT
// The few things every actor in one fight shares. Passed explicitly,
// never reached through a global.
// ═══════════════════════════════════════════════════════════════════

import { SimulationClock } from '@riposte/shared';
import { CombatEvents } from './CombatEvents.js';

export interface CombatContext {
  readonly clock: SimulationClock;
  readonly events: CombatEvents;
  /** Log every transition to the console */
  readonly debug: boolean;
}

export function createCombatContext(options: Partial<CombatContext> = {}): CombatContext {
  return {
    clock: options.clock ?? new SimulationClock(),
    events: options.events ?? new CombatEvents(),
    debug: options.debug ?? false,
  };
}
