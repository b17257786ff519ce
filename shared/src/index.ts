// ═══════════════════════════════════════════════════════════════════
// @riposte/shared — public surface
// ═══════════════════════════════════════════════════════════════════

export * from './constants.js';
export * from './types.js';
export * from './TimingWindow.js';
export * from './CombatStats.js';
export { SimulationClock } from './SimulationClock.js';
export type { Clock } from './SimulationClock.js';
export { CombatConfigError } from './errors.js';
export type { CombatConfigErrorCode } from './errors.js';
