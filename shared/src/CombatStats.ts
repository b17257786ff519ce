// ═══════════════════════════════════════════════════════════════════
// COMBAT STATS — Shared between client (prediction) and server (authority)
//
// Per-actor tuning consumed once, at actor initialization, as plain
// read-only data. Everything that reaches a ledger or a state passes
// through statsSchema first, so a typo in a preset fails loudly at
// load time instead of surfacing as NaN mid-fight.
//
// Units: seconds for durations, per-second for rates, 0–1 for factors
// and for the normalized dodge i-frame markers.
// ═══════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { CombatConfigError } from './errors.js';
import presetData from './data/stat-presets.json';

// ── Schema ────────────────────────────────────────────────────────

const amount = z.number().finite().nonnegative();
const positive = z.number().finite().positive();
const factor = z.number().finite().min(0).max(1);

export const statsSchema = z.object({
  // Health
  maxHealth: positive,

  // Stamina
  maxStamina: positive,
  staminaRegenRate: amount,
  staminaRegenDelay: amount,

  // Poise (accumulates toward a break)
  maxPoise: positive,
  poiseRegenRate: amount,
  /** Grace window after the last hit before poise starts decaying */
  poiseRegenDelay: amount,

  // Attack
  baseDamage: positive,
  lightAttackMultiplier: positive,
  heavyAttackMultiplier: positive,

  // Defense
  physicalDefense: z.number().finite().min(0).max(0.9),
  partialParryDamageFactor: factor,
  partialParryPoiseFactor: factor,
  blockDamageFactor: factor,
  blockStaminaCostOnHit: amount,
  blockStaminaDrainPerSecond: amount,

  // Stamina costs
  sprintStaminaCost: amount,
  dodgeStaminaCost: amount,
  lightAttackStaminaCost: amount,
  heavyAttackStaminaCost: amount,
  parryStaminaCost: amount,

  // Timing
  parryWindowDuration: amount,
  perfectParryWindow: amount,
  parryRecoveryTime: amount,
  blockParryWindow: amount,
  blockPerfectWindow: amount,
  dodgeDuration: positive,
  dodgeIFrameStart: factor,
  dodgeIFrameEnd: factor,
  dodgeDistance: amount,
  staggerRecoveryTime: positive,

  // Movement
  moveSpeed: amount,
  walkMultiplier: amount,
  sprintMultiplier: amount,

  // Input
  inputBufferWindow: amount,
})
  .refine((s) => s.perfectParryWindow <= s.parryWindowDuration, {
    message: 'perfectParryWindow must not exceed parryWindowDuration',
    path: ['perfectParryWindow'],
  })
  .refine((s) => s.blockPerfectWindow <= s.blockParryWindow, {
    message: 'blockPerfectWindow must not exceed blockParryWindow',
    path: ['blockPerfectWindow'],
  })
  .refine((s) => s.dodgeIFrameStart <= s.dodgeIFrameEnd, {
    message: 'dodgeIFrameStart must not come after dodgeIFrameEnd',
    path: ['dodgeIFrameStart'],
  });

export type CombatStats = Readonly<z.infer<typeof statsSchema>>;

// ── Parsing ───────────────────────────────────────────────────────

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Validate raw stat data. Throws CombatConfigError listing every issue;
 * the returned object is frozen.
 */
export function parseCombatStats(input: unknown, label = 'stats'): CombatStats {
  const parsed = statsSchema.safeParse(input);
  if (!parsed.success) {
    throw new CombatConfigError('invalid-stats', `Invalid ${label}:\n${formatIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

// ── Presets ───────────────────────────────────────────────────────

export type StatPresetName = 'player' | 'enemy';

const presetsSchema = z.object({
  player: z.unknown(),
  enemy: z.unknown(),
});

function loadPresets(raw: unknown): Readonly<Record<StatPresetName, CombatStats>> {
  const shape = presetsSchema.safeParse(raw);
  if (!shape.success) {
    throw new CombatConfigError('invalid-stats', `Invalid stat presets:\n${formatIssues(shape.error)}`);
  }
  return Object.freeze({
    player: parseCombatStats(shape.data.player, 'player preset'),
    enemy: parseCombatStats(shape.data.enemy, 'enemy preset'),
  });
}

export const STAT_PRESETS = loadPresets(presetData);

/** Preset merged with overrides, validated as a whole */
export function resolveCombatStats(
  preset: StatPresetName,
  overrides: Partial<CombatStats> = {},
): CombatStats {
  return parseCombatStats({ ...STAT_PRESETS[preset], ...overrides }, `${preset} stats`);
}
