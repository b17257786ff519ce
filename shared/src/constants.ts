// ═══════════════════════════════════════════════════════════════════
// COMBAT CONSTANTS
// Engine-level limits. Gameplay tuning lives in data/stat-presets.json
// and is validated by CombatStats; nothing here is meant to be tweaked
// per character.
// ═══════════════════════════════════════════════════════════════════

/** Fixed physics step in seconds (50 steps per second) */
export const FIXED_TIMESTEP = 1 / 50;

/** How long a buffered intent stays consumable (seconds) */
export const INPUT_BUFFER_WINDOW = 0.15;

// ── External forces ──────────────────────────────────────────────

/** Concurrent forces per actor */
export const MAX_ACTIVE_FORCES = 8;

/** Upper bound on any single force magnitude (units per second) */
export const MAX_FORCE_MAGNITUDE = 100;

/** Upper bound on any single force lifetime (seconds) */
export const MAX_FORCE_DURATION = 10;

/** Forces weaker than this are dropped */
export const FORCE_THRESHOLD = 0.1;

/** Impulse magnitude = distance / duration × this, compensating for decay */
export const KNOCKBACK_CURVE_COMPENSATION = 2;

// ── Stamina ──────────────────────────────────────────────────────

/** Fraction of max stamina needed to leave the exhausted state */
export const EXHAUSTION_RECOVERY_RATIO = 0.2;

// ── Damage ───────────────────────────────────────────────────────

/** Smallest damage a landed (non-nullified) hit can deal */
export const MIN_LANDED_DAMAGE = 1;

/** Squared length under which a direction counts as zero */
export const DIRECTION_EPSILON_SQ = 1e-6;
