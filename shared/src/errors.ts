// ═══════════════════════════════════════════════════════════════════
// CONFIGURATION ERRORS
//
// Thrown only at setup time: a state machine missing a state, a machine
// driven before initialize(), stat data failing validation. Runtime
// outcomes (rejected transitions, bad numeric input) are never thrown.
// ═══════════════════════════════════════════════════════════════════

export type CombatConfigErrorCode =
  | 'invalid-stats'
  | 'missing-state'
  | 'state-id-mismatch'
  | 'already-initialized'
  | 'not-initialized'
  | 'not-started'
  | 'unknown-state';

export class CombatConfigError extends Error {
  readonly code: CombatConfigErrorCode;

  constructor(code: CombatConfigErrorCode, message: string) {
    super(message);
    this.name = 'CombatConfigError';
    this.code = code;
  }
}
