// ═══════════════════════════════════════════════════════════════════
// POISE LEDGER — Stagger accumulator
//
// Incoming hits add poise damage. When the running total reaches max
// the ledger breaks: it reports true once and resets to zero in the
// same call, so the next hit starts a fresh count. After a quiet
// period with no hits the total drains back toward zero.
// ═══════════════════════════════════════════════════════════════════

import type { Clock } from '@riposte/shared';

export interface PoiseConfig {
  max: number;
  regenRate: number;
  /** Seconds without a hit before the total starts draining */
  regenDelay: number;
}

export class PoiseLedger {
  private readonly _clock: Clock;
  private readonly _max: number;
  private readonly _regenRate: number;
  private readonly _regenDelay: number;

  private _current = 0;
  private _lastHitTime = Number.NEGATIVE_INFINITY;
  private _breakCount = 0;

  constructor(clock: Clock, config: PoiseConfig) {
    this._clock = clock;
    this._max = config.max;
    this._regenRate = config.regenRate;
    this._regenDelay = config.regenDelay;
  }

  get current(): number { return this._current; }
  get max(): number { return this._max; }
  get remaining(): number { return this._max - this._current; }
  get normalized(): number { return this._current / this._max; }
  get breakCount(): number { return this._breakCount; }
  get lastHitTime(): number { return this._lastHitTime; }

  /** Would `amount` more poise damage break right now? */
  wouldBreak(amount: number): boolean {
    return Number.isFinite(amount) && this._current + Math.max(0, amount) >= this._max;
  }

  /** Add poise damage. Returns true on the hit that breaks. */
  applyPoiseDamage(amount: number): boolean {
    if (!Number.isFinite(amount)) {
      console.warn(`[PoiseLedger] Rejected non-finite poise damage: ${amount}`);
      return false;
    }
    this._lastHitTime = this._clock.now();
    this._current += Math.max(0, amount);
    if (this._current >= this._max) {
      this._current = 0;
      this._breakCount++;
      return true;
    }
    return false;
  }

  resetPoise(): void {
    this._current = 0;
  }

  tick(dt: number): void {
    if (this._current <= 0 || !(dt > 0)) return;
    if (this._clock.now() - this._lastHitTime < this._regenDelay) return;
    this._current = Math.max(0, this._current - this._regenRate * dt);
  }
}
