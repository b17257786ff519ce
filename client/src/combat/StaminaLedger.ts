// ═══════════════════════════════════════════════════════════════════
// STAMINA LEDGER
//
// Discrete costs (attack, dodge, parry) go through tryConsume: all or
// nothing. Continuous costs (sprint, block hold) go through drain. Any
// spend restarts the regen delay; only time left over once the delay
// has run out regenerates.
//
// Draining to zero exhausts the pool. While exhausted, drain() refuses
// until regen climbs back to EXHAUSTION_RECOVERY_RATIO of max.
// ═══════════════════════════════════════════════════════════════════

import { EXHAUSTION_RECOVERY_RATIO } from '@riposte/shared';

export interface StaminaConfig {
  max: number;
  regenRate: number;
  regenDelay: number;
  exhaustionRecoveryRatio?: number;
}

export class StaminaLedger {
  private readonly _max: number;
  private readonly _regenRate: number;
  private readonly _regenDelay: number;
  private readonly _recoveryThreshold: number;

  private _current: number;
  private _delayRemaining = 0;
  private _exhausted = false;

  constructor(config: StaminaConfig) {
    this._max = config.max;
    this._regenRate = config.regenRate;
    this._regenDelay = config.regenDelay;
    this._recoveryThreshold = config.max * (config.exhaustionRecoveryRatio ?? EXHAUSTION_RECOVERY_RATIO);
    this._current = config.max;
  }

  get current(): number { return this._current; }
  get max(): number { return this._max; }
  get normalized(): number { return this._current / this._max; }
  get regenDelayRemaining(): number { return this._delayRemaining; }
  get isExhausted(): boolean { return this._exhausted; }

  canAfford(amount: number): boolean {
    return Number.isFinite(amount) && amount >= 0 && this._current >= amount;
  }

  /** Spend `amount` if available. Zero always succeeds and still resets the delay. */
  tryConsume(amount: number): boolean {
    if (!Number.isFinite(amount) || amount < 0) {
      console.warn(`[StaminaLedger] Rejected stamina cost: ${amount}`);
      return false;
    }
    if (this._current < amount) return false;
    this._current -= amount;
    this._delayRemaining = this._regenDelay;
    return true;
  }

  /** Per-second cost. Returns whether any stamina remains afterwards. */
  drain(ratePerSecond: number, dt: number): boolean {
    if (!Number.isFinite(ratePerSecond) || !Number.isFinite(dt) || ratePerSecond < 0 || dt < 0) {
      console.warn(`[StaminaLedger] Rejected drain: rate=${ratePerSecond} dt=${dt}`);
      return false;
    }
    if (this._exhausted) return false;
    this._current = Math.max(0, this._current - ratePerSecond * dt);
    this._delayRemaining = this._regenDelay;
    if (this._current <= 0) {
      this._exhausted = true;
      return false;
    }
    return true;
  }

  tick(dt: number): void {
    if (!(dt > 0)) return;
    let regenTime = dt;
    if (this._delayRemaining > 0) {
      if (dt <= this._delayRemaining) {
        this._delayRemaining -= dt;
        return;
      }
      regenTime = dt - this._delayRemaining;
      this._delayRemaining = 0;
    }
    if (this._current < this._max) {
      this._current = Math.min(this._max, this._current + this._regenRate * regenTime);
    }
    if (this._exhausted && this._current >= this._recoveryThreshold) {
      this._exhausted = false;
    }
  }

  restore(amount: number): void {
    if (!Number.isFinite(amount) || amount <= 0) return;
    this._current = Math.min(this._max, this._current + amount);
  }

  reset(): void {
    this._current = this._max;
    this._delayRemaining = 0;
    this._exhausted = false;
  }
}
