// ═══════════════════════════════════════════════════════════════════
// HEALTH POOL
// Current / max hit points. The resolver computes how much to take
// off; this only applies it and reports what actually changed.
// ═══════════════════════════════════════════════════════════════════

export class HealthPool {
  private readonly _max: number;
  private _current: number;

  constructor(max: number) {
    this._max = max;
    this._current = max;
  }

  get current(): number { return this._current; }
  get max(): number { return this._max; }
  get normalized(): number { return this._current / this._max; }
  get isDepleted(): boolean { return this._current <= 0; }

  /** Returns the signed change (≤ 0) */
  applyDamage(amount: number): number {
    if (!Number.isFinite(amount)) {
      console.warn(`[HealthPool] Rejected non-finite damage: ${amount}`);
      return 0;
    }
    if (amount <= 0) return 0;
    const before = this._current;
    this._current = Math.max(0, this._current - amount);
    return this._current - before;
  }

  /** Returns the signed change (≥ 0). Does nothing once depleted. */
  heal(amount: number): number {
    if (!Number.isFinite(amount)) {
      console.warn(`[HealthPool] Rejected non-finite heal: ${amount}`);
      return 0;
    }
    if (amount <= 0 || this._current <= 0) return 0;
    const before = this._current;
    this._current = Math.min(this._max, this._current + amount);
    return this._current - before;
  }
}
