// ═══════════════════════════════════════════════════════════════════
// SIMULATION CLOCK
//
// Explicit time source handed to every component through its context.
// Nothing in the combat core reads wall-clock time, so a whole fight
// replays identically from the same sequence of advance() calls.
// ═══════════════════════════════════════════════════════════════════

export interface Clock {
  /** Seconds since the simulation started */
  now(): number;
}

export class SimulationClock implements Clock {
  private _time: number;
  private _frame = 0;

  constructor(startTime = 0) {
    this._time = Number.isFinite(startTime) ? startTime : 0;
  }

  get frame(): number { return this._frame; }

  now(): number {
    return this._time;
  }

  /** Step time forward. Negative or non-finite steps are ignored. */
  advance(dt: number): number {
    if (!Number.isFinite(dt) || dt < 0) {
      console.warn(`[SimulationClock] Ignored invalid step: ${dt}`);
      return this._time;
    }
    this._time += dt;
    this._frame++;
    return this._time;
  }
}
