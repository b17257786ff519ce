// ═══════════════════════════════════════════════════════════════════
// TIMING WINDOW — parry / deflect timing grade
//
// A window opens at `start` and lasts `duration` seconds. Its first
// `perfectDuration` seconds are the perfect phase:
//
//   elapsed ≤ perfect             → 'perfect'
//   perfect < elapsed ≤ duration  → 'partial'
//   elapsed > duration            → 'expired'
//
// Elapsed time, normalized position and grade are always derived from
// (window, now); nothing is cached on the window.
// ═══════════════════════════════════════════════════════════════════

export type TimingQuality = 'perfect' | 'partial' | 'expired';

export interface TimingWindow {
  readonly start: number;
  readonly duration: number;
  /** Always ≤ duration */
  readonly perfectDuration: number;
}

/**
 * Build a window. Non-finite input is rejected (null); negative lengths
 * clamp to zero and the perfect phase clamps to the window length.
 */
export function createTimingWindow(
  start: number,
  duration: number,
  perfectDuration: number,
): TimingWindow | null {
  if (!Number.isFinite(start) || !Number.isFinite(duration) || !Number.isFinite(perfectDuration)) {
    console.warn(`[TimingWindow] Rejected window (start=${start}, duration=${duration}, perfect=${perfectDuration})`);
    return null;
  }
  const len = Math.max(0, duration);
  return Object.freeze({
    start,
    duration: len,
    perfectDuration: Math.min(Math.max(0, perfectDuration), len),
  });
}

export function timingElapsed(window: TimingWindow, now: number): number {
  return now - window.start;
}

/** Position inside the window, clamped to 0..1 */
export function timingNormalized(window: TimingWindow, now: number): number {
  if (window.duration <= 0) return 1;
  const t = timingElapsed(window, now) / window.duration;
  return t < 0 ? 0 : t > 1 ? 1 : t;
}

export function evaluateTiming(window: TimingWindow, now: number): TimingQuality {
  const elapsed = now - window.start;
  if (elapsed <= window.perfectDuration) return 'perfect';
  if (elapsed <= window.duration) return 'partial';
  return 'expired';
}
