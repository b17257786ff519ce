// ═══════════════════════════════════════════════════════════════════
// INTENT BUFFER — Buffered discrete actions
//
// An input or AI driver pushes an action ("dodge!") at any time; the
// active state consumes it on its next execute() if it is still fresh.
// One preallocated slot per action kind, so a newer press of the same
// action overwrites the older one and nothing is allocated per press.
//
// Stale and consumed entries stay in their slot and are simply inert:
// readers check age and the consumed flag, nothing prunes on a timer.
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import { ACTION_KINDS, INPUT_BUFFER_WINDOW, isFiniteVec2 } from '@riposte/shared';
import type { ActionKind, Clock, Vec2 } from '@riposte/shared';

export interface BufferedIntent {
  readonly action: ActionKind;
  timestamp: number;
  /** Stick direction at the time of the press (zero when none) */
  readonly direction: THREE.Vector2;
  consumed: boolean;
  /** False until the slot has been written once */
  present: boolean;
}

function createSlot(action: ActionKind): BufferedIntent {
  return { action, timestamp: 0, direction: new THREE.Vector2(), consumed: true, present: false };
}

type SlotTable = { readonly [K in ActionKind]: BufferedIntent };

export class IntentBuffer {
  private readonly _clock: Clock;
  private readonly _window: number;
  private readonly _slots: SlotTable;

  constructor(clock: Clock, window = INPUT_BUFFER_WINDOW) {
    this._clock = clock;
    this._window = Number.isFinite(window) && window >= 0 ? window : INPUT_BUFFER_WINDOW;
    this._slots = {
      lightAttack: createSlot('lightAttack'),
      heavyAttack: createSlot('heavyAttack'),
      parry: createSlot('parry'),
      block: createSlot('block'),
      dodge: createSlot('dodge'),
    };
  }

  get window(): number { return this._window; }

  /** Record an action now. A non-finite direction rejects the whole push. */
  push(action: ActionKind, direction?: Vec2): boolean {
    if (direction && !isFiniteVec2(direction)) {
      console.warn(`[IntentBuffer] Rejected ${action}: non-finite direction`);
      return false;
    }
    const slot = this._slots[action];
    slot.timestamp = this._clock.now();
    slot.consumed = false;
    slot.present = true;
    if (direction) slot.direction.set(direction.x, direction.y);
    else slot.direction.set(0, 0);
    return true;
  }

  /**
   * Take the intent if it is fresh and unconsumed. Returns the slot
   * itself, valid until the next push of the same action.
   */
  tryConsume(action: ActionKind, window = this._window): BufferedIntent | null {
    const slot = this._slots[action];
    if (!this.isFresh(slot, window)) return null;
    slot.consumed = true;
    return slot;
  }

  /** Peek without consuming */
  has(action: ActionKind, window = this._window): boolean {
    return this.isFresh(this._slots[action], window);
  }

  /** Seconds since the last push of `action`, or Infinity if never pushed */
  age(action: ActionKind): number {
    const slot = this._slots[action];
    return slot.present ? this._clock.now() - slot.timestamp : Number.POSITIVE_INFINITY;
  }

  clear(): void {
    for (const action of ACTION_KINDS) {
      const slot = this._slots[action];
      slot.consumed = true;
      slot.present = false;
    }
  }

  private isFresh(slot: BufferedIntent, window: number): boolean {
    if (!slot.present || slot.consumed) return false;
    return this._clock.now() - slot.timestamp <= window;
  }
}
