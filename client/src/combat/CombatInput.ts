// ═══════════════════════════════════════════════════════════════════
// COMBAT INPUT — continuous (held) input for one actor
//
// Discrete presses go to the IntentBuffer. What lives here is what a
// state polls every frame: stick direction and the buttons being held
// (sprint, walk, attack for heavy charge, block for guard).
//
// Written by the input manager for the player and by the AI driver
// for enemies, before the frame's execute().
// ═══════════════════════════════════════════════════════════════════

import * as THREE from 'three';
import { isFiniteVec2 } from '@riposte/shared';
import type { Vec2 } from '@riposte/shared';

/** Per-button state, fed once per frame */
export interface ActionState {
  isPressed: boolean;
  justPressed: boolean;
  justReleased: boolean;
}

export function createActionState(): ActionState {
  return { isPressed: false, justPressed: false, justReleased: false };
}

function clearEdges(state: ActionState): void {
  state.justPressed = false;
  state.justReleased = false;
}

export interface HeldActions {
  sprint: ActionState;
  walk: ActionState;
  attack: ActionState;
  block: ActionState;
}

export type HeldAction = keyof HeldActions;

/** Stick deflection below this counts as no input */
const DEAD_ZONE_SQ = 0.01;

export class CombatInput {
  /** Stick direction, length 0..1 */
  readonly direction = new THREE.Vector2();
  readonly actions: HeldActions = {
    sprint: createActionState(),
    walk: createActionState(),
    attack: createActionState(),
    block: createActionState(),
  };

  get hasDirection(): boolean {
    return this.direction.lengthSq() > DEAD_ZONE_SQ;
  }

  setDirection(dir: Vec2): void {
    if (!isFiniteVec2(dir)) {
      console.warn('[CombatInput] Rejected non-finite direction');
      return;
    }
    this.direction.set(dir.x, dir.y);
    if (this.direction.lengthSq() > 1) this.direction.normalize();
  }

  /** Update a held button; edges are derived from the previous value */
  setHeld(action: HeldAction, pressed: boolean): void {
    const state = this.actions[action];
    state.justPressed = pressed && !state.isPressed;
    state.justReleased = !pressed && state.isPressed;
    state.isPressed = pressed;
  }

  isHeld(action: HeldAction): boolean {
    return this.actions[action].isPressed;
  }

  /** Clear edge flags at the end of a frame */
  endFrame(): void {
    clearEdges(this.actions.sprint);
    clearEdges(this.actions.walk);
    clearEdges(this.actions.attack);
    clearEdges(this.actions.block);
  }

  reset(): void {
    this.direction.set(0, 0);
    this.setHeld('sprint', false);
    this.setHeld('walk', false);
    this.setHeld('attack', false);
    this.setHeld('block', false);
    this.endFrame();
  }
}
