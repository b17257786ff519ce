// ═══════════════════════════════════════════════════════════════════
// COMBAT EVENTS — typed observer hub (for UI / sound / VFX)
//
// One hub per combat context. Listeners subscribe per event name and
// get a typed payload; on() returns the unsubscribe function.
//
// Delivery is synchronous and in subscription order. Listener lists
// are copied on subscribe / unsubscribe, so emit() walks a stable
// array and a listener may unsubscribe itself mid-delivery.
// ═══════════════════════════════════════════════════════════════════

import type { ActionKind, ActorId } from '@riposte/shared';
import type { DamageInfo, DamageResult } from './DamageInfo.js';
import type { TransitionOutcome } from './StateMachine.js';

export interface StateChangedEvent {
  actor: ActorId;
  from: string | null;
  to: string;
  trigger: ActionKind | null;
  forced: boolean;
  timestamp: number;
}

export interface TransitionRejectedEvent {
  actor: ActorId;
  from: string;
  to: string;
  reason: Exclude<TransitionOutcome, 'accepted'>;
  trigger: ActionKind | null;
}

export interface HealthChangedEvent {
  actor: ActorId;
  current: number;
  max: number;
  /** Signed: negative for damage */
  delta: number;
}

export interface DamageAppliedEvent {
  actor: ActorId;
  info: DamageInfo;
  result: DamageResult;
}

export interface PoiseBrokenEvent {
  actor: ActorId;
  source: ActorId | null;
}

export interface ParriedEvent {
  defender: ActorId;
  attacker: ActorId | null;
  quality: 'perfect' | 'partial';
}

export interface DeathEvent {
  actor: ActorId;
  killer: ActorId | null;
}

export interface CombatEventMap {
  stateChanged: StateChangedEvent;
  transitionRejected: TransitionRejectedEvent;
  healthChanged: HealthChangedEvent;
  damageApplied: DamageAppliedEvent;
  poiseBroken: PoiseBrokenEvent;
  parried: ParriedEvent;
  death: DeathEvent;
}

export type CombatEventName = keyof CombatEventMap;

export type CombatEventHandler<K extends CombatEventName> = (payload: CombatEventMap[K]) => void;

/** Listener list for one event name */
class Channel<T> {
  private _handlers: ReadonlyArray<(payload: T) => void> = [];

  get size(): number { return this._handlers.length; }

  add(handler: (payload: T) => void): void {
    this._handlers = [...this._handlers, handler];
  }

  remove(handler: (payload: T) => void): void {
    this._handlers = this._handlers.filter((h) => h !== handler);
  }

  dispatch(payload: T): void {
    const list = this._handlers;
    for (let i = 0; i < list.length; i++) list[i](payload);
  }

  clear(): void {
    this._handlers = [];
  }
}

type ChannelTable = { readonly [K in keyof CombatEventMap]: Channel<CombatEventMap[K]> };

export class CombatEvents {
  private readonly _channels: ChannelTable = {
    stateChanged: new Channel(),
    transitionRejected: new Channel(),
    healthChanged: new Channel(),
    damageApplied: new Channel(),
    poiseBroken: new Channel(),
    parried: new Channel(),
    death: new Channel(),
  };

  on<K extends CombatEventName>(type: K, handler: CombatEventHandler<K>): () => void {
    this._channels[type].add(handler);
    return () => this.off(type, handler);
  }

  off<K extends CombatEventName>(type: K, handler: CombatEventHandler<K>): void {
    this._channels[type].remove(handler);
  }

  emit<K extends CombatEventName>(type: K, payload: CombatEventMap[K]): void {
    this._channels[type].dispatch(payload);
  }

  listenerCount(type: CombatEventName): number {
    return this._channels[type].size;
  }

  clear(): void {
    this._channels.stateChanged.clear();
    this._channels.transitionRejected.clear();
    this._channels.healthChanged.clear();
    this._channels.damageApplied.clear();
    this._channels.poiseBroken.clear();
    this._channels.parried.clear();
    this._channels.death.clear();
  }
}
