// ═══════════════════════════════════════════════════════════════════
// STATE MACHINE — generic behavioral state machine
//
// Drives one actor through a closed set of states. The set is declared
// once per machine type with defineStateTable(); every machine of that
// type instantiates each state once at initialize() and re-enters the
// same instances, so transitions allocate nothing.
//
// Two ways in:
//   changeState(target)    asks the current state (canTransitionTo)
//   forceInterrupt(target) skips the ask; only canBeInterrupted gates it
//
// Neither throws on a refused request; both return a TransitionOutcome.
// Within one execute / physicsExecute call the first accepted request
// wins and later ones are 'superseded', as is anything requested from
// enter / exit. A forced move into the terminal state always wins:
// once an actor is dead nothing moves it.
//
// Misuse (driving a machine before initialize/start, a table missing
// a state) throws CombatConfigError.
// ═══════════════════════════════════════════════════════════════════

import { CombatConfigError } from '@riposte/shared';
import type { ActionKind, ActorId, Clock } from '@riposte/shared';
import type { CombatEvents } from './CombatEvents.js';

export type TransitionOutcome =
  | 'accepted'
  | 'same-state'
  | 'terminal'
  | 'denied'
  | 'superseded'
  | 'uninterruptible';

export interface MachineState<TId extends string> {
  readonly id: TId;
  /** Seconds, used for normalized state time. 0 for open-ended states. */
  readonly duration: number;
  readonly canBeInterrupted: boolean;
  enter(): void;
  execute(): void;
  physicsExecute(): void;
  exit(): void;
  /** Runs before exit() when the state is left through forceInterrupt */
  onInterrupted(): void;
  canTransitionTo(target: TId): boolean;
}

export type StateFactory<TId extends string, TCtx> =
  (context: TCtx, machine: StateMachine<TId, TCtx>) => MachineState<TId>;

export interface StateTable<TId extends string, TCtx> {
  readonly ids: readonly TId[];
  readonly factories: Readonly<Record<TId, StateFactory<TId, TCtx>>>;
  /** Absorbing state: no transition out, forced entry never refused */
  readonly terminal: TId | null;
}

/** Declare a machine type. Call once, at module load. */
export function defineStateTable<TId extends string, TCtx>(
  ids: readonly TId[],
  factories: Record<TId, StateFactory<TId, TCtx>>,
  terminal: TId | null = null,
): StateTable<TId, TCtx> {
  if (terminal !== null && !ids.includes(terminal)) {
    throw new CombatConfigError('unknown-state', `Terminal state '${terminal}' is not in the table`);
  }
  return Object.freeze({
    ids: Object.freeze([...ids]),
    factories: Object.freeze({ ...factories }),
    terminal,
  });
}

// ── State base ────────────────────────────────────────────────────

/** Default no-op lifecycle; subclasses override what they need */
export abstract class StateBase<TId extends string, TCtx> implements MachineState<TId> {
  abstract readonly id: TId;
  protected readonly ctx: TCtx;
  protected readonly machine: StateMachine<TId, TCtx>;

  constructor(ctx: TCtx, machine: StateMachine<TId, TCtx>) {
    this.ctx = ctx;
    this.machine = machine;
  }

  get duration(): number { return 0; }
  get canBeInterrupted(): boolean { return true; }

  enter(): void {}
  execute(): void {}
  physicsExecute(): void {}
  exit(): void {}
  onInterrupted(): void {}

  abstract canTransitionTo(target: TId): boolean;

  /** Seconds since this state was entered */
  protected get time(): number { return this.machine.stateTime; }
  protected get normalizedTime(): number { return this.machine.normalizedStateTime; }
}

// ── Machine ───────────────────────────────────────────────────────

export interface StateMachineOptions {
  /** Shown in debug logs: [StateMachine:label] */
  label: string;
  clock: Clock;
  actorId?: ActorId;
  events?: CombatEvents;
  debug?: boolean;
}

export class StateMachine<TId extends string, TCtx> {
  private readonly _table: StateTable<TId, TCtx>;
  private readonly _clock: Clock;
  private readonly _label: string;
  private readonly _actorId: ActorId;
  private readonly _events: CombatEvents | null;
  private readonly _debug: boolean;

  private _states: Map<TId, MachineState<TId>> | null = null;
  private _current: MachineState<TId> | null = null;
  private _enteredAt = 0;

  // First-wins bookkeeping
  private _callbackDepth = 0;
  private _acceptedInCallback = false;
  private _transitioning = false;
  private _pendingTerminal = false;

  constructor(table: StateTable<TId, TCtx>, options: StateMachineOptions) {
    this._table = table;
    this._clock = options.clock;
    this._label = options.label;
    this._actorId = options.actorId ?? options.label;
    this._events = options.events ?? null;
    this._debug = options.debug ?? false;
  }

  // ── Setup ──────────────────────────────────────────────────────

  /** Bind the context and build every state */
  initialize(context: TCtx): void {
    if (this._states) {
      throw new CombatConfigError('already-initialized', `[StateMachine:${this._label}] initialize() called twice`);
    }
    const states = new Map<TId, MachineState<TId>>();
    for (const id of this._table.ids) {
      const factory: StateFactory<TId, TCtx> | undefined = this._table.factories[id];
      if (typeof factory !== 'function') {
        throw new CombatConfigError('missing-state', `[StateMachine:${this._label}] No factory for state '${id}'`);
      }
      const state = factory(context, this);
      if (state.id !== id) {
        throw new CombatConfigError(
          'state-id-mismatch',
          `[StateMachine:${this._label}] Factory for '${id}' built state '${state.id}'`,
        );
      }
      states.set(id, state);
    }
    this._states = states;
  }

  start(initial: TId): void {
    const states = this.requireStates();
    if (this._current) {
      throw new CombatConfigError('already-initialized', `[StateMachine:${this._label}] start() called twice`);
    }
    const state = states.get(initial);
    if (!state) {
      throw new CombatConfigError('unknown-state', `[StateMachine:${this._label}] Unknown initial state '${initial}'`);
    }
    this._current = state;
    this._enteredAt = this._clock.now();
    this._transitioning = true;
    try {
      state.enter();
    } finally {
      this._transitioning = false;
    }
    this._events?.emit('stateChanged', {
      actor: this._actorId, from: null, to: initial, trigger: null, forced: false, timestamp: this._enteredAt,
    });
    this.flushPendingTerminal();
  }

  // ── Readouts ───────────────────────────────────────────────────

  get label(): string { return this._label; }
  get isStarted(): boolean { return this._current !== null; }
  get currentState(): MachineState<TId> { return this.requireCurrent(); }
  get currentStateId(): TId { return this.requireCurrent().id; }
  get isTerminal(): boolean {
    return this._current !== null && this._current.id === this._table.terminal;
  }

  get stateTime(): number { return this._clock.now() - this._enteredAt; }

  /** 0..1 by the current state's duration; 0 for open-ended states */
  get normalizedStateTime(): number {
    const duration = this.requireCurrent().duration;
    if (!(duration > 0)) return 0;
    return Math.min(1, Math.max(0, this.stateTime / duration));
  }

  hasState(id: string): boolean {
    return this._table.ids.some((known) => known === id);
  }

  getState(id: TId): MachineState<TId> {
    const state = this.requireStates().get(id);
    if (!state) {
      throw new CombatConfigError('unknown-state', `[StateMachine:${this._label}] Unknown state '${id}'`);
    }
    return state;
  }

  // ── Transitions ────────────────────────────────────────────────

  changeState(target: TId, trigger: ActionKind | null = null): TransitionOutcome {
    const current = this.requireCurrent();
    const next = this.getState(target);

    let outcome: TransitionOutcome = 'accepted';
    if (current.id === this._table.terminal) outcome = 'terminal';
    else if (this.isLocked()) outcome = 'superseded';
    else if (current === next) outcome = 'same-state';
    else if (!current.canTransitionTo(target)) outcome = 'denied';

    if (outcome !== 'accepted') {
      this.reject(current.id, target, outcome, trigger);
      return outcome;
    }
    this.transition(current, next, trigger, false);
    return outcome;
  }

  forceInterrupt(target: TId): TransitionOutcome {
    const current = this.requireCurrent();
    const next = this.getState(target);
    const toTerminal = target === this._table.terminal;

    let outcome: TransitionOutcome = 'accepted';
    if (current.id === this._table.terminal) outcome = 'terminal';
    else if (toTerminal && this._transitioning) {
      // Requested from inside enter/exit: applied once that transition completes
      this._pendingTerminal = true;
      return outcome;
    } else if (!toTerminal && this.isLocked()) outcome = 'superseded';
    else if (!toTerminal && !current.canBeInterrupted) outcome = 'uninterruptible';

    if (outcome !== 'accepted') {
      this.reject(current.id, target, outcome, null);
      return outcome;
    }
    this.transition(current, next, null, true);
    return outcome;
  }

  // ── Per-frame ──────────────────────────────────────────────────

  execute(): void {
    const state = this.requireCurrent();
    this.beginCallback();
    try {
      state.execute();
    } finally {
      this.endCallback();
    }
  }

  physicsExecute(): void {
    const state = this.requireCurrent();
    this.beginCallback();
    try {
      state.physicsExecute();
    } finally {
      this.endCallback();
    }
  }

  // ── Internal ───────────────────────────────────────────────────

  private isLocked(): boolean {
    return this._transitioning || (this._callbackDepth > 0 && this._acceptedInCallback);
  }

  private transition(
    current: MachineState<TId>,
    next: MachineState<TId>,
    trigger: ActionKind | null,
    forced: boolean,
  ): void {
    if (this._callbackDepth > 0) this._acceptedInCallback = true;

    this._transitioning = true;
    try {
      if (forced) current.onInterrupted();
      current.exit();
      this._current = next;
      this._enteredAt = this._clock.now();
      next.enter();
    } finally {
      this._transitioning = false;
    }

    if (this._debug) {
      console.log(`[StateMachine:${this._label}] ${current.id} -> ${next.id}${forced ? ' (forced)' : ''}`);
    }
    this._events?.emit('stateChanged', {
      actor: this._actorId,
      from: current.id,
      to: next.id,
      trigger,
      forced,
      timestamp: this._enteredAt,
    });
    this.flushPendingTerminal();
  }

  private flushPendingTerminal(): void {
    if (!this._pendingTerminal || this._table.terminal === null) return;
    this._pendingTerminal = false;
    this.forceInterrupt(this._table.terminal);
  }

  private reject(
    from: TId,
    to: TId,
    reason: Exclude<TransitionOutcome, 'accepted'>,
    trigger: ActionKind | null,
  ): void {
    if (this._debug) console.log(`[StateMachine:${this._label}] ${from} -> ${to} rejected (${reason})`);
    this._events?.emit('transitionRejected', { actor: this._actorId, from, to, reason, trigger });
  }

  private beginCallback(): void {
    if (this._callbackDepth === 0) this._acceptedInCallback = false;
    this._callbackDepth++;
  }

  private endCallback(): void {
    this._callbackDepth--;
    if (this._callbackDepth === 0) this._acceptedInCallback = false;
  }

  private requireStates(): Map<TId, MachineState<TId>> {
    if (!this._states) {
      throw new CombatConfigError('not-initialized', `[StateMachine:${this._label}] Used before initialize()`);
    }
    return this._states;
  }

  private requireCurrent(): MachineState<TId> {
    this.requireStates();
    if (!this._current) {
      throw new CombatConfigError('not-started', `[StateMachine:${this._label}] Used before start()`);
    }
    return this._current;
  }
}
