/**
 * Owner of the current behavioral state, the stack of suspended states and
 * at most one pending transition.
 *
 * Transitions requested through changeState/pushState/popState are applied
 * at the start of the next update(), never inside the request itself, so a
 * state may request its own replacement from its input handler without being
 * exited mid-call. A later request replaces an earlier one that has not been
 * applied yet.
 *
 * A state instance occupies at most one slot (current, suspended or
 * pending); requests naming a state already held are ignored.
 *
 * Not re-entrant across threads of control: call it from the driver loop and
 * the state/event callbacks that loop runs.
 */

import { StateHookFaultError, createLogger, describeError } from '@wayfarer/core';
import type { Logger, StateHook } from '@wayfarer/core';

import type { StateHandler } from './state-handler.js';

type PendingTransition =
  | { readonly kind: 'change'; readonly state: StateHandler }
  | { readonly kind: 'push'; readonly state: StateHandler }
  | { readonly kind: 'pop' };

export type TransitionKind = 'initial' | PendingTransition['kind'];

export interface StateTransitionRecord {
  readonly kind: TransitionKind;
  /** Null when the controller had no state before. */
  readonly from: string | null;
  readonly to: string;
  /** Suspended states after the transition. */
  readonly stackDepth: number;
}

export type StateTransitionListener = (record: StateTransitionRecord) => void;

export interface StateControllerOptions {
  logger?: Logger;
  /** Called after every applied transition. */
  onTransition?: StateTransitionListener;
}

export class StateController {
  private current: StateHandler | null = null;
  private pending: PendingTransition | null = null;
  private readonly stack: StateHandler[] = [];
  private readonly logger: Logger;
  private readonly onTransition: StateTransitionListener | null;

  constructor(options: StateControllerOptions = {}) {
    this.logger = options.logger ?? createLogger('StateController');
    this.onTransition = options.onTransition ?? null;
  }

  // ===========================================================================
  // Transition requests
  // ===========================================================================

  /** Installs and enters the first state immediately. Ignored once a state exists. */
  setInitialState(state: StateHandler | null | undefined): void {
    if (this.current) {
      this.logger.warn(`setInitialState() ignored, current state is already ${this.current.name}`);
      return;
    }
    if (!state) {
      this.logger.warn('setInitialState() called without a state');
      return;
    }
    if (this.rejectHeld('setInitialState', state)) {
      return;
    }

    this.logger.info(`initial state: ${state.name}`);
    this.current = state;
    this.enterState(state);
    this.notify({ kind: 'initial', from: null, to: state.name, stackDepth: this.stack.length });
  }

  /** Requests replacing the current state on the next update. */
  changeState(state: StateHandler | null | undefined): void {
    if (!state) {
      this.logger.error('changeState() called without a state');
      return;
    }
    if (this.rejectHeld('changeState', state)) {
      return;
    }

    const current = this.current;
    if (current && !this.canLeave(current)) {
      this.logger.warn(`transition ${current.name} -> ${state.name} rejected, ${current.name} cannot transition`);
      return;
    }

    this.logger.debug(`change requested: ${current?.name ?? 'None'} -> ${state.name}`);
    this.request({ kind: 'change', state });
  }

  /** Requests suspending the current state under `overlay` on the next update. */
  pushState(overlay: StateHandler | null | undefined): void {
    if (!overlay) {
      this.logger.error('pushState() called without a state');
      return;
    }
    if (this.rejectHeld('pushState', overlay)) {
      return;
    }

    this.logger.debug(`push requested: ${overlay.name} over ${this.current?.name ?? 'None'}`);
    this.request({ kind: 'push', state: overlay });
  }

  /** Requests exiting the current state and resuming the top suspended one. */
  popState(): void {
    if (this.stack.length === 0) {
      this.logger.warn('popState() ignored, no suspended state');
      return;
    }

    this.logger.debug(`pop requested: ${this.current?.name ?? 'None'}`);
    this.request({ kind: 'pop' });
  }

  // ===========================================================================
  // Per-tick driving
  // ===========================================================================

  /**
   * Applies the pending transition, if any, then updates the current state.
   * A state asking for an automatic transition gets it on the next update.
   */
  update(deltaTime: number): void {
    const pending = this.pending;
    this.pending = null;
    if (pending) {
      this.apply(pending);
    }

    const state = this.current;
    if (!state) {
      return;
    }

    try {
      state.update(deltaTime);
    } catch (error) {
      this.reportFault(state, 'update', error);
      return;
    }

    let next: StateHandler | null;
    try {
      next = state.getNextState?.() ?? null;
    } catch (error) {
      this.reportFault(state, 'getNextState', error);
      return;
    }

    if (next) {
      this.logger.info(`${state.name} requested automatic transition to ${next.name}`);
      this.changeState(next);
    }
  }

  /** Renders the current state only; suspended states are not drawn. */
  render(): void {
    const state = this.current;
    if (!state) {
      return;
    }
    try {
      state.render();
    } catch (error) {
      this.reportFault(state, 'render', error);
    }
  }

  handleInput(input: string): void {
    const state = this.current;
    if (!state) {
      this.logger.warn(`input received with no current state: ${input}`);
      return;
    }
    try {
      state.handleInput(input);
    } catch (error) {
      this.reportFault(state, 'handleInput', error);
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  getCurrentStateName(): string {
    return this.current?.name ?? 'None';
  }

  hasCurrentState(): boolean {
    return this.current !== null;
  }

  getStateStackDepth(): number {
    return this.stack.length;
  }

  hasPendingTransition(): boolean {
    return this.pending !== null;
  }

  /**
   * Exits the current state and every suspended one, top of the stack first.
   * A pending state was never entered and is dropped without exit().
   */
  dispose(): void {
    this.pending = null;

    const current = this.current;
    this.current = null;
    if (current) {
      this.exitState(current);
    }

    for (let state = this.stack.pop(); state; state = this.stack.pop()) {
      this.exitState(state);
    }
    this.logger.info('disposed');
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private rejectHeld(operation: string, state: StateHandler): boolean {
    let slot: string | null = null;
    if (state === this.current) {
      slot = 'current';
    } else if (this.stack.includes(state)) {
      slot = 'suspended';
    } else if (this.pending && this.pending.kind !== 'pop' && this.pending.state === state) {
      slot = 'pending';
    }

    if (slot !== null) {
      this.logger.warn(`${operation}() ignored, ${state.name} is already ${slot}`);
      return true;
    }
    return false;
  }

  private request(transition: PendingTransition): void {
    if (this.pending) {
      this.logger.warn(`pending ${this.pending.kind} replaced by ${transition.kind}`);
    }
    this.pending = transition;
  }

  private apply(transition: PendingTransition): void {
    const from = this.current;

    switch (transition.kind) {
      case 'change': {
        this.current = null;
        if (from) {
          this.exitState(from);
        }
        this.current = transition.state;
        this.enterState(transition.state);
        break;
      }
      case 'push': {
        if (from) {
          this.stack.push(from);
        }
        this.current = transition.state;
        this.enterState(transition.state);
        break;
      }
      case 'pop': {
        const resumed = this.stack.pop();
        if (!resumed) {
          this.logger.error('pop applied with no suspended state');
          return;
        }
        this.current = null;
        if (from) {
          this.exitState(from);
        }
        // Resumed, not re-entered: it was never exited.
        this.current = resumed;
        break;
      }
    }

    const to = this.getCurrentStateName();
    this.logger.info(`${transition.kind}: ${from?.name ?? 'None'} -> ${to}`, { stackDepth: this.stack.length });
    this.notify({ kind: transition.kind, from: from?.name ?? null, to, stackDepth: this.stack.length });
  }

  private canLeave(state: StateHandler): boolean {
    try {
      return state.canTransition?.() ?? true;
    } catch (error) {
      this.reportFault(state, 'canTransition', error);
      return false;
    }
  }

  private enterState(state: StateHandler): void {
    try {
      state.enter();
    } catch (error) {
      this.reportFault(state, 'enter', error);
    }
  }

  private exitState(state: StateHandler): void {
    try {
      state.exit();
    } catch (error) {
      this.reportFault(state, 'exit', error);
    }
  }

  private notify(record: StateTransitionRecord): void {
    if (!this.onTransition) {
      return;
    }
    try {
      this.onTransition(record);
    } catch (error) {
      this.logger.error('transition listener failed', { error: describeError(error), to: record.to });
    }
  }

  private reportFault(state: StateHandler, hook: StateHook, error: unknown): void {
    const fault = new StateHookFaultError(state.name, hook, error);
    this.logger.error(fault.message, { state: state.name, hook });
  }
}
