/**
 * Behavioral mode interface driven by the StateController.
 *
 * Only the controller calls these hooks. A handler is entered once when it
 * becomes current through setInitialState, changeState or pushState, and
 * exited once before the controller lets go of it. A handler suspended by a
 * push is neither exited nor re-entered when it resumes.
 */

export interface StateHandler {
  /** Unique state name, used in logs and GameStateChanged events. */
  readonly name: string;
  enter(): void;
  /** Player input routed to the current state only. */
  handleInput(input: string): void;
  /** Per-tick logic step; deltaTime in seconds. */
  update(deltaTime: number): void;
  render(): void;
  exit(): void;
  /** Whether the state may be left right now. Absent = always. */
  canTransition?(): boolean;
  /**
   * Optional self-requested transition, polled after each update. The
   * returned handler is requested through changeState and applied on the
   * following tick.
   */
  getNextState?(): StateHandler | null;
}
