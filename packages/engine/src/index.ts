/**
 * @wayfarer/engine
 *
 * State control, the fixed-timestep loop and the runtime that drives them.
 */

export type { StateHandler } from './state-handler.js';

export { StateController } from './state-controller.js';
export type {
  StateControllerOptions,
  StateTransitionListener,
  StateTransitionRecord,
  TransitionKind,
} from './state-controller.js';

export type { Subsystem } from './subsystem.js';
export { SubsystemRegistry } from './subsystem.js';

export { GameLoop, createTimerScheduler, DEFAULT_MAX_FRAME_DELTA_MS } from './game-loop.js';
export type { GameLoopCallbacks, GameLoopScheduler } from './game-loop.js';

export { GameRuntime, RUNTIME_SUBSCRIBER_ID } from './game-runtime.js';
export type { GameRuntimeOptions } from './game-runtime.js';
