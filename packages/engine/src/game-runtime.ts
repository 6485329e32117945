/**
 * GameRuntime: the driver that ticks the event dispatcher, the state
 * controller and the registered subsystems.
 *
 * Per simulation step, in this order:
 *   1. EventDispatcher.processEvents(eventsPerTick)
 *   2. StateController.update(dt)
 *   3. SubsystemRegistry.updateAll(dt)
 * so state logic sees the events queued before the step. Rendering runs once
 * per loop frame afterwards. A subsystem that throws is reported as an Error
 * event naming it; the other subsystems still update.
 *
 * The dispatcher and controller never reference each other; the runtime
 * connects them by publishing a GameStateChanged event for every applied
 * state transition.
 */

import { createGameEvent, EventDispatcher } from '@wayfarer/events';
import type { GameEvent } from '@wayfarer/events';
import { createLogger, describeError, loadEngineConfig } from '@wayfarer/core';
import type { EngineConfig, LogThreshold, Logger, SubsystemFaultError } from '@wayfarer/core';

import { GameLoop } from './game-loop.js';
import type { GameLoopScheduler } from './game-loop.js';
import { StateController } from './state-controller.js';
import type { StateTransitionRecord } from './state-controller.js';
import { SubsystemRegistry } from './subsystem.js';

export const RUNTIME_SUBSCRIBER_ID = 'GameRuntime';

export interface GameRuntimeOptions {
  /** Applied last, over configText and env. */
  config?: Partial<EngineConfig>;
  /** `Engine.ini`-style preferences. */
  configText?: string;
  /** WAYFARER_* overrides, usually process.env. */
  env?: Readonly<Record<string, string | undefined>>;
  logger?: Logger;
  /** Frame scheduler for start(). Default: setTimeout at targetFps. */
  scheduler?: GameLoopScheduler;
}

export class GameRuntime {
  readonly config: EngineConfig;
  readonly events: EventDispatcher;
  readonly states: StateController;
  readonly subsystems = new SubsystemRegistry();
  readonly loop: GameLoop;

  private readonly logger: Logger;
  private initialized = false;
  private frameCount = 0;
  private levelBeforeDebug: LogThreshold | null = null;

  constructor(options: GameRuntimeOptions = {}) {
    this.config = loadEngineConfig({ text: options.configText, env: options.env, overrides: options.config });
    this.logger =
      options.logger ??
      createLogger('GameRuntime', { level: this.config.debug ? 'debug' : this.config.logLevel });

    this.events = new EventDispatcher({
      maxQueueSize: this.config.maxQueueSize,
      logger: this.logger.child('EventDispatcher'),
    });
    this.states = new StateController({
      logger: this.logger.child('StateController'),
      onTransition: (record) => this.publishTransition(record),
    });
    this.loop = new GameLoop(this.config.targetFps, options.scheduler, this.config.maxFrameDeltaMs);
    if (this.config.debug) {
      this.setDebugMode(true);
    }
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  async init(): Promise<void> {
    if (this.initialized) {
      this.logger.warn('init() called twice');
      return;
    }

    this.events.subscribe('Error', (event) => this.onErrorEvent(event), RUNTIME_SUBSCRIBER_ID, 0);
    this.events.subscribe(
      'GameStateChanged',
      (event) => {
        this.logger.debug(`state changed: ${event.payload.fromState} -> ${event.payload.toState}`, {
          trigger: event.payload.trigger,
        });
      },
      RUNTIME_SUBSCRIBER_ID,
      1,
    );

    await this.subsystems.initAll();
    this.initialized = true;
    this.logger.info('initialized', { subsystems: this.subsystems.names() });
  }

  /** Runs the loop on the scheduler; returns false when not initialised. */
  start(): boolean {
    if (!this.initialized) {
      this.logger.error('start() called before init()');
      return false;
    }
    this.loop.start({
      onSimulationStep: (_frameNumber, dt) => this.step(dt),
      onRender: () => this.render(),
    });
    return true;
  }

  stop(): void {
    this.loop.stop();
  }

  isRunning(): boolean {
    return this.loop.isRunning();
  }

  /** Stops the loop and disposes subsystems, states and the dispatcher. */
  shutdown(): void {
    this.loop.stop();
    this.reportFaults(this.subsystems.disposeAll(), false);
    this.states.dispose();
    this.events.dispose();
    this.initialized = false;
    this.logger.info('shut down', { frames: this.frameCount });
  }

  /**
   * Starts a fresh session: pending events and statistics are dropped, every
   * subsystem is reset and the frame counters restart. States are left alone.
   */
  resetSession(): void {
    const droppedEvents = this.events.clearEventQueue();
    this.events.resetStatistics();
    this.reportFaults(this.subsystems.resetAll(), true);
    this.frameCount = 0;
    this.loop.reset();
    this.logger.info('session reset', { droppedEvents });
  }

  /**
   * Turns dispatcher tracing on or off and lowers the shared log level to
   * debug while it is on, so the traces are not filtered out.
   */
  setDebugMode(enabled: boolean): void {
    if (enabled && this.levelBeforeDebug === null) {
      this.levelBeforeDebug = this.logger.level;
      this.logger.setLevel('debug');
    } else if (!enabled && this.levelBeforeDebug !== null) {
      this.logger.setLevel(this.levelBeforeDebug);
      this.levelBeforeDebug = null;
    }
    this.events.setDebugMode(enabled);
  }

  // ===========================================================================
  // Ticking
  // ===========================================================================

  /** One simulation step; dt in seconds. */
  step(deltaTime: number): void {
    this.frameCount += 1;
    try {
      this.events.processEvents(this.config.eventsPerTick);
      this.states.update(deltaTime);
      this.reportFaults(this.subsystems.updateAll(deltaTime), true);
    } catch (error) {
      this.logger.error('step failed', { frame: this.frameCount, error: describeError(error) });
      this.events.publishImmediate(
        createGameEvent('Error', {
          errorCode: 'UPDATE_ERROR',
          errorMessage: describeError(error),
          source: 'GameRuntime',
        }),
      );
    }
  }

  render(): void {
    this.states.render();
  }

  /** step() then render(), for drivers that run their own loop. */
  tick(deltaTime: number): void {
    this.step(deltaTime);
    this.render();
  }

  getFrameCount(): number {
    return this.frameCount;
  }

  // ===========================================================================
  // Wiring
  // ===========================================================================

  private publishTransition(record: StateTransitionRecord): void {
    this.events.publish(
      createGameEvent('GameStateChanged', {
        fromState: record.from ?? 'None',
        toState: record.to,
        trigger: record.kind,
      }),
    );
  }

  private reportFaults(faults: readonly SubsystemFaultError[], publish: boolean): void {
    for (const fault of faults) {
      this.logger.error(fault.message, { subsystem: fault.subsystemName, phase: fault.phase });
      if (publish) {
        this.events.publishImmediate(
          createGameEvent('Error', {
            errorCode: fault.phase === 'update' ? 'UPDATE_ERROR' : 'RESET_ERROR',
            errorMessage: describeError(fault.cause),
            source: fault.subsystemName,
          }),
        );
      }
    }
  }

  private onErrorEvent(event: GameEvent<'Error'>): void {
    this.logger.error(`error event ${event.payload.errorCode}: ${event.payload.errorMessage}`, {
      source: event.payload.source,
    });
  }
}
