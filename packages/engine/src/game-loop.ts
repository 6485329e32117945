/**
 * Fixed-timestep simulation loop.
 *
 * Simulation steps run at a fixed rate from accumulated frame time; render
 * runs once per scheduled frame with the interpolation alpha left over.
 */

export interface GameLoopCallbacks {
  onSimulationStep(frameNumber: number, dt: number): void;
  onRender(alpha: number): void;
}

export interface GameLoopScheduler {
  now(): number;
  requestAnimationFrame(callback: (timestamp: number) => void): number;
  cancelAnimationFrame(handle: number): void;
}

export const DEFAULT_MAX_FRAME_DELTA_MS = 250;

/** Frame scheduler over setTimeout; Node.js has no requestAnimationFrame. */
export function createTimerScheduler(
  frameIntervalMs = 1000 / 60,
  now: () => number = () => performance.now(),
): GameLoopScheduler {
  const timers = new Map<number, ReturnType<typeof setTimeout>>();
  let nextHandle = 1;

  return {
    now,
    requestAnimationFrame(callback) {
      const handle = nextHandle;
      nextHandle += 1;
      timers.set(
        handle,
        setTimeout(() => {
          timers.delete(handle);
          callback(now());
        }, frameIntervalMs),
      );
      return handle;
    },
    cancelAnimationFrame(handle) {
      const timer = timers.get(handle);
      if (timer !== undefined) {
        clearTimeout(timer);
        timers.delete(handle);
      }
    },
  };
}

export class GameLoop {
  readonly simulationDt: number;
  readonly maxFrameDeltaMs: number;

  private frameNumber = 0;
  private accumulator = 0;
  private lastTimestamp = 0;
  private running = false;
  private rafId = 0;
  private callbacks: GameLoopCallbacks | null = null;
  private readonly scheduler: GameLoopScheduler;

  speed = 1.0;
  paused = false;

  constructor(simulationFps = 60, scheduler?: GameLoopScheduler, maxFrameDeltaMs = DEFAULT_MAX_FRAME_DELTA_MS) {
    this.simulationDt = 1000 / simulationFps;
    this.maxFrameDeltaMs = maxFrameDeltaMs;
    this.scheduler = scheduler ?? createTimerScheduler(this.simulationDt);
  }

  start(callbacks: GameLoopCallbacks): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.callbacks = callbacks;
    this.lastTimestamp = this.scheduler.now();
    this.accumulator = 0;
    this.tick(this.lastTimestamp);
  }

  stop(): void {
    this.running = false;
    if (this.rafId !== 0) {
      this.scheduler.cancelAnimationFrame(this.rafId);
      this.rafId = 0;
    }
    this.callbacks = null;
  }

  reset(): void {
    this.frameNumber = 0;
    this.accumulator = 0;
    this.lastTimestamp = this.scheduler.now();
  }

  getFrameNumber(): number {
    return this.frameNumber;
  }

  isRunning(): boolean {
    return this.running;
  }

  private readonly tick = (timestamp: number): void => {
    if (!this.running) {
      return;
    }

    this.rafId = this.scheduler.requestAnimationFrame(this.tick);

    let elapsed = timestamp - this.lastTimestamp;
    this.lastTimestamp = timestamp;

    // Prevent spiral-of-death after the host stalls.
    if (elapsed > this.maxFrameDeltaMs) {
      elapsed = this.maxFrameDeltaMs;
    }

    elapsed *= this.speed;

    const callbacks = this.callbacks;
    if (!callbacks) {
      return;
    }

    if (!this.paused) {
      this.accumulator += elapsed;

      while (this.accumulator >= this.simulationDt && this.running) {
        callbacks.onSimulationStep(this.frameNumber, this.simulationDt / 1000);
        this.frameNumber += 1;
        this.accumulator -= this.simulationDt;
      }
    }

    if (!this.running) {
      return;
    }
    const alpha = this.accumulator / this.simulationDt;
    callbacks.onRender(alpha);
  };
}
