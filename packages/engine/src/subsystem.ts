/**
 * Collaborator lifecycle registry.
 *
 * Persistence, audio and other outer systems plug into the runtime as
 * subsystems. Initialisation runs in registration order and stops at the
 * first failure. Per-tick updates, resets and disposal isolate each
 * subsystem: a throwing one is reported as a SubsystemFaultError and the rest
 * still run. Reset and disposal go in reverse registration order, so a
 * subsystem can rely on the ones registered before it for its whole lifetime.
 */

import { SubsystemFaultError } from '@wayfarer/core';
import type { SubsystemPhase } from '@wayfarer/core';

export interface Subsystem {
  readonly name: string;
  init(): Promise<void> | void;
  /** Runs once every subsystem has initialised. */
  postProcessLoad?(): Promise<void> | void;
  /** After events and states each tick; dt in seconds. */
  update(dt: number): void;
  /** Drop per-session state; the subsystem stays usable. */
  reset(): void;
  dispose(): void;
}

export class SubsystemRegistry {
  private readonly entries: Subsystem[] = [];

  register(subsystem: Subsystem): void {
    if (this.entries.some((entry) => entry.name === subsystem.name)) {
      throw new Error(`Subsystem "${subsystem.name}" already registered`);
    }
    this.entries.push(subsystem);
  }

  names(): string[] {
    return this.entries.map((entry) => entry.name);
  }

  async initAll(): Promise<void> {
    for (const entry of this.entries) {
      await entry.init();
    }
    for (const entry of this.entries) {
      await entry.postProcessLoad?.();
    }
  }

  updateAll(dt: number): SubsystemFaultError[] {
    return this.runEach(this.entries, 'update', (entry) => entry.update(dt));
  }

  resetAll(): SubsystemFaultError[] {
    return this.runEach([...this.entries].reverse(), 'reset', (entry) => entry.reset());
  }

  /** Disposes every subsystem, newest first, and empties the registry. */
  disposeAll(): SubsystemFaultError[] {
    const faults = this.runEach([...this.entries].reverse(), 'dispose', (entry) => entry.dispose());
    this.entries.length = 0;
    return faults;
  }

  private runEach(
    order: readonly Subsystem[],
    phase: SubsystemPhase,
    hook: (entry: Subsystem) => void,
  ): SubsystemFaultError[] {
    const faults: SubsystemFaultError[] = [];
    for (const entry of order) {
      try {
        hook(entry);
      } catch (error) {
        faults.push(new SubsystemFaultError(entry.name, phase, error));
      }
    }
    return faults;
  }
}
