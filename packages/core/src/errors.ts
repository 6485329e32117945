/**
 * Typed error classes for the engine core.
 */

/** Base class for all engine errors. */
export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
  }
}

/** A configuration value was outside its accepted range. */
export class EngineConfigError extends EngineError {
  constructor(
    public readonly key: string,
    public readonly value: unknown,
    reason: string,
  ) {
    super(`Invalid engine config "${key}" (${String(value)}): ${reason}`);
    this.name = 'EngineConfigError';
  }
}

/** A subscriber callback threw while an event was being dispatched. */
export class SubscriberFaultError extends EngineError {
  constructor(
    public readonly subscriberId: string,
    public readonly eventType: string,
    cause: unknown,
  ) {
    super(`Subscriber "${subscriberId}" failed handling "${eventType}": ${describeError(cause)}`, { cause });
    this.name = 'SubscriberFaultError';
  }
}

export type StateHook = 'enter' | 'update' | 'render' | 'exit' | 'handleInput' | 'canTransition' | 'getNextState';

/** A state lifecycle hook threw. */
export class StateHookFaultError extends EngineError {
  constructor(
    public readonly stateName: string,
    public readonly hook: StateHook,
    cause: unknown,
  ) {
    super(`State "${stateName}" failed in ${hook}(): ${describeError(cause)}`, { cause });
    this.name = 'StateHookFaultError';
  }
}

export type SubsystemPhase = 'update' | 'reset' | 'dispose';

/** A subsystem hook threw; the registry carried on with the others. */
export class SubsystemFaultError extends EngineError {
  constructor(
    public readonly subsystemName: string,
    public readonly phase: SubsystemPhase,
    cause: unknown,
  ) {
    super(`Subsystem "${subsystemName}" failed in ${phase}(): ${describeError(cause)}`, { cause });
    this.name = 'SubsystemFaultError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    // JSON.stringify returns undefined for undefined and functions.
    const json: string | undefined = JSON.stringify(error);
    return json === undefined ? String(error) : json;
  } catch {
    return String(error);
  }
}
