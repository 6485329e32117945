/**
 * Immutable event envelope shared by every event kind.
 *
 * Payloads are reached by narrowing on `type` against an event map
 * (`{ [type]: payload }`), so subscribers never cast.
 */

export interface EventEnvelope<TType extends string = string, TPayload = unknown> {
  /** Dispatch key. */
  readonly type: TType;
  /** Monotonic creation time in milliseconds. */
  readonly timestamp: number;
  /** 0 (highest) to 10 (lowest). */
  readonly priority: number;
  /** Informational; the dispatcher does not enforce it. */
  readonly cancellable: boolean;
  readonly payload: TPayload;
}

export type EventType<TMap> = Extract<keyof TMap, string>;

/** Envelope for one type of an event map, or the union over all of them. */
export type EventOf<TMap, K extends EventType<TMap> = EventType<TMap>> = {
  [P in K]: EventEnvelope<P, TMap[P]>;
}[K];

export type EventClock = () => number;

export const MIN_EVENT_PRIORITY = 0;
export const MAX_EVENT_PRIORITY = 10;
export const DEFAULT_EVENT_PRIORITY = 5;

export interface EventOptions {
  /** Default: 5. Rounded and clamped into 0..10. */
  priority?: number;
  /** Default: true. */
  cancellable?: boolean;
  /** Timestamp source. Default: performance.now(). */
  clock?: EventClock;
}

const monotonicClock: EventClock = () => performance.now();

export function normalizeEventPriority(priority: number | undefined): number {
  if (priority === undefined || !Number.isFinite(priority)) {
    return DEFAULT_EVENT_PRIORITY;
  }
  return Math.min(MAX_EVENT_PRIORITY, Math.max(MIN_EVENT_PRIORITY, Math.round(priority)));
}

function freezePayload<T>(payload: T): T {
  if (typeof payload === 'object' && payload !== null) {
    for (const value of Object.values(payload)) {
      if (Array.isArray(value)) {
        Object.freeze(value);
      }
    }
    return Object.freeze(payload);
  }
  return payload;
}

export function createEvent<TType extends string, TPayload>(
  type: TType,
  payload: TPayload,
  options: EventOptions = {},
): EventEnvelope<TType, TPayload> {
  const clock = options.clock ?? monotonicClock;
  return Object.freeze({
    type,
    timestamp: clock(),
    priority: normalizeEventPriority(options.priority),
    cancellable: options.cancellable ?? true,
    payload: freezePayload(payload),
  });
}

export function isEventOfType<TMap, K extends EventType<TMap>>(
  event: EventEnvelope,
  type: K,
): event is EventEnvelope<K, TMap[K]> {
  return event.type === type;
}
