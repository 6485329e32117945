/**
 * @wayfarer/events
 *
 * Event envelope, game event catalogue and the priority dispatcher.
 */

export {
  createEvent,
  isEventOfType,
  normalizeEventPriority,
  MIN_EVENT_PRIORITY,
  MAX_EVENT_PRIORITY,
  DEFAULT_EVENT_PRIORITY,
} from './event.js';
export type { EventEnvelope, EventOf, EventType, EventClock, EventOptions } from './event.js';

export {
  createGameEvent,
  isGameEvent,
  attributeDelta,
  isAttributeImprovement,
  GAME_EVENT_DEFAULTS,
} from './game-events.js';
export type {
  GameEvent,
  GameEventType,
  GameEventPayloads,
  AttributeChangedPayload,
  ItemAcquiredPayload,
  ItemLostPayload,
  LocationChangedPayload,
  ObjectExaminedPayload,
  DialogueStartedPayload,
  DialogueChoicePayload,
  DialogueEndedPayload,
  InsightGainedPayload,
  PuzzleSolvedPayload,
  GameStateChangedPayload,
  GameSavedPayload,
  ErrorPayload,
} from './game-events.js';

export {
  EventDispatcher,
  DEFAULT_SUBSCRIBER_PRIORITY,
  DEFAULT_MAX_QUEUE_SIZE,
} from './event-dispatcher.js';
export type { EventCallback, EventDispatcherOptions } from './event-dispatcher.js';
