/**
 * Game event catalogue: payloads and default priority/cancellability per type.
 */

import { createEvent, isEventOfType } from './event.js';
import type { EventEnvelope, EventOf, EventOptions, EventType } from './event.js';

// ──── Player ────────────────────────────────────────────────────────────────

export interface AttributeChangedPayload {
  /** observation, communication, action, empathy. */
  attributeName: string;
  oldValue: number;
  newValue: number;
  /** e.g. dialogue_choice, item_examination, story_progress. */
  reason: string;
}

export interface ItemAcquiredPayload {
  itemId: string;
  itemName: string;
  /** memento, clue or story. */
  itemType: string;
  source: string;
}

export interface ItemLostPayload {
  itemId: string;
  itemName: string;
  reason: string;
}

// ──── World ─────────────────────────────────────────────────────────────────

export interface LocationChangedPayload {
  fromLocation: string;
  toLocation: string;
  /** walk, door, teleport. */
  transitionType: string;
}

export interface ObjectExaminedPayload {
  objectId: string;
  objectName: string;
  locationId: string;
  firstTimeExamined: boolean;
}

// ──── Dialogue ──────────────────────────────────────────────────────────────

export interface DialogueStartedPayload {
  characterId: string;
  characterName: string;
  dialogueId: string;
}

export interface DialogueChoicePayload {
  dialogueId: string;
  choiceId: string;
  choiceText: string;
  requirements: readonly string[];
}

export interface DialogueEndedPayload {
  characterId: string;
  dialogueId: string;
  /** completed, interrupted, choice_exit. */
  endReason: string;
}

// ──── Story ─────────────────────────────────────────────────────────────────

export interface InsightGainedPayload {
  insightId: string;
  description: string;
  /** character, location, story, mystery. */
  category: string;
  trigger: string;
}

export interface PuzzleSolvedPayload {
  puzzleId: string;
  puzzleName: string;
  solution: string;
  attempts: number;
}

// ──── System ────────────────────────────────────────────────────────────────

export interface GameStateChangedPayload {
  fromState: string;
  toState: string;
  trigger: string;
}

export interface GameSavedPayload {
  saveSlot: string;
  saveTime: string;
  autoSave: boolean;
}

export interface ErrorPayload {
  errorCode: string;
  errorMessage: string;
  source: string;
}

export interface GameEventPayloads {
  AttributeChanged: AttributeChangedPayload;
  ItemAcquired: ItemAcquiredPayload;
  ItemLost: ItemLostPayload;
  LocationChanged: LocationChangedPayload;
  ObjectExamined: ObjectExaminedPayload;
  DialogueStarted: DialogueStartedPayload;
  DialogueChoice: DialogueChoicePayload;
  DialogueEnded: DialogueEndedPayload;
  InsightGained: InsightGainedPayload;
  PuzzleSolved: PuzzleSolvedPayload;
  GameStateChanged: GameStateChangedPayload;
  GameSaved: GameSavedPayload;
  Error: ErrorPayload;
}

export type GameEventType = EventType<GameEventPayloads>;

export type GameEvent<K extends GameEventType = GameEventType> = EventOf<GameEventPayloads, K>;

interface GameEventDefaults {
  readonly priority: number;
  readonly cancellable: boolean;
}

export const GAME_EVENT_DEFAULTS: Readonly<Record<GameEventType, GameEventDefaults>> = {
  AttributeChanged: { priority: 5, cancellable: true },
  ItemAcquired: { priority: 3, cancellable: true },
  ItemLost: { priority: 5, cancellable: true },
  LocationChanged: { priority: 2, cancellable: true },
  ObjectExamined: { priority: 5, cancellable: true },
  DialogueStarted: { priority: 1, cancellable: true },
  DialogueChoice: { priority: 5, cancellable: true },
  DialogueEnded: { priority: 5, cancellable: true },
  InsightGained: { priority: 3, cancellable: true },
  PuzzleSolved: { priority: 4, cancellable: true },
  // State switches and errors must always reach their subscribers.
  GameStateChanged: { priority: 1, cancellable: false },
  GameSaved: { priority: 5, cancellable: true },
  Error: { priority: 0, cancellable: false },
};

/** Creates a catalogue event; explicit options override the per-type defaults. */
export function createGameEvent<K extends GameEventType>(
  type: K,
  payload: GameEventPayloads[K],
  options: EventOptions = {},
): GameEvent<K> {
  const defaults = GAME_EVENT_DEFAULTS[type];
  return createEvent(type, payload, {
    priority: options.priority ?? defaults.priority,
    cancellable: options.cancellable ?? defaults.cancellable,
    clock: options.clock,
  });
}

export function isGameEvent<K extends GameEventType>(event: EventEnvelope, type: K): event is GameEvent<K> {
  return isEventOfType<GameEventPayloads, K>(event, type);
}

export function attributeDelta(event: GameEvent<'AttributeChanged'>): number {
  return event.payload.newValue - event.payload.oldValue;
}

export function isAttributeImprovement(event: GameEvent<'AttributeChanged'>): boolean {
  return event.payload.newValue > event.payload.oldValue;
}
