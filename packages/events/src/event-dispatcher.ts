/**
 * Priority-ordered publish/subscribe dispatcher with a bounded event queue.
 *
 * Subscribers are keyed by event type and kept sorted by ascending priority
 * (equal priorities keep registration order). Events are either dispatched
 * synchronously (`publishImmediate`) or queued (`publish`) and drained by the
 * driver loop through `processEvents`. When the queue is at capacity new
 * events are dropped rather than growing the queue or blocking the producer.
 *
 * Callbacks always run against a copy of the subscriber list, so a callback
 * may subscribe, unsubscribe or publish without affecting the pass in flight.
 * A throwing callback is logged and skipped; delivery continues.
 */

import { EngineConfigError, SubscriberFaultError, createLogger, describeError } from '@wayfarer/core';
import type { Logger } from '@wayfarer/core';

import { isEventOfType } from './event.js';
import type { EventEnvelope, EventOf, EventType } from './event.js';
import type { GameEventPayloads } from './game-events.js';

export type EventCallback<TEvent> = (event: TEvent) => void;

export const DEFAULT_SUBSCRIBER_PRIORITY = 5;
export const DEFAULT_MAX_QUEUE_SIZE = 1000;

interface Subscriber {
  readonly id: string;
  readonly priority: number;
  readonly deliver: (event: EventEnvelope) => void;
  active: boolean;
}

export interface EventDispatcherOptions {
  /** Pending-queue capacity. Default: 1000. */
  maxQueueSize?: number;
  /** Trace subscribe/publish/dispatch at debug level. Default: false. */
  debug?: boolean;
  /** Default: console logger at debug level, so setDebugMode alone decides what is traced. */
  logger?: Logger;
}

export class EventDispatcher<TMap extends object = GameEventPayloads> {
  private readonly subscribers = new Map<string, Subscriber[]>();
  // Drained from queueHead; compacted once the consumed prefix dominates.
  private readonly queue: EventEnvelope[] = [];
  private queueHead = 0;
  private readonly eventCounts = new Map<string, number>();
  private readonly eventFilters: string[] = [];
  private readonly logger: Logger;

  private maxQueueSize: number;
  private debugMode: boolean;
  private processing = false;
  private nextSubscriberSerial = 0;

  constructor(options: EventDispatcherOptions = {}) {
    const maxQueueSize = options.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE;
    if (!Number.isInteger(maxQueueSize) || maxQueueSize < 1) {
      throw new EngineConfigError('maxQueueSize', maxQueueSize, 'expected an integer >= 1');
    }
    this.maxQueueSize = maxQueueSize;
    this.debugMode = options.debug ?? false;
    this.logger = options.logger ?? createLogger('EventDispatcher', { level: 'debug' });
  }

  // ===========================================================================
  // Subscription
  // ===========================================================================

  /**
   * Registers `callback` for `eventType` and returns the subscriber id, or ''
   * when no callback was given. Re-using an id already registered for the
   * type replaces that registration in place before the list is re-sorted.
   */
  subscribe<K extends EventType<TMap>>(
    eventType: K,
    callback: EventCallback<EventOf<TMap, K>> | null | undefined,
    subscriberId = '',
    priority = DEFAULT_SUBSCRIBER_PRIORITY,
  ): string {
    if (typeof callback !== 'function') {
      this.logger.error('subscribe() called without a callback', { eventType });
      return '';
    }

    if (!Number.isFinite(priority)) {
      this.logger.warn(`invalid priority ${priority}, using ${DEFAULT_SUBSCRIBER_PRIORITY}`, { eventType });
      priority = DEFAULT_SUBSCRIBER_PRIORITY;
    }

    const handler = callback;
    const id = subscriberId || this.generateSubscriberId(eventType);
    const subscriber: Subscriber = {
      id,
      priority,
      active: true,
      deliver: (event) => {
        if (isEventOfType<TMap, K>(event, eventType)) {
          handler(event);
        }
      },
    };

    let list = this.subscribers.get(eventType);
    if (!list) {
      list = [];
      this.subscribers.set(eventType, list);
    }

    const existingIndex = list.findIndex((entry) => entry.id === id);
    if (existingIndex >= 0) {
      this.logger.warn(`subscriber "${id}" already registered, replacing it`, { eventType });
      list[existingIndex] = subscriber;
    } else {
      list.push(subscriber);
    }
    // Array.prototype.sort is stable, so equal priorities keep insertion order.
    list.sort((a, b) => a.priority - b.priority);

    if (this.debugMode) {
      this.logger.debug(`subscribed ${id} -> ${eventType}`, { priority });
    }
    return id;
  }

  /** Like subscribe, but the registration is removed before its first delivery. */
  once<K extends EventType<TMap>>(
    eventType: K,
    callback: EventCallback<EventOf<TMap, K>> | null | undefined,
    subscriberId = '',
    priority = DEFAULT_SUBSCRIBER_PRIORITY,
  ): string {
    if (typeof callback !== 'function') {
      this.logger.error('once() called without a callback', { eventType });
      return '';
    }

    const handler = callback;
    const id = subscriberId || this.generateSubscriberId(eventType);
    return this.subscribe<K>(
      eventType,
      (event) => {
        this.unsubscribe(eventType, id);
        handler(event);
      },
      id,
      priority,
    );
  }

  unsubscribe(eventType: string, subscriberId: string): boolean {
    const list = this.subscribers.get(eventType);
    if (!list) {
      return false;
    }

    const index = list.findIndex((entry) => entry.id === subscriberId);
    if (index < 0) {
      return false;
    }
    list.splice(index, 1);
    if (list.length === 0) {
      this.subscribers.delete(eventType);
    }

    if (this.debugMode) {
      this.logger.debug(`unsubscribed ${subscriberId} <- ${eventType}`);
    }
    return true;
  }

  /** Removes `subscriberId` from every event type; returns how many registrations went. */
  unsubscribeAll(subscriberId: string): number {
    let removed = 0;
    for (const [eventType, list] of [...this.subscribers]) {
      const kept = list.filter((entry) => entry.id !== subscriberId);
      removed += list.length - kept.length;
      if (kept.length === 0) {
        this.subscribers.delete(eventType);
      } else if (kept.length !== list.length) {
        this.subscribers.set(eventType, kept);
      }
    }

    if (this.debugMode && removed > 0) {
      this.logger.debug(`unsubscribed ${subscriberId} from all event types`, { removed });
    }
    return removed;
  }

  /** Mutes or unmutes `subscriberId` under every event type it is registered for. */
  setSubscriberActive(subscriberId: string, active: boolean): void {
    for (const list of this.subscribers.values()) {
      for (const subscriber of list) {
        if (subscriber.id === subscriberId) {
          subscriber.active = active;
        }
      }
    }

    if (this.debugMode) {
      this.logger.debug(`subscriber ${subscriberId} ${active ? 'resumed' : 'paused'}`);
    }
  }

  // ===========================================================================
  // Publishing
  // ===========================================================================

  /** Dispatches `event` to its subscribers before returning. */
  publishImmediate(event: EventOf<TMap> | null | undefined): void {
    if (!event) {
      this.logger.error('publishImmediate() called without an event');
      return;
    }
    if (this.debugMode) {
      this.traceEvent(event, 'publish immediate');
    }
    this.recordDispatch(event);
    this.dispatchEvent(event);
  }

  /** Queues `event` for the next processEvents; returns false when it was dropped. */
  publish(event: EventOf<TMap> | null | undefined): boolean {
    if (!event) {
      this.logger.error('publish() called without an event');
      return false;
    }
    if (this.debugMode) {
      this.traceEvent(event, 'publish queued');
    }
    if (this.getQueueSize() >= this.maxQueueSize) {
      this.logger.warn(`event queue full (${this.maxQueueSize}), dropping ${event.type}`);
      return false;
    }
    this.queue.push(event);
    return true;
  }

  /**
   * Queues events in order until the queue is full; the rest are dropped.
   * Returns how many were queued.
   */
  publishBatch(events: ReadonlyArray<EventOf<TMap> | null | undefined>): number {
    let queued = 0;
    for (const event of events) {
      if (this.getQueueSize() >= this.maxQueueSize) {
        break;
      }
      if (event) {
        this.queue.push(event);
        queued += 1;
      }
    }

    if (this.debugMode && events.length > 0) {
      this.logger.debug(`batch published ${queued}/${events.length} events`);
    }
    return event;
  }

  // ===========================================================================
  // Processing
  // ===========================================================================

  /**
   * Drains up to `maxEvents` queued events (0 = all) in FIFO order and returns
   * how many were dispatched. Returns 0 when called from inside a callback
   * that is already being run by processEvents.
   */
  processEvents(maxEvents = 0): number {
    if (this.processing) {
      this.logger.warn('processEvents() re-entered from a callback, ignoring');
      return 0;
    }

    this.processing = true;
    let processed = 0;
    try {
      while (maxEvents <= 0 || processed < maxEvents) {
        const event = this.dequeue();
        if (!event) {
          break;
        }
        this.recordDispatch(event);
        if (this.debugMode) {
          this.traceEvent(event, 'process queued');
        }
        this.dispatchEvent(event);
        processed += 1;
      }
    } catch (error) {
      this.logger.error('event processing aborted', { error: describeError(error), processed });
    } finally {
      this.processing = false;
    }

    if (this.debugMode && processed > 0) {
      this.logger.debug(`processed ${processed} events`);
    }
    return processed;
  }

  /** Drops every pending event; returns how many were dropped. */
  clearEventQueue(): number {
    const dropped = this.getQueueSize();
    this.queue.length = 0;
    this.queueHead = 0;
    if (this.debugMode && dropped > 0) {
      this.logger.debug(`cleared event queue, dropped ${dropped} events`);
    }
    return dropped;
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  /** Registered (active or not) subscribers for `eventType`, or across all types. */
  getSubscriberCount(eventType?: string): number {
    if (!eventType) {
      let total = 0;
      for (const list of this.subscribers.values()) {
        total += list.length;
      }
      return total;
    }
    return this.subscribers.get(eventType)?.length ?? 0;
  }

  getQueueSize(): number {
    return this.queue.length - this.queueHead;
  }

  getMaxQueueSize(): number {
    return this.maxQueueSize;
  }

  /** Snapshot of dispatch counts per event type. */
  getEventStatistics(): Map<string, number> {
    return new Map(this.eventCounts);
  }

  resetStatistics(): void {
    this.eventCounts.clear();
    if (this.debugMode) {
      this.logger.debug('statistics reset');
    }
  }

  hasSubscribers(eventType: string): boolean {
    return (this.subscribers.get(eventType)?.length ?? 0) > 0;
  }

  isProcessing(): boolean {
    return this.processing;
  }

  // ===========================================================================
  // Configuration
  // ===========================================================================

  setDebugMode(enabled: boolean): void {
    this.debugMode = enabled;
    this.logger.info(`debug mode ${enabled ? 'on' : 'off'}`);
  }

  /**
   * Events already queued past a lowered capacity stay queued; only new
   * publishes are refused.
   */
  setMaxQueueSize(maxSize: number): void {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      this.logger.error(`ignoring invalid max queue size ${maxSize}`);
      return;
    }
    this.maxQueueSize = maxSize;
    this.logger.info(`max queue size set to ${maxSize}`);
  }

  /** Adds a type to the allow-list; while it is non-empty, other types are not delivered. */
  addEventFilter(eventType: string): void {
    if (!this.eventFilters.includes(eventType)) {
      this.eventFilters.push(eventType);
    }
    if (this.debugMode) {
      this.logger.debug(`filter added: ${eventType}`);
    }
  }

  removeEventFilter(eventType: string): void {
    const index = this.eventFilters.indexOf(eventType);
    if (index >= 0) {
      this.eventFilters.splice(index, 1);
      if (this.debugMode) {
        this.logger.debug(`filter removed: ${eventType}`);
      }
    }
  }

  clearEventFilters(): void {
    this.eventFilters.length = 0;
    if (this.debugMode) {
      this.logger.debug('filters cleared');
    }
  }

  getEventFilters(): string[] {
    return [...this.eventFilters];
  }

  /** Drops pending events and every registration, logging the final statistics. */
  dispose(): void {
    const dropped = this.clearEventQueue();
    const subscriberCount = this.getSubscriberCount();
    this.subscribers.clear();
    this.eventFilters.length = 0;

    this.logger.info('disposed', {
      droppedEvents: dropped,
      subscribers: subscriberCount,
      statistics: Object.fromEntries(this.eventCounts),
    });
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  // Counted before the filter check: filtered events still show up in the
  // statistics as processed.
  private recordDispatch(event: EventEnvelope): void {
    this.eventCounts.set(event.type, (this.eventCounts.get(event.type) ?? 0) + 1);
  }

  private dispatchEvent(event: EventEnvelope): void {
    if (!this.passesFilter(event.type)) {
      return;
    }

    const list = this.subscribers.get(event.type);
    if (!list || list.length === 0) {
      if (this.debugMode) {
        this.logger.debug(`no subscribers for ${event.type}`);
      }
      return;
    }

    for (const subscriber of [...list]) {
      if (!subscriber.active) {
        continue;
      }
      try {
        subscriber.deliver(event);
        if (this.debugMode) {
          this.logger.debug(`delivered ${event.type} -> ${subscriber.id}`);
        }
      } catch (error) {
        const fault = new SubscriberFaultError(subscriber.id, event.type, error);
        this.logger.error(fault.message, { subscriberId: subscriber.id, eventType: event.type });
      }
    }
  }

  private dequeue(): EventEnvelope | undefined {
    if (this.queueHead >= this.queue.length) {
      return undefined;
    }
    const event = this.queue[this.queueHead];
    this.queueHead += 1;

    if (this.queueHead === this.queue.length) {
      this.queue.length = 0;
      this.queueHead = 0;
    } else if (this.queueHead >= 256 && this.queueHead * 2 >= this.queue.length) {
      this.queue.splice(0, this.queueHead);
      this.queueHead = 0;
    }
    return event;
  }

  private passesFilter(eventType: string): boolean {
    return this.eventFilters.length === 0 || this.eventFilters.includes(eventType);
  }

  private generateSubscriberId(base: string): string {
    this.nextSubscriberSerial += 1;
    return `${base || 'Subscriber'}_${this.nextSubscriberSerial}`;
  }

  private traceEvent(event: EventEnvelope, action: string): void {
    this.logger.debug(`${action}: ${event.type}`, { priority: event.priority, timestamp: event.timestamp });
  }
}
