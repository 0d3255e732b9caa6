/**
 * @module event-bus
 * Type-safe pub/sub emitter for history notifications.
 *
 * The invoker publishes every transition here; observers such as audit
 * trails subscribe without the invoker knowing about them.
 *
 * @see {@link @trip-planner/types#EventBus} for the interface contract
 * @see {@link @trip-planner/types#EventMap} for the event catalogue
 */

import type { EventBus, EventCallback, EventMap } from '@trip-planner/types';

/** Generic callback type used internally by the event bus. */
type Callback = (...args: unknown[]) => void;

interface Subscription {
  callback: Callback;
  once: boolean;
}

/** Receives errors thrown by listeners. */
export type ListenerErrorHandler = (event: keyof EventMap, error: unknown) => void;

/**
 * Concrete implementation of {@link EventBus}.
 *
 * Listeners run in subscription order. A listener that throws does not stop
 * the others: the error goes to `onListenerError` (rethrown when none is set).
 */
export class EventBusImpl implements EventBus {
  private subscriptions = new Map<keyof EventMap, Subscription[]>();

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  /** @inheritdoc */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    this.subscribe(event, callback as Callback, false);
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void {
    this.subscribe(event, callback as Callback, true);
    return () => this.off(event, callback);
  }

  /** @inheritdoc */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void {
    this.remove(event, callback as Callback);
  }

  /** @inheritdoc */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void {
    const list = this.subscriptions.get(event);
    if (!list) return;

    // Snapshot: listeners may unsubscribe while we iterate.
    for (const sub of [...list]) {
      if (sub.once) this.remove(event, sub.callback);
      try {
        sub.callback(...args);
      } catch (error) {
        if (!this.onListenerError) throw error;
        this.onListenerError(event, error);
      }
    }
  }

  /** Number of listeners currently subscribed to `event`. */
  listenerCount(event: keyof EventMap): number {
    return this.subscriptions.get(event)?.length ?? 0;
  }

  /** @inheritdoc */
  clear(): void {
    this.subscriptions.clear();
  }

  private remove(event: keyof EventMap, callback: Callback): void {
    const list = this.subscriptions.get(event);
    if (!list) return;
    const remaining = list.filter((sub) => sub.callback !== callback);
    if (remaining.length === 0) {
      this.subscriptions.delete(event);
    } else {
      this.subscriptions.set(event, remaining);
    }
  }

  private subscribe(event: keyof EventMap, callback: Callback, once: boolean): void {
    const list = this.subscriptions.get(event) ?? [];
    list.push({ callback, once });
    this.subscriptions.set(event, list);
  }
}
