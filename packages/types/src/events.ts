/**
 * @module events
 * Type-safe event bus definitions for history notifications.
 * Observers (audit trails, notification feeds) subscribe through the EventBus.
 */

import type { CommandKind, ErrorCode } from './command';

/** Identifies the command an event refers to. */
export interface HistoryEntryRef {
  kind: CommandKind;
  label: string;
}

/** Map of event names to their payload types. */
export interface EventMap {
  /** Fired when a command executes and is recorded. */
  'history:executed': HistoryEntryRef & { cursor: number; size: number };
  /** Fired when a command is undone. */
  'history:undone': HistoryEntryRef & { cursor: number };
  /** Fired when a command is redone. */
  'history:redone': HistoryEntryRef & { cursor: number };
  /** Fired when execute, undo or redo fails. */
  'history:rejected': {
    operation: 'execute' | 'undo' | 'redo';
    kind: CommandKind | null;
    code: ErrorCode;
    message: string;
  };
  /** Fired when the oldest entry is dropped to respect the size bound. */
  'history:evicted': HistoryEntryRef;
  /** Fired when new work discards the redo branch. */
  'history:pruned': { discarded: HistoryEntryRef[] };
  /** Fired when the history is cleared. */
  'history:cleared': undefined;
}

/** Callback function type for event listeners. */
export type EventCallback<K extends keyof EventMap> = EventMap[K] extends undefined
  ? () => void
  : (payload: EventMap[K]) => void;

/** Type-safe event bus for pub/sub communication. */
export interface EventBus {
  /** Subscribe to an event. Returns an unsubscribe function. */
  on<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Subscribe to an event for a single emission. */
  once<K extends keyof EventMap>(event: K, callback: EventCallback<K>): () => void;
  /** Unsubscribe a specific callback from an event. */
  off<K extends keyof EventMap>(event: K, callback: EventCallback<K>): void;
  /** Emit an event with an optional payload. */
  emit<K extends keyof EventMap>(
    event: K,
    ...args: EventMap[K] extends undefined ? [] : [EventMap[K]]
  ): void;
  /** Remove all listeners for all events. */
  clear(): void;
}
