/**
 * @module invoker
 * Runs commands against the store and keeps their undo/redo history.
 *
 * Every operation is synchronous and returns its outcome as a value:
 * `execute` an {@link ExecuteResult}, `undo`/`redo` a boolean with the
 * reason left in {@link CommandInvoker.lastError}. Transitions are logged
 * and published on the event bus.
 */

import type {
  CommandDescription,
  CommandFailure,
  CommandKind,
  EventBus,
  ExecuteResult,
  HistoryEntryRef,
  HistoryRange,
  HistoryStatistics,
  TripCommand,
} from '@trip-planner/types';
import { CommandHistoryImpl } from './command-history';
import { HistoryExhausted, InverseUnavailable } from './errors';
import { EventBusImpl } from './event-bus';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { computeStatistics } from './statistics';

export interface CommandInvokerOptions {
  /** History bound (default 100). */
  maxSize?: number;
  logger?: Logger;
  events?: EventBus;
}

type Operation = 'execute' | 'undo' | 'redo';

function ref(command: TripCommand): HistoryEntryRef {
  return { kind: command.kind, label: command.label };
}

export class CommandInvoker {
  readonly events: EventBus;

  private readonly timeline: CommandHistoryImpl;
  private readonly logger: Logger;
  private _lastError: CommandFailure | null = null;

  constructor(options: CommandInvokerOptions = {}) {
    this.timeline = new CommandHistoryImpl(options.maxSize);
    this.logger = options.logger ?? silentLogger();
    this.events =
      options.events ??
      new EventBusImpl((event, error) => this.logger.error({ event, err: error }, 'event listener failed'));
  }

  /** Most recent failure signalled by this invoker; cleared by the next success. */
  get lastError(): CommandFailure | null {
    return this._lastError;
  }

  get size(): number {
    return this.timeline.size;
  }

  get cursor(): number {
    return this.timeline.cursor;
  }

  get maxSize(): number {
    return this.timeline.maxSize;
  }

  /**
   * Run a pending command. Any redo branch is discarded first, even if the
   * command then fails. Only successful commands are recorded.
   */
  execute<K extends CommandKind, R, I>(command: TripCommand<K, R, I>): ExecuteResult<R> {
    const discarded = this.timeline.pruneRedoBranch();
    if (discarded.length > 0) {
      this.logger.debug({ discarded: discarded.length }, 'redo branch pruned');
      this.events.emit('history:pruned', { discarded: discarded.map(ref) });
    }

    const outcome = command.execute();
    if (!outcome.ok) {
      this.reject('execute', command.kind, outcome.error);
      return outcome;
    }

    const evicted = this.timeline.record(command);
    this._lastError = null;
    this.logger.debug(
      { kind: command.kind, cursor: this.timeline.cursor, size: this.timeline.size },
      'command executed',
    );
    this.events.emit('history:executed', {
      ...ref(command),
      cursor: this.timeline.cursor,
      size: this.timeline.size,
    });
    if (evicted) {
      this.logger.debug({ kind: evicted.kind }, 'oldest command evicted');
      this.events.emit('history:evicted', ref(evicted));
    }
    return outcome;
  }

  /** Reverse the command at the cursor. */
  undo(): boolean {
    const command = this.timeline.current();
    if (!command) {
      return this.reject('undo', null, new HistoryExhausted('Nothing to undo'));
    }
    if (command.status !== 'executed') {
      return this.reject(
        'undo',
        command.kind,
        new InverseUnavailable(`Cannot undo "${command.label}": it is ${command.status}`),
      );
    }
    if (!command.undo()) {
      return this.reject(
        'undo',
        command.kind,
        command.error ?? new InverseUnavailable(`Cannot undo "${command.label}"`),
      );
    }

    this.timeline.stepBack();
    this._lastError = null;
    this.logger.debug({ kind: command.kind, cursor: this.timeline.cursor }, 'command undone');
    this.events.emit('history:undone', { ...ref(command), cursor: this.timeline.cursor });
    return true;
  }

  /** Re-apply the command right after the cursor. */
  redo(): boolean {
    const command = this.timeline.next();
    if (!command) {
      return this.reject('redo', null, new HistoryExhausted('Nothing to redo'));
    }
    if (command.status !== 'undone') {
      return this.reject(
        'redo',
        command.kind,
        new InverseUnavailable(`Cannot redo "${command.label}": it is ${command.status}`),
      );
    }
    if (!command.redo()) {
      return this.reject(
        'redo',
        command.kind,
        command.error ?? new InverseUnavailable(`Cannot redo "${command.label}"`),
      );
    }

    this.timeline.stepForward();
    this._lastError = null;
    this.logger.debug({ kind: command.kind, cursor: this.timeline.cursor }, 'command redone');
    this.events.emit('history:redone', { ...ref(command), cursor: this.timeline.cursor });
    return true;
  }

  canUndo(): boolean {
    return this.timeline.canUndo;
  }

  canRedo(): boolean {
    return this.timeline.canRedo;
  }

  /** Descriptions of `entries[start..end)`, oldest first. */
  history(range?: HistoryRange): CommandDescription[] {
    return this.timeline.entries(range).map((command) => command.describe());
  }

  statistics(): HistoryStatistics {
    return computeStatistics(this.timeline);
  }

  /** Forget every entry. The store is left as it is. */
  clear(): void {
    this.timeline.clear();
    this._lastError = null;
    this.logger.debug('history cleared');
    this.events.emit('history:cleared');
  }

  private reject(operation: Operation, kind: CommandKind | null, error: CommandFailure): false {
    this._lastError = error;
    this.logger.warn({ operation, kind, code: error.code }, error.message);
    this.events.emit('history:rejected', { operation, kind, code: error.code, message: error.message });
    return false;
  }
}
