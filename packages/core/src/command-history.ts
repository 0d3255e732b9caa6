/**
 * @module command-history
 * Bounded, linear command history with an applied-position cursor.
 *
 * `entries[0..cursor]` are applied, `entries[cursor + 1..]` form the redo
 * branch. Recording while a redo branch exists is the caller's cue to prune
 * it first; the invoker does so before running a new command.
 *
 * @see {@link @trip-planner/types#CommandHistory} for the interface contract
 */

import type { CommandHistory, HistoryRange, TripCommand } from '@trip-planner/types';

/** Default maximum number of commands retained in history. */
export const DEFAULT_MAX_SIZE = 100;

/**
 * Concrete implementation of {@link CommandHistory}.
 *
 * When recording pushes the length past `maxSize`, the oldest entry is
 * evicted and the cursor moves down by one so it keeps pointing at the
 * same command.
 */
export class CommandHistoryImpl implements CommandHistory {
  /** @inheritdoc */
  readonly maxSize: number;

  private list: TripCommand[] = [];
  private _cursor = -1;

  /**
   * Create a new CommandHistory.
   * @param maxSize - Maximum number of commands to keep (default 100).
   */
  constructor(maxSize: number = DEFAULT_MAX_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError('maxSize must be an integer of at least 1');
    }
    this.maxSize = maxSize;
  }

  /** @inheritdoc */
  get cursor(): number {
    return this._cursor;
  }

  /** @inheritdoc */
  get size(): number {
    return this.list.length;
  }

  /** @inheritdoc */
  get canUndo(): boolean {
    return this._cursor >= 0;
  }

  /** @inheritdoc */
  get canRedo(): boolean {
    return this._cursor < this.list.length - 1;
  }

  /** @inheritdoc */
  pruneRedoBranch(): TripCommand[] {
    return this.list.splice(this._cursor + 1);
  }

  /** @inheritdoc */
  record(command: TripCommand): TripCommand | undefined {
    this.pruneRedoBranch();
    this.list.push(command);
    this._cursor = this.list.length - 1;

    if (this.list.length > this.maxSize) {
      this._cursor--;
      return this.list.shift();
    }
    return undefined;
  }

  /** @inheritdoc */
  current(): TripCommand | undefined {
    return this._cursor >= 0 ? this.list[this._cursor] : undefined;
  }

  /** @inheritdoc */
  next(): TripCommand | undefined {
    return this.list[this._cursor + 1];
  }

  /** @inheritdoc */
  stepBack(): void {
    if (this._cursor < 0) throw new RangeError('Nothing to step back over');
    this._cursor--;
  }

  /** @inheritdoc */
  stepForward(): void {
    if (!this.canRedo) throw new RangeError('Nothing to step forward over');
    this._cursor++;
  }

  /** @inheritdoc */
  entries(range: HistoryRange = {}): readonly TripCommand[] {
    const size = this.list.length;
    const start = clamp(range.start ?? 0, 0, size);
    const end = clamp(range.end ?? size, start, size);
    return this.list.slice(start, end);
  }

  /** @inheritdoc */
  clear(): void {
    this.list = [];
    this._cursor = -1;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
