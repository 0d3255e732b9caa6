/**
 * @module commands/store-command
 * Shared lifecycle for every trip command.
 *
 * Variants supply three steps against the {@link TripStore}:
 * `apply` (validate, mutate, capture the inverse), `revert` (apply the
 * inverse) and `reapply` (redo from the captured inverse). The base class
 * owns the status state machine, timestamps and error bookkeeping:
 *
 * ```
 * pending --execute--> executed <--redo/undo--> undone
 *    \--fail--> failed          undone --redo fails--> failed
 * ```
 */

import type {
  CommandDescription,
  CommandFailure,
  CommandKind,
  CommandPayloadMap,
  CommandStatus,
  ExecuteResult,
  TripCommand,
  TripStore,
} from '@trip-planner/types';
import {
  ERROR_CODES,
  InverseUnavailable,
  TripEngineError,
  ValidationFailure,
  errorMessage,
  toTripEngineError,
} from '../errors';

/** Output of a forward step: the mutated entity and the state to reverse it. */
export interface Applied<R, I> {
  result: R;
  inverse: I;
}

/** Undo and redo failures surface as InverseUnavailable, except store I/O failures. */
function inverseFailure(error: unknown, operation: 'undo' | 'redo'): TripEngineError {
  if (error instanceof TripEngineError) {
    if (error.code === ERROR_CODES.INVERSE_UNAVAILABLE || error.code === ERROR_CODES.STORE_FAILURE) {
      return error;
    }
  }
  return new InverseUnavailable(`Cannot ${operation}: ${errorMessage(error)}`, undefined, { cause: error });
}

function now(): string {
  return new Date().toISOString();
}

export abstract class StoreCommand<K extends CommandKind, R, I> implements TripCommand<K, R, I> {
  readonly kind: K;
  readonly label: string;
  readonly payload: CommandPayloadMap[K];

  private _status: CommandStatus = 'pending';
  private _result: R | null = null;
  private captured: { inverse: I } | null = null;
  private _error: TripEngineError | null = null;
  private _executedAt: string | null = null;
  private _undoneAt: string | null = null;

  /**
   * @param store   - Receiver the command mutates.
   * @param kind    - Kind tag.
   * @param payload - Input; a frozen copy is kept.
   * @param label   - Human-readable summary for history listings.
   */
  protected constructor(
    protected readonly store: TripStore,
    kind: K,
    payload: CommandPayloadMap[K],
    label: string,
  ) {
    const copy: CommandPayloadMap[K] = { ...payload };
    Object.freeze(copy);
    this.kind = kind;
    this.payload = copy;
    this.label = label;
  }

  /** Validate, mutate the store once, and return the result with its inverse. */
  protected abstract apply(): Applied<R, I>;

  /** Reverse the effect described by `inverse`. Throws when it no longer applies. */
  protected abstract revert(inverse: I): void;

  /** Re-apply after an undo. */
  protected abstract reapply(inverse: I): Applied<R, I>;

  get status(): CommandStatus {
    return this._status;
  }

  get result(): R | null {
    return this._result;
  }

  get capturedInverse(): I | null {
    return this.captured ? this.captured.inverse : null;
  }

  get error(): CommandFailure | null {
    return this._error;
  }

  get executedAt(): string | null {
    return this._executedAt;
  }

  get undoneAt(): string | null {
    return this._undoneAt;
  }

  /** @inheritdoc */
  execute(): ExecuteResult<R> {
    if (this._status !== 'pending') {
      return {
        ok: false,
        error: new ValidationFailure(`${this.kind} command is already ${this._status}`, {
          status: this._status,
        }),
      };
    }

    try {
      const { result, inverse } = this.apply();
      this.markExecuted(result, inverse);
      return { ok: true, value: result };
    } catch (error) {
      const failure = toTripEngineError(error);
      this._status = 'failed';
      this._error = failure;
      return { ok: false, error: failure };
    }
  }

  /** @inheritdoc */
  undo(): boolean {
    if (this._status !== 'executed' || !this.captured) return false;

    try {
      this.revert(this.captured.inverse);
    } catch (error) {
      this._error = inverseFailure(error, 'undo');
      return false;
    }
    this._status = 'undone';
    this._undoneAt = now();
    this._error = null;
    return true;
  }

  /** @inheritdoc */
  redo(): boolean {
    if (this._status !== 'undone' || !this.captured) return false;

    try {
      const { result, inverse } = this.reapply(this.captured.inverse);
      this.markExecuted(result, inverse);
      return true;
    } catch (error) {
      this._status = 'failed';
      this._error = inverseFailure(error, 'redo');
      return false;
    }
  }

  /** @inheritdoc */
  describe(): CommandDescription {
    return {
      kind: this.kind,
      label: this.label,
      status: this._status,
      executedAt: this._executedAt,
      undoneAt: this._undoneAt,
      payload: { ...this.payload },
      error: this._error ? { code: this._error.code, message: this._error.message } : null,
    };
  }

  private markExecuted(result: R, inverse: I): void {
    this._status = 'executed';
    this._result = result;
    this.captured = { inverse };
    this._executedAt = now();
    this._error = null;
  }
}
