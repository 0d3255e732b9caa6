/**
 * @module command
 * Command pattern types for undoable trip mutations.
 * Each mutation is a Command that captures what it needs to reverse itself.
 */

import type { Activity, AnyItineraryItem, Expense, Flight, Hotel, ItemKind, Trip } from './trip';

/** Lifecycle of a command. `failed` is terminal. */
export type CommandStatus = 'pending' | 'executed' | 'undone' | 'failed';

/** Machine-readable failure codes. */
export type ErrorCode =
  | 'VALIDATION_FAILURE'
  | 'NOT_FOUND'
  | 'INVERSE_UNAVAILABLE'
  | 'HISTORY_EXHAUSTED'
  | 'STORE_FAILURE'
  | 'CONFIG_ERROR';

/** A failure reported by a command or the invoker. */
export interface CommandFailure {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}

/** Outcome of {@link TripCommand.execute} and {@link CommandInvoker.execute}. */
export type ExecuteResult<R> =
  | { readonly ok: true; readonly value: R }
  | { readonly ok: false; readonly error: CommandFailure };

export interface CreateTripPayload {
  userId: number;
  destination: string;
  name: string;
  startDate: string;
  endDate: string;
  /** Requested share code; a free one is generated when omitted or blank. */
  shareCode?: string;
}

export interface UpdateBudgetPayload {
  tripId: number;
  budget: number;
}

export interface AddCollaboratorPayload {
  tripId: number;
  userId: number;
}

export interface AddFlightPayload {
  tripId: number;
  company: string;
  code: string;
  departure: string;
  arrival: string;
}

export interface AddHotelPayload {
  tripId: number;
  name: string;
  checkin: string;
  checkout: string;
}

export interface AddActivityPayload {
  tripId: number;
  description: string;
  date: string;
}

export interface AddExpensePayload {
  tripId: number;
  description: string;
  amount: number;
  currency: string;
  date: string;
  category: string;
}

export interface UpdateItemStatusPayload {
  itemKind: ItemKind;
  itemId: number;
  isDone: boolean;
}

/** Payload accepted by each command kind. */
export interface CommandPayloadMap {
  CreateTrip: CreateTripPayload;
  UpdateBudget: UpdateBudgetPayload;
  AddCollaborator: AddCollaboratorPayload;
  AddFlight: AddFlightPayload;
  AddHotel: AddHotelPayload;
  AddActivity: AddActivityPayload;
  AddExpense: AddExpensePayload;
  UpdateItemStatus: UpdateItemStatusPayload;
}

export type CommandKind = keyof CommandPayloadMap;

export type CommandPayload = CommandPayloadMap[CommandKind];

/** Forward result type produced by each command kind. */
export interface CommandResultMap {
  CreateTrip: Trip;
  UpdateBudget: Trip;
  AddCollaborator: Trip;
  AddFlight: Flight;
  AddHotel: Hotel;
  AddActivity: Activity;
  AddExpense: Expense;
  UpdateItemStatus: AnyItineraryItem;
}

/** Read-only view of a command for history listings. */
export interface CommandDescription {
  kind: CommandKind;
  /** Human-readable label, e.g. `Set budget of trip 7 to 1000`. */
  label: string;
  status: CommandStatus;
  /** ISO timestamp of the latest execute or redo. */
  executedAt: string | null;
  /** ISO timestamp of the latest undo. */
  undoneAt: string | null;
  payload: CommandPayload;
  error: { code: ErrorCode; message: string } | null;
}

/**
 * A reversible unit of work bound to a store and an immutable payload.
 *
 * @typeParam K - Command kind tag.
 * @typeParam R - Forward result (the mutated entity).
 * @typeParam I - State captured on execute to reverse the effect.
 */
export interface TripCommand<K extends CommandKind = CommandKind, R = unknown, I = unknown> {
  readonly kind: K;
  readonly label: string;
  /** Frozen copy of the constructor input. */
  readonly payload: CommandPayloadMap[K];
  readonly status: CommandStatus;
  /** Result of the latest successful execute or redo. */
  readonly result: R | null;
  /** Set once the command has executed; never cleared afterwards. */
  readonly capturedInverse: I | null;
  readonly error: CommandFailure | null;
  readonly executedAt: string | null;
  readonly undoneAt: string | null;

  /** Apply the change. Only valid while pending; leaves the store untouched on failure. */
  execute(): ExecuteResult<R>;
  /** Reverse an executed command. On failure the status stays `executed`. */
  undo(): boolean;
  /** Re-apply an undone command. On failure the command becomes `failed`. */
  redo(): boolean;
  describe(): CommandDescription;
}

/** Half-open index range over the history. Bounds are clamped to `[0, size]`; negatives do not count from the end. */
export interface HistoryRange {
  start?: number;
  end?: number;
}

/** Counts derived from the current history entries. */
export interface HistoryStatistics {
  total: number;
  executed: number;
  undone: number;
  failed: number;
  byKind: Partial<Record<CommandKind, number>>;
  cursor: number;
  maxSize: number;
  canUndo: boolean;
  canRedo: boolean;
}

/** Bounded, linear list of recorded commands with an applied-position cursor. */
export interface CommandHistory {
  /** Maximum number of commands kept. */
  readonly maxSize: number;
  /** Index of the last applied entry, `-1` when nothing is applied. */
  readonly cursor: number;
  readonly size: number;
  readonly canUndo: boolean;
  readonly canRedo: boolean;

  /** Drop every entry after the cursor and return them. */
  pruneRedoBranch(): TripCommand[];
  /** Append an applied command and return the evicted oldest entry, if any. */
  record(command: TripCommand): TripCommand | undefined;
  /** Entry at the cursor. */
  current(): TripCommand | undefined;
  /** Entry right after the cursor. */
  next(): TripCommand | undefined;
  stepBack(): void;
  stepForward(): void;
  entries(range?: HistoryRange): readonly TripCommand[];
  clear(): void;
}
