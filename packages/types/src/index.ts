/**
 * @trip-planner/types
 *
 * Shared type definitions for the trip planner.
 * This package contains zero runtime code: only TypeScript interfaces
 * and types that serve as the contract between the other packages.
 *
 * @packageDocumentation
 */

// Entities
export type {
  Activity,
  AnyItineraryItem,
  CollectionName,
  EntityMap,
  Expense,
  Flight,
  Hotel,
  ItemCollection,
  ItemKind,
  ItineraryItem,
  Trip,
} from './trip';

// Receiver
export type { EntityFilter, StoreSnapshot, TripStore } from './store';

// Commands (undo/redo)
export type {
  AddActivityPayload,
  AddCollaboratorPayload,
  AddExpensePayload,
  AddFlightPayload,
  AddHotelPayload,
  CommandDescription,
  CommandFailure,
  CommandHistory,
  CommandKind,
  CommandPayload,
  CommandPayloadMap,
  CommandResultMap,
  CommandStatus,
  CreateTripPayload,
  ErrorCode,
  ExecuteResult,
  HistoryRange,
  HistoryStatistics,
  TripCommand,
  UpdateBudgetPayload,
  UpdateItemStatusPayload,
} from './command';

// Events
export type { EventBus, EventCallback, EventMap, HistoryEntryRef } from './events';
