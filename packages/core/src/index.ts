/**
 * @trip-planner/core
 *
 * Undoable command engine for trip planning: commands, history, invoker,
 * and the trip store they operate on.
 *
 * @packageDocumentation
 */

// Errors
export {
  ERROR_CODES,
  TripEngineError,
  ValidationFailure,
  NotFound,
  InverseUnavailable,
  HistoryExhausted,
  StoreFailure,
  ConfigError,
  errorMessage,
  toTripEngineError,
} from './errors';

// Configuration and logging
export { EngineConfigSchema, ENV_KEYS, LOG_LEVELS, loadConfig } from './config';
export type { EngineConfig, LoadConfigOptions } from './config';
export { createLogger, silentLogger } from './logger';
export type { CreateLoggerOptions, Logger } from './logger';

// Store
export { COLLECTIONS, ITEM_COLLECTIONS, ITEM_KINDS } from './collections';
export { InMemoryTripStore, emptySnapshot } from './memory-store';
export { JsonFileTripStore, readStoreFile } from './json-file-store';
export { StoreSnapshotSchema, parseStoreSnapshot } from './store-snapshot';
export { SHARE_CODE_LENGTH, generateShareCode, generateFreeShareCode } from './share-code';

// Commands
export {
  StoreCommand,
  CreateTripCommand,
  UpdateBudgetCommand,
  AddCollaboratorCommand,
  AddFlightCommand,
  AddHotelCommand,
  AddActivityCommand,
  AddExpenseCommand,
  UpdateItemStatusCommand,
} from './commands';
export type { Applied, BudgetInverse, CollaboratorInverse, ItemStatusInverse } from './commands';
export { CommandFactory } from './command-factory';

// History and invoker
export { CommandHistoryImpl, DEFAULT_MAX_SIZE } from './command-history';
export { computeStatistics } from './statistics';
export { CommandInvoker } from './invoker';
export type { CommandInvokerOptions } from './invoker';
export { EventBusImpl } from './event-bus';
export type { ListenerErrorHandler } from './event-bus';
export { AuditTrail, DEFAULT_AUDIT_LIMIT } from './audit-trail';
export type { AuditRecord, AuditTrailOptions } from './audit-trail';

// Session
export { createTripSession } from './session';
export type { CreateTripSessionOptions, TripSession } from './session';
