/**
 * @module errors
 * Error taxonomy for the command engine.
 *
 * Commands never throw these across their public boundary: they are caught,
 * stored on the command and returned as values. Each error carries a machine
 * `code`, optional structured `details`, and the original `cause` when one exists.
 */

import type { CommandFailure, ErrorCode } from '@trip-planner/types';

/** Well-known error codes. */
export const ERROR_CODES = {
  VALIDATION_FAILURE: 'VALIDATION_FAILURE',
  NOT_FOUND: 'NOT_FOUND',
  INVERSE_UNAVAILABLE: 'INVERSE_UNAVAILABLE',
  HISTORY_EXHAUSTED: 'HISTORY_EXHAUSTED',
  STORE_FAILURE: 'STORE_FAILURE',
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const satisfies Record<ErrorCode, ErrorCode>;

type Details = Record<string, unknown>;

/** Base class of every engine error. */
export class TripEngineError extends Error implements CommandFailure {
  readonly code: ErrorCode;
  readonly details?: Readonly<Details>;

  constructor(code: ErrorCode, message: string, details?: Details, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TripEngineError';
    this.code = code;
    this.details = details;
  }
}

/** A payload broke a business rule; nothing was mutated. */
export class ValidationFailure extends TripEngineError {
  constructor(message: string, details?: Details) {
    super(ERROR_CODES.VALIDATION_FAILURE, message, details);
    this.name = 'ValidationFailure';
  }
}

/** A referenced trip or itinerary item does not exist. */
export class NotFound extends TripEngineError {
  constructor(message: string, details?: Details) {
    super(ERROR_CODES.NOT_FOUND, message, details);
    this.name = 'NotFound';
  }
}

/** Undo or redo cannot be applied to the store as it currently is. */
export class InverseUnavailable extends TripEngineError {
  constructor(message: string, details?: Details, options?: ErrorOptions) {
    super(ERROR_CODES.INVERSE_UNAVAILABLE, message, details, options);
    this.name = 'InverseUnavailable';
  }
}

/** Undo or redo was requested with nothing to apply. */
export class HistoryExhausted extends TripEngineError {
  constructor(message: string, details?: Details) {
    super(ERROR_CODES.HISTORY_EXHAUSTED, message, details);
    this.name = 'HistoryExhausted';
  }
}

/** The store itself failed (for example a write error); the mutation was rolled back. */
export class StoreFailure extends TripEngineError {
  constructor(message: string, details?: Details, options?: ErrorOptions) {
    super(ERROR_CODES.STORE_FAILURE, message, details, options);
    this.name = 'StoreFailure';
  }
}

/** Configuration did not pass schema validation. */
export class ConfigError extends TripEngineError {
  constructor(message: string, details?: Details) {
    super(ERROR_CODES.CONFIG_ERROR, message, details);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Engine errors pass through; anything else is wrapped as a {@link StoreFailure}. */
export function toTripEngineError(error: unknown): TripEngineError {
  if (error instanceof TripEngineError) return error;
  return new StoreFailure(errorMessage(error), undefined, { cause: error });
}
