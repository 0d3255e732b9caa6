/**
 * @module commands/validation
 * Payload checks shared by the command variants. Each throws
 * {@link ValidationFailure} before anything touches the store.
 */

import { ValidationFailure } from '../errors';

/** Ids are positive integers. */
export function requireId(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationFailure(`${field} must be a positive integer`, { field, value });
  }
}

/** Every listed field must contain a non-blank string. */
export function requireText(fields: Record<string, string>): void {
  for (const [field, value] of Object.entries(fields)) {
    if (value.trim() === '') {
      throw new ValidationFailure(`${field} must not be blank`, { field });
    }
  }
}

export function requireAmount(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationFailure(`${field} must be a finite number >= 0`, { field, value });
  }
}

/** ISO dates compare correctly as strings. */
export function requireOrdered(startField: string, start: string, endField: string, end: string): void {
  if (start > end) {
    throw new ValidationFailure(`${startField} must not be after ${endField}`, {
      [startField]: start,
      [endField]: end,
    });
  }
}
