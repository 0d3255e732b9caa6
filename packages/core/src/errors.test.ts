import { describe, it, expect } from 'vitest';
import {
  HistoryExhausted,
  InverseUnavailable,
  StoreFailure,
  TripEngineError,
  ValidationFailure,
  errorMessage,
  toTripEngineError,
} from './errors';

describe('errors', () => {
  it('carries code, name and details', () => {
    const error = new ValidationFailure('name must not be blank', { field: 'name' });

    expect(error).toBeInstanceOf(TripEngineError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('VALIDATION_FAILURE');
    expect(error.name).toBe('ValidationFailure');
    expect(error.details).toEqual({ field: 'name' });
  });

  it('keeps the cause', () => {
    const cause = new Error('EACCES');
    const error = new InverseUnavailable('Cannot redo', undefined, { cause });
    expect(error.cause).toBe(cause);
  });

  it('toTripEngineError passes engine errors through', () => {
    const error = new HistoryExhausted('Nothing to undo');
    expect(toTripEngineError(error)).toBe(error);
  });

  it('toTripEngineError wraps anything else as StoreFailure', () => {
    const wrapped = toTripEngineError(new Error('disk full'));
    expect(wrapped).toBeInstanceOf(StoreFailure);
    expect(wrapped.message).toBe('disk full');
    expect(toTripEngineError('oops').message).toBe('oops');
  });

  it('errorMessage stringifies non-errors', () => {
    expect(errorMessage(new Error('x'))).toBe('x');
    expect(errorMessage(42)).toBe('42');
  });
});
