import { describe, it, expect } from 'vitest';
import { storeWith, tripFixture } from '../__tests__/fixtures';
import { AddActivityCommand } from './add-activity';
import { AddExpenseCommand } from './add-expense';
import { AddFlightCommand } from './add-flight';
import { AddHotelCommand } from './add-hotel';

const FLIGHT = {
  tripId: 7,
  company: 'Test Air',
  code: 'TA100',
  departure: '2026-04-01T08:00',
  arrival: '2026-04-01T10:00',
};

describe('AddFlightCommand', () => {
  it('inserts the flight under the trip', () => {
    const store = storeWith(tripFixture());
    const result = new AddFlightCommand(store, FLIGHT).execute();

    expect(result).toEqual({ ok: true, value: { id: 1, ...FLIGHT, isDone: false } });
    expect(store.findById('flights', 1)?.code).toBe('TA100');
  });

  it('undo removes the flight with the captured id', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddFlightCommand(store, FLIGHT);
    cmd.execute();
    const capturedId = cmd.capturedInverse?.id;

    expect(cmd.undo()).toBe(true);
    expect(capturedId).toBe(1);
    expect(store.findById('flights', 1)).toBeUndefined();
  });

  it('redo brings back the same flight id', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddFlightCommand(store, FLIGHT);
    cmd.execute();
    cmd.undo();

    expect(cmd.redo()).toBe(true);
    expect(store.list('flights').map((flight) => flight.id)).toEqual([1]);
    expect(store.nextId('flights')).toBe(2);
  });

  it('redo fails once the trip is gone', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddFlightCommand(store, FLIGHT);
    cmd.execute();
    cmd.undo();
    store.delete('trips', 7);

    expect(cmd.redo()).toBe(false);
    expect(cmd.error?.message).toBe('Trip 7 no longer exists');
  });

  it('fails with NOT_FOUND for an unknown trip', () => {
    const result = new AddFlightCommand(storeWith(), FLIGHT).execute();
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('NOT_FOUND');
  });

  it('undo fails when the flight was already deleted', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddFlightCommand(store, FLIGHT);
    cmd.execute();
    store.delete('flights', 1);

    expect(cmd.undo()).toBe(false);
    expect(cmd.error?.message).toBe('flights entry 1 no longer exists');
  });
});

describe('AddHotelCommand', () => {
  const HOTEL = { tripId: 7, name: 'Casa Azul', checkin: '2026-04-01', checkout: '2026-04-05' };

  it('inserts and undoes a hotel stay', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddHotelCommand(store, HOTEL);

    expect(cmd.execute()).toEqual({ ok: true, value: { id: 1, ...HOTEL, isDone: false } });
    expect(cmd.undo()).toBe(true);
    expect(store.list('hotels')).toEqual([]);
  });

  it('redo restores the stay under its original id', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddHotelCommand(store, HOTEL);
    cmd.execute();
    cmd.undo();

    expect(cmd.redo()).toBe(true);
    expect(store.list('hotels')).toEqual([{ id: 1, ...HOTEL, isDone: false }]);
  });

  it('rejects a check-out before the check-in', () => {
    const result = new AddHotelCommand(storeWith(tripFixture()), { ...HOTEL, checkout: '2026-03-30' }).execute();
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('checkin must not be after checkout');
  });
});

describe('AddActivityCommand', () => {
  const ACTIVITY = { tripId: 7, description: 'Tram 28', date: '2026-04-02' };

  it('inserts an activity with the next activity id', () => {
    const store = storeWith(tripFixture());
    new AddActivityCommand(store, ACTIVITY).execute();
    const second = new AddActivityCommand(store, { ...ACTIVITY, description: 'Belem' }).execute();

    expect(second.ok).toBe(true);
    if (second.ok) expect(second.value.id).toBe(2);
  });

  it('undo then redo returns the store to each earlier state', () => {
    const store = storeWith(tripFixture());
    const before = store.snapshot();
    const cmd = new AddActivityCommand(store, ACTIVITY);
    cmd.execute();
    const after = store.snapshot();

    expect(cmd.undo()).toBe(true);
    expect(store.list('activities')).toEqual(before.activities);

    expect(cmd.redo()).toBe(true);
    expect(cmd.status).toBe('executed');
    expect(store.snapshot()).toEqual(after);
    expect(store.findById('activities', 1)).toEqual({ id: 1, ...ACTIVITY, isDone: false });
  });

  it('redo fails and turns the command failed when the trip is gone', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddActivityCommand(store, ACTIVITY);
    cmd.execute();
    cmd.undo();
    store.delete('trips', 7);

    expect(cmd.redo()).toBe(false);
    expect(cmd.status).toBe('failed');
    expect(cmd.error?.code).toBe('INVERSE_UNAVAILABLE');
    expect(store.list('activities')).toEqual([]);
  });
});

describe('AddExpenseCommand', () => {
  const EXPENSE = {
    tripId: 7,
    description: 'Museum tickets',
    amount: 24.5,
    currency: 'EUR',
    date: '2026-04-03',
    category: 'culture',
  };

  it('records the expense', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddExpenseCommand(store, EXPENSE);

    expect(cmd.execute()).toEqual({ ok: true, value: { id: 1, ...EXPENSE, isDone: false } });
    expect(cmd.label).toBe('Add expense "Museum tickets" (24.5 EUR) to trip 7');
  });

  it('undo removes the expense and redo restores the same id', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddExpenseCommand(store, EXPENSE);
    cmd.execute();

    expect(cmd.undo()).toBe(true);
    expect(store.findById('expenses', 1)).toBeUndefined();

    expect(cmd.redo()).toBe(true);
    expect(store.list('expenses')).toEqual([{ id: 1, ...EXPENSE, isDone: false }]);
    expect(store.nextId('expenses')).toBe(2);
  });

  it('undo fails when the expense was already deleted', () => {
    const store = storeWith(tripFixture());
    const cmd = new AddExpenseCommand(store, EXPENSE);
    cmd.execute();
    store.delete('expenses', 1);

    expect(cmd.undo()).toBe(false);
    expect(cmd.status).toBe('executed');
    expect(cmd.error?.message).toBe('expenses entry 1 no longer exists');
  });

  it('rejects a negative amount', () => {
    const store = storeWith(tripFixture());
    const result = new AddExpenseCommand(store, { ...EXPENSE, amount: -3 }).execute();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('amount must be a finite number >= 0');
    expect(store.list('expenses')).toEqual([]);
  });
});
