import { describe, it, expect } from 'vitest';
import { storeWith, tripFixture } from '../__tests__/fixtures';
import { UpdateItemStatusCommand } from './update-item-status';

function storeWithExpense() {
  const store = storeWith(tripFixture());
  store.insert('expenses', (id) => ({
    id,
    tripId: 7,
    description: 'Taxi',
    amount: 18,
    currency: 'EUR',
    date: '2026-04-01',
    category: 'transport',
    isDone: false,
  }));
  return store;
}

describe('UpdateItemStatusCommand', () => {
  it('maps the item kind to its collection and sets isDone', () => {
    const store = storeWithExpense();
    const cmd = new UpdateItemStatusCommand(store, { itemKind: 'expense', itemId: 1, isDone: true });

    const result = cmd.execute();

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.isDone).toBe(true);
    expect(cmd.capturedInverse).toEqual({ previousIsDone: false });
    expect(store.findById('expenses', 1)?.isDone).toBe(true);
    expect(cmd.label).toBe('Mark expense 1 as done');
  });

  it('undo restores the previous flag', () => {
    const store = storeWithExpense();
    const cmd = new UpdateItemStatusCommand(store, { itemKind: 'expense', itemId: 1, isDone: true });
    cmd.execute();

    expect(cmd.undo()).toBe(true);
    expect(store.findById('expenses', 1)?.isDone).toBe(false);
  });

  it('refuses to undo when the flag changed elsewhere', () => {
    const store = storeWithExpense();
    const cmd = new UpdateItemStatusCommand(store, { itemKind: 'expense', itemId: 1, isDone: true });
    cmd.execute();
    store.update('expenses', 1, (expense) => ({ ...expense, isDone: false }));

    expect(cmd.undo()).toBe(false);
    expect(cmd.error?.code).toBe('INVERSE_UNAVAILABLE');
  });

  it('fails with NOT_FOUND for a missing item', () => {
    const cmd = new UpdateItemStatusCommand(storeWithExpense(), { itemKind: 'hotel', itemId: 1, isDone: true });
    const result = cmd.execute();

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('hotel 1 not found');
    expect(cmd.status).toBe('failed');
  });

  it('redo re-applies the flag after an undo', () => {
    const store = storeWithExpense();
    const cmd = new UpdateItemStatusCommand(store, { itemKind: 'expense', itemId: 1, isDone: true });
    cmd.execute();
    cmd.undo();

    expect(cmd.redo()).toBe(true);
    expect(cmd.status).toBe('executed');
    expect(store.findById('expenses', 1)?.isDone).toBe(true);
    expect(cmd.capturedInverse).toEqual({ previousIsDone: false });

    expect(cmd.undo()).toBe(true);
    expect(store.findById('expenses', 1)?.isDone).toBe(false);
  });

  it('redo captures the previous flag again', () => {
    const store = storeWithExpense();
    const cmd = new UpdateItemStatusCommand(store, { itemKind: 'expense', itemId: 1, isDone: true });
    cmd.execute();
    cmd.undo();
    store.update('expenses', 1, (expense) => ({ ...expense, isDone: true }));

    expect(cmd.redo()).toBe(true);
    expect(cmd.capturedInverse).toEqual({ previousIsDone: true });
  });

  it('redo fails once the item is deleted', () => {
    const store = storeWithExpense();
    const cmd = new UpdateItemStatusCommand(store, { itemKind: 'expense', itemId: 1, isDone: true });
    cmd.execute();
    cmd.undo();
    store.delete('expenses', 1);

    expect(cmd.redo()).toBe(false);
    expect(cmd.status).toBe('failed');
    expect(cmd.error?.message).toBe('Cannot redo: expense 1 not found');
  });
});
