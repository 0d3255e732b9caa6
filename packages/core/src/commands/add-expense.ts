/**
 * @module commands/add-expense
 * Records an expense against a trip. The amount must be finite and non-negative.
 */

import type { AddExpensePayload, Expense, TripStore } from '@trip-planner/types';
import { removeItem, requireTrip, restoreItem } from './itinerary';
import type { Applied } from './store-command';
import { StoreCommand } from './store-command';
import { requireAmount, requireId, requireText } from './validation';

export class AddExpenseCommand extends StoreCommand<'AddExpense', Expense, Expense> {
  constructor(store: TripStore, payload: AddExpensePayload) {
    super(
      store,
      'AddExpense',
      payload,
      `Add expense "${payload.description}" (${payload.amount} ${payload.currency}) to trip ${payload.tripId}`,
    );
  }

  protected apply(): Applied<Expense, Expense> {
    const { tripId, description, amount, currency, date, category } = this.payload;
    requireId('tripId', tripId);
    requireText({ description, currency, date, category });
    requireAmount('amount', amount);
    requireTrip(this.store, tripId);

    const expense = this.store.insert('expenses', (id) => ({
      id,
      tripId,
      description,
      amount,
      currency,
      date,
      category,
      isDone: false,
    }));
    return { result: expense, inverse: { ...expense } };
  }

  protected revert(expense: Expense): void {
    removeItem(this.store, 'expenses', expense.id);
  }

  protected reapply(expense: Expense): Applied<Expense, Expense> {
    return { result: restoreItem(this.store, 'expenses', expense), inverse: expense };
  }
}
