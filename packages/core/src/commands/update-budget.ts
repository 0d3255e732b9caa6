/**
 * @module commands/update-budget
 * Sets a trip's budget, remembering the previous value for undo.
 */

import type { Trip, TripStore, UpdateBudgetPayload } from '@trip-planner/types';
import { InverseUnavailable, NotFound } from '../errors';
import { requireTrip } from './itinerary';
import type { Applied } from './store-command';
import { StoreCommand } from './store-command';
import { requireAmount, requireId } from './validation';

export interface BudgetInverse {
  previousBudget: number;
}

export class UpdateBudgetCommand extends StoreCommand<'UpdateBudget', Trip, BudgetInverse> {
  constructor(store: TripStore, payload: UpdateBudgetPayload) {
    super(store, 'UpdateBudget', payload, `Set budget of trip ${payload.tripId} to ${payload.budget}`);
  }

  protected apply(): Applied<Trip, BudgetInverse> {
    const { tripId, budget } = this.payload;
    requireId('tripId', tripId);
    requireAmount('budget', budget);

    const previous = requireTrip(this.store, tripId);
    const updated = this.store.updateBudget(tripId, budget);
    if (!updated) throw new NotFound(`Trip ${tripId} not found`, { tripId });
    return { result: updated, inverse: { previousBudget: previous.budget } };
  }

  protected revert({ previousBudget }: BudgetInverse): void {
    const { tripId, budget } = this.payload;
    const trip = this.store.findById('trips', tripId);
    if (!trip) throw new InverseUnavailable(`Trip ${tripId} no longer exists`, { tripId });
    if (trip.budget !== budget) {
      throw new InverseUnavailable(
        `Budget of trip ${tripId} changed to ${trip.budget} after it was set to ${budget}`,
        { tripId, expected: budget, actual: trip.budget },
      );
    }
    if (!this.store.updateBudget(tripId, previousBudget)) {
      throw new InverseUnavailable(`Trip ${tripId} no longer exists`, { tripId });
    }
  }

  protected reapply(): Applied<Trip, BudgetInverse> {
    return this.apply();
  }
}
