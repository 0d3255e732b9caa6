/**
 * @module commands/create-trip
 * Creates a trip owned by `userId`.
 *
 * A blank or missing share code is replaced by a freshly generated free one.
 * A requested code already used by another trip is rejected.
 */

import type { CreateTripPayload, Trip, TripStore } from '@trip-planner/types';
import { ITEM_KINDS, ITEM_COLLECTIONS } from '../collections';
import { InverseUnavailable, ValidationFailure } from '../errors';
import { generateFreeShareCode } from '../share-code';
import type { Applied } from './store-command';
import { StoreCommand } from './store-command';
import { requireId, requireOrdered, requireText } from './validation';

export class CreateTripCommand extends StoreCommand<'CreateTrip', Trip, Trip> {
  constructor(store: TripStore, payload: CreateTripPayload) {
    super(store, 'CreateTrip', payload, `Create trip "${payload.name}" to ${payload.destination}`);
  }

  protected apply(): Applied<Trip, Trip> {
    const { userId, destination, name, startDate, endDate } = this.payload;
    requireId('userId', userId);
    requireText({ destination, name, startDate, endDate });
    requireOrdered('startDate', startDate, 'endDate', endDate);

    const shareCode = this.resolveShareCode();
    const trip = this.store.insert('trips', (id) => ({
      id,
      userId,
      destination,
      name,
      startDate,
      endDate,
      isSuggestion: false,
      budget: 0,
      shareCode,
      collaborators: [],
    }));
    return { result: trip, inverse: structuredClone(trip) };
  }

  protected revert(trip: Trip): void {
    // Deleting a trip that still has items would orphan them.
    for (const kind of ITEM_KINDS) {
      const collection = ITEM_COLLECTIONS[kind];
      const items = this.store.list(collection, (item) => item.tripId === trip.id);
      if (items.length > 0) {
        throw new InverseUnavailable(`Trip ${trip.id} still has ${collection}`, {
          tripId: trip.id,
          collection,
        });
      }
    }
    if (!this.store.delete('trips', trip.id)) {
      throw new InverseUnavailable(`Trip ${trip.id} no longer exists`, { tripId: trip.id });
    }
  }

  protected reapply(trip: Trip): Applied<Trip, Trip> {
    if (this.store.findTripByShareCode(trip.shareCode)) {
      throw new InverseUnavailable(`Share code ${trip.shareCode} is now used by another trip`, {
        shareCode: trip.shareCode,
      });
    }
    if (!this.store.restore('trips', trip)) {
      throw new InverseUnavailable(`Trip id ${trip.id} is no longer available`, { tripId: trip.id });
    }
    return { result: structuredClone(trip), inverse: trip };
  }

  private resolveShareCode(): string {
    const requested = this.payload.shareCode?.trim() ?? '';
    const isTaken = (code: string) => this.store.findTripByShareCode(code) !== undefined;
    if (requested === '') return generateFreeShareCode(isTaken);
    if (isTaken(requested)) {
      throw new ValidationFailure(`Share code ${requested} is already in use`, { shareCode: requested });
    }
    return requested;
  }
}
