/**
 * @module commands/itinerary
 * Store helpers shared by the item commands.
 */

import type { EntityMap, ItemCollection, Trip, TripStore } from '@trip-planner/types';
import { InverseUnavailable, NotFound } from '../errors';

export function requireTrip(store: TripStore, tripId: number): Trip {
  const trip = store.findById('trips', tripId);
  if (!trip) throw new NotFound(`Trip ${tripId} not found`, { tripId });
  return trip;
}

/** Undo of an item insert: delete it by id. */
export function removeItem(store: TripStore, collection: ItemCollection, itemId: number): void {
  if (!store.delete(collection, itemId)) {
    throw new InverseUnavailable(`${collection} entry ${itemId} no longer exists`, { collection, itemId });
  }
}

/** Redo of an item insert: put the captured item back under its original id. */
export function restoreItem<C extends ItemCollection>(
  store: TripStore,
  collection: C,
  item: EntityMap[C],
): EntityMap[C] {
  if (!store.findById('trips', item.tripId)) {
    throw new InverseUnavailable(`Trip ${item.tripId} no longer exists`, { tripId: item.tripId });
  }
  if (!store.restore(collection, item)) {
    throw new InverseUnavailable(`${collection} id ${item.id} is no longer available`, {
      collection,
      itemId: item.id,
    });
  }
  return { ...item };
}
