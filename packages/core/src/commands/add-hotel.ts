/**
 * @module commands/add-hotel
 * Adds a hotel stay to an existing trip. Check-in may not be after check-out.
 */

import type { AddHotelPayload, Hotel, TripStore } from '@trip-planner/types';
import { removeItem, requireTrip, restoreItem } from './itinerary';
import type { Applied } from './store-command';
import { StoreCommand } from './store-command';
import { requireId, requireOrdered, requireText } from './validation';

export class AddHotelCommand extends StoreCommand<'AddHotel', Hotel, Hotel> {
  constructor(store: TripStore, payload: AddHotelPayload) {
    super(store, 'AddHotel', payload, `Add hotel "${payload.name}" to trip ${payload.tripId}`);
  }

  protected apply(): Applied<Hotel, Hotel> {
    const { tripId, name, checkin, checkout } = this.payload;
    requireId('tripId', tripId);
    requireText({ name, checkin, checkout });
    requireOrdered('checkin', checkin, 'checkout', checkout);
    requireTrip(this.store, tripId);

    const hotel = this.store.insert('hotels', (id) => ({
      id,
      tripId,
      name,
      checkin,
      checkout,
      isDone: false,
    }));
    return { result: hotel, inverse: { ...hotel } };
  }

  protected revert(hotel: Hotel): void {
    removeItem(this.store, 'hotels', hotel.id);
  }

  protected reapply(hotel: Hotel): Applied<Hotel, Hotel> {
    return { result: restoreItem(this.store, 'hotels', hotel), inverse: hotel };
  }
}
