/**
 * @module commands/add-flight
 * Adds a flight to an existing trip.
 */

import type { AddFlightPayload, Flight, TripStore } from '@trip-planner/types';
import { removeItem, requireTrip, restoreItem } from './itinerary';
import type { Applied } from './store-command';
import { StoreCommand } from './store-command';
import { requireId, requireText } from './validation';

export class AddFlightCommand extends StoreCommand<'AddFlight', Flight, Flight> {
  constructor(store: TripStore, payload: AddFlightPayload) {
    super(store, 'AddFlight', payload, `Add flight ${payload.code} to trip ${payload.tripId}`);
  }

  protected apply(): Applied<Flight, Flight> {
    const { tripId, company, code, departure, arrival } = this.payload;
    requireId('tripId', tripId);
    requireText({ company, code, departure, arrival });
    requireTrip(this.store, tripId);

    const flight = this.store.insert('flights', (id) => ({
      id,
      tripId,
      company,
      code,
      departure,
      arrival,
      isDone: false,
    }));
    return { result: flight, inverse: { ...flight } };
  }

  protected revert(flight: Flight): void {
    removeItem(this.store, 'flights', flight.id);
  }

  protected reapply(flight: Flight): Applied<Flight, Flight> {
    return { result: restoreItem(this.store, 'flights', flight), inverse: flight };
  }
}
