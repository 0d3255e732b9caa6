/**
 * @module commands/add-collaborator
 * Grants a user access to a trip.
 */

import type { AddCollaboratorPayload, Trip, TripStore } from '@trip-planner/types';
import { InverseUnavailable, NotFound, ValidationFailure } from '../errors';
import { requireTrip } from './itinerary';
import type { Applied } from './store-command';
import { StoreCommand } from './store-command';
import { requireId } from './validation';

export interface CollaboratorInverse {
  added: true;
}

export class AddCollaboratorCommand extends StoreCommand<'AddCollaborator', Trip, CollaboratorInverse> {
  constructor(store: TripStore, payload: AddCollaboratorPayload) {
    super(store, 'AddCollaborator', payload, `Add user ${payload.userId} to trip ${payload.tripId}`);
  }

  protected apply(): Applied<Trip, CollaboratorInverse> {
    const { tripId, userId } = this.payload;
    requireId('tripId', tripId);
    requireId('userId', userId);

    const trip = requireTrip(this.store, tripId);
    if (trip.userId === userId) {
      throw new ValidationFailure(`User ${userId} is the owner of trip ${tripId}`, { tripId, userId });
    }
    if (trip.collaborators.includes(userId)) {
      throw new ValidationFailure(`User ${userId} is already a collaborator of trip ${tripId}`, {
        tripId,
        userId,
      });
    }

    const updated = this.store.addCollaborator(tripId, userId);
    if (!updated) throw new NotFound(`Trip ${tripId} not found`, { tripId });
    return { result: updated, inverse: { added: true } };
  }

  protected revert(): void {
    const { tripId, userId } = this.payload;
    const trip = this.store.findById('trips', tripId);
    if (!trip) throw new InverseUnavailable(`Trip ${tripId} no longer exists`, { tripId });
    if (!trip.collaborators.includes(userId)) {
      throw new InverseUnavailable(`User ${userId} is no longer a collaborator of trip ${tripId}`, {
        tripId,
        userId,
      });
    }
    this.store.removeCollaborator(tripId, userId);
  }

  protected reapply(): Applied<Trip, CollaboratorInverse> {
    return this.apply();
  }
}
