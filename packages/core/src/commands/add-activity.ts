/**
 * @module commands/add-activity
 */

import type { Activity, AddActivityPayload, TripStore } from '@trip-planner/types';
import { removeItem, requireTrip, restoreItem } from './itinerary';
import type { Applied } from './store-command';
import { StoreCommand } from './store-command';
import { requireId, requireText } from './validation';

export class AddActivityCommand extends StoreCommand<'AddActivity', Activity, Activity> {
  constructor(store: TripStore, payload: AddActivityPayload) {
    super(
      store,
      'AddActivity',
      payload,
      `Add activity "${payload.description}" to trip ${payload.tripId}`,
    );
  }

  protected apply(): Applied<Activity, Activity> {
    const { tripId, description, date } = this.payload;
    requireId('tripId', tripId);
    requireText({ description, date });
    requireTrip(this.store, tripId);

    const activity = this.store.insert('activities', (id) => ({
      id,
      tripId,
      description,
      date,
      isDone: false,
    }));
    return { result: activity, inverse: { ...activity } };
  }

  protected revert(activity: Activity): void {
    removeItem(this.store, 'activities', activity.id);
  }

  protected reapply(activity: Activity): Applied<Activity, Activity> {
    return { result: restoreItem(this.store, 'activities', activity), inverse: activity };
  }
}
