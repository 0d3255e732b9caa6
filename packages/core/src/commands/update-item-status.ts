/**
 * @module commands/update-item-status
 * Ticks or unticks an itinerary item.
 */

import type { AnyItineraryItem, TripStore, UpdateItemStatusPayload } from '@trip-planner/types';
import { ITEM_COLLECTIONS } from '../collections';
import { InverseUnavailable, NotFound, ValidationFailure } from '../errors';
import type { Applied } from './store-command';
import { StoreCommand } from './store-command';
import { requireId } from './validation';

export interface ItemStatusInverse {
  previousIsDone: boolean;
}

export class UpdateItemStatusCommand extends StoreCommand<
  'UpdateItemStatus',
  AnyItineraryItem,
  ItemStatusInverse
> {
  constructor(store: TripStore, payload: UpdateItemStatusPayload) {
    super(
      store,
      'UpdateItemStatus',
      payload,
      `Mark ${payload.itemKind} ${payload.itemId} as ${payload.isDone ? 'done' : 'not done'}`,
    );
  }

  protected apply(): Applied<AnyItineraryItem, ItemStatusInverse> {
    const { itemKind, itemId, isDone } = this.payload;
    if (!Object.hasOwn(ITEM_COLLECTIONS, itemKind)) {
      throw new ValidationFailure(`Unknown item kind ${String(itemKind)}`, { itemKind });
    }
    requireId('itemId', itemId);

    const collection = ITEM_COLLECTIONS[itemKind];
    const item = this.store.findById(collection, itemId);
    if (!item) throw new NotFound(`${itemKind} ${itemId} not found`, { itemKind, itemId });

    const updated = this.store.update(collection, itemId, (current) => ({ ...current, isDone }));
    if (!updated) throw new NotFound(`${itemKind} ${itemId} not found`, { itemKind, itemId });
    return { result: updated, inverse: { previousIsDone: item.isDone } };
  }

  protected revert({ previousIsDone }: ItemStatusInverse): void {
    const { itemKind, itemId, isDone } = this.payload;
    const collection = ITEM_COLLECTIONS[itemKind];
    const item = this.store.findById(collection, itemId);
    if (!item) throw new InverseUnavailable(`${itemKind} ${itemId} no longer exists`, { itemKind, itemId });
    if (item.isDone !== isDone) {
      throw new InverseUnavailable(`${itemKind} ${itemId} status changed after this update`, {
        itemKind,
        itemId,
      });
    }
    this.store.update(collection, itemId, (current) => ({ ...current, isDone: previousIsDone }));
  }

  protected reapply(): Applied<AnyItineraryItem, ItemStatusInverse> {
    return this.apply();
  }
}
