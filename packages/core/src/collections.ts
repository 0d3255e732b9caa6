/**
 * @module collections
 * Collection names and the item-kind to collection mapping.
 */

import type { CollectionName, ItemCollection, ItemKind } from '@trip-planner/types';

export const COLLECTIONS: readonly CollectionName[] = ['trips', 'flights', 'hotels', 'activities', 'expenses'];

export const ITEM_COLLECTIONS: Readonly<Record<ItemKind, ItemCollection>> = {
  flight: 'flights',
  hotel: 'hotels',
  activity: 'activities',
  expense: 'expenses',
};

export const ITEM_KINDS = ['flight', 'hotel', 'activity', 'expense'] as const satisfies readonly ItemKind[];
