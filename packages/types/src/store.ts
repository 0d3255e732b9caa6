/**
 * @module store
 * Receiver contract consumed by trip commands.
 *
 * Every mutating method is atomic: it either applies completely or leaves the
 * store unchanged (and throws when the failure comes from the store itself).
 * Returned entities are copies; mutating them does not touch the store.
 */

import type { CollectionName, EntityMap, Trip } from './trip';

/** Predicate used by {@link TripStore.list}. */
export type EntityFilter<C extends CollectionName> = (entity: EntityMap[C]) => boolean;

/** Serialized form of a whole store. */
export interface StoreSnapshot {
  version: 1;
  /** Highest id ever allocated per collection. */
  sequences: Record<CollectionName, number>;
  trips: Trip[];
  flights: EntityMap['flights'][];
  hotels: EntityMap['hotels'][];
  activities: EntityMap['activities'][];
  expenses: EntityMap['expenses'][];
}

/** The mutable store that commands operate against. */
export interface TripStore {
  /**
   * Id the next insert into `collection` will receive.
   * Ids only grow; a deleted id is never handed out again.
   */
  nextId(collection: CollectionName): number;

  /** Allocate an id, build the entity with it, and store it. */
  insert<C extends CollectionName>(collection: C, build: (id: number) => EntityMap[C]): EntityMap[C];

  /**
   * Put back an entity under an id this store allocated earlier.
   * Returns false when the id is occupied or was never allocated.
   */
  restore<C extends CollectionName>(collection: C, entity: EntityMap[C]): boolean;

  findById<C extends CollectionName>(collection: C, id: number): EntityMap[C] | undefined;

  list<C extends CollectionName>(collection: C, filter?: EntityFilter<C>): EntityMap[C][];

  /** Replace an entity with the mutator's output. The id cannot change. */
  update<C extends CollectionName>(
    collection: C,
    id: number,
    mutator: (current: EntityMap[C]) => EntityMap[C],
  ): EntityMap[C] | undefined;

  delete(collection: CollectionName, id: number): boolean;

  findTripByShareCode(code: string): Trip | undefined;

  updateBudget(tripId: number, budget: number): Trip | undefined;

  /** Adds `userId` unless it is the owner or already present. */
  addCollaborator(tripId: number, userId: number): Trip | undefined;

  removeCollaborator(tripId: number, userId: number): Trip | undefined;

  snapshot(): StoreSnapshot;
}
