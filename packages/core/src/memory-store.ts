/**
 * @module memory-store
 * In-memory implementation of the {@link TripStore} receiver contract.
 *
 * Each mutation runs inside {@link InMemoryTripStore.transact}: the
 * collections are snapshotted first and restored if the mutation or the
 * persistence hook throws.
 */

import type {
  CollectionName,
  EntityFilter,
  EntityMap,
  StoreSnapshot,
  Trip,
  TripStore,
} from '@trip-planner/types';
import { COLLECTIONS } from './collections';
import { StoreFailure, TripEngineError, errorMessage } from './errors';

type Collections = { [C in CollectionName]: Map<number, EntityMap[C]> };
type Sequences = Record<CollectionName, number>;

function emptyCollections(): Collections {
  return {
    trips: new Map(),
    flights: new Map(),
    hotels: new Map(),
    activities: new Map(),
    expenses: new Map(),
  };
}

function emptySequences(): Sequences {
  return { trips: 0, flights: 0, hotels: 0, activities: 0, expenses: 0 };
}

/** A store snapshot with no entities. */
export function emptySnapshot(): StoreSnapshot {
  return {
    version: 1,
    sequences: emptySequences(),
    trips: [],
    flights: [],
    hotels: [],
    activities: [],
    expenses: [],
  };
}

function fill<C extends CollectionName>(
  collections: Collections,
  sequences: Sequences,
  name: C,
  entities: EntityMap[C][],
): void {
  const map = collections[name];
  for (const entity of entities) {
    map.set(entity.id, structuredClone(entity));
    // Never hand out an id that is already in use.
    sequences[name] = Math.max(sequences[name], entity.id);
  }
}

export class InMemoryTripStore implements TripStore {
  private collections: Collections = emptyCollections();
  private sequences: Sequences = emptySequences();

  /**
   * @param snapshot - Initial contents, e.g. loaded from disk.
   */
  constructor(snapshot?: StoreSnapshot) {
    if (snapshot) this.load(snapshot);
  }

  /** Replace the whole store with `snapshot`. Does not persist. */
  protected load(snapshot: StoreSnapshot): void {
    const collections = emptyCollections();
    const sequences: Sequences = { ...snapshot.sequences };
    for (const name of COLLECTIONS) {
      fill(collections, sequences, name, snapshot[name]);
    }
    this.collections = collections;
    this.sequences = sequences;
  }

  nextId(collection: CollectionName): number {
    return this.sequences[collection] + 1;
  }

  insert<C extends CollectionName>(collection: C, build: (id: number) => EntityMap[C]): EntityMap[C] {
    return this.transact(() => {
      const id = this.sequences[collection] + 1;
      const entity = build(id);
      if (entity.id !== id) {
        throw new StoreFailure(`Built ${collection} entity has id ${entity.id}, expected ${id}`);
      }
      this.sequences[collection] = id;
      this.collections[collection].set(id, structuredClone(entity));
      return structuredClone(entity);
    });
  }

  restore<C extends CollectionName>(collection: C, entity: EntityMap[C]): boolean {
    const { id } = entity;
    if (!Number.isInteger(id) || id < 1 || id > this.sequences[collection]) return false;
    if (this.collections[collection].has(id)) return false;
    this.transact(() => {
      this.collections[collection].set(id, structuredClone(entity));
    });
    return true;
  }

  findById<C extends CollectionName>(collection: C, id: number): EntityMap[C] | undefined {
    const entity = this.collections[collection].get(id);
    return entity === undefined ? undefined : structuredClone(entity);
  }

  list<C extends CollectionName>(collection: C, filter?: EntityFilter<C>): EntityMap[C][] {
    const entities = [...this.collections[collection].values()].map((entity) => structuredClone(entity));
    return filter ? entities.filter(filter) : entities;
  }

  update<C extends CollectionName>(
    collection: C,
    id: number,
    mutator: (current: EntityMap[C]) => EntityMap[C],
  ): EntityMap[C] | undefined {
    const current = this.collections[collection].get(id);
    if (current === undefined) return undefined;
    return this.transact(() => {
      const next = mutator(structuredClone(current));
      if (next.id !== id) {
        throw new StoreFailure(`Update of ${collection} ${id} tried to change its id to ${next.id}`);
      }
      this.collections[collection].set(id, structuredClone(next));
      return structuredClone(next);
    });
  }

  delete(collection: CollectionName, id: number): boolean {
    if (!this.collections[collection].has(id)) return false;
    this.transact(() => {
      this.collections[collection].delete(id);
    });
    return true;
  }

  findTripByShareCode(code: string): Trip | undefined {
    for (const trip of this.collections.trips.values()) {
      if (trip.shareCode === code) return structuredClone(trip);
    }
    return undefined;
  }

  updateBudget(tripId: number, budget: number): Trip | undefined {
    return this.update('trips', tripId, (trip) => ({ ...trip, budget }));
  }

  addCollaborator(tripId: number, userId: number): Trip | undefined {
    return this.update('trips', tripId, (trip) => {
      if (trip.userId === userId || trip.collaborators.includes(userId)) return trip;
      return { ...trip, collaborators: [...trip.collaborators, userId] };
    });
  }

  removeCollaborator(tripId: number, userId: number): Trip | undefined {
    return this.update('trips', tripId, (trip) => ({
      ...trip,
      collaborators: trip.collaborators.filter((id) => id !== userId),
    }));
  }

  snapshot(): StoreSnapshot {
    const snapshot: StoreSnapshot = {
      version: 1,
      sequences: { ...this.sequences },
      trips: [...this.collections.trips.values()],
      flights: [...this.collections.flights.values()],
      hotels: [...this.collections.hotels.values()],
      activities: [...this.collections.activities.values()],
      expenses: [...this.collections.expenses.values()],
    };
    return structuredClone(snapshot);
  }

  /**
   * Run one mutation atomically. On any throw the collections and id
   * sequences are put back as they were before the call.
   */
  protected transact<T>(mutation: () => T): T {
    const collections = structuredClone(this.collections);
    const sequences = { ...this.sequences };
    try {
      const result = mutation();
      this.persist();
      return result;
    } catch (error) {
      this.collections = collections;
      this.sequences = sequences;
      if (error instanceof TripEngineError) throw error;
      throw new StoreFailure(`Store mutation failed: ${errorMessage(error)}`, undefined, { cause: error });
    }
  }

  /** Hook run after every mutation, before the transaction commits. */
  protected persist(): void {}
}
