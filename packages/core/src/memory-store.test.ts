import { describe, it, expect } from 'vitest';
import type { Trip } from '@trip-planner/types';
import { storeWith, tripFixture } from './__tests__/fixtures';
import { StoreFailure } from './errors';
import { InMemoryTripStore, emptySnapshot } from './memory-store';

function newTrip(id: number, shareCode = `CODE0${id}`): Trip {
  return tripFixture({ id, shareCode });
}

class FlakyStore extends InMemoryTripStore {
  failNextPersist = false;

  protected override persist(): void {
    if (this.failNextPersist) {
      this.failNextPersist = false;
      throw new Error('disk full');
    }
  }
}

describe('InMemoryTripStore', () => {
  describe('ids', () => {
    it('assigns ids from 1 and never reuses a deleted one', () => {
      const store = new InMemoryTripStore();
      const first = store.insert('trips', (id) => newTrip(id));
      expect(first.id).toBe(1);

      expect(store.delete('trips', 1)).toBe(true);
      const second = store.insert('trips', (id) => newTrip(id));
      expect(second.id).toBe(2);
    });

    it('nextId peeks without allocating', () => {
      const store = new InMemoryTripStore();
      expect(store.nextId('flights')).toBe(1);
      expect(store.nextId('flights')).toBe(1);
    });

    it('keeps a sequence per collection', () => {
      const store = storeWith(tripFixture());
      expect(store.nextId('trips')).toBe(8);
      expect(store.nextId('hotels')).toBe(1);
    });

    it('raises a loaded sequence that is behind the stored ids', () => {
      const store = new InMemoryTripStore({
        ...emptySnapshot(),
        sequences: { trips: 2, flights: 0, hotels: 0, activities: 0, expenses: 0 },
        trips: [tripFixture({ id: 5 })],
      });
      expect(store.nextId('trips')).toBe(6);
    });

    it('rejects an entity whose id differs from the allocated one', () => {
      const store = new InMemoryTripStore();
      expect(() => store.insert('trips', () => newTrip(42))).toThrow(StoreFailure);
      expect(store.nextId('trips')).toBe(1);
    });
  });

  describe('copies', () => {
    it('returns copies that do not alias stored entities', () => {
      const store = storeWith(tripFixture());
      const trip = store.findById('trips', 7);
      trip?.collaborators.push(99);

      expect(store.findById('trips', 7)?.collaborators).toEqual([]);
    });
  });

  describe('restore', () => {
    it('puts a deleted entity back under its original id', () => {
      const store = storeWith(tripFixture());
      const trip = tripFixture();
      store.delete('trips', 7);

      expect(store.restore('trips', trip)).toBe(true);
      expect(store.findById('trips', 7)).toEqual(trip);
    });

    it('refuses an occupied id', () => {
      const store = storeWith(tripFixture());
      expect(store.restore('trips', tripFixture())).toBe(false);
    });

    it('refuses an id that was never allocated', () => {
      const store = storeWith(tripFixture());
      expect(store.restore('trips', tripFixture({ id: 99 }))).toBe(false);
      expect(store.findById('trips', 99)).toBeUndefined();
    });
  });

  describe('update', () => {
    it('returns undefined for a missing entity', () => {
      const store = new InMemoryTripStore();
      expect(store.update('trips', 1, (trip) => trip)).toBeUndefined();
    });

    it('cannot change the id', () => {
      const store = storeWith(tripFixture());
      expect(() => store.update('trips', 7, (trip) => ({ ...trip, id: 8 }))).toThrow(StoreFailure);
      expect(store.findById('trips', 8)).toBeUndefined();
    });

    it('updates the budget', () => {
      const store = storeWith(tripFixture());
      expect(store.updateBudget(7, 250)?.budget).toBe(250);
      expect(store.findById('trips', 7)?.budget).toBe(250);
    });
  });

  describe('collaborators', () => {
    it('adds a user once and never the owner', () => {
      const store = storeWith(tripFixture());
      store.addCollaborator(7, 9);
      store.addCollaborator(7, 9);
      store.addCollaborator(7, 3);

      expect(store.findById('trips', 7)?.collaborators).toEqual([9]);
    });

    it('removes a collaborator', () => {
      const store = storeWith(tripFixture({ collaborators: [4, 9] }));
      expect(store.removeCollaborator(7, 9)?.collaborators).toEqual([4]);
    });
  });

  describe('queries', () => {
    it('finds a trip by share code', () => {
      const store = storeWith(tripFixture(), newTrip(8, 'ZZZ999'));
      expect(store.findTripByShareCode('ZZZ999')?.id).toBe(8);
      expect(store.findTripByShareCode('NOPE00')).toBeUndefined();
    });

    it('lists a collection with an optional filter', () => {
      const store = storeWith(tripFixture(), newTrip(8), newTrip(9));
      expect(store.list('trips').map((trip) => trip.id)).toEqual([7, 8, 9]);
      expect(store.list('trips', (trip) => trip.id > 7).map((trip) => trip.id)).toEqual([8, 9]);
    });
  });

  describe('atomicity', () => {
    it('rolls a mutation back when persisting fails', () => {
      const store = new FlakyStore({ ...emptySnapshot(), trips: [tripFixture()] });
      store.failNextPersist = true;

      expect(() => store.insert('trips', (id) => newTrip(id))).toThrow('Store mutation failed: disk full');
      expect(store.list('trips').map((trip) => trip.id)).toEqual([7]);
      expect(store.nextId('trips')).toBe(8);
    });

    it('wraps the cause in a StoreFailure', () => {
      const store = new FlakyStore({ ...emptySnapshot(), trips: [tripFixture()] });
      store.failNextPersist = true;

      let caught: unknown;
      try {
        store.updateBudget(7, 500);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(StoreFailure);
      expect(store.findById('trips', 7)?.budget).toBe(0);
    });
  });

  it('snapshot() round-trips through the constructor', () => {
    const store = storeWith(tripFixture());
    store.insert('flights', (id) => ({
      id,
      tripId: 7,
      company: 'Test Air',
      code: 'TA100',
      departure: '2026-04-01T08:00',
      arrival: '2026-04-01T10:00',
      isDone: false,
    }));
    store.delete('flights', 1);

    const reloaded = new InMemoryTripStore(store.snapshot());
    expect(reloaded.snapshot()).toEqual(store.snapshot());
    expect(reloaded.nextId('flights')).toBe(2);
  });
});
