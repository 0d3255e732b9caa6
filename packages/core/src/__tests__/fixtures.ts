import type { Trip } from '@trip-planner/types';
import { InMemoryTripStore, emptySnapshot } from '../memory-store';

/** Trip 7, owned by user 3, budget 0. */
export function tripFixture(overrides: Partial<Trip> = {}): Trip {
  return {
    id: 7,
    userId: 3,
    destination: 'Lisbon',
    name: 'Spring break',
    startDate: '2026-04-01',
    endDate: '2026-04-08',
    isSuggestion: false,
    budget: 0,
    shareCode: 'ABC123',
    collaborators: [],
    ...overrides,
  };
}

/** In-memory store seeded with `trips`; id sequences start after the highest id. */
export function storeWith(...trips: Trip[]): InMemoryTripStore {
  return new InMemoryTripStore({ ...emptySnapshot(), trips });
}
