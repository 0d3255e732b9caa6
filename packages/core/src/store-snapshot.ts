/**
 * @module store-snapshot
 * zod schema of the on-disk store document.
 */

import { z } from 'zod';
import type { StoreSnapshot } from '@trip-planner/types';

const id = z.number().int().positive();

const itemFields = {
  id,
  tripId: id,
  isDone: z.boolean(),
};

export const TripSchema = z.object({
  id,
  userId: z.number().int(),
  destination: z.string(),
  name: z.string(),
  startDate: z.string(),
  endDate: z.string(),
  isSuggestion: z.boolean(),
  budget: z.number().nonnegative(),
  shareCode: z.string(),
  collaborators: z.array(z.number().int()),
});

export const FlightSchema = z.object({
  ...itemFields,
  company: z.string(),
  code: z.string(),
  departure: z.string(),
  arrival: z.string(),
});

export const HotelSchema = z.object({
  ...itemFields,
  name: z.string(),
  checkin: z.string(),
  checkout: z.string(),
});

export const ActivitySchema = z.object({
  ...itemFields,
  description: z.string(),
  date: z.string(),
});

export const ExpenseSchema = z.object({
  ...itemFields,
  description: z.string(),
  amount: z.number().nonnegative(),
  currency: z.string(),
  date: z.string(),
  category: z.string(),
});

const sequence = z.number().int().nonnegative().default(0);

export const StoreSnapshotSchema = z.object({
  version: z.literal(1),
  sequences: z
    .object({
      trips: sequence,
      flights: sequence,
      hotels: sequence,
      activities: sequence,
      expenses: sequence,
    })
    .default({}),
  trips: z.array(TripSchema).default([]),
  flights: z.array(FlightSchema).default([]),
  hotels: z.array(HotelSchema).default([]),
  activities: z.array(ActivitySchema).default([]),
  expenses: z.array(ExpenseSchema).default([]),
});

/** Parse an untrusted document. Throws a `ZodError` when it does not match. */
export function parseStoreSnapshot(input: unknown): StoreSnapshot {
  return StoreSnapshotSchema.parse(input);
}
