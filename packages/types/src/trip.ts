/**
 * @module trip
 * Trip and itinerary entity types stored by the trip store.
 */

/** A planned trip owned by one user and optionally shared with collaborators. */
export interface Trip {
  /** Numeric id, unique within the `trips` collection. */
  id: number;
  /** Id of the owning user. */
  userId: number;
  destination: string;
  name: string;
  /** ISO date (YYYY-MM-DD). */
  startDate: string;
  /** ISO date (YYYY-MM-DD), never before `startDate`. */
  endDate: string;
  /** True for curated suggestion trips not owned by a real user. */
  isSuggestion: boolean;
  budget: number;
  /** Six-character code used to join the trip. Unique across trips. */
  shareCode: string;
  /** User ids with edit access, excluding the owner. */
  collaborators: number[];
}

/** Fields shared by every itinerary item. */
export interface ItineraryItem {
  id: number;
  /** Trip the item belongs to. */
  tripId: number;
  /** Checklist flag toggled by the traveller. */
  isDone: boolean;
}

export interface Flight extends ItineraryItem {
  company: string;
  code: string;
  /** ISO date-time of departure. */
  departure: string;
  /** ISO date-time of arrival. */
  arrival: string;
}

export interface Hotel extends ItineraryItem {
  name: string;
  /** ISO date. */
  checkin: string;
  /** ISO date, never before `checkin`. */
  checkout: string;
}

export interface Activity extends ItineraryItem {
  description: string;
  /** ISO date. */
  date: string;
}

export interface Expense extends ItineraryItem {
  description: string;
  amount: number;
  /** ISO 4217 code, e.g. "EUR". */
  currency: string;
  /** ISO date. */
  date: string;
  category: string;
}

/** Entity type stored in each collection. */
export interface EntityMap {
  trips: Trip;
  flights: Flight;
  hotels: Hotel;
  activities: Activity;
  expenses: Expense;
}

/** Name of a store collection. */
export type CollectionName = keyof EntityMap;

/** Collections that hold itinerary items. */
export type ItemCollection = Exclude<CollectionName, 'trips'>;

/** Any itinerary item. */
export type AnyItineraryItem = EntityMap[ItemCollection];

/** Singular item kind as used in payloads ("flight", "expense", ...). */
export type ItemKind = 'flight' | 'hotel' | 'activity' | 'expense';
