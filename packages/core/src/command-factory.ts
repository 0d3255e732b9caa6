/**
 * @module command-factory
 * Builds commands by kind, bound to one store.
 */

import type {
  CommandKind,
  CommandPayloadMap,
  CommandResultMap,
  TripCommand,
  TripStore,
} from '@trip-planner/types';
import {
  AddActivityCommand,
  AddCollaboratorCommand,
  AddExpenseCommand,
  AddFlightCommand,
  AddHotelCommand,
  CreateTripCommand,
  UpdateBudgetCommand,
  UpdateItemStatusCommand,
} from './commands';

type Builders = {
  [K in CommandKind]: (store: TripStore, payload: CommandPayloadMap[K]) => TripCommand<K, CommandResultMap[K]>;
};

const BUILDERS: Builders = {
  CreateTrip: (store, payload) => new CreateTripCommand(store, payload),
  UpdateBudget: (store, payload) => new UpdateBudgetCommand(store, payload),
  AddCollaborator: (store, payload) => new AddCollaboratorCommand(store, payload),
  AddFlight: (store, payload) => new AddFlightCommand(store, payload),
  AddHotel: (store, payload) => new AddHotelCommand(store, payload),
  AddActivity: (store, payload) => new AddActivityCommand(store, payload),
  AddExpense: (store, payload) => new AddExpenseCommand(store, payload),
  UpdateItemStatus: (store, payload) => new UpdateItemStatusCommand(store, payload),
};

export class CommandFactory {
  constructor(private readonly store: TripStore) {}

  /** A new pending command of `kind`. */
  create<K extends CommandKind>(kind: K, payload: CommandPayloadMap[K]): TripCommand<K, CommandResultMap[K]> {
    const build: Builders[K] = BUILDERS[kind];
    return build(this.store, payload);
  }
}
