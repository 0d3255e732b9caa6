/**
 * @module session
 * Wires one store, event bus, invoker and command factory together.
 * Callers hold the returned session; nothing here is global.
 */

import type { EventBus, TripStore } from '@trip-planner/types';
import { AuditTrail } from './audit-trail';
import { CommandFactory } from './command-factory';
import type { EngineConfig } from './config';
import { EventBusImpl } from './event-bus';
import { CommandInvoker } from './invoker';
import { JsonFileTripStore } from './json-file-store';
import type { Logger } from './logger';
import { createLogger } from './logger';

export interface TripSession {
  readonly config: EngineConfig;
  readonly store: TripStore;
  readonly events: EventBus;
  readonly invoker: CommandInvoker;
  readonly commands: CommandFactory;
  readonly logger: Logger;
  /** Log of every history transition in this session. */
  readonly audit: AuditTrail;
}

export interface CreateTripSessionOptions {
  config: EngineConfig;
  /** Defaults to a {@link JsonFileTripStore} at `config.storeFile`. */
  store?: TripStore;
  logger?: Logger;
  events?: EventBus;
}

export function createTripSession(options: CreateTripSessionOptions): TripSession {
  const { config } = options;
  const logger = options.logger ?? createLogger(config);
  const events =
    options.events ??
    new EventBusImpl((event, error) => logger.error({ event, err: error }, 'event listener failed'));
  const store = options.store ?? JsonFileTripStore.open(config.storeFile, logger);
  const audit = new AuditTrail(events, logger.child({ component: 'audit' }));
  const invoker = new CommandInvoker({ maxSize: config.maxHistorySize, logger, events });

  return { config, store, events, invoker, commands: new CommandFactory(store), logger, audit };
}
