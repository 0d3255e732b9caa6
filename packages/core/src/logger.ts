/**
 * @module logger
 * pino logger factory shared by the engine and the MCP server.
 */

import pino from 'pino';
import type { EngineConfig } from './config';

export type Logger = pino.Logger;

export interface CreateLoggerOptions {
  /** Write to stderr instead of stdout (stdio protocols own stdout). */
  stderr?: boolean;
}

export function createLogger(
  config: Pick<EngineConfig, 'logLevel' | 'prettyLogs'>,
  options: CreateLoggerOptions = {},
): Logger {
  const fd = options.stderr ? 2 : 1;
  if (config.prettyLogs) {
    return pino({
      name: 'trip-planner',
      level: config.logLevel,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: fd } },
    });
  }
  return pino({ name: 'trip-planner', level: config.logLevel }, pino.destination(fd));
}

/** Logger used when the caller injects none. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
