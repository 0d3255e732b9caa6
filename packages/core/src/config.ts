/**
 * @module config
 * Engine configuration: zod schema, defaults, and environment loading.
 *
 * Precedence: explicit overrides > environment variables > defaults.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

const booleanFlag = z.union([
  z.boolean(),
  z.enum(['true', 'false', '1', '0']).transform((value) => value === 'true' || value === '1'),
]);

export const EngineConfigSchema = z.object({
  maxHistorySize: z.coerce.number().int().min(1).default(100),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  prettyLogs: booleanFlag.default(false),
  storeFile: z.string().min(1).default('trips.json'),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/** Environment variable read for each config key. */
export const ENV_KEYS = {
  maxHistorySize: 'TRIP_PLANNER_MAX_HISTORY',
  logLevel: 'TRIP_PLANNER_LOG_LEVEL',
  prettyLogs: 'TRIP_PLANNER_PRETTY_LOGS',
  storeFile: 'TRIP_PLANNER_STORE_FILE',
} as const satisfies Record<keyof EngineConfig, string>;

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
  overrides?: Partial<EngineConfig>;
}

export function loadConfig(options: LoadConfigOptions = {}): EngineConfig {
  const { env = process.env, overrides = {} } = options;

  const raw: Record<string, unknown> = {};
  for (const [key, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== '') raw[key] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const parsed = EngineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}
