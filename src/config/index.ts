/**
 * Engine configuration.
 *
 * Defaults are merged under explicit overrides; environment variables
 * (PDP_*) sit between the two and are validated before use.
 */

import { z } from 'zod';
import { SchemaInvalidError } from '../core/errors.js';
import type { LogLevelValue } from '../core/logging/logger.js';
import { LogLevel } from '../core/logging/logger.js';

export interface EngineConfig {
  /** Deletion attempts before a duty becomes FAILED */
  readonly maxAttempts: number;
  /** Upper bound on duties processed by one tick */
  readonly tickBatchSize: number;
  /** Interval of the periodic scheduler trigger */
  readonly tickIntervalMs: number;
  /** Base delay before a failed deletion is retried; doubles per attempt */
  readonly retryBackoffMs: number;
  readonly logLevel: LogLevelValue;
  readonly serviceName: string;
  /** Directory for durable policies, duties and the audit log; in-memory when unset */
  readonly dataDir?: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxAttempts: 3,
  tickBatchSize: 100,
  tickIntervalMs: 60 * 60 * 1000,
  retryBackoffMs: 60 * 1000,
  logLevel: LogLevel.INFO,
  serviceName: 'retention-pdp',
};

const logLevelSchema = z.enum([LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR]);

const envSchema = z.object({
  PDP_MAX_ATTEMPTS: z.coerce.number().int().min(1).optional(),
  PDP_TICK_BATCH_SIZE: z.coerce.number().int().min(1).optional(),
  PDP_TICK_INTERVAL_MS: z.coerce.number().int().min(1).optional(),
  PDP_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).optional(),
  PDP_LOG_LEVEL: logLevelSchema.optional(),
  PDP_SERVICE_NAME: z.string().min(1).optional(),
  PDP_DATA_DIR: z.string().min(1).optional(),
});

type EnvironmentSettings = z.infer<typeof envSchema>;

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Drop blank variables so `PDP_X=` behaves like an unset variable
 */
function presentVariables(env: Environment): Record<string, string> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('PDP_') && value !== undefined && value.trim() !== '') {
      present[key] = value.trim();
    }
  }
  return present;
}

function fromEnvironment(settings: EnvironmentSettings): Partial<EngineConfig> {
  return {
    ...(settings.PDP_MAX_ATTEMPTS !== undefined && { maxAttempts: settings.PDP_MAX_ATTEMPTS }),
    ...(settings.PDP_TICK_BATCH_SIZE !== undefined && { tickBatchSize: settings.PDP_TICK_BATCH_SIZE }),
    ...(settings.PDP_TICK_INTERVAL_MS !== undefined && { tickIntervalMs: settings.PDP_TICK_INTERVAL_MS }),
    ...(settings.PDP_RETRY_BACKOFF_MS !== undefined && { retryBackoffMs: settings.PDP_RETRY_BACKOFF_MS }),
    ...(settings.PDP_LOG_LEVEL !== undefined && { logLevel: settings.PDP_LOG_LEVEL }),
    ...(settings.PDP_SERVICE_NAME !== undefined && { serviceName: settings.PDP_SERVICE_NAME }),
    ...(settings.PDP_DATA_DIR !== undefined && { dataDir: settings.PDP_DATA_DIR }),
  };
}

/**
 * Resolve the engine configuration: defaults < environment < overrides
 */
export function loadConfig(
  env: Environment = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const parsed = envSchema.safeParse(presentVariables(env));
  if (!parsed.success) {
    throw new SchemaInvalidError(
      'configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    ...DEFAULT_ENGINE_CONFIG,
    ...fromEnvironment(parsed.data),
    ...overrides,
  };
}
