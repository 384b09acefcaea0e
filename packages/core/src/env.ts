import { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Environment Variable Validation
 * Parses runtime configuration once at boot and fails fast on bad values
 */

const BooleanFlagSchema = z
  .enum(['true', 'false'])
  .optional()
  .default('false')
  .transform((v) => v === 'true');

// Validated at boot; the logger reads LOG_LEVEL from the environment itself
const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

// Storage config
const DatabaseEnvSchema = z.object({
  /** Unset means in-memory adapters unless the engine is given a pool */
  DATABASE_URL: z.string().url().optional(),
  STORAGE_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  STORAGE_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(50),
  JOURNAL_PAGE_SIZE: z.coerce.number().int().positive().default(500),
});

// Snapshot policy
const SnapshotEnvSchema = z.object({
  /** Snapshot once this many events accumulated since the last snapshot */
  SNAPSHOT_EVERY_EVENTS: z.coerce.number().int().positive().default(1000),
  /** Snapshot once the last snapshot is this old (10 minutes) */
  SNAPSHOT_MAX_AGE_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  /** Prune superseded snapshots older than this (30 days) */
  SNAPSHOT_RETENTION_MS: z.coerce.number().int().positive().default(30 * 24 * 60 * 60 * 1000),
});

// Optimistic concurrency
const ConcurrencyEnvSchema = z.object({
  APPEND_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
});

// Redrive scheduling; manual by default
const RedriveEnvSchema = z.object({
  REDRIVE_AUTO_ENABLED: BooleanFlagSchema,
  REDRIVE_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),
  REDRIVE_BASE_DELAY_MS: z.coerce.number().int().positive().default(60 * 1000),
  REDRIVE_MAX_DELAY_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  REDRIVE_MAX_AUTO_ATTEMPTS: z.coerce.number().int().nonnegative().default(5),
});

export const AppEnvSchema = ServerEnvSchema.merge(DatabaseEnvSchema)
  .merge(SnapshotEnvSchema)
  .merge(ConcurrencyEnvSchema)
  .merge(RedriveEnvSchema);

export type AppEnv = z.infer<typeof AppEnvSchema>;

/**
 * Typed configuration consumed by the engine factory
 */
export interface StreamVaultConfig {
  databaseUrl: string | undefined;
  storage: {
    maxRetries: number;
    baseDelayMs: number;
    pageSize: number;
  };
  snapshot: {
    everyEvents: number;
    maxAgeMs: number;
    retentionMs: number;
  };
  concurrency: {
    maxRetries: number;
  };
  redrive: {
    autoEnabled: boolean;
    intervalMs: number;
    baseDelayMs: number;
    maxDelayMs: number;
    maxAutoAttempts: number;
  };
}

/**
 * Validate environment variables
 * @throws ValidationError naming every invalid key
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = AppEnvSchema.safeParse(env);

  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.'));
    throw new ValidationError(
      `Invalid environment configuration: ${keys.join(', ')}`,
      result.error.flatten().fieldErrors
    );
  }

  return result.data;
}

/**
 * Load and shape configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StreamVaultConfig {
  const parsed = validateEnv(env);

  return {
    databaseUrl: parsed.DATABASE_URL,
    storage: {
      maxRetries: parsed.STORAGE_MAX_RETRIES,
      baseDelayMs: parsed.STORAGE_RETRY_BASE_DELAY_MS,
      pageSize: parsed.JOURNAL_PAGE_SIZE,
    },
    snapshot: {
      everyEvents: parsed.SNAPSHOT_EVERY_EVENTS,
      maxAgeMs: parsed.SNAPSHOT_MAX_AGE_MS,
      retentionMs: parsed.SNAPSHOT_RETENTION_MS,
    },
    concurrency: {
      maxRetries: parsed.APPEND_MAX_RETRIES,
    },
    redrive: {
      autoEnabled: parsed.REDRIVE_AUTO_ENABLED,
      intervalMs: parsed.REDRIVE_INTERVAL_MS,
      baseDelayMs: parsed.REDRIVE_BASE_DELAY_MS,
      maxDelayMs: parsed.REDRIVE_MAX_DELAY_MS,
      maxAutoAttempts: parsed.REDRIVE_MAX_AUTO_ATTEMPTS,
    },
  };
}
