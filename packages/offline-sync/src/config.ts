/**
 * @file Sync Configuration
 *
 * Defaults, validation and environment loading for the sync client.
 *
 * @module @study-helper/offline-sync/config
 */

import { z } from 'zod'
import { ConfigError } from './errors.js'

// =============================================================================
// Schema
// =============================================================================

/**
 * Retry ceiling used when none is configured.
 */
export const DEFAULT_MAX_RETRIES = 3

/**
 * Storage key the queue is persisted under when none is configured.
 */
export const DEFAULT_STORAGE_KEY = 'offline_queue'

export const syncConfigSchema = z.object({
  /** Base URL of the study-helper API, e.g. `http://localhost:8000` */
  baseUrl: z.string().url().optional(),
  /** Bearer token sent with every dispatch */
  authToken: z.string().min(1).optional(),
  storageKey: z.string().min(1).default(DEFAULT_STORAGE_KEY),
  /** Failed dispatches allowed before a record is dropped */
  maxRetries: z.number().int().positive().default(DEFAULT_MAX_RETRIES),
  /** Timeout for a single dispatch, in ms */
  dispatchTimeoutMs: z.number().int().positive().default(10_000),
  /** Interval between reachability probes, in ms */
  probeIntervalMs: z.number().int().positive().default(15_000),
  /** Path probed for reachability */
  healthPath: z.string().startsWith('/').default('/health'),
  debug: z.boolean().default(false),
})

/**
 * Configuration as accepted from callers (defaults optional).
 */
export type SyncConfigInput = z.input<typeof syncConfigSchema>

/**
 * Configuration with defaults applied.
 */
export type SyncConfig = z.output<typeof syncConfigSchema>

// =============================================================================
// Resolution
// =============================================================================

/**
 * Validate caller configuration and fill in defaults.
 *
 * @throws {ConfigError} listing every invalid field
 *
 * @example
 * ```typescript
 * const config = resolveSyncConfig({ baseUrl: 'http://localhost:8000' })
 * config.maxRetries // 3
 * ```
 */
export function resolveSyncConfig(input: SyncConfigInput = {}): SyncConfig {
  const result = syncConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    )
  }
  return result.data
}

/**
 * Build configuration from `SYNC_*` environment variables.
 *
 * | Variable | Field |
 * |---|---|
 * | SYNC_BASE_URL | baseUrl |
 * | SYNC_AUTH_TOKEN | authToken |
 * | SYNC_STORAGE_KEY | storageKey |
 * | SYNC_MAX_RETRIES | maxRetries |
 * | SYNC_DISPATCH_TIMEOUT_MS | dispatchTimeoutMs |
 * | SYNC_PROBE_INTERVAL_MS | probeIntervalMs |
 * | SYNC_HEALTH_PATH | healthPath |
 * | SYNC_DEBUG | debug (`true` or `1`) |
 *
 * Explicit overrides win over the environment.
 */
export function loadSyncConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: SyncConfigInput = {}
): SyncConfig {
  const fromEnv: SyncConfigInput = {
    baseUrl: env.SYNC_BASE_URL,
    authToken: env.SYNC_AUTH_TOKEN,
    storageKey: env.SYNC_STORAGE_KEY,
    maxRetries: parseInteger(env.SYNC_MAX_RETRIES),
    dispatchTimeoutMs: parseInteger(env.SYNC_DISPATCH_TIMEOUT_MS),
    probeIntervalMs: parseInteger(env.SYNC_PROBE_INTERVAL_MS),
    healthPath: env.SYNC_HEALTH_PATH,
    debug: parseBoolean(env.SYNC_DEBUG),
  }

  return resolveSyncConfig({ ...fromEnv, ...overrides })
}

// =============================================================================
// Helpers
// =============================================================================

function parseInteger(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined
  }
  // NaN is left for the schema to reject
  return Number(value)
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined
  }
  return value === 'true' || value === '1'
}
