import { config as loadEnv } from 'dotenv'

import { configSchema, type ForklineConfig } from './schema.js'

/** Reads a numeric env value; unset or blank falls back to the default. */
function parseNumber(input: string | undefined, fallback: number): number {
  if (input === undefined || input.trim() === '') return fallback
  return Number(input)
}

/**
 * Loads runtime configuration from environment and validates shape/types.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ForklineConfig {
  loadEnv()

  return configSchema.parse({
    dataDir: env.FORKLINE_DATA_DIR ?? `${process.cwd()}/data/conversations`,
    providersPath: env.FORKLINE_PROVIDERS_PATH || undefined,
    maxToolIterations: parseNumber(env.FORKLINE_MAX_TOOL_ITERATIONS, 25),
    openRetry: {
      attempts: parseNumber(env.FORKLINE_OPEN_RETRY_ATTEMPTS, 2),
      backoffMs: parseNumber(env.FORKLINE_OPEN_RETRY_BACKOFF_MS, 500)
    },
    gateway: {
      enabled: env.FORKLINE_GATEWAY_ENABLED === 'true',
      host: env.FORKLINE_GATEWAY_HOST ?? '127.0.0.1',
      port: parseNumber(env.FORKLINE_GATEWAY_PORT, 8787)
    },
    logMuted: env.FORKLINE_LOG_MUTED === 'true'
  })
}
