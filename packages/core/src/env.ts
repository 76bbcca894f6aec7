import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'silent'])
    .default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

/**
 * Ledger settings on top of the base schema.
 *
 * STORAGE_STAT_MODE selects how accounts refresh their storage statistics
 * after a mutation: `exact` deduplicates shared cells by hash, `fast` uses
 * tree-wide counts and may overcount cells shared between code, data and
 * libraries.
 */
export const ledgerEnvSchema = baseEnvSchema.extend({
  STORAGE_STAT_MODE: z.enum(['exact', 'fast']).default('exact'),
})

export type LedgerEnv = z.infer<typeof ledgerEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @returns Validated environment variables
 */
export function loadEnvVariables<T extends z.ZodType>(
  schema: T,
  envPath?: string,
): z.infer<T> {
  // Load environment variables from .env file
  dotenvConfig({ path: envPath })

  // Validate and parse environment variables
  return schema.parse(process.env)
}

/**
 * Load ledger environment variables
 * @param envPath - Optional path to .env file
 * @returns Validated ledger environment variables
 */
export function loadLedgerEnv(envPath?: string): LedgerEnv {
  return loadEnvVariables(ledgerEnvSchema, envPath)
}

let cachedEnv: LedgerEnv | undefined

/**
 * Ledger environment, parsed once per process.
 */
export function getLedgerEnv(): LedgerEnv {
  if (!cachedEnv) {
    cachedEnv = loadLedgerEnv()
  }
  return cachedEnv
}
