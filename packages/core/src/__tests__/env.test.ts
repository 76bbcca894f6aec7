import { afterEach, describe, expect, it, vi } from 'vitest'
import { ledgerEnvSchema, loadEnvVariables } from '../env'

describe('ledger environment', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('applies defaults', () => {
    expect(ledgerEnvSchema.parse({})).toEqual({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      STORAGE_STAT_MODE: 'exact',
    })
  })

  it('rejects unknown footprint modes', () => {
    expect(ledgerEnvSchema.safeParse({ STORAGE_STAT_MODE: 'lazy' }).success).toBe(
      false,
    )
  })

  it('reads values from process.env', () => {
    vi.stubEnv('STORAGE_STAT_MODE', 'fast')
    vi.stubEnv('LOG_LEVEL', 'warn')
    const env = loadEnvVariables(ledgerEnvSchema)
    expect(env.STORAGE_STAT_MODE).toBe('fast')
    expect(env.LOG_LEVEL).toBe('warn')
  })
})
