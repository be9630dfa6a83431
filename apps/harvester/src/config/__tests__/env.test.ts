import { describe, it, expect } from 'vitest'
import { ConfigError, loadHarvesterEnv } from '../env'

describe('loadHarvesterEnv', () => {
  it('applies defaults', () => {
    expect(loadHarvesterEnv({ DATABASE_URL: 'postgres://localhost/dealcheck' })).toEqual({
      DATABASE_URL: 'postgres://localhost/dealcheck',
      SCORING_VERSION: 'v1',
      SOURCES_CONFIG: 'config/sources.json',
      SOURCE_TIMEOUT_MS: 30_000,
    })
  })

  it('coerces numbers and treats empty strings as unset', () => {
    const env = loadHarvesterEnv({
      DATABASE_URL: 'postgres://localhost/dealcheck',
      SOURCE_TIMEOUT_MS: '5000',
      SLACK_PIPELINE_ALERTS_WEBHOOK_URL: '',
    })

    expect(env.SOURCE_TIMEOUT_MS).toBe(5000)
    expect(env.SLACK_PIPELINE_ALERTS_WEBHOOK_URL).toBeUndefined()
  })

  it('fails with the offending keys', () => {
    expect(() => loadHarvesterEnv({ SOURCE_TIMEOUT_MS: '-1' })).toThrow(ConfigError)
    expect(() => loadHarvesterEnv({ SOURCE_TIMEOUT_MS: '-1' })).toThrow(
      'Invalid harvester configuration: DATABASE_URL: Required; SOURCE_TIMEOUT_MS: Number must be greater than 0'
    )
  })
})
