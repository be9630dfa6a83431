import { describe, it, expect } from 'vitest'
import { ConfigError, loadApiEnv } from '../env'

describe('loadApiEnv', () => {
  it('defaults the port to 8000', () => {
    expect(loadApiEnv({ DATABASE_URL: 'postgres://localhost/dealcheck' })).toEqual({
      DATABASE_URL: 'postgres://localhost/dealcheck',
      PORT: 8000,
    })
  })

  it('rejects a malformed FRONTEND_URL', () => {
    expect(() => loadApiEnv({ DATABASE_URL: 'postgres://localhost/dealcheck', FRONTEND_URL: 'not a url' })).toThrow(
      ConfigError
    )
  })
})
