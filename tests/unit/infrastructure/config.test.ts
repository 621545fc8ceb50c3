import { describe, expect, it } from 'vitest'
import { loadConfig } from '@infrastructure/config.ts'

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 8000,
      databasePath: 'data/recipes.db',
      mediaRoot: 'data/media',
      mediaUrl: '/static/media/',
      maxImageBytes: 5 * 1024 * 1024,
      corsOrigins: [],
      logLevel: 'info',
    })
  })

  it('reads values from the environment', () => {
    const config = loadConfig({
      PORT: '3001',
      DATABASE_PATH: ':memory:',
      CORS_ORIGINS: 'http://localhost:5173, https://recipes.example.com,',
      LOG_LEVEL: 'debug',
    })

    expect(config.port).toBe(3001)
    expect(config.databasePath).toBe(':memory:')
    expect(config.corsOrigins).toEqual(['http://localhost:5173', 'https://recipes.example.com'])
    expect(config.logLevel).toBe('debug')
  })

  it('names the variable that is invalid', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT:/)
  })

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/LOG_LEVEL/)
  })

  it('requires MEDIA_URL to be a path prefix', () => {
    expect(() => loadConfig({ MEDIA_URL: 'media' })).toThrow('MEDIA_URL: must start and end with "/"')
  })
})
