import { describe, it, expect } from 'vitest'
import { DEFAULT_DATA_PATH, loadConfig } from './config'

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    expect(loadConfig({})).toEqual({
      dataPath: DEFAULT_DATA_PATH,
      port: 8000,
      corsOrigin: 'http://localhost:5173',
    })
  })

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      DATA_PATH: '/srv/data/projects.csv',
      PORT: '9100',
      CORS_ORIGIN: 'http://dashboard.test',
    })

    expect(config).toEqual({
      dataPath: '/srv/data/projects.csv',
      port: 9100,
      corsOrigin: 'http://dashboard.test',
    })
  })

  it('should reject an invalid port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('Invalid PORT: eighty')
  })
})
