import { loadConfig, CONSTANTS } from '../src/config'

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      NODE_ENV: 'development',
      MIRROR_NODE_URL: 'http://localhost:5551',
      FEE_ESTIMATE_TIMEOUT_MS: 10_000,
      LOG_LEVEL: 'info'
    })
  })

  it('reads values from the environment', () => {
    const cfg = loadConfig({
      NODE_ENV: 'test',
      MIRROR_NODE_URL: 'https://mirror.example',
      FEE_ESTIMATE_TIMEOUT_MS: '2500',
      LOG_LEVEL: 'debug'
    })
    expect(cfg.MIRROR_NODE_URL).toBe('https://mirror.example')
    expect(cfg.FEE_ESTIMATE_TIMEOUT_MS).toBe(2500)
    expect(cfg.LOG_LEVEL).toBe('debug')
    expect(cfg.NODE_ENV).toBe('test')
  })

  it('falls back on a timeout that is not a positive integer', () => {
    expect(loadConfig({ FEE_ESTIMATE_TIMEOUT_MS: 'soon' }).FEE_ESTIMATE_TIMEOUT_MS).toBe(10_000)
    expect(loadConfig({ FEE_ESTIMATE_TIMEOUT_MS: '0' }).FEE_ESTIMATE_TIMEOUT_MS).toBe(10_000)
    expect(loadConfig({ FEE_ESTIMATE_TIMEOUT_MS: '1.5' }).FEE_ESTIMATE_TIMEOUT_MS).toBe(10_000)
  })

  it('exposes the fee estimate path', () => {
    expect(CONSTANTS.FEE_ESTIMATE_PATH).toBe('/api/v1/network/fees')
  })
})
