import { describe, expect, it } from 'vitest'

import { loadConfig } from '../src/config/load.js'

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      dataDir: `${process.cwd()}/data/conversations`,
      maxToolIterations: 25,
      openRetry: { attempts: 2, backoffMs: 500 },
      gateway: { enabled: false, host: '127.0.0.1', port: 8787 },
      logMuted: false
    })
  })

  it('reads overrides', () => {
    const config = loadConfig({
      FORKLINE_DATA_DIR: '/var/lib/forkline',
      FORKLINE_PROVIDERS_PATH: '/etc/forkline/providers.json',
      FORKLINE_MAX_TOOL_ITERATIONS: '5',
      FORKLINE_OPEN_RETRY_ATTEMPTS: '4',
      FORKLINE_OPEN_RETRY_BACKOFF_MS: '0',
      FORKLINE_GATEWAY_ENABLED: 'true',
      FORKLINE_GATEWAY_PORT: '9001',
      FORKLINE_LOG_MUTED: 'true'
    })

    expect(config).toEqual({
      dataDir: '/var/lib/forkline',
      providersPath: '/etc/forkline/providers.json',
      maxToolIterations: 5,
      openRetry: { attempts: 4, backoffMs: 0 },
      gateway: { enabled: true, host: '127.0.0.1', port: 9001 },
      logMuted: true
    })
  })

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ FORKLINE_MAX_TOOL_ITERATIONS: '0' })).toThrow()
    expect(() => loadConfig({ FORKLINE_GATEWAY_PORT: 'eighty' })).toThrow()
  })
})
