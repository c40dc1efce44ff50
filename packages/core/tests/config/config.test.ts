import { describe, it, expect } from 'vitest'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { ConfigError, defaultRoot, expandHome, loadConfig } from '../../src/config/index.js'

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      root: join(homedir(), '.pluginyard', 'plugins'),
      fetchTimeoutMs: 120_000,
      lockWaitMs: 60_000,
      limits: { maxFileCount: 10_000, maxTotalBytes: 256 * 1024 * 1024 },
    })
    expect(defaultRoot()).toBe(join(homedir(), '.pluginyard', 'plugins'))
  })

  it('reads overrides and expands ~ in the root', () => {
    const config = loadConfig({
      PLUGINYARD_HOME: '~/my-plugins',
      PLUGINYARD_FETCH_TIMEOUT_MS: '5000',
      PLUGINYARD_LOCK_WAIT_MS: '0',
      PLUGINYARD_MAX_FILES: '12',
      PLUGINYARD_MAX_BYTES: '1024',
    })
    expect(config).toEqual({
      root: join(homedir(), 'my-plugins'),
      fetchTimeoutMs: 5000,
      lockWaitMs: 0,
      limits: { maxFileCount: 12, maxTotalBytes: 1024 },
    })
  })

  it('rejects invalid numbers with a ConfigError naming the variable', () => {
    let caught: unknown
    try {
      loadConfig({ PLUGINYARD_FETCH_TIMEOUT_MS: 'soon' })
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(ConfigError)
    if (!(caught instanceof ConfigError)) return
    expect(caught.issues).toHaveLength(1)
    expect(caught.issues[0].startsWith('PLUGINYARD_FETCH_TIMEOUT_MS: ')).toBe(true)
  })
})

describe('expandHome', () => {
  it('expands only a leading ~', () => {
    expect(expandHome('~')).toBe(homedir())
    expect(expandHome('~/x')).toBe(join(homedir(), 'x'))
    expect(expandHome('/abs/~/x')).toBe('/abs/~/x')
  })
})
