import { describe, it, expect } from 'vitest'

describe('@pluginyard/core', () => {
  it('can be imported without errors', async () => {
    const core = await import('../src/index.js')
    expect(core.PluginManager).toBeDefined()
    expect(core.resolveSource).toBeDefined()
  })
})
