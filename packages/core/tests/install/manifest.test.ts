import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { readManifest } from '../../src/install/index.js'
import { writeTree } from '../helpers/fixtures.js'

describe('readManifest', () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'plugin-manifest-'))
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('returns nothing when no manifest exists', async () => {
    expect(await readManifest(tempDir)).toEqual({ manifest: null, path: null, warnings: [] })
  })

  it('reads version and description and keeps unknown fields', async () => {
    await writeTree(tempDir, {
      'plugin.json': JSON.stringify({ name: 'demo', version: '1.4.0', description: 'Demo plugin', hooks: ['start'] }),
    })
    const result = await readManifest(tempDir)
    expect(result.path).toBe('plugin.json')
    expect(result.manifest).toEqual({ name: 'demo', version: '1.4.0', description: 'Demo plugin', hooks: ['start'] })
    expect(result.warnings).toEqual([])
  })

  it('prefers .plugin/plugin.json over the root manifest', async () => {
    await writeTree(tempDir, {
      '.plugin/plugin.json': '{"version":"2.0.0"}',
      'plugin.json': '{"version":"1.0.0"}',
    })
    const result = await readManifest(tempDir)
    expect(result.path).toBe('.plugin/plugin.json')
    expect(result.manifest?.version).toBe('2.0.0')
  })

  it('falls back to .claude-plugin/plugin.json', async () => {
    await writeTree(tempDir, { '.claude-plugin/plugin.json': '{"description":"Compat layout"}' })
    expect((await readManifest(tempDir)).manifest?.description).toBe('Compat layout')
  })

  it('warns about unparseable manifests instead of failing', async () => {
    await writeTree(tempDir, { 'plugin.json': '{ version: 1 }' })
    const result = await readManifest(tempDir)
    expect(result.manifest).toBeNull()
    expect(result.warnings).toHaveLength(1)
    expect(result.warnings[0].startsWith('Ignoring plugin.json: ')).toBe(true)
  })

  it('warns about manifests with the wrong field types', async () => {
    await writeTree(tempDir, { 'plugin.json': '{"version": 3}' })
    const result = await readManifest(tempDir)
    expect(result.manifest).toBeNull()
    expect(result.warnings[0].startsWith('Ignoring plugin.json: ')).toBe(true)
  })
})
