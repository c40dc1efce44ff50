import { describe, it, expect } from 'vitest'
import { PluginError } from '@pluginyard/core'
import type { ListedPlugin } from '@pluginyard/core'
import { formatError } from '../src/context.js'
import { formatDetails, formatSummary, shortRef, toJson } from '../src/format.js'

const plugin: ListedPlugin = {
  name: 'sample-plugin',
  source: { kind: 'github_shorthand', location: 'acme/sample-plugin', ref: 'v2.0.0', subdir: null },
  resolvedRef: '0123456789abcdef0123456789abcdef01234567',
  installPath: '/srv/plugins/sample-plugin',
  installedAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-02T00:00:00.000Z',
  version: null,
  description: null,
  status: 'ok',
  issue: null,
}

describe('formatError', () => {
  it('names the stage', () => {
    expect(formatError(PluginError.notInstalled('x'))).toBe('Error [registry]: Plugin "x" is not installed')
  })

  it('adds the underlying cause', () => {
    const error = PluginError.fetch('Failed to fetch https://github.com/acme/x.git', new Error('Could not resolve host'))
    expect(formatError(error)).toBe(
      'Error [fetch]: Failed to fetch https://github.com/acme/x.git\n  cause: Could not resolve host',
    )
  })
})

describe('plugin formatting', () => {
  it('shortens refs to eight characters', () => {
    expect(shortRef(plugin.resolvedRef)).toBe('01234567')
  })

  it('summarizes a plugin without a version', () => {
    expect(formatSummary(plugin)).toBe('sample-plugin (no version)  github:acme/sample-plugin#v2.0.0 (01234567)')
  })

  it('shows dashes for missing details', () => {
    const lines = formatDetails(plugin)
    expect(lines[1]).toBe('  Version:      -')
    expect(lines[2]).toBe('  Description:  -')
    expect(lines[5]).toBe('  Resolved ref: 0123456789abcdef0123456789abcdef01234567')
  })

  it('renders the issue message in JSON', () => {
    const issue = PluginError.inconsistent('sample-plugin', 'install path /srv/plugins/sample-plugin is missing')
    const json = toJson({
      root: '/srv/plugins',
      registryPath: '/srv/plugins/.registry.json',
      plugins: [{ ...plugin, status: 'inconsistent', issue }],
      untracked: ['stray'],
    })
    expect(json.plugins_dir).toBe('/srv/plugins')
    expect(json.plugins[0].status).toBe('inconsistent')
    expect(json.plugins[0].issue).toBe(issue.message)
    expect(json.untracked).toEqual(['stray'])
  })
})
