import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readFile, rm, writeFile, mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { PluginManager, fingerprintTree } from '@pluginyard/core'
import { run } from '../src/program.js'
import type { CliDeps } from '../src/context.js'

interface Captured {
  stdout: string
  stderr: string
}

describe('pluginyard CLI', () => {
  let tempDir: string
  let root: string
  let source: string
  let out: Captured
  let deps: CliDeps

  async function cli(...args: string[]): Promise<number> {
    return run(['--root', root, ...args], deps)
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pluginyard-cli-'))
    root = join(tempDir, 'plugins')
    source = join(tempDir, 'src', 'local-plugin')
    await mkdir(join(source, 'skills'), { recursive: true })
    await writeFile(
      join(source, 'plugin.json'),
      JSON.stringify({ name: 'local-plugin', version: '1.0.0', description: 'A local plugin' }),
    )
    await writeFile(join(source, 'skills', 'hello.md'), '# Hello')

    out = { stdout: '', stderr: '' }
    deps = {
      io: {
        stdout: (text) => {
          out.stdout += text
        },
        stderr: (text) => {
          out.stderr += text
        },
      },
      openManager: (dir) => new PluginManager({ root: dir ?? join(tempDir, 'unused'), lock: { failFast: true } }),
    }
  })

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true })
  })

  it('prints help for plugin without a verb', async () => {
    expect(await cli('plugin')).toBe(0)
    expect(out.stdout).toContain('Usage: pluginyard plugin [options] [command]')
    expect(out.stdout).toContain('install [options] <source>')
  })

  it('reports an empty root', async () => {
    expect(await cli('plugin', 'list')).toBe(0)
    expect(out.stdout).toBe(`No plugins installed in ${root}\n`)
  })

  it('installs a local plugin', async () => {
    const ref = (await fingerprintTree(source)).slice(0, 8)

    expect(await cli('plugin', 'install', source)).toBe(0)
    expect(out.stdout).toBe([
      `Installing plugin from ${source}...`,
      'Installed "local-plugin" v1.0.0',
      '  A local plugin',
      `  Source: ${source}`,
      `  Ref: ${ref}`,
      `  Installed to: ${join(root, 'local-plugin')}`,
      '',
    ].join('\n'))
    expect(out.stderr).toBe('')
    expect(await readFile(join(root, 'local-plugin', 'skills', 'hello.md'), 'utf-8')).toBe('# Hello')
  })

  it('refuses a second install without --force', async () => {
    await cli('plugin', 'install', source)
    out.stderr = ''

    expect(await cli('plugin', 'install', source)).toBe(1)
    expect(out.stderr).toBe('Error [registry]: Plugin "local-plugin" is already installed; use --force to replace it\n')
  })

  it('replaces with -f', async () => {
    await cli('plugin', 'install', source)
    out.stdout = ''

    expect(await cli('plugin', 'install', source, '-f')).toBe(0)
    expect(out.stdout.split('\n')[1]).toBe('Reinstalled "local-plugin" v1.0.0')
  })

  it('installs under an explicit name', async () => {
    expect(await cli('plugin', 'install', source, '--name', 'renamed')).toBe(0)
    expect(out.stdout.split('\n')[1]).toBe('Installed "renamed" v1.0.0')
  })

  it('rejects --ref for a local path', async () => {
    expect(await cli('plugin', 'install', source, '--ref', 'main')).toBe(1)
    expect(out.stderr).toBe(`Error [resolve]: --ref cannot be used with a local path: ${source}\n`)
  })

  it('rejects traversal in --repo-path', async () => {
    expect(await cli('plugin', 'install', source, '--repo-path', '../other')).toBe(1)
    expect(out.stderr).toBe('Error [resolve]: Repository path must not contain "..": ../other\n')
  })

  it('lists plugins as text', async () => {
    await cli('plugin', 'install', source)
    const ref = (await fingerprintTree(source)).slice(0, 8)
    out.stdout = ''

    expect(await cli('plugin', 'list')).toBe(0)
    expect(out.stdout).toBe([
      `Installed plugins (${root}):`,
      `  local-plugin v1.0.0  ${source} (${ref})`,
      '    A local plugin',
      '',
    ].join('\n'))
  })

  it('flags inconsistent records and untracked directories', async () => {
    await cli('plugin', 'install', source)
    await rm(join(root, 'local-plugin'), { recursive: true })
    await mkdir(join(root, 'stray'))
    const ref = (await fingerprintTree(source)).slice(0, 8)
    out.stdout = ''

    expect(await cli('plugin', 'list')).toBe(0)
    expect(out.stdout).toBe([
      `Installed plugins (${root}):`,
      `  local-plugin v1.0.0  ${source} (${ref})  [inconsistent]`,
      '    A local plugin',
      `    ! Plugin "local-plugin" is inconsistent: install path ${join(root, 'local-plugin')} is missing`,
      'Untracked directories: stray',
      '',
    ].join('\n'))
  })

  it('lists plugins as JSON', async () => {
    await cli('plugin', 'install', source)
    out.stdout = ''

    expect(await cli('plugin', 'list', '--json')).toBe(0)
    const parsed: unknown = JSON.parse(out.stdout)
    expect(parsed).toMatchObject({
      plugins_dir: root,
      plugins: [{
        name: 'local-plugin',
        source_kind: 'local_path',
        source_location: source,
        source_ref: null,
        source_subdir: null,
        install_path: join(root, 'local-plugin'),
        version: '1.0.0',
        description: 'A local plugin',
        status: 'ok',
        issue: null,
      }],
      untracked: [],
    })
  })

  it('fails list on a corrupt registry', async () => {
    await mkdir(root, { recursive: true })
    await writeFile(join(root, '.registry.json'), '[]')

    expect(await cli('plugin', 'list')).toBe(1)
    expect(out.stdout).toBe('')
    expect(out.stderr.startsWith(`Error [registry]: Plugin registry is corrupt: ${join(root, '.registry.json')} failed validation`)).toBe(true)
  })

  it('uninstalls and reports a second uninstall', async () => {
    await cli('plugin', 'install', source)
    out.stdout = ''

    expect(await cli('plugin', 'uninstall', 'local-plugin')).toBe(0)
    expect(out.stdout).toBe('Uninstalled "local-plugin"\n')

    expect(await cli('plugin', 'uninstall', 'local-plugin')).toBe(1)
    expect(out.stderr).toBe('Error [registry]: Plugin "local-plugin" is not installed\n')
  })

  it('updates from the recorded source', async () => {
    await cli('plugin', 'install', source)
    const before = (await fingerprintTree(source)).slice(0, 8)
    out.stdout = ''

    expect(await cli('plugin', 'update', 'local-plugin')).toBe(0)
    expect(out.stdout).toBe(`"local-plugin" is already up to date (${before})\n`)

    await writeFile(join(source, 'skills', 'hello.md'), '# Hello again')
    const after = (await fingerprintTree(source)).slice(0, 8)
    out.stdout = ''

    expect(await cli('plugin', 'update', 'local-plugin')).toBe(0)
    expect(out.stdout).toBe([
      'Updated "local-plugin" to v1.0.0',
      `  Ref: ${before} -> ${after}`,
      '',
    ].join('\n'))
    expect(await readFile(join(root, 'local-plugin', 'skills', 'hello.md'), 'utf-8')).toBe('# Hello again')
  })

  it('reports update of an unknown plugin', async () => {
    expect(await cli('plugin', 'update', 'ghost')).toBe(1)
    expect(out.stderr).toBe('Error [registry]: Plugin "ghost" is not installed\n')
  })

  it('shows plugin details', async () => {
    await cli('plugin', 'install', source)
    out.stdout = ''

    expect(await cli('plugin', 'info', 'local-plugin')).toBe(0)
    const lines = out.stdout.split('\n')
    expect(lines[0]).toBe('local-plugin')
    expect(lines).toContain('  Version:      1.0.0')
    expect(lines).toContain('  Source kind:  local_path')
    expect(lines).toContain('  Status:       ok')
  })

  it('fails on a missing argument', async () => {
    expect(await cli('plugin', 'install')).toBe(1)
    expect(out.stderr).toContain("missing required argument 'source'")
  })
})
