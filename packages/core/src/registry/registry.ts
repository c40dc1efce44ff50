/**
 * Plugin registry: parse, validate and persist the installed plugin list.
 *
 * A document that cannot be parsed is reported as corrupt and never
 * replaced: rewriting it would forget real installations.
 */

import { join, resolve } from 'node:path'
import { Ok, Err, PluginError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { PluginSourceSchema } from '../sources/index.js'
import {
  REGISTRY_FORMAT_VERSION,
  RegistryDocumentSchema,
} from './schemas.js'
import type { InstalledPlugin, RegistryDocument, RegistryRow, RegistryState } from './schemas.js'
import type { RegistryStore } from './store.js'

function rowToPlugin(row: RegistryRow): Result<InstalledPlugin, string> {
  const source = PluginSourceSchema.safeParse({
    kind: row.source_kind,
    location: row.source_location,
    ref: row.source_ref,
    subdir: row.source_subdir,
  })
  if (!source.success) return Err(`invalid source for "${row.name}": ${source.error.message}`)

  return Ok({
    name: row.name,
    source: source.data,
    resolvedRef: row.resolved_ref,
    installPath: row.install_path,
    installedAt: row.installed_at,
    updatedAt: row.updated_at,
    version: row.version,
    description: row.description,
  })
}

function pluginToRow(plugin: InstalledPlugin): RegistryRow {
  return {
    name: plugin.name,
    source_kind: plugin.source.kind,
    source_location: plugin.source.location,
    source_ref: plugin.source.ref,
    source_subdir: plugin.source.subdir,
    resolved_ref: plugin.resolvedRef,
    install_path: plugin.installPath,
    installed_at: plugin.installedAt,
    updated_at: plugin.updatedAt,
    version: plugin.version,
    description: plugin.description,
  }
}

export class Registry {
  readonly root: string

  constructor(private store: RegistryStore, root: string) {
    this.root = resolve(root)
  }

  get location(): string {
    return this.store.location
  }

  /** Managed directory for a plugin name. */
  pathFor(name: string): string {
    return join(this.root, name)
  }

  async read(): Promise<Result<RegistryState, PluginError>> {
    let text: string | null
    try {
      text = await this.store.read()
    } catch (e) {
      return Err(PluginError.corruptRegistry(`${this.location} could not be read: ${errorMessage(e)}`, e))
    }
    if (text === null) return Ok({ plugins: [] })

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch (e) {
      return Err(PluginError.corruptRegistry(`${this.location} is not valid JSON: ${errorMessage(e)}`, e))
    }

    const parsed = RegistryDocumentSchema.safeParse(json)
    if (!parsed.success) {
      return Err(PluginError.corruptRegistry(`${this.location} failed validation: ${parsed.error.message}`))
    }

    const plugins: InstalledPlugin[] = []
    const seen = new Set<string>()
    for (const row of parsed.data.plugins) {
      const key = row.name.toLowerCase()
      if (seen.has(key)) {
        return Err(PluginError.corruptRegistry(`duplicate entry "${row.name}" in ${this.location}`))
      }
      seen.add(key)

      if (resolve(row.install_path) !== this.pathFor(row.name)) {
        return Err(PluginError.corruptRegistry(`"${row.name}" points outside ${this.root}: ${row.install_path}`))
      }

      const plugin = rowToPlugin(row)
      if (!plugin.ok) return Err(PluginError.corruptRegistry(plugin.error))
      plugins.push(plugin.value)
    }

    return Ok({ plugins })
  }

  async write(state: RegistryState): Promise<Result<void, PluginError>> {
    const doc: RegistryDocument = {
      format_version: REGISTRY_FORMAT_VERSION,
      plugins: state.plugins.map(pluginToRow),
    }

    try {
      await this.store.write(`${JSON.stringify(doc, null, 2)}\n`)
      return Ok(undefined)
    } catch (e) {
      return Err(PluginError.registryWrite(`Failed to write ${this.location}: ${errorMessage(e)}`, e))
    }
  }
}

// ── State helpers ──

/** Names are unique regardless of case so they map to distinct directories everywhere. */
export function findPlugin(state: RegistryState, name: string): InstalledPlugin | undefined {
  const key = name.toLowerCase()
  return state.plugins.find((p) => p.name.toLowerCase() === key)
}

/** Replace the record with the same name in place, or append it. */
export function upsertPlugin(state: RegistryState, plugin: InstalledPlugin): RegistryState {
  const key = plugin.name.toLowerCase()
  const index = state.plugins.findIndex((p) => p.name.toLowerCase() === key)
  if (index === -1) return { plugins: [...state.plugins, plugin] }

  const plugins = [...state.plugins]
  plugins[index] = plugin
  return { plugins }
}

export function removePlugin(state: RegistryState, name: string): RegistryState {
  const key = name.toLowerCase()
  return { plugins: state.plugins.filter((p) => p.name.toLowerCase() !== key) }
}
