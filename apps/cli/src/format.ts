/**
 * Plain-text and JSON renderings of installed plugins.
 */

import { describeSource } from '@pluginyard/core'
import type { InstalledPlugin, ListedPlugin, PluginListing } from '@pluginyard/core'

export function shortRef(ref: string): string {
  return ref.slice(0, 8)
}

export function formatVersion(version: string | null): string {
  return version ? `v${version}` : '(no version)'
}

/** One-line summary: name, version, source and short ref. */
export function formatSummary(plugin: InstalledPlugin): string {
  return `${plugin.name} ${formatVersion(plugin.version)}  ${describeSource(plugin.source)} (${shortRef(plugin.resolvedRef)})`
}

export function formatListing(listing: PluginListing): string[] {
  const lines: string[] = []

  if (listing.plugins.length === 0) {
    lines.push(`No plugins installed in ${listing.root}`)
  } else {
    lines.push(`Installed plugins (${listing.root}):`)
    for (const plugin of listing.plugins) {
      const marker = plugin.status === 'ok' ? '' : '  [inconsistent]'
      lines.push(`  ${formatSummary(plugin)}${marker}`)
      if (plugin.description) lines.push(`    ${plugin.description}`)
      if (plugin.issue) lines.push(`    ! ${plugin.issue.message}`)
    }
  }

  if (listing.untracked.length > 0) {
    lines.push(`Untracked directories: ${listing.untracked.join(', ')}`)
  }
  return lines
}

export function formatDetails(plugin: ListedPlugin): string[] {
  return [
    plugin.name,
    `  Version:      ${plugin.version ?? '-'}`,
    `  Description:  ${plugin.description ?? '-'}`,
    `  Source:       ${describeSource(plugin.source)}`,
    `  Source kind:  ${plugin.source.kind}`,
    `  Resolved ref: ${plugin.resolvedRef}`,
    `  Installed to: ${plugin.installPath}`,
    `  Installed at: ${plugin.installedAt}`,
    `  Updated at:   ${plugin.updatedAt}`,
    `  Status:       ${plugin.issue ? `${plugin.status} (${plugin.issue.message})` : plugin.status}`,
  ]
}

export interface ListedPluginJson {
  name: string
  source_kind: string
  source_location: string
  source_ref: string | null
  source_subdir: string | null
  resolved_ref: string
  install_path: string
  installed_at: string
  updated_at: string
  version: string | null
  description: string | null
  status: string
  issue: string | null
}

export function toJson(listing: PluginListing): {
  plugins_dir: string
  plugins: ListedPluginJson[]
  untracked: string[]
} {
  return {
    plugins_dir: listing.root,
    plugins: listing.plugins.map((plugin) => ({
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
      status: plugin.status,
      issue: plugin.issue ? plugin.issue.message : null,
    })),
    untracked: listing.untracked,
  }
}
