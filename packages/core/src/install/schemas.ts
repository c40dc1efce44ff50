/**
 * Inputs and results of plugin manager operations.
 */

import type { PluginError } from '../common/index.js'
import type { InstalledPlugin } from '../registry/index.js'

export interface InstallPluginInput {
  /** Raw source string: github:<owner>/<repo>, git URL, ssh remote or path. */
  source: string
  ref?: string | null
  repoPath?: string | null
  /** Registry name; derived from the source when omitted. */
  name?: string | null
  /** Replace an existing installation of the same name. */
  force?: boolean
}

export interface InstallPluginResult {
  plugin: InstalledPlugin
  /** An earlier installation (or stray directory) was replaced. */
  replaced: boolean
  warnings: string[]
}

export interface UpdatePluginResult {
  plugin: InstalledPlugin
  previousRef: string
  changed: boolean
  warnings: string[]
}

export type PluginStatus = 'ok' | 'inconsistent'

export type ListedPlugin = InstalledPlugin & {
  status: PluginStatus
  /** Why the record disagrees with the filesystem. */
  issue: PluginError | null
}

export interface PluginListing {
  root: string
  registryPath: string
  plugins: ListedPlugin[]
  /** Directories in the root with no registry record. */
  untracked: string[]
}
