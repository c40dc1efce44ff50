/**
 * Installation: plugin manager, locks and manifest reading.
 */

export {
  PluginManager,
  createPluginManager,
  REGISTRY_FILE,
  STAGING_DIR,
  TRASH_DIR,
  LOCKS_DIR,
} from './manager.js'
export type { PluginManagerOptions } from './manager.js'

export { acquireLock, withLock, isProcessAlive, DEFAULT_LOCK_OPTIONS } from './lock.js'
export type { LockOptions, LockHandle } from './lock.js'

export { readManifest, PluginManifestSchema, MANIFEST_CANDIDATES } from './manifest.js'
export type { PluginManifest, ManifestReadResult } from './manifest.js'

export type {
  InstallPluginInput,
  InstallPluginResult,
  UpdatePluginResult,
  PluginStatus,
  ListedPlugin,
  PluginListing,
} from './schemas.js'
