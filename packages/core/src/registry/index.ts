/**
 * Registry: durable record of installed plugins.
 */

export { Registry, findPlugin, upsertPlugin, removePlugin } from './registry.js'
export { FileRegistryStore, MemoryRegistryStore } from './store.js'
export type { RegistryStore } from './store.js'

export {
  InstalledPluginSchema,
  RegistryRowSchema,
  RegistryDocumentSchema,
  REGISTRY_FORMAT_VERSION,
} from './schemas.js'
export type { InstalledPlugin, RegistryRow, RegistryDocument, RegistryState } from './schemas.js'
