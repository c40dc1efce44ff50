/**
 * Plugin sources: descriptor schemas and the source string resolver.
 */

export {
  PluginSourceSchema,
  RemoteSourceSchema,
  LocalSourceSchema,
  SourceKindSchema,
  RemoteSourceKindSchema,
} from './schemas.js'
export type { PluginSource, RemoteSource, LocalSource, SourceKind, RemoteSourceKind } from './schemas.js'

export {
  resolveSource,
  normalizeSubdir,
  cloneUrl,
  deriveName,
  validateName,
  describeSource,
} from './resolver.js'
export type { ResolveOptions } from './resolver.js'
