/**
 * Zod schemas for installed plugin records and the registry document.
 */

import { z } from 'zod'
import { FilePathSchema, PluginNameSchema, TimestampSchema } from '../common/index.js'
import { PluginSourceSchema, SourceKindSchema } from '../sources/index.js'

// ── In-memory record ──

export const InstalledPluginSchema = z.object({
  name: PluginNameSchema,
  source: PluginSourceSchema,
  resolvedRef: z.string().min(1),
  installPath: FilePathSchema,
  installedAt: TimestampSchema,
  updatedAt: TimestampSchema,
  version: z.string().nullable(),
  description: z.string().nullable(),
})

export type InstalledPlugin = z.infer<typeof InstalledPluginSchema>

// ── Persisted document (snake_case rows) ──

export const RegistryRowSchema = z.object({
  name: PluginNameSchema,
  source_kind: SourceKindSchema,
  source_location: z.string().min(1),
  source_ref: z.string().min(1).nullable(),
  source_subdir: z.string().min(1).nullable(),
  resolved_ref: z.string().min(1),
  install_path: FilePathSchema,
  installed_at: TimestampSchema,
  updated_at: TimestampSchema,
  version: z.string().nullable().default(null),
  description: z.string().nullable().default(null),
})

export type RegistryRow = z.infer<typeof RegistryRowSchema>

export const REGISTRY_FORMAT_VERSION = 1

export const RegistryDocumentSchema = z.object({
  format_version: z.literal(REGISTRY_FORMAT_VERSION),
  plugins: z.array(RegistryRowSchema),
})

export type RegistryDocument = z.infer<typeof RegistryDocumentSchema>

export interface RegistryState {
  /** Installation order. */
  plugins: InstalledPlugin[]
}
