/**
 * Zod schemas for plugin source descriptors.
 */

import { z } from 'zod'

export const RemoteSourceKindSchema = z.enum(['github_shorthand', 'git_url', 'ssh_git_url'])
export type RemoteSourceKind = z.infer<typeof RemoteSourceKindSchema>

export const SourceKindSchema = z.enum(['github_shorthand', 'git_url', 'ssh_git_url', 'local_path'])
export type SourceKind = z.infer<typeof SourceKindSchema>

export const RemoteSourceSchema = z.object({
  kind: RemoteSourceKindSchema,
  location: z.string().min(1),
  ref: z.string().min(1).nullable(),
  subdir: z.string().min(1).nullable(),
})
export type RemoteSource = z.infer<typeof RemoteSourceSchema>

export const LocalSourceSchema = z.object({
  kind: z.literal('local_path'),
  location: z.string().min(1),
  ref: z.null(),
  subdir: z.string().min(1).nullable(),
})
export type LocalSource = z.infer<typeof LocalSourceSchema>

export const PluginSourceSchema = z.discriminatedUnion('kind', [
  RemoteSourceSchema.extend({ kind: z.literal('github_shorthand') }),
  RemoteSourceSchema.extend({ kind: z.literal('git_url') }),
  RemoteSourceSchema.extend({ kind: z.literal('ssh_git_url') }),
  LocalSourceSchema,
])

/** Where and at what version a plugin's content comes from. */
export type PluginSource = RemoteSource | LocalSource
