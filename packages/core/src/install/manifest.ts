/**
 * Optional plugin manifest (plugin.json) read from a staged tree.
 */

import { readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { z } from 'zod'
import { errnoCode, errorMessage } from '../common/index.js'

export const PluginManifestSchema = z.object({
  name: z.string().min(1).optional(),
  version: z.string().optional(),
  description: z.string().optional(),
  author: z.union([
    z.string(),
    z.object({ name: z.string() }).passthrough(),
  ]).optional(),
}).passthrough()  // accept unknown fields for forward compat

export type PluginManifest = z.infer<typeof PluginManifestSchema>

/** Checked in order; the first file found wins. */
export const MANIFEST_CANDIDATES = ['.plugin/plugin.json', 'plugin.json', '.claude-plugin/plugin.json']

export interface ManifestReadResult {
  manifest: PluginManifest | null
  /** Relative path of the manifest that was read. */
  path: string | null
  warnings: string[]
}

export async function readManifest(treePath: string): Promise<ManifestReadResult> {
  for (const candidate of MANIFEST_CANDIDATES) {
    let raw: string
    try {
      raw = await readFile(join(treePath, candidate), 'utf-8')
    } catch (e) {
      const code = errnoCode(e)
      if (code === 'ENOENT' || code === 'ENOTDIR') continue
      return { manifest: null, path: candidate, warnings: [`Could not read ${candidate}: ${errorMessage(e)}`] }
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch (e) {
      return { manifest: null, path: candidate, warnings: [`Ignoring ${candidate}: ${errorMessage(e)}`] }
    }

    const parsed = PluginManifestSchema.safeParse(json)
    if (!parsed.success) {
      return { manifest: null, path: candidate, warnings: [`Ignoring ${candidate}: ${parsed.error.message}`] }
    }
    return { manifest: parsed.data, path: candidate, warnings: [] }
  }

  return { manifest: null, path: null, warnings: [] }
}
