/**
 * Staged tree inspection: safety checks and content fingerprint.
 */

import { createHash } from 'node:crypto'
import { lstat, readdir, readFile, readlink } from 'node:fs/promises'
import { dirname, isAbsolute, join, relative, resolve, sep } from 'node:path'
import { Ok, Err, PluginError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'

export interface TreeLimits {
  maxFileCount: number
  maxTotalBytes: number
}

export const DEFAULT_TREE_LIMITS: TreeLimits = {
  maxFileCount: 10_000,
  maxTotalBytes: 256 * 1024 * 1024,
}

export interface TreeStats {
  fileCount: number
  totalBytes: number
}

export interface FileManifestEntry {
  path: string
  sha256: string
  size: number
}

function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex')
}

/** True when `child` is `parent` or lies below it. */
export function isInside(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child))
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel))
}

function toPosix(path: string): string {
  return path.split(sep).join('/')
}

/**
 * Walk the staged tree rejecting symlinks that point outside it and trees
 * over the configured limits.
 */
export async function verifyTree(
  root: string,
  limits: TreeLimits = DEFAULT_TREE_LIMITS,
): Promise<Result<TreeStats, PluginError>> {
  const stats: TreeStats = { fileCount: 0, totalBytes: 0 }

  async function walk(current: string): Promise<PluginError | null> {
    const entries = await readdir(current, { withFileTypes: true })

    for (const entry of entries) {
      const fullPath = join(current, entry.name)
      const rel = toPosix(relative(root, fullPath))
      const info = await lstat(fullPath)

      if (info.isSymbolicLink()) {
        const target = resolve(dirname(fullPath), await readlink(fullPath))
        if (!isInside(root, target)) {
          return PluginError.unsafePath('verify', `Symlink escapes the plugin tree: ${rel}`)
        }
        continue
      }

      if (info.isDirectory()) {
        const nested = await walk(fullPath)
        if (nested) return nested
        continue
      }

      if (info.isFile()) {
        stats.fileCount++
        stats.totalBytes += info.size

        if (stats.fileCount > limits.maxFileCount) {
          return PluginError.install('verify', `File count exceeds ${limits.maxFileCount}`)
        }
        if (stats.totalBytes > limits.maxTotalBytes) {
          return PluginError.install('verify', `Total size exceeds ${limits.maxTotalBytes} bytes`)
        }
      }
    }

    return null
  }

  try {
    const failure = await walk(root)
    return failure ? Err(failure) : Ok(stats)
  } catch (e) {
    return Err(PluginError.install('verify', `Failed to inspect staged tree: ${errorMessage(e)}`, e))
  }
}

export async function buildFileManifest(dir: string): Promise<FileManifestEntry[]> {
  const manifest: FileManifestEntry[] = []

  async function walk(current: string): Promise<void> {
    const entries = await readdir(current, { withFileTypes: true })
    for (const entry of entries) {
      const fullPath = join(current, entry.name)
      if (entry.isDirectory()) {
        await walk(fullPath)
      } else if (entry.isSymbolicLink()) {
        const target = await readlink(fullPath)
        manifest.push({ path: toPosix(relative(dir, fullPath)), sha256: sha256(`symlink:${target}`), size: 0 })
      } else if (entry.isFile()) {
        const content = await readFile(fullPath)
        manifest.push({ path: toPosix(relative(dir, fullPath)), sha256: sha256(content), size: content.length })
      }
    }
  }

  await walk(dir)
  return manifest.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
}

/**
 * Content fingerprint of a tree: sha256 over the sorted path/hash list.
 * Stands in for a commit id on local installs.
 */
export async function fingerprintTree(dir: string): Promise<string> {
  const manifest = await buildFileManifest(dir)
  return sha256(manifest.map((entry) => `${entry.path}\0${entry.sha256}\n`).join(''))
}
