/**
 * Fetcher: materializes a plugin source into a private staging directory.
 *
 * Layout: <stagingRoot>/<label>-<uuid>/{checkout|tree}. The fetcher never
 * touches the managed plugin directories; publishing is the manager's job.
 */

import { cp, mkdir, realpath, rm, stat } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, PluginError, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'
import { cloneUrl, describeSource } from '../sources/index.js'
import type { LocalSource, PluginSource, RemoteSource } from '../sources/index.js'
import { SimpleGitClient, isCommitHash, isGitTimeout } from './git-client.js'
import type { GitClient } from './git-client.js'
import { fingerprintTree, isInside } from './tree.js'

/** Entries never copied from a local source. */
const SKIPPED_LOCAL_ENTRIES = new Set(['.git', 'node_modules'])

export interface StagedTree {
  /** Staging directory owned by this fetch; removed by `discard()`. */
  stagingPath: string
  /** Effective plugin tree inside the staging directory. */
  treePath: string
  /** Commit hash, or content fingerprint for local sources. */
  resolvedRef: string
  discard(): Promise<void>
}

export interface FetcherOptions {
  stagingRoot: string
  git?: GitClient
  timeoutMs?: number
}

interface FetchedTree {
  treePath: string
  resolvedRef: string
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

export async function discardDir(path: string): Promise<void> {
  try {
    await rm(path, { recursive: true, force: true })
  } catch (e) {
    console.warn(`[plugin-fetch] failed to remove ${path}: ${errorMessage(e)}`)
  }
}

export class Fetcher {
  private stagingRoot: string
  private git: GitClient
  private timeoutMs: number

  constructor(opts: FetcherOptions) {
    this.stagingRoot = opts.stagingRoot
    this.timeoutMs = opts.timeoutMs ?? 120_000
    this.git = opts.git ?? new SimpleGitClient(this.timeoutMs)
  }

  /**
   * Fetch `source` into a fresh staging directory. On failure the staging
   * directory is already gone when the `Err` is returned.
   */
  async fetch(source: PluginSource, label: string): Promise<Result<StagedTree, PluginError>> {
    const stagingPath = join(this.stagingRoot, `${label}-${uuidv4()}`)

    let fetched: Result<FetchedTree, PluginError>
    try {
      await mkdir(stagingPath, { recursive: true })
      fetched = source.kind === 'local_path'
        ? await this.copyLocal(source, stagingPath)
        : await this.cloneRemote(source, stagingPath)
    } catch (e) {
      fetched = Err(PluginError.fetch(`Failed to stage ${describeSource(source)}: ${errorMessage(e)}`, e))
    }

    if (!fetched.ok) {
      await discardDir(stagingPath)
      return fetched
    }

    return Ok({
      stagingPath,
      treePath: fetched.value.treePath,
      resolvedRef: fetched.value.resolvedRef,
      discard: () => discardDir(stagingPath),
    })
  }

  private async cloneRemote(source: RemoteSource, stagingPath: string): Promise<Result<FetchedTree, PluginError>> {
    const checkout = join(stagingPath, 'checkout')
    const url = cloneUrl(source)
    const pinnedCommit = source.ref && isCommitHash(source.ref) ? source.ref : null
    const target = source.ref ? `${url} at ${source.ref}` : url

    let resolvedRef: string
    try {
      // Commits cannot be shallow-cloned by name: take full history, then check out
      await this.git.clone(url, checkout, {
        ref: pinnedCommit ? null : source.ref,
        shallow: pinnedCommit === null,
      })
      if (pinnedCommit) await this.git.checkout(checkout, pinnedCommit)
      resolvedRef = await this.git.headCommit(checkout)
    } catch (e) {
      if (isGitTimeout(e)) {
        return Err(PluginError.fetch(`Fetching ${target} timed out after ${this.timeoutMs}ms`, e))
      }
      return Err(PluginError.fetch(`Failed to fetch ${target}: ${errorMessage(e)}`, e))
    }

    await rm(join(checkout, '.git'), { recursive: true, force: true })

    if (!source.subdir) return Ok({ treePath: checkout, resolvedRef })

    const treePath = join(checkout, source.subdir)
    if (!(await isDirectory(treePath))) {
      return Err(PluginError.subdirNotFound(source.subdir, url))
    }
    if (!isInside(await realpath(checkout), await realpath(treePath))) {
      return Err(PluginError.unsafePath('fetch', `Repository path "${source.subdir}" resolves outside the checkout`))
    }
    return Ok({ treePath, resolvedRef })
  }

  private async copyLocal(source: LocalSource, stagingPath: string): Promise<Result<FetchedTree, PluginError>> {
    const origin = source.subdir ? join(source.location, source.subdir) : source.location

    if (!(await isDirectory(origin))) {
      return source.subdir
        ? Err(PluginError.subdirNotFound(source.subdir, source.location))
        : Err(PluginError.fetch(`Local plugin source is not a directory: ${source.location}`))
    }
    const realOrigin = await realpath(origin)
    if (source.subdir && !isInside(await realpath(source.location), realOrigin)) {
      return Err(PluginError.unsafePath('fetch', `Repository path "${source.subdir}" resolves outside ${source.location}`))
    }

    const treePath = join(stagingPath, 'tree')
    try {
      await cp(realOrigin, treePath, {
        recursive: true,
        preserveTimestamps: true,
        verbatimSymlinks: true,
        filter: (from) => from === realOrigin || !SKIPPED_LOCAL_ENTRIES.has(basename(from)),
      })
    } catch (e) {
      return Err(PluginError.fetch(`Failed to copy ${origin}: ${errorMessage(e)}`, e))
    }

    return Ok({ treePath, resolvedRef: await fingerprintTree(treePath) })
  }
}
