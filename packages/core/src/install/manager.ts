/**
 * Plugin manager: install, update, uninstall and list.
 *
 * Install flow: resolve → lock → fetch into staging → verify → publish
 * (rename into place, previous copy set aside) → registry commit → drop the
 * set-aside copy. Nothing before the registry commit is visible as a
 * completed operation; a failure at any step restores the previous state.
 */

import type { Dirent } from 'node:fs'
import { cp, lstat, mkdir, readdir, rename, rm, stat } from 'node:fs/promises'
import { join } from 'node:path'
import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, PluginError, errnoCode, errorMessage } from '../common/index.js'
import type { ErrorStage, Result } from '../common/index.js'
import type { PluginyardConfig } from '../config/index.js'
import { Fetcher, discardDir, verifyTree, DEFAULT_TREE_LIMITS } from '../fetch/index.js'
import type { GitClient, TreeLimits } from '../fetch/index.js'
import {
  FileRegistryStore,
  Registry,
  findPlugin,
  removePlugin,
  upsertPlugin,
} from '../registry/index.js'
import type { InstalledPlugin, RegistryState } from '../registry/index.js'
import { deriveName, resolveSource, validateName } from '../sources/index.js'
import type { PluginSource } from '../sources/index.js'
import { withLock } from './lock.js'
import type { LockOptions } from './lock.js'
import { readManifest } from './manifest.js'
import type {
  InstallPluginInput,
  InstallPluginResult,
  ListedPlugin,
  PluginListing,
  UpdatePluginResult,
} from './schemas.js'

export const REGISTRY_FILE = '.registry.json'
export const STAGING_DIR = '.staging'
export const TRASH_DIR = '.trash'
export const LOCKS_DIR = '.locks'

const UUID_SUFFIX = /-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/

export interface PluginManagerOptions {
  root: string
  registry?: Registry
  fetcher?: Fetcher
  /** Used by the default fetcher. */
  git?: GitClient
  fetchTimeoutMs?: number
  lock?: Partial<LockOptions>
  limits?: TreeLimits
  /** Base for relative local source paths. */
  cwd?: string
  now?: () => Date
}

interface Deployed {
  plugin: InstalledPlugin
  replaced: boolean
  warnings: string[]
}

interface Publication {
  replaced: boolean
  /** Put the previous installation back (registry commit failed). */
  rollback(): Promise<void>
  /** Drop the set-aside previous installation (registry commit succeeded). */
  finalize(): Promise<void>
}

type DeployMode = 'install' | 'update'

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path)
    return true
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') return false
    throw e
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory()
  } catch {
    return false
  }
}

/** Rename, falling back to copy + delete across filesystems. */
async function moveDir(from: string, to: string): Promise<void> {
  try {
    await rename(from, to)
  } catch (e) {
    if (errnoCode(e) !== 'EXDEV') throw e
    await cp(from, to, { recursive: true, preserveTimestamps: true, verbatimSymlinks: true, errorOnExist: true, force: false })
    await rm(from, { recursive: true, force: true })
  }
}

async function restore(backupPath: string, originalPath: string): Promise<void> {
  try {
    await rename(backupPath, originalPath)
  } catch (e) {
    console.warn(`[plugin-manager] could not restore ${originalPath} from ${backupPath}: ${errorMessage(e)}`)
  }
}

export class PluginManager {
  readonly root: string
  readonly registry: Registry
  private fetcher: Fetcher
  private lockOptions: Partial<LockOptions>
  private limits: TreeLimits
  private cwd: string
  private now: () => Date

  constructor(opts: PluginManagerOptions) {
    this.registry = opts.registry ?? new Registry(new FileRegistryStore(join(opts.root, REGISTRY_FILE)), opts.root)
    this.root = this.registry.root
    this.fetcher = opts.fetcher ?? new Fetcher({
      stagingRoot: join(this.root, STAGING_DIR),
      git: opts.git,
      timeoutMs: opts.fetchTimeoutMs,
    })
    this.lockOptions = opts.lock ?? {}
    this.limits = opts.limits ?? DEFAULT_TREE_LIMITS
    this.cwd = opts.cwd ?? process.cwd()
    this.now = opts.now ?? (() => new Date())
  }

  // ── Operations ──

  async install(input: InstallPluginInput): Promise<Result<InstallPluginResult, PluginError>> {
    const source = resolveSource(input.source, { ref: input.ref, repoPath: input.repoPath, cwd: this.cwd })
    if (!source.ok) return source

    const name = validateName(input.name?.trim() || deriveName(source.value))
    if (!name.ok) return name

    return this.exclusive(name.value, 'install', async () => {
      const state = await this.registry.read()
      if (!state.ok) return state

      const existing = findPlugin(state.value, name.value) ?? null
      if (!input.force) {
        if (existing) return Err(PluginError.nameConflict(existing.name))
        if (await exists(this.registry.pathFor(name.value))) {
          return Err(PluginError.nameConflict(name.value, 'has an untracked directory in the plugin root'))
        }
      }

      const deployed = await this.deploy(name.value, source.value, existing, 'install')
      if (!deployed.ok) return deployed
      return Ok(deployed.value)
    })
  }

  async update(name: string): Promise<Result<UpdatePluginResult, PluginError>> {
    if (!validateName(name).ok) return Err(PluginError.notInstalled(name))

    return this.exclusive(name, 'update', async () => {
      const state = await this.registry.read()
      if (!state.ok) return state

      const existing = findPlugin(state.value, name)
      if (!existing) return Err(PluginError.notInstalled(name))

      // Stored source, stored ref policy: no ref follows the default branch
      const deployed = await this.deploy(existing.name, existing.source, existing, 'update')
      if (!deployed.ok) return deployed

      return Ok({
        plugin: deployed.value.plugin,
        previousRef: existing.resolvedRef,
        changed: deployed.value.plugin.resolvedRef !== existing.resolvedRef,
        warnings: deployed.value.warnings,
      })
    })
  }

  async uninstall(name: string): Promise<Result<InstalledPlugin, PluginError>> {
    if (!validateName(name).ok) return Err(PluginError.notInstalled(name))

    return this.exclusive(name, 'uninstall', async () => {
      const state = await this.registry.read()
      if (!state.ok) return state

      const existing = findPlugin(state.value, name)
      if (!existing) return Err(PluginError.notInstalled(name))

      try {
        await rm(existing.installPath, { recursive: true, force: true })
      } catch (e) {
        return Err(PluginError.io('remove', `Failed to remove ${existing.installPath}: ${errorMessage(e)}`, e))
      }

      // Directory is gone; if this write fails the record stays and list flags it
      const committed = await this.commit((current) =>
        findPlugin(current, existing.name)
          ? Ok(removePlugin(current, existing.name))
          : Err(PluginError.notInstalled(existing.name)),
      )
      if (!committed.ok) return committed

      return Ok(existing)
    })
  }

  async list(): Promise<Result<PluginListing, PluginError>> {
    const state = await this.registry.read()
    if (!state.ok) return state

    const plugins: ListedPlugin[] = []
    for (const plugin of state.value.plugins) {
      const present = await isDirectory(plugin.installPath)
      plugins.push({
        ...plugin,
        status: present ? 'ok' : 'inconsistent',
        issue: present
          ? null
          : PluginError.inconsistent(plugin.name, `install path ${plugin.installPath} is missing`),
      })
    }

    let untracked: string[]
    try {
      untracked = await this.untrackedDirectories(state.value)
    } catch (e) {
      return Err(PluginError.io('registry', `Failed to scan ${this.root}: ${errorMessage(e)}`, e))
    }

    return Ok({ root: this.root, registryPath: this.registry.location, plugins, untracked })
  }

  async get(name: string): Promise<Result<ListedPlugin, PluginError>> {
    const listing = await this.list()
    if (!listing.ok) return listing

    const key = name.toLowerCase()
    const plugin = listing.value.plugins.find((p) => p.name.toLowerCase() === key)
    return plugin ? Ok(plugin) : Err(PluginError.notInstalled(name))
  }

  // ── Pipeline ──

  private async deploy(
    name: string,
    source: PluginSource,
    existing: InstalledPlugin | null,
    mode: DeployMode,
  ): Promise<Result<Deployed, PluginError>> {
    const staged = await this.fetcher.fetch(source, name.toLowerCase())
    if (!staged.ok) return staged

    try {
      const verified = await verifyTree(staged.value.treePath, this.limits)
      if (!verified.ok) return verified

      const { manifest, warnings } = await readManifest(staged.value.treePath)
      const target = this.registry.pathFor(name)

      const published = await this.publish(staged.value.treePath, target, existing?.installPath ?? null, name)
      if (!published.ok) return published

      const now = this.now().toISOString()
      const plugin: InstalledPlugin = {
        name,
        source,
        resolvedRef: staged.value.resolvedRef,
        installPath: target,
        installedAt: mode === 'update' && existing ? existing.installedAt : now,
        updatedAt: now,
        version: manifest?.version ?? null,
        description: manifest?.description ?? null,
      }

      const committed = await this.commit((current) => Ok(upsertPlugin(current, plugin)))
      if (!committed.ok) {
        await published.value.rollback()
        return committed
      }

      await published.value.finalize()
      return Ok({ plugin, replaced: published.value.replaced || existing !== null, warnings })
    } finally {
      await staged.value.discard()
    }
  }

  /**
   * Move the staged tree into `target`, setting aside whatever currently
   * occupies `target` (and the previous record's path, if different).
   */
  private async publish(
    treePath: string,
    target: string,
    previousPath: string | null,
    name: string,
  ): Promise<Result<Publication, PluginError>> {
    const setAside: Array<{ original: string; backup: string }> = []
    const candidates = previousPath && previousPath !== target ? [previousPath, target] : [target]

    try {
      for (const original of candidates) {
        if (!(await exists(original))) continue
        const backup = join(this.root, TRASH_DIR, `${name.toLowerCase()}-${uuidv4()}`)
        await mkdir(join(this.root, TRASH_DIR), { recursive: true })
        await rename(original, backup)
        setAside.push({ original, backup })
      }
    } catch (e) {
      for (const entry of setAside.reverse()) await restore(entry.backup, entry.original)
      return Err(PluginError.install('publish', `Failed to move the existing installation aside: ${errorMessage(e)}`, e))
    }

    try {
      await moveDir(treePath, target)
    } catch (e) {
      for (const entry of setAside.reverse()) await restore(entry.backup, entry.original)
      return Err(PluginError.install('publish', `Failed to move ${name} into ${target}: ${errorMessage(e)}`, e))
    }

    return Ok({
      replaced: setAside.length > 0,
      rollback: async () => {
        await discardDir(target)
        for (const entry of [...setAside].reverse()) await restore(entry.backup, entry.original)
      },
      finalize: async () => {
        for (const entry of setAside) await discardDir(entry.backup)
      },
    })
  }

  /** Read-modify-write of the registry under the registry lock. */
  private async commit(
    mutate: (state: RegistryState) => Result<RegistryState, PluginError>,
  ): Promise<Result<void, PluginError>> {
    return withLock(join(this.root, LOCKS_DIR, 'registry.lock'), 'registry write', this.lockOptions, async () => {
      const state = await this.registry.read()
      if (!state.ok) return state

      const next = mutate(state.value)
      if (!next.ok) return next

      return this.registry.write(next.value)
    })
  }

  /**
   * Run `fn` holding the per-name lock, after sweeping leftovers of earlier
   * interrupted runs for the same name.
   */
  private async exclusive<T>(
    name: string,
    operation: 'install' | 'update' | 'uninstall',
    fn: () => Promise<Result<T, PluginError>>,
  ): Promise<Result<T, PluginError>> {
    const lockPath = join(this.root, LOCKS_DIR, `plugin-${name.toLowerCase()}.lock`)
    const stage: ErrorStage = operation === 'uninstall' ? 'remove' : 'publish'

    try {
      return await withLock(lockPath, `${operation} ${name}`, this.lockOptions, async () => {
        await this.sweepLeftovers(name)
        return fn()
      })
    } catch (e) {
      return Err(PluginError.io(stage, `Unexpected ${operation} error: ${errorMessage(e)}`, e))
    }
  }

  /**
   * Remove staging directories and set-aside copies left by a crashed run.
   * A set-aside copy whose original is missing is moved back instead.
   */
  private async sweepLeftovers(name: string): Promise<void> {
    const key = name.toLowerCase()
    const target = this.registry.pathFor(name)

    for (const dir of [STAGING_DIR, TRASH_DIR]) {
      const parent = join(this.root, dir)
      let entries: string[]
      try {
        entries = await readdir(parent)
      } catch (e) {
        if (errnoCode(e) === 'ENOENT') continue
        throw e
      }

      for (const entry of entries) {
        if (!UUID_SUFFIX.test(entry) || entry.replace(UUID_SUFFIX, '') !== key) continue
        const leftover = join(parent, entry)

        if (dir === TRASH_DIR && !(await exists(target))) {
          console.warn(`[plugin-manager] restoring ${target} from interrupted run (${entry})`)
          await restore(leftover, target)
          continue
        }
        console.warn(`[plugin-manager] removing leftover ${dir}/${entry}`)
        await discardDir(leftover)
      }
    }
  }

  private async untrackedDirectories(state: RegistryState): Promise<string[]> {
    let entries: Dirent[]
    try {
      entries = await readdir(this.root, { withFileTypes: true })
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return []
      throw e
    }

    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.') && !findPlugin(state, entry.name))
      .map((entry) => entry.name)
      .sort()
  }
}

/** Manager wired from environment configuration. */
export function createPluginManager(
  config: PluginyardConfig,
  overrides: Partial<Omit<PluginManagerOptions, 'root'>> = {},
): PluginManager {
  return new PluginManager({
    root: config.root,
    fetchTimeoutMs: config.fetchTimeoutMs,
    lock: { waitMs: config.lockWaitMs },
    limits: { maxFileCount: config.limits.maxFileCount, maxTotalBytes: config.limits.maxTotalBytes },
    ...overrides,
  })
}
