/**
 * Advisory lock files guarding per-plugin operations and registry writes.
 *
 * A lock is a file created with O_EXCL holding the owner's pid. Locks whose
 * owner process is gone are reclaimed.
 */

import { mkdir, readFile, rm, stat, writeFile } from 'node:fs/promises'
import { basename, dirname } from 'node:path'
import { setTimeout as sleep } from 'node:timers/promises'
import { v4 as uuidv4 } from 'uuid'
import { z } from 'zod'
import { Ok, Err, PluginError, errnoCode, errorMessage } from '../common/index.js'
import type { Result } from '../common/index.js'

export interface LockOptions {
  /** How long to wait for a held lock before giving up. */
  waitMs: number
  /** Fail immediately instead of waiting. */
  failFast: boolean
  pollMs: number
  /** Age after which an unreadable lock file counts as abandoned. */
  unreadableStaleMs: number
}

export const DEFAULT_LOCK_OPTIONS: LockOptions = {
  waitMs: 60_000,
  failFast: false,
  pollMs: 100,
  unreadableStaleMs: 30_000,
}

const LockInfoSchema = z.object({
  pid: z.number().int().positive(),
  token: z.string(),
  operation: z.string(),
  acquiredAt: z.string(),
})

type LockInfo = z.infer<typeof LockInfoSchema>

export interface LockHandle {
  readonly path: string
  release(): Promise<void>
}

type Holder =
  | { state: 'gone' }
  | { state: 'stale'; description: string }
  | { state: 'held'; description: string }

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (e) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(e) === 'EPERM'
  }
}

async function tryCreate(path: string, info: LockInfo): Promise<boolean> {
  try {
    await writeFile(path, JSON.stringify(info), { flag: 'wx' })
    return true
  } catch (e) {
    if (errnoCode(e) === 'EEXIST') return false
    throw e
  }
}

async function inspect(path: string, opts: LockOptions): Promise<Holder> {
  let text: string
  try {
    text = await readFile(path, 'utf-8')
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') return { state: 'gone' }
    throw e
  }

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch {
    json = null
  }

  const parsed = LockInfoSchema.safeParse(json)
  if (parsed.success) {
    const info = parsed.data
    const description = `pid ${info.pid}, ${info.operation}, since ${info.acquiredAt}`
    return isProcessAlive(info.pid) ? { state: 'held', description } : { state: 'stale', description }
  }

  // Owner may still be writing the file; only abandon it once it is old
  try {
    const age = Date.now() - (await stat(path)).mtimeMs
    return age > opts.unreadableStaleMs
      ? { state: 'stale', description: 'unreadable lock file' }
      : { state: 'held', description: 'unknown owner' }
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') return { state: 'gone' }
    throw e
  }
}

export async function acquireLock(
  path: string,
  operation: string,
  options: Partial<LockOptions> = {},
): Promise<Result<LockHandle, PluginError>> {
  const opts = { ...DEFAULT_LOCK_OPTIONS, ...options }
  const key = basename(path, '.lock')
  const info: LockInfo = {
    pid: process.pid,
    token: uuidv4(),
    operation,
    acquiredAt: new Date().toISOString(),
  }
  const deadline = Date.now() + opts.waitMs

  try {
    await mkdir(dirname(path), { recursive: true })

    for (;;) {
      if (await tryCreate(path, info)) {
        return Ok({ path, release: () => releaseLock(path, info.token) })
      }

      const holder = await inspect(path, opts)
      if (holder.state === 'gone') continue
      if (holder.state === 'stale') {
        console.warn(`[plugin-lock] reclaiming stale lock ${path} (${holder.description})`)
        await rm(path, { force: true })
        continue
      }
      if (opts.failFast || Date.now() >= deadline) {
        return Err(PluginError.inProgress(key, holder.description))
      }
      await sleep(opts.pollMs)
    }
  } catch (e) {
    return Err(PluginError.io('lock', `Failed to acquire lock ${path}: ${errorMessage(e)}`, e))
  }
}

async function releaseLock(path: string, token: string): Promise<void> {
  try {
    const current = LockInfoSchema.safeParse(JSON.parse(await readFile(path, 'utf-8')))
    // Reclaimed by someone else after we were presumed dead
    if (!current.success || current.data.token !== token) return
    await rm(path, { force: true })
  } catch (e) {
    if (errnoCode(e) === 'ENOENT') return
    console.warn(`[plugin-lock] failed to release ${path}: ${errorMessage(e)}`)
  }
}

/**
 * Run `fn` while holding the lock at `path`. The lock is released on every
 * exit path.
 */
export async function withLock<T>(
  path: string,
  operation: string,
  options: Partial<LockOptions>,
  fn: () => Promise<Result<T, PluginError>>,
): Promise<Result<T, PluginError>> {
  const lock = await acquireLock(path, operation, options)
  if (!lock.ok) return lock

  try {
    return await fn()
  } finally {
    await lock.value.release()
  }
}
