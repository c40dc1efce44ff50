/**
 * Git access behind a small seam so the fetcher can be exercised without a
 * network or a git binary.
 */

import { simpleGit, GitPluginError } from 'simple-git'
import type { SimpleGit, SimpleGitOptions } from 'simple-git'

export interface CloneOptions {
  /** Branch or tag to clone; `null` clones the remote's default branch. */
  ref: string | null
  shallow: boolean
}

export interface GitClient {
  clone(url: string, dir: string, opts: CloneOptions): Promise<void>
  checkout(dir: string, ref: string): Promise<void>
  headCommit(dir: string): Promise<string>
}

const COMMIT_HASH = /^[0-9a-f]{7,40}$/i

export function isCommitHash(ref: string): boolean {
  return COMMIT_HASH.test(ref)
}

export function cloneArgs(opts: CloneOptions): string[] {
  if (!opts.shallow) return []
  return opts.ref ? ['--depth', '1', '--branch', opts.ref] : ['--depth', '1']
}

export function isGitTimeout(e: unknown): boolean {
  return e instanceof GitPluginError && e.plugin === 'timeout'
}

export class SimpleGitClient implements GitClient {
  constructor(private timeoutMs: number) {}

  private git(baseDir?: string): SimpleGit {
    const options: Partial<SimpleGitOptions> = { timeout: { block: this.timeoutMs } }
    if (baseDir) options.baseDir = baseDir
    // Never wait on an interactive credential prompt
    return simpleGit(options).env({ ...process.env, GIT_TERMINAL_PROMPT: '0' })
  }

  async clone(url: string, dir: string, opts: CloneOptions): Promise<void> {
    await this.git().clone(url, dir, cloneArgs(opts))
  }

  async checkout(dir: string, ref: string): Promise<void> {
    await this.git(dir).checkout(ref)
  }

  async headCommit(dir: string): Promise<string> {
    const sha = await this.git(dir).revparse(['HEAD'])
    return sha.trim()
  }
}
