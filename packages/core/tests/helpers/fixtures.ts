import { cp, mkdir, readFile, readdir, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import type { CloneOptions, GitClient } from '../../src/fetch/index.js'

/** Write `files` (relative path → contents) under `dir`. */
export async function writeTree(dir: string, files: Record<string, string>): Promise<void> {
  await mkdir(dir, { recursive: true })
  for (const [path, content] of Object.entries(files)) {
    await mkdir(dirname(join(dir, path)), { recursive: true })
    await writeFile(join(dir, path), content)
  }
}

/** Directory entries, or [] when the directory does not exist. */
export async function entries(dir: string): Promise<string[]> {
  try {
    return (await readdir(dir)).sort()
  } catch {
    return []
  }
}

export interface FakeRevision {
  tree: string
  commit: string
}

/**
 * Git stand-in: "clones" by copying a fixture tree registered for a
 * url + ref, and records every call.
 */
export class FakeGitClient implements GitClient {
  readonly clones: Array<{ url: string; opts: CloneOptions }> = []
  readonly checkouts: string[] = []
  failWith: unknown = null
  private revisions = new Map<string, FakeRevision>()

  /** `ref` null registers the default branch. */
  set(url: string, ref: string | null, revision: FakeRevision): void {
    this.revisions.set(`${url}#${ref ?? 'HEAD'}`, revision)
  }

  async clone(url: string, dir: string, opts: CloneOptions): Promise<void> {
    this.clones.push({ url, opts })
    if (this.failWith !== null) throw this.failWith

    const revision = this.revisions.get(`${url}#${opts.ref ?? 'HEAD'}`)
    if (!revision) throw new Error(`Remote branch ${opts.ref ?? 'HEAD'} not found in ${url}`)

    await cp(revision.tree, dir, { recursive: true })
    await writeTree(join(dir, '.git'), { HEAD: revision.commit })
  }

  async checkout(dir: string, ref: string): Promise<void> {
    this.checkouts.push(ref)
    await writeFile(join(dir, '.git', 'HEAD'), ref)
  }

  async headCommit(dir: string): Promise<string> {
    return (await readFile(join(dir, '.git', 'HEAD'), 'utf-8')).trim()
  }
}
