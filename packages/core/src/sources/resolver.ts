/**
 * Source resolver: turns a user-supplied source string into a typed
 * `PluginSource`.
 *
 * Precedence: github shorthand, http(s) git URL, ssh remote, existing local
 * path. The only I/O is the existence probe for local paths, which callers
 * may replace.
 */

import { existsSync } from 'node:fs'
import { basename, isAbsolute, resolve } from 'node:path'
import { Ok, Err, PluginError, PLUGIN_NAME_PATTERN } from '../common/index.js'
import type { Result } from '../common/index.js'
import { expandHome } from '../config/index.js'
import type { PluginSource, RemoteSourceKind } from './schemas.js'

const GITHUB_PREFIX = 'github:'
const GITHUB_REPO = /^([A-Za-z0-9][A-Za-z0-9-]{0,38})\/([A-Za-z0-9._-]+)$/
const SCP_REMOTE = /^[A-Za-z0-9._-]+@[A-Za-z0-9.-]+:[A-Za-z0-9._~-]+(?:\/[A-Za-z0-9._~-]+)+$/

export interface ResolveOptions {
  ref?: string | null
  /** Repository-relative subdirectory holding the plugin (monorepos). */
  repoPath?: string | null
  cwd?: string
  pathExists?: (path: string) => boolean
}

interface Classified {
  kind: RemoteSourceKind | 'local_path'
  location: string
}

function stripGitSuffix(name: string): string {
  return name.endsWith('.git') ? name.slice(0, -4) : name
}

function parseUrl(raw: string): URL | null {
  try {
    return new URL(raw)
  } catch {
    return null
  }
}

function hasRepoPath(url: URL): boolean {
  return url.hostname.length > 0 && url.pathname.replace(/\/+$/, '').length > 1
}

function classify(
  raw: string,
  cwd: string,
  pathExists: (path: string) => boolean,
): Result<Classified, PluginError> {
  if (raw.startsWith(GITHUB_PREFIX)) {
    const match = GITHUB_REPO.exec(raw.slice(GITHUB_PREFIX.length))
    if (!match) return Err(PluginError.invalidSource(raw))
    const repo = stripGitSuffix(match[2])
    if (!repo) return Err(PluginError.invalidSource(raw))
    return Ok({ kind: 'github_shorthand', location: `${match[1]}/${repo}` })
  }

  if (/^https?:\/\//i.test(raw)) {
    const url = parseUrl(raw)
    if (!url || !hasRepoPath(url)) return Err(PluginError.invalidSource(raw))
    return Ok({ kind: 'git_url', location: raw.replace(/\/+$/, '') })
  }

  if (/^ssh:\/\//i.test(raw)) {
    const url = parseUrl(raw)
    if (!url || !hasRepoPath(url)) return Err(PluginError.invalidSource(raw))
    return Ok({ kind: 'ssh_git_url', location: raw.replace(/\/+$/, '') })
  }

  if (SCP_REMOTE.test(raw)) {
    return Ok({ kind: 'ssh_git_url', location: raw })
  }

  const absolute = resolve(cwd, expandHome(raw))
  if (pathExists(absolute)) {
    return Ok({ kind: 'local_path', location: absolute })
  }

  return Err(PluginError.invalidSource(raw))
}

/**
 * Normalize a repository-relative path. `null` means the repository root.
 */
export function normalizeSubdir(repoPath: string | null | undefined): Result<string | null, PluginError> {
  const trimmed = repoPath?.trim() ?? ''
  if (!trimmed) return Ok(null)

  const segments = trimmed.split(/[\\/]+/)
  if (segments.includes('..')) {
    return Err(PluginError.unsafePath('resolve', `Repository path must not contain "..": ${trimmed}`))
  }
  if (isAbsolute(trimmed) || /^[\\/]/.test(trimmed) || /^[A-Za-z]:/.test(trimmed)) {
    return Err(PluginError.unsafePath('resolve', `Repository path must be relative: ${trimmed}`))
  }

  const normalized = segments.filter((s) => s !== '' && s !== '.').join('/')
  return Ok(normalized || null)
}

export function resolveSource(raw: string, opts: ResolveOptions = {}): Result<PluginSource, PluginError> {
  const text = raw.trim()
  if (!text) return Err(PluginError.invalidSource(raw))

  const classified = classify(text, opts.cwd ?? process.cwd(), opts.pathExists ?? existsSync)
  if (!classified.ok) return classified

  const subdir = normalizeSubdir(opts.repoPath)
  if (!subdir.ok) return subdir

  const ref = opts.ref?.trim() || null
  const { kind, location } = classified.value

  if (kind === 'local_path') {
    if (ref) return Err(PluginError.refNotApplicable(location))
    return Ok({ kind, location, ref: null, subdir: subdir.value })
  }

  return Ok({ kind, location, ref, subdir: subdir.value })
}

/** Remote URL git should clone for a remote source. */
export function cloneUrl(source: PluginSource): string {
  return source.kind === 'github_shorthand' ? `https://github.com/${source.location}.git` : source.location
}

/**
 * Default registry name: the subdirectory basename for monorepo installs,
 * otherwise the repository or directory name.
 */
export function deriveName(source: PluginSource): string {
  if (source.subdir) {
    const segments = source.subdir.split('/')
    return segments[segments.length - 1]
  }

  switch (source.kind) {
    case 'github_shorthand':
    case 'git_url':
    case 'ssh_git_url': {
      const segments = source.location.split(/[/:]/).filter(Boolean)
      return stripGitSuffix(segments[segments.length - 1] ?? '')
    }
    case 'local_path':
      return basename(source.location)
    default: {
      const unreachable: never = source
      return unreachable
    }
  }
}

export function validateName(name: string): Result<string, PluginError> {
  return PLUGIN_NAME_PATTERN.test(name) ? Ok(name) : Err(PluginError.invalidName(name))
}

export function describeSource(source: PluginSource): string {
  const origin = source.kind === 'github_shorthand' ? `${GITHUB_PREFIX}${source.location}` : source.location
  const ref = source.ref ? `#${source.ref}` : ''
  const subdir = source.subdir ? ` (${source.subdir})` : ''
  return `${origin}${ref}${subdir}`
}
