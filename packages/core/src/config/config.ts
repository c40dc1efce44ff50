/**
 * Environment-driven configuration for the plugin manager.
 */

import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { z } from 'zod'

const ConfigEnvSchema = z.object({
  PLUGINYARD_HOME: z.string().min(1).optional(),
  PLUGINYARD_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  PLUGINYARD_LOCK_WAIT_MS: z.coerce.number().int().nonnegative().default(60_000),
  PLUGINYARD_MAX_FILES: z.coerce.number().int().positive().default(10_000),
  PLUGINYARD_MAX_BYTES: z.coerce.number().int().positive().default(256 * 1024 * 1024),
})

export interface PluginyardConfig {
  /** Managed root: one directory per plugin plus the registry document. */
  root: string
  fetchTimeoutMs: number
  lockWaitMs: number
  limits: {
    maxFileCount: number
    maxTotalBytes: number
  }
}

export class ConfigError extends Error {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export function defaultRoot(): string {
  return join(homedir(), '.pluginyard', 'plugins')
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PluginyardConfig {
  const parsed = ConfigEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }
  const vars = parsed.data

  return {
    root: vars.PLUGINYARD_HOME ? resolve(expandHome(vars.PLUGINYARD_HOME)) : defaultRoot(),
    fetchTimeoutMs: vars.PLUGINYARD_FETCH_TIMEOUT_MS,
    lockWaitMs: vars.PLUGINYARD_LOCK_WAIT_MS,
    limits: {
      maxFileCount: vars.PLUGINYARD_MAX_FILES,
      maxTotalBytes: vars.PLUGINYARD_MAX_BYTES,
    },
  }
}

export function expandHome(path: string): string {
  if (path === '~') return homedir()
  if (path.startsWith('~/')) return join(homedir(), path.slice(2))
  return path
}
