/**
 * Shared command context: output streams, manager factory and exit status.
 */

import { errorMessage } from '@pluginyard/core'
import type { PluginError, PluginManager } from '@pluginyard/core'

export interface Io {
  stdout(text: string): void
  stderr(text: string): void
}

export interface CliDeps {
  io: Io
  /** Manager for the managed root; `root` is the global --root option, if given. */
  openManager(root: string | undefined): PluginManager
}

export interface CliContext extends CliDeps {
  /** Exit code the last command settled on. */
  exitCode: number
}

export type GlobalOptions = {
  root?: string
}

export function println(write: (text: string) => void, line = ''): void {
  write(`${line}\n`)
}

export function formatError(error: PluginError): string {
  const lines = [`Error [${error.stage}]: ${error.message}`]
  if (error.cause !== undefined) lines.push(`  cause: ${errorMessage(error.cause)}`)
  return lines.join('\n')
}

export function fail(ctx: CliContext, error: PluginError): void {
  println(ctx.io.stderr, formatError(error))
  ctx.exitCode = 1
}

export function warn(ctx: CliContext, warnings: string[]): void {
  for (const warning of warnings) println(ctx.io.stderr, `Warning: ${warning}`)
}
