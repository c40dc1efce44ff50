/**
 * Command tree: `pluginyard [--root <dir>] plugin <verb>`.
 */

import { Command, CommanderError } from 'commander'
import { errorMessage } from '@pluginyard/core'
import { println } from './context.js'
import type { CliContext, CliDeps } from './context.js'
import { infoCommand } from './commands/info.js'
import { installCommand } from './commands/install.js'
import { listCommand } from './commands/list.js'
import { uninstallCommand } from './commands/uninstall.js'
import { updateCommand } from './commands/update.js'

export const VERSION = '0.1.0'

function eachCommand(cmd: Command, fn: (c: Command) => void): void {
  fn(cmd)
  for (const sub of cmd.commands) eachCommand(sub, fn)
}

export function buildProgram(ctx: CliContext): Command {
  const plugin = new Command('plugin')
    .description('Manage installed plugins')
    .addCommand(listCommand(ctx))
    .addCommand(installCommand(ctx))
    .addCommand(uninstallCommand(ctx))
    .addCommand(updateCommand(ctx))
    .addCommand(infoCommand(ctx))

  // No verb: show what is available
  plugin.action(() => {
    ctx.io.stdout(plugin.helpInformation())
  })

  const program = new Command()
    .name('pluginyard')
    .description('Install, update and remove plugins from git remotes or local paths')
    .version(VERSION)
    .option('--root <dir>', 'Managed plugin root (overrides PLUGINYARD_HOME)')
    .addCommand(plugin)

  // Settings are not inherited through addCommand
  eachCommand(program, (cmd) => {
    cmd.exitOverride()
    cmd.configureOutput({
      writeOut: (text) => ctx.io.stdout(text),
      writeErr: (text) => ctx.io.stderr(text),
    })
  })

  return program
}

/** Parse `argv` (without the node and script entries) and return the exit code. */
export async function run(argv: string[], deps: CliDeps): Promise<number> {
  const ctx: CliContext = { ...deps, exitCode: 0 }
  const program = buildProgram(ctx)

  try {
    await program.parseAsync(argv, { from: 'user' })
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode
    println(ctx.io.stderr, `Error: ${errorMessage(e)}`)
    return 1
  }
  return ctx.exitCode
}
