/**
 * plugin uninstall - remove a plugin and its registry record
 */

import { Command } from 'commander'
import { println, fail } from '../context.js'
import type { CliContext, GlobalOptions } from '../context.js'

export function uninstallCommand(ctx: CliContext): Command {
  return new Command('uninstall')
    .description('Uninstall a plugin')
    .argument('<name>', 'Installed plugin name')
    .action(async (name: string, _options: Record<string, never>, cmd: Command) => {
      const manager = ctx.openManager(cmd.optsWithGlobals<GlobalOptions>().root)
      const result = await manager.uninstall(name)
      if (!result.ok) return fail(ctx, result.error)

      println(ctx.io.stdout, `Uninstalled "${result.value.name}"`)
    })
}
