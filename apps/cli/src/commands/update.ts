/**
 * plugin update - re-fetch a plugin from its recorded source
 */

import { Command } from 'commander'
import { println, fail, warn } from '../context.js'
import type { CliContext, GlobalOptions } from '../context.js'
import { formatVersion, shortRef } from '../format.js'

export function updateCommand(ctx: CliContext): Command {
  return new Command('update')
    .description('Update an installed plugin from its recorded source and ref')
    .argument('<name>', 'Installed plugin name')
    .action(async (name: string, _options: Record<string, never>, cmd: Command) => {
      const manager = ctx.openManager(cmd.optsWithGlobals<GlobalOptions>().root)
      const result = await manager.update(name)
      if (!result.ok) return fail(ctx, result.error)

      const { plugin, previousRef, changed, warnings } = result.value
      warn(ctx, warnings)
      if (!changed) {
        println(ctx.io.stdout, `"${plugin.name}" is already up to date (${shortRef(plugin.resolvedRef)})`)
        return
      }
      println(ctx.io.stdout, `Updated "${plugin.name}" to ${formatVersion(plugin.version)}`)
      println(ctx.io.stdout, `  Ref: ${shortRef(previousRef)} -> ${shortRef(plugin.resolvedRef)}`)
    })
}
