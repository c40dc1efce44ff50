import { Command } from 'commander'
import { println, fail } from '../context.js'
import type { CliContext, GlobalOptions } from '../context.js'
import { formatDetails } from '../format.js'

export function infoCommand(ctx: CliContext): Command {
  return new Command('info')
    .description('Show details of an installed plugin')
    .argument('<name>', 'Installed plugin name')
    .action(async (name: string, _options: Record<string, never>, cmd: Command) => {
      const manager = ctx.openManager(cmd.optsWithGlobals<GlobalOptions>().root)
      const result = await manager.get(name)
      if (!result.ok) return fail(ctx, result.error)

      for (const line of formatDetails(result.value)) println(ctx.io.stdout, line)
    })
}
