/**
 * plugin list - show installed plugins and untracked directories
 */

import { Command } from 'commander'
import { println, fail } from '../context.js'
import type { CliContext, GlobalOptions } from '../context.js'
import { formatListing, toJson } from '../format.js'

interface ListOptions {
  json?: boolean
}

export function listCommand(ctx: CliContext): Command {
  return new Command('list')
    .description('List installed plugins')
    .option('--json', 'Print the listing as JSON')
    .action(async (options: ListOptions, cmd: Command) => {
      const manager = ctx.openManager(cmd.optsWithGlobals<GlobalOptions>().root)
      const listing = await manager.list()
      if (!listing.ok) return fail(ctx, listing.error)

      if (options.json) {
        println(ctx.io.stdout, JSON.stringify(toJson(listing.value), null, 2))
        return
      }
      for (const line of formatListing(listing.value)) println(ctx.io.stdout, line)
    })
}
