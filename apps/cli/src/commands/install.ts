/**
 * plugin install - fetch a plugin source and register it
 */

import { Command } from 'commander'
import { describeSource } from '@pluginyard/core'
import { println, fail, warn } from '../context.js'
import type { CliContext, GlobalOptions } from '../context.js'
import { formatVersion, shortRef } from '../format.js'

interface InstallOptions {
  ref?: string
  repoPath?: string
  name?: string
  force?: boolean
}

export function installCommand(ctx: CliContext): Command {
  return new Command('install')
    .description('Install a plugin from github:<owner>/<repo>, a git URL, an ssh remote or a local path')
    .argument('<source>', 'Plugin source')
    .option('--ref <ref>', 'Branch, tag or commit to install (remote sources only)')
    .option('--repo-path <path>', 'Subdirectory of the repository that holds the plugin')
    .option('--name <name>', 'Name to register the plugin under')
    .option('-f, --force', 'Replace an existing installation with the same name')
    .action(async (source: string, options: InstallOptions, cmd: Command) => {
      const manager = ctx.openManager(cmd.optsWithGlobals<GlobalOptions>().root)
      println(ctx.io.stdout, `Installing plugin from ${source}...`)

      const result = await manager.install({
        source,
        ref: options.ref,
        repoPath: options.repoPath,
        name: options.name,
        force: options.force === true,
      })
      if (!result.ok) return fail(ctx, result.error)

      const { plugin, replaced, warnings } = result.value
      warn(ctx, warnings)
      println(ctx.io.stdout, `${replaced ? 'Reinstalled' : 'Installed'} "${plugin.name}" ${formatVersion(plugin.version)}`)
      if (plugin.description) println(ctx.io.stdout, `  ${plugin.description}`)
      println(ctx.io.stdout, `  Source: ${describeSource(plugin.source)}`)
      println(ctx.io.stdout, `  Ref: ${shortRef(plugin.resolvedRef)}`)
      println(ctx.io.stdout, `  Installed to: ${plugin.installPath}`)
    })
}
