#!/usr/bin/env -S node --import tsx
/**
 * pluginyard CLI entry point.
 *
 * Usage:
 *   pluginyard plugin list [--json]
 *   pluginyard plugin install <source> [--ref <ref>] [--repo-path <path>] [--name <name>] [-f]
 *   pluginyard plugin uninstall <name>
 *   pluginyard plugin update <name>
 *   pluginyard plugin info <name>
 */

import { resolve } from 'node:path'
import { createPluginManager, expandHome, loadConfig } from '@pluginyard/core'
import { run } from './program.js'

process.exitCode = await run(process.argv.slice(2), {
  io: {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  },
  openManager: (root) => {
    const config = loadConfig()
    return createPluginManager(root ? { ...config, root: resolve(expandHome(root)) } : config)
  },
})
