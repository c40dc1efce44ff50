/**
 * @pluginyard/core
 *
 * Local plugin package manager: source resolution, fetching, the installed
 * plugin registry and the install/update/uninstall pipeline.
 */

export * from './common/index.js'
export * from './config/index.js'
export * from './sources/index.js'
export * from './fetch/index.js'
export * from './registry/index.js'
export * from './install/index.js'
