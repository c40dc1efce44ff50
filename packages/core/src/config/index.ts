export { loadConfig, defaultRoot, expandHome, ConfigError } from './config.js'
export type { PluginyardConfig } from './config.js'
