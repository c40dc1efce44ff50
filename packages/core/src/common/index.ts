/**
 * Common utilities: shared types, Result pattern, error handling.
 */

export { Ok, Err, unwrap, isOk, isErr } from './result.js'
export type { Result } from './result.js'

export { PluginError, errorMessage, errnoCode } from './errors.js'
export type { ErrorCode, ErrorStage } from './errors.js'

export { TimestampSchema, FilePathSchema, PluginNameSchema, PLUGIN_NAME_PATTERN } from './schemas.js'
