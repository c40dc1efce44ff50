/**
 * Typed error class for plugin manager operations.
 *
 * Every error names the pipeline stage that failed so callers can report
 * where an operation stopped.
 */

export type ErrorCode =
  | 'INVALID_SOURCE_FORMAT'
  | 'UNSAFE_PATH'
  | 'REF_NOT_APPLICABLE'
  | 'INVALID_NAME'
  | 'SUBDIR_NOT_FOUND'
  | 'FETCH_FAILED'
  | 'NAME_CONFLICT'
  | 'NOT_INSTALLED'
  | 'INSTALL_FAILED'
  | 'CORRUPT_REGISTRY'
  | 'REGISTRY_WRITE_FAILED'
  | 'INCONSISTENT'
  | 'OPERATION_IN_PROGRESS'
  | 'IO_ERROR'

export type ErrorStage = 'resolve' | 'lock' | 'fetch' | 'verify' | 'publish' | 'remove' | 'registry'

export class PluginError extends Error {
  readonly code: ErrorCode
  readonly stage: ErrorStage

  constructor(code: ErrorCode, stage: ErrorStage, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = 'PluginError'
    this.code = code
    this.stage = stage
  }

  static invalidSource(raw: string): PluginError {
    return new PluginError(
      'INVALID_SOURCE_FORMAT',
      'resolve',
      `Unrecognized plugin source: "${raw}" (expected github:<owner>/<repo>, a git URL, user@host:owner/repo, or an existing path)`,
    )
  }

  static unsafePath(stage: ErrorStage, message: string): PluginError {
    return new PluginError('UNSAFE_PATH', stage, message)
  }

  static refNotApplicable(path: string): PluginError {
    return new PluginError('REF_NOT_APPLICABLE', 'resolve', `--ref cannot be used with a local path: ${path}`)
  }

  static invalidName(name: string): PluginError {
    return new PluginError(
      'INVALID_NAME',
      'resolve',
      `Invalid plugin name "${name}": use letters, digits, ".", "_" or "-", starting with a letter or digit`,
    )
  }

  static subdirNotFound(subdir: string, location: string): PluginError {
    return new PluginError('SUBDIR_NOT_FOUND', 'fetch', `Repository path "${subdir}" not found in ${location}`)
  }

  static fetch(message: string, cause?: unknown): PluginError {
    return new PluginError('FETCH_FAILED', 'fetch', message, cause)
  }

  static nameConflict(name: string, detail = 'is already installed'): PluginError {
    return new PluginError('NAME_CONFLICT', 'registry', `Plugin "${name}" ${detail}; use --force to replace it`)
  }

  static notInstalled(name: string): PluginError {
    return new PluginError('NOT_INSTALLED', 'registry', `Plugin "${name}" is not installed`)
  }

  static install(stage: 'verify' | 'publish', message: string, cause?: unknown): PluginError {
    return new PluginError('INSTALL_FAILED', stage, message, cause)
  }

  static corruptRegistry(message: string, cause?: unknown): PluginError {
    return new PluginError('CORRUPT_REGISTRY', 'registry', `Plugin registry is corrupt: ${message}`, cause)
  }

  static registryWrite(message: string, cause?: unknown): PluginError {
    return new PluginError('REGISTRY_WRITE_FAILED', 'registry', message, cause)
  }

  static inconsistent(name: string, message: string): PluginError {
    return new PluginError('INCONSISTENT', 'registry', `Plugin "${name}" is inconsistent: ${message}`)
  }

  static io(stage: ErrorStage, message: string, cause?: unknown): PluginError {
    return new PluginError('IO_ERROR', stage, message, cause)
  }

  static inProgress(key: string, holder: string): PluginError {
    return new PluginError('OPERATION_IN_PROGRESS', 'lock', `Another operation holds the lock for ${key} (${holder})`)
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}

/** Node system error code (`ENOENT`, `EXDEV`, ...) of an unknown thrown value. */
export function errnoCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return e.code
  }
  return undefined
}
