/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const TimestampSchema = z.string().datetime()

export const FilePathSchema = z.string().min(1, 'File path cannot be empty')

export const PLUGIN_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/

export const PluginNameSchema = z.string().regex(PLUGIN_NAME_PATTERN)
