/**
 * Backing stores for the registry document.
 */

import { open, readFile, rename, rm, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { v4 as uuidv4 } from 'uuid'
import { errnoCode } from '../common/index.js'

export interface RegistryStore {
  /** Where the document lives, for diagnostics. */
  readonly location: string
  /** Raw document text, or `null` when nothing has been written yet. */
  read(): Promise<string | null>
  /** Replace the whole document; either the old or the new text survives a crash. */
  write(text: string): Promise<void>
}

export class FileRegistryStore implements RegistryStore {
  constructor(readonly location: string) {}

  async read(): Promise<string | null> {
    try {
      return await readFile(this.location, 'utf-8')
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return null
      throw e
    }
  }

  async write(text: string): Promise<void> {
    await mkdir(dirname(this.location), { recursive: true })
    const tempPath = `${this.location}.${uuidv4()}.tmp`

    try {
      const handle = await open(tempPath, 'wx')
      try {
        await handle.writeFile(text, 'utf-8')
        await handle.sync()
      } finally {
        await handle.close()
      }
      await rename(tempPath, this.location)
    } catch (e) {
      await rm(tempPath, { force: true })
      throw e
    }
  }
}

export class MemoryRegistryStore implements RegistryStore {
  readonly location = 'memory'

  constructor(private text: string | null = null) {}

  async read(): Promise<string | null> {
    return this.text
  }

  async write(text: string): Promise<void> {
    this.text = text
  }
}
