/**
 * @file File Storage
 *
 * {@link KeyValueStorage} backed by one JSON file per key in a directory.
 * Writes go to a temporary file that is then renamed over the target, so a
 * crash mid-write leaves the previous value intact.
 *
 * @module @study-helper/offline-sync/storage/file-storage
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { KeyValueStorage } from './storage-adapter.js'

export interface FileStorageOptions {
  /** Directory holding the files; created on first write */
  directory: string
}

export class FileStorage implements KeyValueStorage {
  readonly directory: string

  constructor(options: FileStorageOptions) {
    this.directory = options.directory
  }

  /**
   * Path of the file holding `key`.
   */
  pathFor(key: string): string {
    return join(this.directory, `${encodeURIComponent(key)}.json`)
  }

  async getItem(key: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(key), 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        return null
      }
      throw error
    }
  }

  async setItem(key: string, value: string): Promise<void> {
    await mkdir(this.directory, { recursive: true })
    const path = this.pathFor(key)
    const tempPath = `${path}.${process.pid}.tmp`
    await writeFile(tempPath, value, 'utf8')
    await rename(tempPath, path)
  }

  async removeItem(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true })
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
