/**
 * @file Storage Adapter
 *
 * The persistence primitive the durable queue sits on. The interface mirrors
 * the Web Storage API, so `localStorage` satisfies it as-is, while async
 * backends such as {@link FileStorage} may return promises.
 *
 * Access goes through {@link readItem}, {@link writeItem} and
 * {@link removeItem}, which never throw: failures come back as a
 * {@link StorageResult} for the caller to branch on.
 *
 * @module @study-helper/offline-sync/storage/storage-adapter
 */

import { StorageReadError, StorageWriteError, toError } from '../errors.js'
import type { SyncError } from '../errors.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Get/set/remove of string values under string keys, sync or async.
 */
export interface KeyValueStorage {
  getItem(key: string): string | null | Promise<string | null>
  setItem(key: string, value: string): void | Promise<void>
  removeItem(key: string): void | Promise<void>
}

/**
 * Outcome of a storage access.
 */
export type StorageResult<T> = { ok: true; value: T } | { ok: false; error: SyncError }

// =============================================================================
// Result Helpers
// =============================================================================

export async function readItem(
  storage: KeyValueStorage,
  key: string
): Promise<StorageResult<string | null>> {
  try {
    const value = await storage.getItem(key)
    return { ok: true, value }
  } catch (error) {
    return { ok: false, error: new StorageReadError(key, { cause: toError(error) }) }
  }
}

export async function writeItem(
  storage: KeyValueStorage,
  key: string,
  value: string
): Promise<StorageResult<void>> {
  try {
    await storage.setItem(key, value)
    return { ok: true, value: undefined }
  } catch (error) {
    return { ok: false, error: new StorageWriteError(key, { cause: toError(error) }) }
  }
}

export async function removeItem(
  storage: KeyValueStorage,
  key: string
): Promise<StorageResult<void>> {
  try {
    await storage.removeItem(key)
    return { ok: true, value: undefined }
  } catch (error) {
    return { ok: false, error: new StorageWriteError(key, { cause: toError(error) }) }
  }
}

// =============================================================================
// Memory Storage
// =============================================================================

/**
 * Synchronous in-memory storage. Contents last as long as the instance, so
 * sharing one instance between two queues simulates a process restart.
 */
export class MemoryStorage implements KeyValueStorage {
  private readonly items = new Map<string, string>()

  getItem(key: string): string | null {
    return this.items.get(key) ?? null
  }

  setItem(key: string, value: string): void {
    this.items.set(key, value)
  }

  removeItem(key: string): void {
    this.items.delete(key)
  }

  get size(): number {
    return this.items.size
  }
}
