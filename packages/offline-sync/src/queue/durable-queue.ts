/**
 * @file Durable Queue
 *
 * Ordered store of pending mutation records that survives process restarts.
 * Every change is written through to a {@link KeyValueStorage} before the
 * returned promise settles.
 *
 * Storage failures never escape: an unreadable or corrupt stored queue loads
 * as empty (and is overwritten by the next write), and a failed write is
 * logged and dropped while the in-memory queue stays authoritative.
 *
 * Persisted format (version 1):
 *
 * ```json
 * { "version": 1, "mutations": [...], "lastModified": 1700000000000 }
 * ```
 *
 * A bare array is read as version 0, the format of older clients, and
 * migrated record by record.
 *
 * @module @study-helper/offline-sync/queue/durable-queue
 */

import { z } from 'zod'
import { DEFAULT_STORAGE_KEY } from '../config.js'
import { StorageCorruptionError, toError } from '../errors.js'
import type { SyncError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { DebugOption, Logger } from '../logger.js'
import { createMutationRecord, describeRecord, mutationRecordSchema } from '../mutation/mutation-record.js'
import type { MutationInput } from '../mutation/mutation-record.js'
import { mutationPayloadSchema } from '../mutation/schemas.js'
import { readItem, removeItem, writeItem } from '../storage/storage-adapter.js'
import type { KeyValueStorage, StorageResult } from '../storage/storage-adapter.js'
import type { MutationMethod, MutationRecord } from '../types.js'

// =============================================================================
// Types
// =============================================================================

export interface DurableQueueOptions {
  storage: KeyValueStorage
  /** Key the queue is stored under (default `offline_queue`) */
  storageKey?: string
  debug?: DebugOption
  /** Clock, used for record timestamps and `lastModified` */
  now?: () => Date
  /** Called for every storage failure after it has been logged */
  onStorageError?: (error: SyncError) => void
}

/**
 * Current persisted format.
 */
export interface PersistedQueue {
  version: 1
  mutations: MutationRecord[]
  lastModified: number
}

export const QUEUE_FORMAT_VERSION = 1

// =============================================================================
// Stored Format Schemas
// =============================================================================

const persistedQueueSchema = z.object({
  version: z.literal(QUEUE_FORMAT_VERSION),
  mutations: z.array(z.unknown()),
  lastModified: z.number().optional(),
})

/**
 * Item shape written by older clients: an HTTP verb, the request path, the
 * request body, a retry counter and an epoch-millisecond timestamp.
 */
const legacyItemSchema = z.object({
  id: z.union([z.string().min(1), z.number()]),
  method: z.string(),
  endpoint: z.string().min(1),
  data: mutationPayloadSchema.nullable().optional(),
  retries: z.number().int().nonnegative().optional(),
  timestamp: z.number(),
})

const LEGACY_METHODS: Record<string, MutationMethod> = {
  POST: 'CREATE',
  PUT: 'UPDATE',
  PATCH: 'UPDATE',
  DELETE: 'DELETE',
}

// =============================================================================
// Durable Queue
// =============================================================================

export class DurableQueue {
  readonly storageKey: string

  private readonly storage: KeyValueStorage
  private readonly logger: Logger
  private readonly now: () => Date
  private readonly onStorageError?: (error: SyncError) => void

  private records: MutationRecord[] = []
  private loadPromise?: Promise<void>
  private writeChain: Promise<void> = Promise.resolve()

  constructor(options: DurableQueueOptions) {
    this.storage = options.storage
    this.storageKey = options.storageKey ?? DEFAULT_STORAGE_KEY
    this.logger = createLogger(options.debug, 'DurableQueue')
    this.now = options.now ?? (() => new Date())
    this.onStorageError = options.onStorageError
  }

  /**
   * Create a queue and load whatever was persisted under its key.
   */
  static async open(options: DurableQueueOptions): Promise<DurableQueue> {
    const queue = new DurableQueue(options)
    await queue.load()
    return queue
  }

  // ===========================================================================
  // Loading
  // ===========================================================================

  /**
   * Load the persisted queue, replacing the in-memory state. Only the first
   * call reads storage; later calls share its result.
   */
  load(): Promise<void> {
    if (!this.loadPromise) {
      this.loadPromise = this.readFromStorage()
    }
    return this.loadPromise
  }

  private async readFromStorage(): Promise<void> {
    const read = await readItem(this.storage, this.storageKey)
    if (!read.ok) {
      this.reportStorageError(read.error)
      this.records = []
      return
    }

    if (read.value === null) {
      this.records = []
      return
    }

    const decoded = this.decode(read.value)
    if (!decoded.ok) {
      this.reportStorageError(decoded.error)
      this.records = []
      return
    }

    this.records = decoded.value
    this.logger.debug(`Restored ${this.records.length} pending mutation(s)`)
  }

  private decode(raw: string): StorageResult<MutationRecord[]> {
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      return {
        ok: false,
        error: new StorageCorruptionError(this.storageKey, 'not valid JSON', { cause: toError(error) }),
      }
    }

    let items: unknown[]
    if (Array.isArray(parsed)) {
      items = parsed
    } else {
      const envelope = persistedQueueSchema.safeParse(parsed)
      if (!envelope.success) {
        return {
          ok: false,
          error: new StorageCorruptionError(this.storageKey, 'unrecognized queue format'),
        }
      }
      items = envelope.data.mutations
    }

    const records: MutationRecord[] = []
    const seen = new Set<string>()

    items.forEach((item, index) => {
      const record = decodeItem(item)
      if (!record) {
        this.logger.warn('Dropping invalid stored mutation', { index })
        return
      }
      if (seen.has(record.id)) {
        this.logger.warn('Dropping duplicate stored mutation', { id: record.id })
        return
      }
      seen.add(record.id)
      records.push(record)
    })

    return { ok: true, value: records }
  }

  // ===========================================================================
  // Queue Operations
  // ===========================================================================

  /**
   * Validate a write, append it to the tail and persist.
   *
   * @returns the new record's id
   * @throws {PayloadValidationError} when the payload is malformed
   */
  async enqueue(input: MutationInput): Promise<string> {
    await this.load()

    const record = createMutationRecord(input, { now: this.now })
    this.records.push(record)
    this.logger.info(`Enqueued ${describeRecord(record)}`, { id: record.id })

    await this.persist()
    return record.id
  }

  /**
   * Snapshot of the pending records in FIFO order.
   */
  peekAll(): MutationRecord[] {
    return [...this.records]
  }

  getById(id: string): MutationRecord | undefined {
    return this.records.find((record) => record.id === id)
  }

  /**
   * Remove a record. Removing an absent id is a no-op.
   *
   * @returns whether a record was removed
   */
  async remove(id: string): Promise<boolean> {
    await this.load()

    const index = this.records.findIndex((record) => record.id === id)
    if (index === -1) {
      return false
    }

    this.records.splice(index, 1)
    await this.persist()
    return true
  }

  /**
   * Overwrite a record's retry count and remember the error that caused it.
   *
   * An absent id is only logged: a concurrent pass may have removed it. A
   * count lower than the current one is refused.
   *
   * @returns whether the record was updated
   */
  async updateRetryCount(id: string, retryCount: number, lastError?: string): Promise<boolean> {
    await this.load()

    const index = this.records.findIndex((record) => record.id === id)
    const current = this.records[index]
    if (!current) {
      this.logger.debug('updateRetryCount: no pending mutation with this id', { id })
      return false
    }

    if (retryCount < current.retryCount) {
      this.logger.warn('updateRetryCount: refusing to lower retry count', {
        id,
        current: current.retryCount,
        requested: retryCount,
      })
      return false
    }

    this.records[index] = {
      ...current,
      retryCount,
      ...(lastError !== undefined ? { lastError } : {}),
    }
    await this.persist()
    return true
  }

  /**
   * Number of pending records.
   */
  size(): number {
    return this.records.length
  }

  /**
   * Drop every pending record and delete the stored entry.
   */
  async clear(): Promise<void> {
    await this.load()

    const cleared = this.records.length
    this.records = []
    await this.chainWrite(() => removeItem(this.storage, this.storageKey))
    this.logger.info(`Cleared ${cleared} pending mutation(s)`)
  }

  /**
   * Resolves once every write issued so far has finished.
   */
  flush(): Promise<void> {
    return this.writeChain
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  private persist(): Promise<void> {
    const snapshot: PersistedQueue = {
      version: QUEUE_FORMAT_VERSION,
      mutations: [...this.records],
      lastModified: this.now().getTime(),
    }
    const serialized = JSON.stringify(snapshot)
    return this.chainWrite(() => writeItem(this.storage, this.storageKey, serialized))
  }

  /**
   * Writes are chained so a slow write never lands after a newer one.
   */
  private chainWrite(write: () => Promise<StorageResult<void>>): Promise<void> {
    this.writeChain = this.writeChain.then(async () => {
      const result = await write()
      if (!result.ok) {
        this.reportStorageError(result.error)
      }
    })
    return this.writeChain
  }

  private reportStorageError(error: SyncError): void {
    this.logger.error(error.message, { code: error.code })
    try {
      this.onStorageError?.(error)
    } catch (hookError) {
      this.logger.error('Storage error hook threw', { error: toError(hookError).message })
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

function decodeItem(item: unknown): MutationRecord | undefined {
  const current = mutationRecordSchema.safeParse(item)
  if (current.success) {
    return hasPayloadForMethod(current.data) ? current.data : undefined
  }

  const legacy = legacyItemSchema.safeParse(item)
  if (!legacy.success) {
    return undefined
  }

  const method = LEGACY_METHODS[legacy.data.method.toUpperCase()]
  if (!method) {
    return undefined
  }

  const enqueuedAt = new Date(legacy.data.timestamp)
  if (Number.isNaN(enqueuedAt.getTime())) {
    return undefined
  }

  const payload = method === 'DELETE' ? undefined : (legacy.data.data ?? undefined)
  const record: MutationRecord = {
    id: String(legacy.data.id),
    method,
    target: legacy.data.endpoint,
    retryCount: legacy.data.retries ?? 0,
    enqueuedAt: enqueuedAt.toISOString(),
    ...(payload !== undefined ? { payload } : {}),
  }
  return hasPayloadForMethod(record) ? record : undefined
}

function hasPayloadForMethod(record: MutationRecord): boolean {
  return record.method === 'DELETE' ? record.payload === undefined : record.payload !== undefined
}
