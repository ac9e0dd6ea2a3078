/**
 * @file Replay Engine
 *
 * Drains the durable queue against the remote apply endpoint, one record at a
 * time in FIFO order. The next record is not dispatched until the previous
 * one's outcome is written back to the queue.
 *
 * Per record:
 *
 * | Situation | Queue action | Tally |
 * |---|---|---|
 * | `retryCount >= maxRetries` before dispatch | remove | permanentFailures |
 * | earlier record for the same target failed this pass | none | deferred |
 * | applied | remove | appliedCount |
 * | conflict verdict | remove | conflicts |
 * | any error | retryCount + 1 | retryScheduled |
 *
 * Passes never overlap. A drain requested while one is running is folded
 * into a single follow-up pass that starts when the current one finishes.
 *
 * @module @study-helper/offline-sync/replay/replay-engine
 */

import { DEFAULT_MAX_RETRIES } from '../config.js'
import { RequestTimeoutError, isTransientError, toError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { DebugOption, Logger } from '../logger.js'
import { describeRecord } from '../mutation/mutation-record.js'
import type { DurableQueue } from '../queue/durable-queue.js'
import { readItem, writeItem } from '../storage/storage-adapter.js'
import type { KeyValueStorage } from '../storage/storage-adapter.js'
import type {
  ApplyRequest,
  ApplyResponse,
  ConflictEntry,
  MutationRecord,
  PermanentFailure,
  ReconciliationOutcome,
  RemoteApplyEndpoint,
  ServerChange,
} from '../types.js'

// =============================================================================
// Types
// =============================================================================

export type RecordResult = 'applied' | 'conflict' | 'retry' | 'failed' | 'deferred'

/**
 * Progress event emitted after each record of a pass is handled.
 */
export interface ReplayProgress {
  current: number
  total: number
  id: string
  result: RecordResult
}

export type OutcomeListener = (outcome: ReconciliationOutcome) => void

export interface ReplayEngineOptions {
  queue: DurableQueue
  endpoint: RemoteApplyEndpoint
  /** Failed dispatches allowed before a record is dropped */
  maxRetries?: number
  /** Timeout for each dispatch and change-feed pull, in ms */
  dispatchTimeoutMs?: number
  /**
   * Where the sync checkpoint is kept. Without it the checkpoint lives in
   * memory only.
   */
  checkpointStorage?: KeyValueStorage
  /** @default `${queue.storageKey}:checkpoint` */
  checkpointKey?: string
  now?: () => Date
  debug?: DebugOption
  onProgress?: (progress: ReplayProgress) => void
}

/**
 * Checkpoint reported when no sync has ever completed.
 */
export const INITIAL_CHECKPOINT = new Date(0).toISOString()

const DEFAULT_DISPATCH_TIMEOUT_MS = 10_000

// =============================================================================
// Replay Engine
// =============================================================================

export class ReplayEngine {
  readonly maxRetries: number
  readonly checkpointKey: string

  private readonly queue: DurableQueue
  private readonly endpoint: RemoteApplyEndpoint
  private readonly dispatchTimeoutMs: number
  private readonly checkpointStorage?: KeyValueStorage
  private readonly now: () => Date
  private readonly logger: Logger
  private readonly onProgress?: (progress: ReplayProgress) => void
  private readonly listeners = new Set<OutcomeListener>()

  private running?: Promise<ReconciliationOutcome>
  private followUp?: Promise<ReconciliationOutcome>
  private memoryCheckpoint?: string

  constructor(options: ReplayEngineOptions) {
    this.queue = options.queue
    this.endpoint = options.endpoint
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES
    this.dispatchTimeoutMs = options.dispatchTimeoutMs ?? DEFAULT_DISPATCH_TIMEOUT_MS
    this.checkpointStorage = options.checkpointStorage
    this.checkpointKey = options.checkpointKey ?? `${options.queue.storageKey}:checkpoint`
    this.now = options.now ?? (() => new Date())
    this.logger = createLogger(options.debug, 'ReplayEngine')
    this.onProgress = options.onProgress
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Run a drain pass, or join the follow-up pass if one is already running.
   * Never rejects.
   */
  drainNow(): Promise<ReconciliationOutcome> {
    // A pending follow-up owns the next pass, even after `running` cleared
    if (this.followUp) {
      return this.followUp
    }

    if (!this.running) {
      return this.startPass()
    }

    this.logger.debug('Drain already running, scheduling one follow-up pass')
    const followUp = this.running.then(() => {
      this.followUp = undefined
      return this.startPass()
    })
    this.followUp = followUp
    return followUp
  }

  get isDraining(): boolean {
    return this.running !== undefined || this.followUp !== undefined
  }

  /**
   * Subscribe to the outcome of every pass.
   *
   * @returns an unsubscribe function
   */
  onOutcome(listener: OutcomeListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * The checkpoint stored by the last successful sync, if any.
   */
  async getCheckpoint(): Promise<string | undefined> {
    if (!this.checkpointStorage) {
      return this.memoryCheckpoint
    }

    const read = await readItem(this.checkpointStorage, this.checkpointKey)
    if (!read.ok) {
      this.logger.error(read.error.message, { code: read.error.code })
      return this.memoryCheckpoint
    }
    return read.value ?? undefined
  }

  // ===========================================================================
  // Pass
  // ===========================================================================

  private startPass(): Promise<ReconciliationOutcome> {
    const startedAt = this.now().toISOString()
    const pass: Promise<ReconciliationOutcome> = this.runPass(startedAt)
      .catch((error: unknown) => {
        this.logger.error('Drain pass aborted', { error: toError(error).message })
        return this.emptyOutcome(startedAt, INITIAL_CHECKPOINT)
      })
      .then((outcome) => {
        this.emit(outcome)
        return outcome
      })
      .finally(() => {
        if (this.running === pass) {
          this.running = undefined
        }
      })

    this.running = pass
    return pass
  }

  private async runPass(startedAt: string): Promise<ReconciliationOutcome> {
    await this.queue.load()
    const snapshot = this.queue.peekAll()
    if (snapshot.length === 0) {
      return this.emptyOutcome(startedAt, (await this.getCheckpoint()) ?? startedAt)
    }

    this.logger.info(`Processing ${snapshot.length} pending mutation(s)`)

    let appliedCount = 0
    let retryScheduled = 0
    let deferred = 0
    const conflicts: ConflictEntry[] = []
    const permanentFailures: PermanentFailure[] = []
    const conflictChanges: ServerChange[] = []
    const failedTargets = new Set<string>()

    for (const [index, planned] of snapshot.entries()) {
      const progress = (result: RecordResult) =>
        this.reportProgress({ current: index + 1, total: snapshot.length, id: planned.id, result })

      // Re-read after every await: the record may have been removed meanwhile
      const record = this.queue.getById(planned.id)
      if (!record) {
        continue
      }

      if (failedTargets.has(record.target)) {
        deferred++
        this.logger.debug(`Deferred ${describeRecord(record)} behind an earlier failure`)
        progress('deferred')
        continue
      }

      if (record.retryCount >= this.maxRetries) {
        await this.queue.remove(record.id)
        permanentFailures.push(toPermanentFailure(record))
        this.logger.warn(`Max retries exceeded: ${describeRecord(record)}`, {
          id: record.id,
          lastError: record.lastError,
        })
        progress('failed')
        continue
      }

      let response: ApplyResponse
      try {
        response = await this.dispatch(record)
      } catch (error) {
        const err = toError(error)
        const retryCount = record.retryCount + 1
        await this.queue.updateRetryCount(record.id, retryCount, err.message)
        failedTargets.add(record.target)
        retryScheduled++
        this.logger.warn(
          `${isTransientError(err) ? 'Retry' : 'Rejected, retry'} ${retryCount}/${this.maxRetries}: ${describeRecord(record)}`,
          { id: record.id, error: err.message }
        )
        progress('retry')
        continue
      }

      await this.queue.remove(record.id)

      if (response.applied) {
        appliedCount++
        this.logger.info(`Applied ${describeRecord(record)}`, { id: record.id })
        progress('applied')
        continue
      }

      const { conflict } = response
      conflicts.push({
        id: record.id,
        method: record.method,
        target: record.target,
        clientTimestamp: record.baseUpdatedAt ?? null,
        serverTimestamp: conflict.serverUpdatedAt,
        resolution: 'server_wins',
        reason: conflict.reason,
        ...(conflict.serverRecord !== undefined ? { serverRecord: conflict.serverRecord } : {}),
      })
      if (conflict.serverRecord !== undefined) {
        conflictChanges.push({
          target: record.target,
          updatedAt: conflict.serverUpdatedAt,
          record: conflict.serverRecord,
        })
      }
      this.logger.warn(`Conflict on ${describeRecord(record)}: ${conflict.reason}`, {
        id: record.id,
        clientTimestamp: record.baseUpdatedAt,
        serverTimestamp: conflict.serverUpdatedAt,
      })
      progress('conflict')
    }

    const { serverChanges, syncCheckpoint } = await this.syncServerChanges(conflictChanges)

    const outcome: ReconciliationOutcome = {
      appliedCount,
      conflicts,
      permanentFailures,
      retryScheduled,
      deferred,
      serverChanges,
      syncCheckpoint,
      startedAt,
      finishedAt: this.now().toISOString(),
    }

    if (this.queue.size() === 0) {
      this.logger.info('All mutations processed')
    }
    return outcome
  }

  // ===========================================================================
  // Dispatch
  // ===========================================================================

  private dispatch(record: MutationRecord): Promise<ApplyResponse> {
    const request: ApplyRequest = {
      method: record.method,
      target: record.target,
      ...(record.payload !== undefined ? { payload: record.payload } : {}),
      ...(record.baseUpdatedAt !== undefined ? { baseUpdatedAt: record.baseUpdatedAt } : {}),
    }
    return withTimeout(record.target, this.dispatchTimeoutMs, (signal) => this.endpoint.apply(request, { signal }))
  }

  // ===========================================================================
  // Server Changes & Checkpoint
  // ===========================================================================

  private async syncServerChanges(
    conflictChanges: ServerChange[]
  ): Promise<{ serverChanges: ServerChange[]; syncCheckpoint: string }> {
    const pullChanges = this.endpoint.pullChanges?.bind(this.endpoint)
    if (!pullChanges) {
      const syncCheckpoint = this.now().toISOString()
      await this.storeCheckpoint(syncCheckpoint)
      return { serverChanges: conflictChanges, syncCheckpoint }
    }

    const since = await this.getCheckpoint()
    try {
      const page = await withTimeout('change feed', this.dispatchTimeoutMs, (signal) => pullChanges(since, { signal }))
      await this.storeCheckpoint(page.checkpoint)
      this.logger.debug(`Pulled ${page.changes.length} server change(s)`, { checkpoint: page.checkpoint })
      return { serverChanges: mergeServerChanges(page.changes, conflictChanges), syncCheckpoint: page.checkpoint }
    } catch (error) {
      this.logger.warn('Failed to pull server changes', { error: toError(error).message })
      return { serverChanges: conflictChanges, syncCheckpoint: since ?? INITIAL_CHECKPOINT }
    }
  }

  private async storeCheckpoint(checkpoint: string): Promise<void> {
    this.memoryCheckpoint = checkpoint
    if (!this.checkpointStorage) {
      return
    }

    const written = await writeItem(this.checkpointStorage, this.checkpointKey, checkpoint)
    if (!written.ok) {
      this.logger.error(written.error.message, { code: written.error.code })
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private emptyOutcome(startedAt: string, syncCheckpoint: string): ReconciliationOutcome {
    return {
      appliedCount: 0,
      conflicts: [],
      permanentFailures: [],
      retryScheduled: 0,
      deferred: 0,
      serverChanges: [],
      syncCheckpoint,
      startedAt,
      finishedAt: this.now().toISOString(),
    }
  }

  private reportProgress(progress: ReplayProgress): void {
    try {
      this.onProgress?.(progress)
    } catch (error) {
      this.logger.error('Progress callback threw', { error: toError(error).message })
    }
  }

  private emit(outcome: ReconciliationOutcome): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(outcome)
      } catch (error) {
        this.logger.error('Outcome listener threw', { error: toError(error).message })
      }
    }
  }
}

/**
 * Run an endpoint call with an abort signal that fires after `timeoutMs`.
 * Rejects with {@link RequestTimeoutError} on expiry even if the call
 * ignores the signal.
 */
export function withTimeout<T>(
  target: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController()

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort('timeout')
      reject(new RequestTimeoutError(timeoutMs, { target }))
    }, timeoutMs)

    run(controller.signal).then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      }
    )
  })
}

function toPermanentFailure(record: MutationRecord): PermanentFailure {
  return {
    id: record.id,
    method: record.method,
    target: record.target,
    retryCount: record.retryCount,
    enqueuedAt: record.enqueuedAt,
    ...(record.lastError !== undefined ? { lastError: record.lastError } : {}),
  }
}

/**
 * One entry per target, keeping the newest; order of first appearance.
 */
function mergeServerChanges(pulled: ServerChange[], fromConflicts: ServerChange[]): ServerChange[] {
  const byTarget = new Map<string, ServerChange>()
  for (const change of [...pulled, ...fromConflicts]) {
    const existing = byTarget.get(change.target)
    if (!existing || Date.parse(change.updatedAt) > Date.parse(existing.updatedAt)) {
      byTarget.set(change.target, change)
    }
  }
  return [...byTarget.values()]
}
