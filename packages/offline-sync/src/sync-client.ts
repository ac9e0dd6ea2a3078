/**
 * @file Sync Client
 *
 * The runtime context that owns one durable queue and wires it to the replay
 * engine, the connectivity monitor and the write path. Application code talks
 * to this object only.
 *
 * @example
 * ```typescript
 * const client = await createHttpSyncClient(loadSyncConfigFromEnv(), {
 *   storage: new FileStorage({ directory: '.sync' }),
 * })
 * client.onOutcome((outcome) => notifyUser(outcome))
 * client.start()
 *
 * const result = await client.submit('UPDATE', '/api/v1/notes/1', { title: 'Week 3' }, {
 *   baseUpdatedAt: note.updated_at,
 * })
 * if (result.status === 'queued') showBadge(client.pendingCount())
 * ```
 *
 * @module @study-helper/offline-sync/sync-client
 */

import { resolveSyncConfig } from './config.js'
import type { SyncConfig, SyncConfigInput } from './config.js'
import { ConnectivityMonitor } from './connectivity/connectivity-monitor.js'
import type { DrainTrigger } from './connectivity/connectivity-monitor.js'
import { createProbeReachability } from './connectivity/reachability.js'
import type { NetworkStatusChange, ReachabilitySource } from './connectivity/reachability.js'
import { ConfigError, isTransientError, toError } from './errors.js'
import { createLogger } from './logger.js'
import type { Logger } from './logger.js'
import { validateBaseUpdatedAt, validateMutationInput } from './mutation/resource-payloads.js'
import { DurableQueue } from './queue/durable-queue.js'
import { ReplayEngine, withTimeout } from './replay/replay-engine.js'
import type { OutcomeListener, ReplayProgress } from './replay/replay-engine.js'
import type { KeyValueStorage } from './storage/storage-adapter.js'
import { HttpTransport } from './transport/http-transport.js'
import type {
  ApplyRequest,
  ConflictVerdict,
  MutationMethod,
  MutationPayload,
  ReconciliationOutcome,
  RemoteApplyEndpoint,
} from './types.js'

// =============================================================================
// Types
// =============================================================================

export interface SyncClientOptions {
  endpoint: RemoteApplyEndpoint
  storage: KeyValueStorage
  reachability: ReachabilitySource
  config?: SyncConfigInput
  now?: () => Date
  onStatusChange?: (change: NetworkStatusChange) => void
  onProgress?: (progress: ReplayProgress) => void
}

export interface WriteOptions {
  /** The resource's `updatedAt` as the client last saw it */
  baseUpdatedAt?: string
}

/**
 * What happened to a write submitted through {@link SyncClient.submit}.
 */
export type SubmitResult =
  | { status: 'applied'; updatedAt: string; record?: MutationPayload }
  | { status: 'queued'; id: string }
  | { status: 'conflict'; conflict: ConflictVerdict }
  | { status: 'failed'; error: Error }

// =============================================================================
// Sync Client
// =============================================================================

export class SyncClient {
  readonly config: SyncConfig
  readonly queue: DurableQueue
  readonly engine: ReplayEngine
  readonly monitor: ConnectivityMonitor

  private readonly endpoint: RemoteApplyEndpoint
  private readonly reachability: ReachabilitySource
  private readonly logger: Logger
  private disposed = false

  constructor(options: SyncClientOptions) {
    this.config = resolveSyncConfig(options.config)
    this.endpoint = options.endpoint
    this.reachability = options.reachability
    this.logger = createLogger(this.config.debug, 'SyncClient')

    this.queue = new DurableQueue({
      storage: options.storage,
      storageKey: this.config.storageKey,
      debug: this.config.debug,
      ...(options.now ? { now: options.now } : {}),
    })

    this.engine = new ReplayEngine({
      queue: this.queue,
      endpoint: options.endpoint,
      maxRetries: this.config.maxRetries,
      dispatchTimeoutMs: this.config.dispatchTimeoutMs,
      checkpointStorage: options.storage,
      debug: this.config.debug,
      ...(options.now ? { now: options.now } : {}),
      ...(options.onProgress ? { onProgress: options.onProgress } : {}),
    })

    this.monitor = new ConnectivityMonitor({
      reachability: options.reachability,
      engine: this.engine,
      debug: this.config.debug,
      ...(options.onStatusChange ? { onStatusChange: options.onStatusChange } : {}),
      onDrain: (outcome, trigger) => this.logDrain(outcome, trigger),
    })
  }

  /**
   * Create a client and load its persisted queue.
   */
  static async create(options: SyncClientOptions): Promise<SyncClient> {
    const client = new SyncClient(options)
    await client.queue.load()
    return client
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start watching reachability. Drains immediately if already online.
   */
  start(): void {
    if (this.disposed) {
      throw new Error('SyncClient has been disposed')
    }
    this.monitor.start()
  }

  /**
   * Stop watching reachability. Pending records stay persisted.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return
    this.disposed = true
    this.monitor.stop()
    this.reachability.dispose()
    await this.queue.flush()
  }

  // ===========================================================================
  // Write Path
  // ===========================================================================

  /**
   * Attempt a write against the server, queueing it when that is not
   * possible right now.
   *
   * Writes go straight to the queue while offline, and also while earlier
   * writes to the same target are still pending, so they replay in order.
   *
   * @throws {PayloadValidationError} when the payload is malformed
   */
  async submit(
    method: MutationMethod,
    target: string,
    payload?: MutationPayload,
    options: WriteOptions = {}
  ): Promise<SubmitResult> {
    validateMutationInput(method, target, payload)
    validateBaseUpdatedAt(target, options.baseUpdatedAt)
    await this.queue.load()

    if (!this.reachability.isOnline()) {
      return this.queueWrite(method, target, payload, options)
    }

    if (this.queue.peekAll().some((record) => record.target === target)) {
      this.logger.debug(`Queueing ${method} ${target} behind pending writes`)
      return this.queueWrite(method, target, payload, options)
    }

    const request: ApplyRequest = {
      method,
      target,
      ...(payload !== undefined ? { payload } : {}),
      ...(options.baseUpdatedAt !== undefined ? { baseUpdatedAt: options.baseUpdatedAt } : {}),
    }

    try {
      const response = await withTimeout(target, this.config.dispatchTimeoutMs, (signal) =>
        this.endpoint.apply(request, { signal })
      )
      if (response.applied) {
        return {
          status: 'applied',
          updatedAt: response.updatedAt,
          ...(response.record !== undefined ? { record: response.record } : {}),
        }
      }
      return { status: 'conflict', conflict: response.conflict }
    } catch (error) {
      if (isTransientError(error)) {
        this.logger.info(`Server unreachable, queueing ${method} ${target}`, {
          error: toError(error).message,
        })
        return this.queueWrite(method, target, payload, options)
      }
      this.logger.warn(`${method} ${target} failed`, { error: toError(error).message })
      return { status: 'failed', error: toError(error) }
    }
  }

  /**
   * Queue a write without attempting it first.
   *
   * @returns the record id
   * @throws {PayloadValidationError} when the payload is malformed
   */
  enqueue(
    method: MutationMethod,
    target: string,
    payload?: MutationPayload,
    options: WriteOptions = {}
  ): Promise<string> {
    return this.queue.enqueue({
      method,
      target,
      ...(payload !== undefined ? { payload } : {}),
      ...(options.baseUpdatedAt !== undefined ? { baseUpdatedAt: options.baseUpdatedAt } : {}),
    })
  }

  // ===========================================================================
  // Replay
  // ===========================================================================

  /**
   * Run a drain pass now (or join the one already scheduled).
   */
  drainNow(): Promise<ReconciliationOutcome> {
    return this.engine.drainNow()
  }

  pendingCount(): number {
    return this.queue.size()
  }

  isOnline(): boolean {
    return this.reachability.isOnline()
  }

  /**
   * Subscribe to every pass's outcome, whatever triggered it.
   */
  onOutcome(listener: OutcomeListener): () => void {
    return this.engine.onOutcome(listener)
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async queueWrite(
    method: MutationMethod,
    target: string,
    payload: MutationPayload | undefined,
    options: WriteOptions
  ): Promise<SubmitResult> {
    const id = await this.enqueue(method, target, payload, options)
    return { status: 'queued', id }
  }

  private logDrain(outcome: ReconciliationOutcome, trigger: DrainTrigger): void {
    const total = outcome.appliedCount + outcome.conflicts.length + outcome.permanentFailures.length
    if (total === 0 && outcome.retryScheduled === 0) {
      return
    }
    this.logger.info(`Drain after ${trigger} finished`, {
      applied: outcome.appliedCount,
      conflicts: outcome.conflicts.length,
      permanentFailures: outcome.permanentFailures.length,
      retryScheduled: outcome.retryScheduled,
      pending: this.queue.size(),
    })
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export interface HttpSyncClientOptions {
  storage: KeyValueStorage
  /** Defaults to probing `config.healthPath` every `config.probeIntervalMs` */
  reachability?: ReachabilitySource
  /** Path of the server's change feed, if it has one */
  changesPath?: string
  now?: () => Date
  onStatusChange?: (change: NetworkStatusChange) => void
}

/**
 * Build a client that talks to the REST API at `config.baseUrl`.
 *
 * @throws {ConfigError} when the configuration is invalid or has no baseUrl
 */
export async function createHttpSyncClient(
  config: SyncConfigInput,
  options: HttpSyncClientOptions
): Promise<SyncClient> {
  const resolved = resolveSyncConfig(config)
  if (!resolved.baseUrl) {
    throw new ConfigError(['baseUrl: Required'])
  }

  const transport = new HttpTransport(resolved.baseUrl, {
    timeout: resolved.dispatchTimeoutMs,
    healthPath: resolved.healthPath,
    debug: resolved.debug,
    ...(resolved.authToken ? { authToken: resolved.authToken } : {}),
    ...(options.changesPath ? { changesPath: options.changesPath } : {}),
  })

  let reachability = options.reachability
  if (!reachability) {
    const probe = createProbeReachability({
      probe: () => transport.ping(),
      intervalMs: resolved.probeIntervalMs,
      debug: resolved.debug,
    })
    probe.start()
    reachability = probe
  }

  return SyncClient.create({
    endpoint: transport,
    storage: options.storage,
    reachability,
    config: resolved,
    ...(options.now ? { now: options.now } : {}),
    ...(options.onStatusChange ? { onStatusChange: options.onStatusChange } : {}),
  })
}
