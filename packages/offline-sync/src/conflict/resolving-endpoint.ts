/**
 * @file Resolving Endpoint
 *
 * An in-process implementation of the remote apply endpoint: a resource store
 * keyed by item path, guarded by the {@link ConflictResolver}, with a change
 * feed the replay engine can pull from. It backs local development and serves
 * as the server stand-in for tests.
 *
 * Every write is stamped with a strictly increasing server timestamp, so the
 * change feed can use the last timestamp it returned as its checkpoint.
 *
 * @module @study-helper/offline-sync/conflict/resolving-endpoint
 */

import { NetworkError, RejectedDispatchError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { DebugOption, Logger } from '../logger.js'
import type {
  ApplyRequest,
  ApplyResponse,
  ChangeFeedPage,
  DispatchOptions,
  MutationPayload,
  RemoteApplyEndpoint,
  ServerChange,
} from '../types.js'
import { createConflictResolver } from './conflict-resolver.js'
import type { ConflictResolver } from './conflict-resolver.js'

// =============================================================================
// Types
// =============================================================================

export interface ResolvingEndpointOptions {
  resolver?: ConflictResolver
  /** Server clock */
  now?: () => Date
  debug?: DebugOption
}

/**
 * A stored resource with its authoritative timestamp.
 */
export interface StoredResource {
  record: MutationPayload
  updatedAt: string
}

// =============================================================================
// Resolving Endpoint
// =============================================================================

export class ResolvingEndpoint implements RemoteApplyEndpoint {
  private readonly resolver: ConflictResolver
  private readonly now: () => Date
  private readonly logger: Logger

  private readonly resources = new Map<string, StoredResource>()
  private readonly nextIds = new Map<string, number>()
  private readonly changes: ServerChange[] = []
  private lastStamp = 0

  constructor(options: ResolvingEndpointOptions = {}) {
    this.resolver = options.resolver ?? createConflictResolver()
    this.now = options.now ?? (() => new Date())
    this.logger = createLogger(options.debug, 'ResolvingEndpoint')
  }

  // ===========================================================================
  // Remote Apply Endpoint
  // ===========================================================================

  async apply(request: ApplyRequest, options?: DispatchOptions): Promise<ApplyResponse> {
    if (options?.signal?.aborted) {
      throw new NetworkError('Request aborted', { target: request.target })
    }

    switch (request.method) {
      case 'CREATE':
        return this.create(request.target, request.payload ?? {})
      case 'UPDATE':
        return this.update(request)
      case 'DELETE':
        return this.remove(request)
    }
  }

  /**
   * Changes stamped after `since`, oldest first, one per target. Without
   * `since` every target ever written is returned.
   */
  async pullChanges(since: string | undefined, options?: DispatchOptions): Promise<ChangeFeedPage> {
    if (options?.signal?.aborted) {
      throw new NetworkError('Request aborted')
    }

    const sinceMs = since === undefined ? Number.NaN : Date.parse(since)
    const changes = Number.isNaN(sinceMs)
      ? [...this.changes]
      : this.changes.filter((change) => Date.parse(change.updatedAt) > sinceMs)

    return { changes: clone(changes), checkpoint: this.currentCheckpoint(since) }
  }

  // ===========================================================================
  // Server-side Access
  // ===========================================================================

  /**
   * Write a resource directly, as another device or an admin would. Creates
   * the resource if it does not exist.
   */
  put(target: string, fields: MutationPayload): StoredResource {
    const existing = this.resources.get(target)
    const updatedAt = this.stamp()
    const stored: StoredResource = {
      record: {
        ...(existing?.record ?? { created_at: updatedAt }),
        ...fields,
        updated_at: updatedAt,
      },
      updatedAt,
    }

    this.resources.set(target, stored)
    this.recordChange({ target, updatedAt, record: stored.record })
    return clone(stored)
  }

  get(target: string): StoredResource | undefined {
    const stored = this.resources.get(target)
    return stored ? clone(stored) : undefined
  }

  get size(): number {
    return this.resources.size
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  private create(target: string, payload: MutationPayload): ApplyResponse {
    const collection = target.replace(/\/+$/, '')
    const id = this.nextIds.get(collection) ?? 1
    this.nextIds.set(collection, id + 1)

    const itemTarget = `${collection}/${id}`
    const updatedAt = this.stamp()
    const record: MutationPayload = { ...payload, id, created_at: updatedAt, updated_at: updatedAt }

    this.resources.set(itemTarget, { record, updatedAt })
    this.recordChange({ target: itemTarget, updatedAt, record })
    this.logger.debug(`Created ${itemTarget}`)

    return { applied: true, updatedAt, record: clone(record) }
  }

  private update(request: ApplyRequest): ApplyResponse {
    const existing = this.requireResource(request.target)

    const decision = this.resolver.decide({
      clientUpdatedAt: request.baseUpdatedAt,
      serverUpdatedAt: existing.updatedAt,
      serverRecord: clone(existing.record),
    })
    if (decision.outcome === 'conflict') {
      this.logger.info(`Rejected stale UPDATE ${request.target}`, {
        clientUpdatedAt: request.baseUpdatedAt,
        serverUpdatedAt: existing.updatedAt,
      })
      return { applied: false, conflict: decision.verdict }
    }

    const updatedAt = this.stamp()
    const record: MutationPayload = {
      ...existing.record,
      ...(request.payload ?? {}),
      updated_at: updatedAt,
    }

    this.resources.set(request.target, { record, updatedAt })
    this.recordChange({ target: request.target, updatedAt, record })

    return { applied: true, updatedAt, record: clone(record) }
  }

  private remove(request: ApplyRequest): ApplyResponse {
    const existing = this.requireResource(request.target)

    const decision = this.resolver.decide({
      clientUpdatedAt: request.baseUpdatedAt,
      serverUpdatedAt: existing.updatedAt,
      serverRecord: clone(existing.record),
    })
    if (decision.outcome === 'conflict') {
      this.logger.info(`Rejected stale DELETE ${request.target}`)
      return { applied: false, conflict: decision.verdict }
    }

    const updatedAt = this.stamp()
    this.resources.delete(request.target)
    this.recordChange({ target: request.target, updatedAt, deleted: true })

    return { applied: true, updatedAt }
  }

  private requireResource(target: string): StoredResource {
    const existing = this.resources.get(target)
    if (!existing) {
      throw new RejectedDispatchError(404, `${target} not found`, { target })
    }
    return existing
  }

  // ===========================================================================
  // Clock & Feed
  // ===========================================================================

  /**
   * Next server timestamp, at least 1ms after the previous one.
   */
  private stamp(): string {
    const next = Math.max(this.now().getTime(), this.lastStamp + 1)
    this.lastStamp = next
    return new Date(next).toISOString()
  }

  private currentCheckpoint(since: string | undefined): string {
    const latest = this.changes[this.changes.length - 1]
    if (latest) {
      return latest.updatedAt
    }
    if (since !== undefined) {
      return since
    }

    // Later writes must stamp after a checkpoint handed out here
    const now = this.now().getTime()
    this.lastStamp = Math.max(this.lastStamp, now)
    return new Date(now).toISOString()
  }

  /**
   * Only the newest change per target is kept. Stamps only increase, so
   * appending keeps the log ordered.
   */
  private recordChange(change: ServerChange): void {
    const previous = this.changes.findIndex((entry) => entry.target === change.target)
    if (previous !== -1) {
      this.changes.splice(previous, 1)
    }
    this.changes.push(clone(change))
  }
}

function clone<T>(value: T): T {
  return structuredClone(value)
}
