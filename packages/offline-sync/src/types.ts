/**
 * Shared type definitions for @study-helper/offline-sync
 *
 * Covers the queued write (MutationRecord), the wire contract with the remote
 * apply endpoint, and the report handed back after each replay pass.
 *
 * @module types
 */

// ============================================================================
// Payload Types
// ============================================================================

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/**
 * Field values carried by a CREATE or UPDATE mutation.
 */
export type MutationPayload = { [key: string]: JsonValue }

// ============================================================================
// Mutation Record
// ============================================================================

/**
 * The intended write verb.
 */
export type MutationMethod = 'CREATE' | 'UPDATE' | 'DELETE'

/**
 * One pending write, as stored in the durable queue.
 *
 * Records are never mutated in place: the queue swaps in a copy when the
 * retry count changes.
 */
export interface MutationRecord {
  /** Generated at enqueue time (time-based + random suffix) */
  readonly id: string
  readonly method: MutationMethod
  /** Resource path the mutation applies to, e.g. `/api/v1/notes/12` */
  readonly target: string
  /** Absent for DELETE */
  readonly payload?: MutationPayload
  /**
   * The resource's `updatedAt` as the client last saw it when the edit was
   * made. Compared against the server's current `updatedAt` on replay.
   */
  readonly baseUpdatedAt?: string
  /** Failed dispatch attempts so far */
  readonly retryCount: number
  /** ISO-8601 creation time; ordering and diagnostics only */
  readonly enqueuedAt: string
  /** Message of the most recent failed dispatch */
  readonly lastError?: string
}

// ============================================================================
// Remote Apply Endpoint
// ============================================================================

/**
 * What the client sends for each replayed record.
 */
export interface ApplyRequest {
  method: MutationMethod
  target: string
  payload?: MutationPayload
  baseUpdatedAt?: string
}

/**
 * Server verdict when a client write was rejected in favor of newer state.
 */
export interface ConflictVerdict {
  serverUpdatedAt: string
  reason: string
  /** The authoritative record, when the server chooses to send it */
  serverRecord?: MutationPayload
}

/**
 * Result of a successful round trip. Transient failures are thrown instead.
 */
export type ApplyResponse =
  | { applied: true; updatedAt: string; record?: MutationPayload }
  | { applied: false; conflict: ConflictVerdict }

/**
 * A change the server made that the client should pull down.
 */
export interface ServerChange {
  target: string
  updatedAt: string
  deleted?: boolean
  record?: MutationPayload
}

/**
 * One page of the server's change feed.
 */
export interface ChangeFeedPage {
  changes: ServerChange[]
  /** Boundary to pass as `since` on the next pull */
  checkpoint: string
}

/**
 * Per-call options for endpoint methods.
 */
export interface DispatchOptions {
  signal?: AbortSignal
}

/**
 * The remote collaborator the replay engine and write path talk to.
 *
 * `apply` must resolve with `applied: true` or a conflict verdict, and throw
 * for anything else (network, timeout, 5xx, rejected request).
 */
export interface RemoteApplyEndpoint {
  apply(request: ApplyRequest, options?: DispatchOptions): Promise<ApplyResponse>
  pullChanges?(since: string | undefined, options?: DispatchOptions): Promise<ChangeFeedPage>
}

// ============================================================================
// Reconciliation Outcome
// ============================================================================

/**
 * A record the server refused because its copy was newer.
 */
export interface ConflictEntry {
  id: string
  method: MutationMethod
  target: string
  /** The client's last-known `updatedAt`, or null when it had none */
  clientTimestamp: string | null
  serverTimestamp: string
  resolution: 'server_wins'
  reason: string
  serverRecord?: MutationPayload
}

/**
 * A record dropped after exhausting its retries.
 */
export interface PermanentFailure {
  id: string
  method: MutationMethod
  target: string
  retryCount: number
  enqueuedAt: string
  lastError?: string
}

/**
 * Report for one replay pass.
 */
export interface ReconciliationOutcome {
  appliedCount: number
  conflicts: ConflictEntry[]
  permanentFailures: PermanentFailure[]
  /** Records left queued with an incremented retry count */
  retryScheduled: number
  /** Records skipped because an earlier record for the same target failed */
  deferred: number
  serverChanges: ServerChange[]
  /** Boundary for the next incremental sync */
  syncCheckpoint: string
  startedAt: string
  finishedAt: string
}
