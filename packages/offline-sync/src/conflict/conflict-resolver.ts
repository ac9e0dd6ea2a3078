/**
 * @file Conflict Resolver
 *
 * Last-write-wins arbitrated by the server's clock. The resolver compares
 * the `updatedAt` the client last saw (captured when the edit was made)
 * with the authoritative record's current `updatedAt`:
 *
 * - server not strictly newer: the client write is the newest information,
 *   apply it
 * - server strictly newer: the server's state wins and the write is rejected
 *   as a conflict
 *
 * Client clocks are never compared with each other, only with timestamps the
 * server itself issued. There is no field-level merge: a losing write is
 * discarded whole.
 *
 * @module @study-helper/offline-sync/conflict/conflict-resolver
 */

import type { ConflictVerdict, MutationPayload } from '../types.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Reason reported with every conflict verdict.
 */
export const CONFLICT_REASON = 'record was changed on the server more recently'

export interface ConflictCheck {
  /** The client's last-known `updatedAt`; absent when it had none */
  clientUpdatedAt?: string
  /** The authoritative record's current `updatedAt` */
  serverUpdatedAt: string
  /** The authoritative record, echoed back in the verdict */
  serverRecord?: MutationPayload
}

export type ConflictDecision =
  | { outcome: 'apply' }
  | { outcome: 'conflict'; verdict: ConflictVerdict }

export interface ConflictResolver {
  name: 'last-write-wins'
  decide(check: ConflictCheck): ConflictDecision
}

export interface ConflictResolverOptions {
  /** Called for every conflict verdict */
  onConflict?: (check: ConflictCheck, verdict: ConflictVerdict) => void
}

// =============================================================================
// Decision
// =============================================================================

/**
 * Whether the server's timestamp is strictly newer than the client's.
 *
 * A missing or unparseable client timestamp never loses: the write is
 * treated as made against the current server state.
 */
export function isServerNewer(serverUpdatedAt: string, clientUpdatedAt: string | undefined): boolean {
  if (clientUpdatedAt === undefined) {
    return false
  }

  const server = Date.parse(serverUpdatedAt)
  const client = Date.parse(clientUpdatedAt)
  if (Number.isNaN(server) || Number.isNaN(client)) {
    return false
  }

  return server > client
}

/**
 * Create the server-wins-on-newer resolver.
 *
 * @example
 * ```typescript
 * const resolver = createConflictResolver()
 * resolver.decide({
 *   clientUpdatedAt: '2024-03-01T10:00:00.000Z',
 *   serverUpdatedAt: '2024-03-01T11:00:00.000Z',
 * })
 * // { outcome: 'conflict', verdict: { serverUpdatedAt: '2024-03-01T11:00:00.000Z', reason: '...' } }
 * ```
 */
export function createConflictResolver(options: ConflictResolverOptions = {}): ConflictResolver {
  return {
    name: 'last-write-wins',
    decide(check) {
      if (!isServerNewer(check.serverUpdatedAt, check.clientUpdatedAt)) {
        return { outcome: 'apply' }
      }

      const verdict: ConflictVerdict = {
        serverUpdatedAt: check.serverUpdatedAt,
        reason: CONFLICT_REASON,
        ...(check.serverRecord !== undefined ? { serverRecord: check.serverRecord } : {}),
      }
      options.onConflict?.(check, verdict)
      return { outcome: 'conflict', verdict }
    },
  }
}
