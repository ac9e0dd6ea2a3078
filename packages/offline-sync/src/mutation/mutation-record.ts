/**
 * @file Mutation Record
 *
 * Creation, id generation and the stored schema for queued writes.
 *
 * @module @study-helper/offline-sync/mutation/mutation-record
 */

import { z } from 'zod'
import type { MutationMethod, MutationPayload, MutationRecord } from '../types.js'
import { validateBaseUpdatedAt, validateMutationInput } from './resource-payloads.js'
import { mutationMethodSchema, mutationPayloadSchema, timestampSchema } from './schemas.js'

// =============================================================================
// Schemas
// =============================================================================

/**
 * Shape of a record as persisted in the durable queue.
 */
export const mutationRecordSchema: z.ZodType<MutationRecord> = z.object({
  id: z.string().min(1),
  method: mutationMethodSchema,
  target: z.string().min(1),
  payload: mutationPayloadSchema.optional(),
  baseUpdatedAt: timestampSchema.optional(),
  retryCount: z.number().int().nonnegative(),
  enqueuedAt: timestampSchema,
  lastError: z.string().optional(),
})

// =============================================================================
// Creation
// =============================================================================

/**
 * What a caller supplies when queueing a write.
 */
export interface MutationInput {
  method: MutationMethod
  target: string
  payload?: MutationPayload
  baseUpdatedAt?: string
}

export interface CreateRecordOptions {
  /** Clock override */
  now?: () => Date
  /** Id generator override */
  generateId?: () => string
}

/**
 * Generate a record id: creation time plus a random suffix, so two records
 * created in the same millisecond still differ.
 */
export function generateMutationId(now: number = Date.now()): string {
  return `mut-${now}-${Math.random().toString(36).slice(2, 11)}`
}

/**
 * Validate a write and wrap it in a fresh record with `retryCount` 0.
 *
 * @throws {PayloadValidationError} when the payload does not fit the method
 *   or the target's resource schema
 */
export function createMutationRecord(
  input: MutationInput,
  options: CreateRecordOptions = {}
): MutationRecord {
  const payload = validateMutationInput(input.method, input.target, input.payload)
  validateBaseUpdatedAt(input.target, input.baseUpdatedAt)
  const enqueuedAt = (options.now ?? (() => new Date()))()

  const record: MutationRecord = {
    id: options.generateId ? options.generateId() : generateMutationId(enqueuedAt.getTime()),
    method: input.method,
    target: input.target,
    retryCount: 0,
    enqueuedAt: enqueuedAt.toISOString(),
    ...(payload !== undefined ? { payload } : {}),
    ...(input.baseUpdatedAt !== undefined ? { baseUpdatedAt: input.baseUpdatedAt } : {}),
  }

  return record
}

/**
 * One-line description for logs, e.g. `UPDATE /api/v1/notes/1`.
 */
export function describeRecord(record: Pick<MutationRecord, 'method' | 'target'>): string {
  return `${record.method} ${record.target}`
}
