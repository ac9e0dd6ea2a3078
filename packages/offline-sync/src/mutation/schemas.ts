/**
 * @file Base Schemas
 *
 * zod schemas shared by records, resource payloads and the HTTP transport.
 *
 * @module @study-helper/offline-sync/mutation/schemas
 */

import { z } from 'zod'
import type { JsonValue, MutationPayload } from '../types.js'

export const mutationMethodSchema = z.enum(['CREATE', 'UPDATE', 'DELETE'])

/**
 * Any string `Date.parse` understands.
 */
export const timestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: 'Invalid timestamp' })

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
)

export const mutationPayloadSchema: z.ZodType<MutationPayload> = z.record(jsonValueSchema)
