/**
 * @file Resource Payloads
 *
 * Payload schemas for the study-helper REST resources. Writes are checked when
 * they are queued so a malformed edit fails in front of the user instead of
 * days later during replay.
 *
 * | Target | CREATE | UPDATE / DELETE |
 * |---|---|---|
 * | courses | `/api/v1/courses` | `/api/v1/courses/{id}` |
 * | notes | `/api/v1/notes` | `/api/v1/notes/{id}` |
 * | tasks | `/api/v1/tasks` | `/api/v1/tasks/{id}` |
 *
 * Targets outside this table only need a JSON object payload.
 *
 * @module @study-helper/offline-sync/mutation/resource-payloads
 */

import { z } from 'zod'
import { PayloadValidationError } from '../errors.js'
import type { MutationMethod, MutationPayload } from '../types.js'
import { mutationPayloadSchema, timestampSchema } from './schemas.js'

// =============================================================================
// Resource Schemas
// =============================================================================

export type ResourceName = 'course' | 'note' | 'task'

const hexColor = z.string().regex(/^#[0-9A-Fa-f]{6}$/, 'Color must be a hex color code like #3B82F6')
const courseId = z.number().int().positive()
const priority = z.enum(['low', 'medium', 'high'])

const courseCreateSchema = z
  .object({
    name: z.string().min(1).max(200),
    description: z.string().max(2000).nullable().optional(),
    color: hexColor.optional(),
  })
  .strict()

const courseUpdateSchema = z
  .object({
    name: z.string().min(1).max(200).optional(),
    description: z.string().max(2000).nullable().optional(),
    color: hexColor.optional(),
    is_archived: z.boolean().optional(),
  })
  .strict()

const noteCreateSchema = z
  .object({
    course_id: courseId,
    title: z.string().max(300),
    content: z.string().max(50_000),
    tags: z.string().max(500).nullable().optional(),
  })
  .strict()

const noteUpdateSchema = z
  .object({
    title: z.string().max(300).optional(),
    content: z.string().max(50_000).optional(),
    tags: z.string().max(500).nullable().optional(),
  })
  .strict()

// An empty title is allowed: the server substitutes "Untitled Task - <time>"
const taskCreateSchema = z
  .object({
    course_id: courseId,
    title: z.string().max(300).optional(),
    description: z.string().nullable().optional(),
    due_date: timestampSchema.nullable().optional(),
    priority: priority.optional(),
  })
  .strict()

const taskUpdateSchema = z
  .object({
    title: z.string().max(300).optional(),
    description: z.string().nullable().optional(),
    due_date: timestampSchema.nullable().optional(),
    priority: priority.optional(),
    is_completed: z.boolean().optional(),
  })
  .strict()

interface ResourceRoute {
  resource: ResourceName
  collectionPath: RegExp
  itemPath: RegExp
  create: z.ZodTypeAny
  update: z.ZodTypeAny
}

const ROUTES: readonly ResourceRoute[] = [
  {
    resource: 'course',
    collectionPath: /^\/api\/v1\/courses\/?$/,
    itemPath: /^\/api\/v1\/courses\/\d+\/?$/,
    create: courseCreateSchema,
    update: courseUpdateSchema,
  },
  {
    resource: 'note',
    collectionPath: /^\/api\/v1\/notes\/?$/,
    itemPath: /^\/api\/v1\/notes\/\d+\/?$/,
    create: noteCreateSchema,
    update: noteUpdateSchema,
  },
  {
    resource: 'task',
    collectionPath: /^\/api\/v1\/tasks\/?$/,
    itemPath: /^\/api\/v1\/tasks\/\d+\/?$/,
    create: taskCreateSchema,
    update: taskUpdateSchema,
  },
]

// =============================================================================
// Matching
// =============================================================================

export interface ResourceMatch {
  resource: ResourceName
  kind: 'collection' | 'item'
}

/**
 * Identify which study-helper resource a target refers to.
 *
 * @returns undefined for targets outside the known routes
 */
export function matchResource(target: string): ResourceMatch | undefined {
  for (const route of ROUTES) {
    if (route.collectionPath.test(target)) {
      return { resource: route.resource, kind: 'collection' }
    }
    if (route.itemPath.test(target)) {
      return { resource: route.resource, kind: 'item' }
    }
  }
  return undefined
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check that a write is well formed for its method and target.
 *
 * @returns the payload, or undefined for DELETE
 * @throws {PayloadValidationError} listing every problem found
 */
export function validateMutationInput(
  method: MutationMethod,
  target: string,
  payload: MutationPayload | undefined
): MutationPayload | undefined {
  if (target.trim() === '') {
    throw new PayloadValidationError('(empty target)', ['target must not be empty'])
  }

  if (method === 'DELETE') {
    if (payload !== undefined) {
      throw new PayloadValidationError(target, ['DELETE must not carry a payload'])
    }
    checkRouteKind(target, method)
    return undefined
  }

  if (payload === undefined) {
    throw new PayloadValidationError(target, [`${method} requires a payload`])
  }

  const jsonCheck = mutationPayloadSchema.safeParse(payload)
  if (!jsonCheck.success) {
    throw new PayloadValidationError(target, formatIssues(jsonCheck.error))
  }

  if (method === 'UPDATE' && Object.keys(payload).length === 0) {
    throw new PayloadValidationError(target, ['UPDATE must change at least one field'])
  }

  const route = checkRouteKind(target, method)
  if (route) {
    const schema = method === 'CREATE' ? route.create : route.update
    const result = schema.safeParse(payload)
    if (!result.success) {
      throw new PayloadValidationError(target, formatIssues(result.error))
    }
  }

  return payload
}

/**
 * Validate an optional client-known timestamp.
 *
 * @throws {PayloadValidationError} when the value is not a parseable date
 */
export function validateBaseUpdatedAt(target: string, baseUpdatedAt: string | undefined): void {
  if (baseUpdatedAt === undefined) {
    return
  }
  if (!timestampSchema.safeParse(baseUpdatedAt).success) {
    throw new PayloadValidationError(target, [`baseUpdatedAt "${baseUpdatedAt}" is not a timestamp`])
  }
}

function checkRouteKind(target: string, method: MutationMethod): ResourceRoute | undefined {
  for (const route of ROUTES) {
    const isCollection = route.collectionPath.test(target)
    const isItem = route.itemPath.test(target)
    if (!isCollection && !isItem) {
      continue
    }
    if (method === 'CREATE' && !isCollection) {
      throw new PayloadValidationError(target, [`CREATE must target the ${route.resource} collection`])
    }
    if (method !== 'CREATE' && !isItem) {
      throw new PayloadValidationError(target, [`${method} must target a single ${route.resource}`])
    }
    return route
  }
  return undefined
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  )
}
