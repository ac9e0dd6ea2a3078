/**
 * @file HTTP Transport
 *
 * Remote apply endpoint over the study-helper REST API. Each mutation maps to
 * one request against its target path:
 *
 * | Method | HTTP |
 * |---|---|
 * | CREATE | `POST {target}` |
 * | UPDATE | `PATCH {target}` |
 * | DELETE | `DELETE {target}` |
 *
 * The client-known timestamp travels in the `X-Base-Updated-At` header.
 * Responses are classified as:
 *
 * - 2xx: applied
 * - 409: conflict, body `{ serverUpdatedAt, reason, serverRecord? }`
 * - 5xx, 429, timeout, network failure: {@link TransientDispatchError}
 * - any other status: {@link RejectedDispatchError}
 *
 * @example
 * ```typescript
 * const transport = new HttpTransport('http://localhost:8000', {
 *   authToken: token,
 *   timeout: 10_000,
 * })
 *
 * const response = await transport.apply({
 *   method: 'UPDATE',
 *   target: '/api/v1/notes/1',
 *   payload: { title: 'Week 3' },
 * })
 * ```
 *
 * @module @study-helper/offline-sync/transport/http-transport
 */

import { z } from 'zod'
import {
  InvalidResponseError,
  NetworkError,
  RejectedDispatchError,
  RequestTimeoutError,
  ServerUnavailableError,
  toError,
} from '../errors.js'
import { createLogger } from '../logger.js'
import type { DebugOption, Logger } from '../logger.js'
import { mutationPayloadSchema, timestampSchema } from '../mutation/schemas.js'
import type {
  ApplyRequest,
  ApplyResponse,
  ChangeFeedPage,
  DispatchOptions,
  MutationMethod,
  MutationPayload,
  RemoteApplyEndpoint,
} from '../types.js'

// ============================================================================
// Type Definitions
// ============================================================================

export interface HttpTransportOptions {
  /**
   * Bearer token, sent as `Authorization: Bearer <token>`.
   */
  authToken?: string

  /**
   * Timeout for a single request in milliseconds. Expiry raises
   * {@link RequestTimeoutError}.
   *
   * @default undefined (no timeout)
   */
  timeout?: number

  /**
   * Additional headers. Content-Type cannot be overridden.
   */
  headers?: Record<string, string>

  /**
   * Path probed by {@link HttpTransport.ping}.
   *
   * @default '/health'
   */
  healthPath?: string

  /**
   * Path of the server's change feed. When set, the transport offers
   * `pullChanges`, requesting `GET {changesPath}?since=<checkpoint>`.
   */
  changesPath?: string

  /**
   * fetch implementation; defaults to the global one.
   */
  fetch?: FetchFn

  debug?: DebugOption
}

/**
 * The subset of `fetch` the transport calls.
 */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>

interface RequestParts {
  method: 'GET' | 'POST' | 'PATCH' | 'DELETE'
  headers?: Record<string, string>
  body?: string
}

const HTTP_METHODS: Record<MutationMethod, 'POST' | 'PATCH' | 'DELETE'> = {
  CREATE: 'POST',
  UPDATE: 'PATCH',
  DELETE: 'DELETE',
}

// ============================================================================
// Response Schemas
// ============================================================================

const conflictBodySchema = z.object({
  serverUpdatedAt: timestampSchema,
  reason: z.string(),
  serverRecord: mutationPayloadSchema.optional(),
})

const changeFeedSchema = z.object({
  changes: z.array(
    z.object({
      target: z.string().min(1),
      updatedAt: timestampSchema,
      deleted: z.boolean().optional(),
      record: mutationPayloadSchema.optional(),
    })
  ),
  checkpoint: timestampSchema,
})

const errorBodySchema = z.object({
  detail: z.string(),
})

// ============================================================================
// HttpTransport Class
// ============================================================================

export class HttpTransport implements RemoteApplyEndpoint {
  /** Base URL without trailing slash */
  readonly baseUrl: string

  /**
   * Present only when `changesPath` was configured.
   */
  readonly pullChanges?: (since: string | undefined, options?: DispatchOptions) => Promise<ChangeFeedPage>

  private readonly options: HttpTransportOptions
  private readonly fetchFn: FetchFn
  private readonly logger: Logger
  private authToken?: string

  /** Active abort controllers for cleanup */
  private readonly activeControllers = new Set<AbortController>()

  constructor(baseUrl: string, options: HttpTransportOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/$/, '')
    this.options = options
    this.authToken = options.authToken
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init))
    this.logger = createLogger(options.debug, 'HttpTransport')

    const changesPath = options.changesPath
    if (changesPath) {
      this.pullChanges = (since, dispatchOptions) => this.fetchChanges(changesPath, since, dispatchOptions)
    }
  }

  // ===========================================================================
  // Authentication
  // ===========================================================================

  /**
   * Set the token for subsequent requests, or clear it with undefined.
   */
  setAuthToken(token: string | undefined): void {
    this.authToken = token
  }

  getAuthToken(): string | undefined {
    return this.authToken
  }

  // ===========================================================================
  // Remote Apply Endpoint
  // ===========================================================================

  /**
   * Send one mutation.
   *
   * @throws {TransientDispatchError} on network failure, timeout, 5xx or 429
   * @throws {RejectedDispatchError} on any other non-2xx, non-409 status
   * @throws {InvalidResponseError} when a 409 body is not a conflict verdict
   */
  async apply(request: ApplyRequest, options?: DispatchOptions): Promise<ApplyResponse> {
    const headers: Record<string, string> = {}
    if (request.baseUpdatedAt !== undefined) {
      headers['X-Base-Updated-At'] = request.baseUpdatedAt
    }

    const response = await this.execute(
      request.target,
      {
        method: HTTP_METHODS[request.method],
        headers,
        ...(request.payload !== undefined ? { body: JSON.stringify(request.payload) } : {}),
      },
      options?.signal
    )

    if (response.status === 409) {
      const body = await readJson(response)
      const verdict = conflictBodySchema.safeParse(unwrapDetail(body))
      if (!verdict.success) {
        throw new InvalidResponseError(`Malformed conflict response for ${request.target}`)
      }
      this.logger.info(`Conflict on ${request.method} ${request.target}`, {
        serverUpdatedAt: verdict.data.serverUpdatedAt,
      })
      return { applied: false, conflict: verdict.data }
    }

    await this.throwForStatus(response, request.target)

    const body = await readJson(response)
    const record = mutationPayloadSchema.safeParse(body)
    const updatedAt = record.success ? readUpdatedAt(record.data) : undefined

    return {
      applied: true,
      updatedAt: updatedAt ?? new Date().toISOString(),
      ...(record.success ? { record: record.data } : {}),
    }
  }

  /**
   * Probe the health endpoint.
   *
   * @returns true for any 2xx answer; false on any error or other status
   */
  async ping(options?: DispatchOptions): Promise<boolean> {
    try {
      const response = await this.execute(this.options.healthPath ?? '/health', { method: 'GET' }, options?.signal)
      return response.ok
    } catch (error) {
      this.logger.debug('Health probe failed', { error: toError(error).message })
      return false
    }
  }

  /**
   * Abort all in-flight requests.
   */
  abortAll(reason?: string): void {
    for (const controller of this.activeControllers) {
      controller.abort(reason)
    }
    this.activeControllers.clear()
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private async fetchChanges(
    changesPath: string,
    since: string | undefined,
    options?: DispatchOptions
  ): Promise<ChangeFeedPage> {
    const query = since !== undefined ? `?since=${encodeURIComponent(since)}` : ''
    const response = await this.execute(`${changesPath}${query}`, { method: 'GET' }, options?.signal)
    await this.throwForStatus(response, changesPath)

    const page = changeFeedSchema.safeParse(await readJson(response))
    if (!page.success) {
      throw new InvalidResponseError(`Malformed change feed response from ${changesPath}`)
    }
    return page.data
  }

  /**
   * Executes a single HTTP request with timeout and cleanup.
   * @internal
   */
  private async execute(path: string, parts: RequestParts, externalSignal?: AbortSignal): Promise<Response> {
    const headers: Record<string, string> = {}

    if (this.options.headers) {
      for (const [key, value] of Object.entries(this.options.headers)) {
        if (key.toLowerCase() !== 'content-type') {
          headers[key] = value
        }
      }
    }
    headers['Content-Type'] = 'application/json'
    if (this.authToken) {
      headers['Authorization'] = `Bearer ${this.authToken}`
    }

    const controller = new AbortController()
    this.activeControllers.add(controller)

    let timedOut = false
    let timeoutId: ReturnType<typeof setTimeout> | undefined
    const onExternalAbort = () => controller.abort('aborted')

    const cleanup = () => {
      if (timeoutId !== undefined) {
        clearTimeout(timeoutId)
        timeoutId = undefined
      }
      externalSignal?.removeEventListener('abort', onExternalAbort)
      this.activeControllers.delete(controller)
    }

    try {
      if (externalSignal?.aborted) {
        throw new NetworkError('Request aborted', { target: path })
      }
      externalSignal?.addEventListener('abort', onExternalAbort, { once: true })

      const timeout = this.options.timeout
      if (timeout) {
        timeoutId = setTimeout(() => {
          timedOut = true
          controller.abort('timeout')
        }, timeout)
      }

      try {
        return await this.fetchFn(`${this.baseUrl}${path}`, {
          method: parts.method,
          headers: { ...headers, ...parts.headers },
          ...(parts.body !== undefined ? { body: parts.body } : {}),
          signal: controller.signal,
        })
      } catch (error) {
        if (timedOut && timeout) {
          throw new RequestTimeoutError(timeout, { target: path, cause: toError(error) })
        }
        if (controller.signal.aborted) {
          throw new NetworkError('Request aborted', { target: path, cause: toError(error) })
        }
        throw new NetworkError(toError(error).message, { target: path, cause: toError(error) })
      }
    } finally {
      cleanup()
    }
  }

  private async throwForStatus(response: Response, target: string): Promise<void> {
    if (response.ok) {
      return
    }

    if (response.status >= 500 || response.status === 429) {
      throw new ServerUnavailableError(response.status, response.statusText, { target })
    }

    const detail = errorBodySchema.safeParse(await readJson(response))
    const message = detail.success ? detail.data.detail : `HTTP ${response.status}: ${response.statusText}`
    if (response.status === 401) {
      this.logger.warn('Server rejected the auth token', { target })
    }
    throw new RejectedDispatchError(response.status, message, { target })
  }
}

// ============================================================================
// Helpers
// ============================================================================

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text()
  if (text.trim() === '') {
    return undefined
  }
  try {
    const parsed: unknown = JSON.parse(text)
    return parsed
  } catch {
    return undefined
  }
}

/**
 * Error bodies may nest the payload under `detail`.
 */
function unwrapDetail(body: unknown): unknown {
  if (typeof body === 'object' && body !== null && 'detail' in body) {
    return body.detail
  }
  return body
}

function readUpdatedAt(record: MutationPayload): string | undefined {
  const value = record.updated_at ?? record.updatedAt
  return typeof value === 'string' && !Number.isNaN(Date.parse(value)) ? value : undefined
}
