/**
 * @file Sync Error Classes
 *
 * Structured errors for the offline sync subsystem. Dispatch errors decide how
 * the replay engine treats a record; storage errors are never thrown past the
 * durable queue and only show up inside `StorageResult` values and logs.
 *
 * @example
 * ```typescript
 * try {
 *   await endpoint.apply(request)
 * } catch (error) {
 *   if (isTransientError(error)) {
 *     // queue it and try again on the next reconnect
 *   }
 * }
 * ```
 */

// =============================================================================
// Base Error
// =============================================================================

/**
 * Machine-readable error codes.
 */
export type SyncErrorCode =
  | 'NETWORK'
  | 'TIMEOUT'
  | 'SERVER_UNAVAILABLE'
  | 'REJECTED'
  | 'STORAGE_CORRUPTION'
  | 'STORAGE_WRITE'
  | 'STORAGE_READ'
  | 'INVALID_PAYLOAD'
  | 'INVALID_RESPONSE'
  | 'INVALID_CONFIG'

/**
 * Base class for every error raised by this package.
 */
export class SyncError extends Error {
  readonly code: SyncErrorCode

  /** The original cause of this error, if any */
  override readonly cause?: Error

  constructor(message: string, code: SyncErrorCode, options?: { cause?: Error }) {
    super(message)
    this.name = 'SyncError'
    this.code = code
    this.cause = options?.cause

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

// =============================================================================
// Dispatch Errors
// =============================================================================

/**
 * A dispatch that may succeed if tried again later: network unreachable,
 * timeout, or server unavailable. Never corrupts queue state.
 */
export class TransientDispatchError extends SyncError {
  /** The target the dispatch was aimed at */
  readonly target?: string

  constructor(
    message: string,
    code: 'NETWORK' | 'TIMEOUT' | 'SERVER_UNAVAILABLE',
    options?: { target?: string; cause?: Error }
  ) {
    super(message, code, options)
    this.name = 'TransientDispatchError'
    this.target = options?.target
  }
}

/**
 * The request never got a response (DNS failure, refused connection, offline).
 */
export class NetworkError extends TransientDispatchError {
  constructor(message: string, options?: { target?: string; cause?: Error }) {
    super(message, 'NETWORK', options)
    this.name = 'NetworkError'
  }
}

/**
 * The per-dispatch timeout expired before a response arrived.
 */
export class RequestTimeoutError extends TransientDispatchError {
  /** The timeout duration in milliseconds */
  readonly timeout: number

  constructor(timeout: number, options?: { target?: string; cause?: Error }) {
    super(`Request timed out after ${timeout}ms`, 'TIMEOUT', options)
    this.name = 'RequestTimeoutError'
    this.timeout = timeout
  }
}

/**
 * The server answered with a 5xx status.
 */
export class ServerUnavailableError extends TransientDispatchError {
  readonly status: number

  constructor(status: number, statusText: string, options?: { target?: string }) {
    super(`HTTP ${status}: ${statusText}`, 'SERVER_UNAVAILABLE', options)
    this.name = 'ServerUnavailableError'
    this.status = status
  }
}

/**
 * The server refused the request outright (4xx other than a conflict).
 * Still counts against the retry ceiling; the resource may have been deleted
 * server-side and the record will be reported once retries run out.
 */
export class RejectedDispatchError extends SyncError {
  readonly status: number
  readonly target?: string

  constructor(status: number, message: string, options?: { target?: string }) {
    super(message, 'REJECTED')
    this.name = 'RejectedDispatchError'
    this.status = status
    this.target = options?.target
  }
}

/**
 * The server's answer did not match the apply contract.
 */
export class InvalidResponseError extends SyncError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, 'INVALID_RESPONSE', options)
    this.name = 'InvalidResponseError'
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * The persisted queue could not be parsed or failed validation.
 */
export class StorageCorruptionError extends SyncError {
  readonly key: string

  constructor(key: string, message: string, options?: { cause?: Error }) {
    super(`Stored queue under "${key}" is corrupt: ${message}`, 'STORAGE_CORRUPTION', options)
    this.name = 'StorageCorruptionError'
    this.key = key
  }
}

/**
 * The storage medium refused a read.
 */
export class StorageReadError extends SyncError {
  readonly key: string

  constructor(key: string, options?: { cause?: Error }) {
    super(`Failed to read "${key}"${describeCause(options?.cause)}`, 'STORAGE_READ', options)
    this.name = 'StorageReadError'
    this.key = key
  }
}

/**
 * The storage medium refused a write (full, read-only, gone).
 */
export class StorageWriteError extends SyncError {
  readonly key: string

  constructor(key: string, options?: { cause?: Error }) {
    super(`Failed to write "${key}"${describeCause(options?.cause)}`, 'STORAGE_WRITE', options)
    this.name = 'StorageWriteError'
    this.key = key
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * A mutation was rejected at enqueue time because its payload does not fit
 * its method or target.
 */
export class PayloadValidationError extends SyncError {
  readonly target: string
  readonly issues: string[]

  constructor(target: string, issues: string[]) {
    super(`Invalid payload for ${target}: ${issues.join('; ')}`, 'INVALID_PAYLOAD')
    this.name = 'PayloadValidationError'
    this.target = target
    this.issues = issues
  }
}

/**
 * Configuration failed schema validation.
 */
export class ConfigError extends SyncError {
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid sync configuration: ${issues.join('; ')}`, 'INVALID_CONFIG')
    this.name = 'ConfigError'
    this.issues = issues
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Normalizes anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

/**
 * Determines whether a dispatch error is worth retrying later.
 *
 * Besides our own TransientDispatchError, Node's socket error codes and the
 * TypeError that `fetch` throws on connection failure count as transient.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof TransientDispatchError) {
    return true
  }
  if (error instanceof SyncError) {
    return false
  }
  if (!(error instanceof Error)) {
    return false
  }

  const code = readErrorCode(error)
  if (code && ['ETIMEDOUT', 'ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN'].includes(code)) {
    return true
  }

  return error instanceof TypeError && error.message.toLowerCase().includes('fetch')
}

function readErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

function describeCause(cause: Error | undefined): string {
  return cause ? `: ${cause.message}` : ''
}
