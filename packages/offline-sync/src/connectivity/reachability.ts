/**
 * @file Reachability Sources
 *
 * Sources of "online"/"offline" transitions for the connectivity monitor.
 * Node has no `online`/`offline` events, so reachability is either pushed in
 * by the host ({@link createManualReachability}) or polled from a probe such
 * as `HttpTransport.ping` ({@link createProbeReachability}).
 *
 * Listeners are only called on actual transitions; setting the current
 * status again is a no-op.
 *
 * @module @study-helper/offline-sync/connectivity/reachability
 */

import { toError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { DebugOption, Logger } from '../logger.js'

// =============================================================================
// Types
// =============================================================================

export type NetworkStatus = 'online' | 'offline'

export interface NetworkStatusChange {
  status: NetworkStatus
  previousStatus: NetworkStatus
  timestamp: Date
}

export type NetworkStatusListener = (change: NetworkStatusChange) => void

/**
 * Anything the connectivity monitor can watch.
 */
export interface ReachabilitySource {
  isOnline(): boolean
  getStatus(): NetworkStatus
  /** @returns an unsubscribe function */
  onStatusChange(listener: NetworkStatusListener): () => void
  dispose(): void
}

export interface ManualReachability extends ReachabilitySource {
  /**
   * Report a new status. Returns the status now in effect.
   */
  setStatus(status: NetworkStatus): NetworkStatus
}

export interface ProbeReachability extends ReachabilitySource {
  /** Begin polling; the first probe runs on the next tick */
  start(): void
  stop(): void
  /** Run one probe now and apply its result */
  check(): Promise<NetworkStatus>
}

export interface ProbeReachabilityOptions {
  /** Resolves true when the server is reachable; a rejection counts as offline */
  probe: () => Promise<boolean>
  /** @default 15000 */
  intervalMs?: number
  /** Status assumed before the first probe completes */
  initialStatus?: NetworkStatus
  debug?: DebugOption
}

// =============================================================================
// Status Emitter
// =============================================================================

interface StatusEmitter {
  get(): NetworkStatus
  update(status: NetworkStatus): void
  subscribe(listener: NetworkStatusListener): () => void
  dispose(): void
  readonly disposed: boolean
}

function createStatusEmitter(initial: NetworkStatus, logger: Logger): StatusEmitter {
  let current = initial
  let disposed = false
  const listeners = new Set<NetworkStatusListener>()

  return {
    get: () => current,
    update(status) {
      if (disposed || status === current) return

      const change: NetworkStatusChange = {
        status,
        previousStatus: current,
        timestamp: new Date(),
      }
      current = status
      logger.info(`Network is ${status}`)

      for (const listener of [...listeners]) {
        try {
          listener(change)
        } catch (error) {
          logger.error('Status listener threw', { error: toError(error).message })
        }
      }
    },
    subscribe(listener) {
      if (disposed) {
        return () => {}
      }
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
    dispose() {
      disposed = true
      listeners.clear()
    },
    get disposed() {
      return disposed
    },
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Reachability driven by explicit `setStatus` calls.
 */
export function createManualReachability(
  initial: NetworkStatus = 'online',
  options: { debug?: DebugOption } = {}
): ManualReachability {
  const emitter = createStatusEmitter(initial, createLogger(options.debug, 'Reachability'))

  return {
    isOnline: () => emitter.get() === 'online',
    getStatus: () => emitter.get(),
    onStatusChange: (listener) => emitter.subscribe(listener),
    setStatus(status) {
      emitter.update(status)
      return emitter.get()
    },
    dispose: () => emitter.dispose(),
  }
}

/**
 * Reachability polled from an async probe.
 *
 * @example
 * ```typescript
 * const reachability = createProbeReachability({
 *   probe: () => transport.ping(),
 *   intervalMs: 15_000,
 * })
 * reachability.start()
 * ```
 */
export function createProbeReachability(options: ProbeReachabilityOptions): ProbeReachability {
  const logger = createLogger(options.debug, 'ProbeReachability')
  const emitter = createStatusEmitter(options.initialStatus ?? 'offline', logger)
  const intervalMs = options.intervalMs ?? 15_000

  let intervalId: ReturnType<typeof setInterval> | null = null
  let firstProbeId: ReturnType<typeof setTimeout> | null = null
  let inFlight: Promise<NetworkStatus> | null = null

  async function runProbe(): Promise<NetworkStatus> {
    let reachable: boolean
    try {
      reachable = await options.probe()
    } catch (error) {
      logger.debug('Probe failed', { error: toError(error).message })
      reachable = false
    }
    emitter.update(reachable ? 'online' : 'offline')
    return emitter.get()
  }

  function check(): Promise<NetworkStatus> {
    if (emitter.disposed) {
      return Promise.resolve(emitter.get())
    }
    // Overlapping checks share the probe already running
    if (!inFlight) {
      inFlight = runProbe().finally(() => {
        inFlight = null
      })
    }
    return inFlight
  }

  function stop(): void {
    if (firstProbeId !== null) {
      clearTimeout(firstProbeId)
      firstProbeId = null
    }
    if (intervalId !== null) {
      clearInterval(intervalId)
      intervalId = null
    }
  }

  return {
    isOnline: () => emitter.get() === 'online',
    getStatus: () => emitter.get(),
    onStatusChange: (listener) => emitter.subscribe(listener),
    check,
    start() {
      if (emitter.disposed || intervalId !== null) return

      firstProbeId = setTimeout(() => {
        firstProbeId = null
        void check()
      }, 0)
      intervalId = setInterval(() => {
        void check()
      }, intervalMs)
    },
    stop,
    dispose() {
      stop()
      emitter.dispose()
    },
  }
}
