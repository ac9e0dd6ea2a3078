/**
 * @file Connectivity Monitor
 *
 * Bridges reachability transitions to replay passes. Every transition to
 * online triggers one drain, unconditionally; a transition to offline only
 * gets logged and forwarded. On start, a host that is already online gets an
 * initial drain so records that survived a restart are flushed.
 *
 * @module @study-helper/offline-sync/connectivity/connectivity-monitor
 */

import { toError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { DebugOption, Logger } from '../logger.js'
import type { ReconciliationOutcome } from '../types.js'
import type { NetworkStatusChange, ReachabilitySource } from './reachability.js'

/**
 * What the monitor drives; the replay engine satisfies it.
 */
export interface Drainable {
  drainNow(): Promise<ReconciliationOutcome>
}

export type DrainTrigger = 'startup' | 'reconnect'

export interface ConnectivityMonitorOptions {
  reachability: ReachabilitySource
  engine: Drainable
  debug?: DebugOption
  /** Forwarded for every transition, e.g. to update a UI indicator */
  onStatusChange?: (change: NetworkStatusChange) => void
  /** Called with the outcome of each drain the monitor triggered */
  onDrain?: (outcome: ReconciliationOutcome, trigger: DrainTrigger) => void
}

export class ConnectivityMonitor {
  private readonly reachability: ReachabilitySource
  private readonly engine: Drainable
  private readonly logger: Logger
  private readonly options: ConnectivityMonitorOptions

  private unsubscribe?: () => void
  private lastDrain?: Promise<ReconciliationOutcome>

  constructor(options: ConnectivityMonitorOptions) {
    this.reachability = options.reachability
    this.engine = options.engine
    this.options = options
    this.logger = createLogger(options.debug, 'ConnectivityMonitor')
  }

  /**
   * Subscribe to transitions; drain immediately if already online.
   */
  start(): void {
    if (this.unsubscribe) return

    this.unsubscribe = this.reachability.onStatusChange((change) => this.handleChange(change))

    if (this.reachability.isOnline()) {
      this.trigger('startup')
    }
  }

  stop(): void {
    this.unsubscribe?.()
    this.unsubscribe = undefined
  }

  get isStarted(): boolean {
    return this.unsubscribe !== undefined
  }

  isOnline(): boolean {
    return this.reachability.isOnline()
  }

  /**
   * The most recent drain this monitor triggered, if any.
   */
  get pendingDrain(): Promise<ReconciliationOutcome> | undefined {
    return this.lastDrain
  }

  private handleChange(change: NetworkStatusChange): void {
    this.options.onStatusChange?.(change)

    if (change.status === 'online') {
      this.logger.info('Connection restored, draining queue')
      this.trigger('reconnect')
    } else {
      this.logger.info('Connection lost, writes will be queued')
    }
  }

  private trigger(trigger: DrainTrigger): void {
    const drain = this.engine.drainNow()
    this.lastDrain = drain

    void drain
      .then((outcome) => this.options.onDrain?.(outcome, trigger))
      .catch((error: unknown) => {
        this.logger.error(`Drain after ${trigger} failed`, { error: toError(error).message })
      })
  }
}
