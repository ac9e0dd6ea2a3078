/**
 * Connectivity monitor tests
 */

import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest'
import {
  ConnectivityMonitor,
  type ConnectivityMonitorOptions,
  type Drainable,
} from '../../src/connectivity/connectivity-monitor.js'
import { createManualReachability, type ManualReachability } from '../../src/connectivity/reachability.js'
import type { ReconciliationOutcome } from '../../src/types.js'

const OUTCOME: ReconciliationOutcome = {
  appliedCount: 2,
  conflicts: [],
  permanentFailures: [],
  retryScheduled: 0,
  deferred: 0,
  serverChanges: [],
  syncCheckpoint: '2024-03-01T10:00:00.000Z',
  startedAt: '2024-03-01T10:00:00.000Z',
  finishedAt: '2024-03-01T10:00:00.000Z',
}

describe('ConnectivityMonitor', () => {
  let drainNow: Mock<Drainable['drainNow']>
  let engine: Drainable

  beforeEach(() => {
    drainNow = vi.fn<Drainable['drainNow']>()
    drainNow.mockResolvedValue(OUTCOME)
    engine = { drainNow }
  })

  function createMonitor(
    reachability: ManualReachability,
    extra: Pick<ConnectivityMonitorOptions, 'debug' | 'onDrain' | 'onStatusChange'> = {}
  ) {
    return new ConnectivityMonitor({ reachability, engine, ...extra })
  }

  it('should drain on start when already online', async () => {
    const onDrain = vi.fn()
    const monitor = createMonitor(createManualReachability('online'), { onDrain })

    monitor.start()
    await monitor.pendingDrain

    expect(drainNow).toHaveBeenCalledTimes(1)
    expect(onDrain).toHaveBeenCalledWith(OUTCOME, 'startup')
  })

  it('should not drain on start while offline', () => {
    const monitor = createMonitor(createManualReachability('offline'))

    monitor.start()

    expect(drainNow).not.toHaveBeenCalled()
    expect(monitor.pendingDrain).toBeUndefined()
    expect(monitor.isOnline()).toBe(false)
  })

  it('should drain on every transition to online', async () => {
    const reachability = createManualReachability('offline')
    const onDrain = vi.fn()
    const monitor = createMonitor(reachability, { onDrain })
    monitor.start()

    reachability.setStatus('online')
    reachability.setStatus('offline')
    reachability.setStatus('online')
    await monitor.pendingDrain

    expect(drainNow).toHaveBeenCalledTimes(2)
    expect(onDrain).toHaveBeenLastCalledWith(OUTCOME, 'reconnect')
  })

  it('should forward every transition', () => {
    const reachability = createManualReachability('offline')
    const onStatusChange = vi.fn()
    const monitor = createMonitor(reachability, { onStatusChange })
    monitor.start()

    reachability.setStatus('online')
    reachability.setStatus('offline')

    expect(onStatusChange.mock.calls.map(([change]) => change.status)).toEqual(['online', 'offline'])
  })

  it('should stop reacting after stop', () => {
    const reachability = createManualReachability('offline')
    const monitor = createMonitor(reachability)
    monitor.start()
    monitor.start()
    expect(monitor.isStarted).toBe(true)

    monitor.stop()
    reachability.setStatus('online')

    expect(monitor.isStarted).toBe(false)
    expect(drainNow).not.toHaveBeenCalled()
  })

  it('should log a drain that rejects', async () => {
    drainNow.mockRejectedValue(new Error('engine disposed'))
    const sink = vi.fn()
    const reachability = createManualReachability('offline')
    const monitor = createMonitor(reachability, { debug: sink })
    monitor.start()

    reachability.setStatus('online')

    await vi.waitFor(() => {
      expect(sink).toHaveBeenCalledWith('error', 'Drain after reconnect failed', {
        scope: 'ConnectivityMonitor',
        error: 'engine disposed',
      })
    })
  })
})
