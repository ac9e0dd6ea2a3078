/**
 * Resolving endpoint tests
 *
 * The clock is frozen, so every timestamp comes from the 1ms stamping step.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { CONFLICT_REASON } from '../../src/conflict/conflict-resolver.js'
import { ResolvingEndpoint } from '../../src/conflict/resolving-endpoint.js'
import { NetworkError, RejectedDispatchError } from '../../src/errors.js'

const T0 = '2024-03-01T10:00:00.000Z'
const T1 = '2024-03-01T10:00:00.001Z'
const T2 = '2024-03-01T10:00:00.002Z'

describe('ResolvingEndpoint', () => {
  let endpoint: ResolvingEndpoint

  beforeEach(() => {
    endpoint = new ResolvingEndpoint({ now: () => new Date(T0) })
  })

  describe('CREATE', () => {
    it('should assign ids per collection', async () => {
      const first = await endpoint.apply({ method: 'CREATE', target: '/api/v1/courses', payload: { name: 'Biology' } })
      const second = await endpoint.apply({ method: 'CREATE', target: '/api/v1/courses/', payload: { name: 'Physics' } })
      const note = await endpoint.apply({
        method: 'CREATE',
        target: '/api/v1/notes',
        payload: { course_id: 1, title: 'Cells', content: '#' },
      })

      expect(first).toEqual({
        applied: true,
        updatedAt: T0,
        record: { name: 'Biology', id: 1, created_at: T0, updated_at: T0 },
      })
      expect(second).toMatchObject({ applied: true, updatedAt: T1, record: { id: 2 } })
      expect(note).toMatchObject({ record: { id: 1 } })
      expect(endpoint.get('/api/v1/courses/2')?.record.name).toBe('Physics')
      expect(endpoint.size).toBe(3)
    })
  })

  describe('UPDATE', () => {
    it('should merge fields when the client saw the current version', async () => {
      endpoint.put('/api/v1/notes/1', { title: 'Cells', content: 'v1' })

      const response = await endpoint.apply({
        method: 'UPDATE',
        target: '/api/v1/notes/1',
        payload: { content: 'v2' },
        baseUpdatedAt: T0,
      })

      expect(response).toEqual({
        applied: true,
        updatedAt: T1,
        record: { created_at: T0, title: 'Cells', content: 'v2', updated_at: T1 },
      })
      expect(endpoint.get('/api/v1/notes/1')?.updatedAt).toBe(T1)
    })

    it('should apply a write that carries no base timestamp', async () => {
      endpoint.put('/api/v1/notes/1', { title: 'Cells' })

      const response = await endpoint.apply({ method: 'UPDATE', target: '/api/v1/notes/1', payload: { title: 'B' } })

      expect(response.applied).toBe(true)
    })

    it('should reject a write made against an older version', async () => {
      endpoint.put('/api/v1/notes/1', { title: 'Server edit' })

      const response = await endpoint.apply({
        method: 'UPDATE',
        target: '/api/v1/notes/1',
        payload: { title: 'Offline edit' },
        baseUpdatedAt: '2024-03-01T09:00:00.000Z',
      })

      expect(response).toEqual({
        applied: false,
        conflict: {
          serverUpdatedAt: T0,
          reason: CONFLICT_REASON,
          serverRecord: { created_at: T0, title: 'Server edit', updated_at: T0 },
        },
      })
      expect(endpoint.get('/api/v1/notes/1')?.record.title).toBe('Server edit')
    })

    it('should refuse a missing resource with 404', async () => {
      const attempt = endpoint.apply({ method: 'UPDATE', target: '/api/v1/notes/7', payload: { title: 'x' } })

      await expect(attempt).rejects.toBeInstanceOf(RejectedDispatchError)
      await expect(attempt).rejects.toMatchObject({ status: 404, message: '/api/v1/notes/7 not found' })
    })
  })

  describe('DELETE', () => {
    it('should remove the resource and record a tombstone', async () => {
      endpoint.put('/api/v1/tasks/3', { title: 'Read chapter 4' })

      const response = await endpoint.apply({ method: 'DELETE', target: '/api/v1/tasks/3', baseUpdatedAt: T0 })

      expect(response).toEqual({ applied: true, updatedAt: T1 })
      expect(endpoint.get('/api/v1/tasks/3')).toBeUndefined()
      const feed = await endpoint.pullChanges(T0)
      expect(feed.changes).toEqual([{ target: '/api/v1/tasks/3', updatedAt: T1, deleted: true }])
    })

    it('should keep a resource the client deleted from a stale copy', async () => {
      endpoint.put('/api/v1/tasks/3', { title: 'Read chapter 4' })

      const response = await endpoint.apply({
        method: 'DELETE',
        target: '/api/v1/tasks/3',
        baseUpdatedAt: '2024-03-01T09:00:00.000Z',
      })

      expect(response.applied).toBe(false)
      expect(endpoint.get('/api/v1/tasks/3')).toBeDefined()
    })
  })

  describe('pullChanges', () => {
    it('should return the whole history without a checkpoint', async () => {
      endpoint.put('/api/v1/notes/1', { title: 'A' })
      endpoint.put('/api/v1/notes/2', { title: 'B' })

      const feed = await endpoint.pullChanges(undefined)

      expect(feed.changes.map((change) => change.target)).toEqual(['/api/v1/notes/1', '/api/v1/notes/2'])
      expect(feed.checkpoint).toBe(T1)
    })

    it('should return only changes after the checkpoint', async () => {
      endpoint.put('/api/v1/notes/1', { title: 'A' })
      endpoint.put('/api/v1/notes/1', { title: 'B' })
      endpoint.put('/api/v1/notes/2', { title: 'C' })

      const feed = await endpoint.pullChanges(T0)

      expect(feed.changes.map((change) => change.updatedAt)).toEqual([T1, T2])
      expect(feed.checkpoint).toBe(T2)
    })

    it('should keep only the newest change for each target', async () => {
      endpoint.put('/api/v1/notes/1', { title: 'A' })
      endpoint.put('/api/v1/notes/2', { title: 'B' })
      endpoint.put('/api/v1/notes/1', { title: 'C' })

      const feed = await endpoint.pullChanges(undefined)

      expect(feed.changes.map((change) => [change.target, change.updatedAt])).toEqual([
        ['/api/v1/notes/2', T1],
        ['/api/v1/notes/1', T2],
      ])
      expect(feed.changes[1]?.record).toMatchObject({ title: 'C' })
      expect(feed.checkpoint).toBe(T2)
    })

    it('should stamp later writes after a checkpoint taken from the clock', async () => {
      const empty = await endpoint.pullChanges(undefined)
      const written = endpoint.put('/api/v1/notes/1', { title: 'A' })

      expect(empty).toEqual({ changes: [], checkpoint: T0 })
      expect(written.updatedAt).toBe(T1)
    })

    it('should echo the checkpoint back when nothing was ever written', async () => {
      expect(await endpoint.pullChanges('2024-02-01T00:00:00.000Z')).toEqual({
        changes: [],
        checkpoint: '2024-02-01T00:00:00.000Z',
      })
    })
  })

  describe('isolation', () => {
    it('should hand out copies', () => {
      endpoint.put('/api/v1/notes/1', { title: 'A' })

      const copy = endpoint.get('/api/v1/notes/1')
      if (copy) {
        copy.record.title = 'mutated'
      }

      expect(endpoint.get('/api/v1/notes/1')?.record.title).toBe('A')
    })

    it('should honor an aborted signal', async () => {
      const controller = new AbortController()
      controller.abort()

      await expect(
        endpoint.apply({ method: 'DELETE', target: '/api/v1/tasks/1' }, { signal: controller.signal })
      ).rejects.toBeInstanceOf(NetworkError)
      await expect(endpoint.pullChanges(undefined, { signal: controller.signal })).rejects.toThrow('Request aborted')
    })
  })
})
