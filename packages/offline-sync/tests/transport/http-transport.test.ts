/**
 * HTTP transport tests
 *
 * fetch is injected, so no request leaves the process.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest'
import {
  InvalidResponseError,
  NetworkError,
  RejectedDispatchError,
  RequestTimeoutError,
  ServerUnavailableError,
} from '../../src/errors.js'
import { HttpTransport, type FetchFn } from '../../src/transport/http-transport.js'

const BASE_URL = 'http://localhost:8000'

function jsonResponse(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  })
}

/**
 * A fetch that never answers and rejects once its signal aborts.
 */
function hangingFetch(): FetchFn {
  return (_url, init) =>
    new Promise<Response>((_resolve, reject) => {
      init.signal?.addEventListener('abort', () => reject(new Error('The operation was aborted')))
    })
}

describe('HttpTransport', () => {
  let fetchMock: Mock<FetchFn>

  beforeEach(() => {
    fetchMock = vi.fn<FetchFn>()
  })

  describe('requests', () => {
    it('should map each method to its HTTP verb and send the payload', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ id: 1, updated_at: '2024-03-01T10:00:00.000Z' }, 201, 'Created')
      )
      const transport = new HttpTransport(`${BASE_URL}/`, { authToken: 'test-secret', fetch: fetchMock })

      await transport.apply({ method: 'CREATE', target: '/api/v1/courses', payload: { name: 'Biology' } })
      await transport.apply({
        method: 'UPDATE',
        target: '/api/v1/courses/1',
        payload: { name: 'Biology II' },
        baseUpdatedAt: '2024-03-01T10:00:00.000Z',
      })

      expect(fetchMock).toHaveBeenNthCalledWith(
        1,
        'http://localhost:8000/api/v1/courses',
        expect.objectContaining({
          method: 'POST',
          headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-secret' },
          body: '{"name":"Biology"}',
        })
      )
      expect(fetchMock).toHaveBeenNthCalledWith(
        2,
        'http://localhost:8000/api/v1/courses/1',
        expect.objectContaining({
          method: 'PATCH',
          headers: {
            'Content-Type': 'application/json',
            Authorization: 'Bearer test-secret',
            'X-Base-Updated-At': '2024-03-01T10:00:00.000Z',
          },
        })
      )
    })

    it('should send DELETE without a body', async () => {
      fetchMock.mockResolvedValue(new Response(null, { status: 204 }))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      await transport.apply({ method: 'DELETE', target: '/api/v1/tasks/3' })

      const init = fetchMock.mock.calls[0]?.[1]
      expect(init?.method).toBe('DELETE')
      expect(init !== undefined && 'body' in init).toBe(false)
    })

    it('should keep Content-Type and drop Authorization once the token is cleared', async () => {
      fetchMock.mockResolvedValue(jsonResponse({}))
      const transport = new HttpTransport(BASE_URL, {
        authToken: 'test-secret',
        headers: { 'content-type': 'text/plain', 'X-Client': 'study-helper' },
        fetch: fetchMock,
      })

      transport.setAuthToken(undefined)
      await transport.apply({ method: 'UPDATE', target: '/api/v1/notes/1', payload: { title: 'A' } })

      expect(transport.getAuthToken()).toBeUndefined()
      expect(fetchMock.mock.calls[0]?.[1].headers).toEqual({
        'X-Client': 'study-helper',
        'Content-Type': 'application/json',
      })
    })
  })

  describe('response classification', () => {
    it('should read the server timestamp from a 2xx body', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ id: 4, title: 'A', updated_at: '2024-03-01T10:00:00.000Z' }))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      const response = await transport.apply({ method: 'UPDATE', target: '/api/v1/notes/4', payload: { title: 'A' } })

      expect(response).toEqual({
        applied: true,
        updatedAt: '2024-03-01T10:00:00.000Z',
        record: { id: 4, title: 'A', updated_at: '2024-03-01T10:00:00.000Z' },
      })
    })

    describe('without a timestamp in the body', () => {
      beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] })
        vi.setSystemTime(new Date('2024-03-01T12:00:00.000Z'))
      })

      afterEach(() => {
        vi.useRealTimers()
      })

      it('should fall back to the local clock', async () => {
        fetchMock.mockResolvedValue(new Response(null, { status: 204 }))
        const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

        const response = await transport.apply({ method: 'DELETE', target: '/api/v1/tasks/3' })

        expect(response).toEqual({ applied: true, updatedAt: '2024-03-01T12:00:00.000Z' })
      })
    })

    it('should turn 409 into a conflict verdict', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse(
          {
            serverUpdatedAt: '2024-03-01T11:00:00.000Z',
            reason: 'record was changed on the server more recently',
            serverRecord: { title: 'Server edit' },
          },
          409,
          'Conflict'
        )
      )
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      const response = await transport.apply({ method: 'UPDATE', target: '/api/v1/notes/1', payload: { title: 'A' } })

      expect(response).toEqual({
        applied: false,
        conflict: {
          serverUpdatedAt: '2024-03-01T11:00:00.000Z',
          reason: 'record was changed on the server more recently',
          serverRecord: { title: 'Server edit' },
        },
      })
    })

    it('should accept a verdict nested under detail', async () => {
      fetchMock.mockResolvedValue(
        jsonResponse({ detail: { serverUpdatedAt: '2024-03-01T11:00:00.000Z', reason: 'stale' } }, 409, 'Conflict')
      )
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      const response = await transport.apply({ method: 'DELETE', target: '/api/v1/notes/1' })

      expect(response).toEqual({
        applied: false,
        conflict: { serverUpdatedAt: '2024-03-01T11:00:00.000Z', reason: 'stale' },
      })
    })

    it('should reject a 409 without a verdict', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ detail: 'Duplicate title' }, 409, 'Conflict'))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      await expect(transport.apply({ method: 'DELETE', target: '/api/v1/notes/1' })).rejects.toBeInstanceOf(
        InvalidResponseError
      )
    })

    it.each([
      [500, 'Internal Server Error'],
      [503, 'Service Unavailable'],
      [429, 'Too Many Requests'],
    ])('should treat %i as transient', async (status, statusText) => {
      fetchMock.mockResolvedValue(new Response(null, { status, statusText }))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      const attempt = transport.apply({ method: 'DELETE', target: '/api/v1/tasks/3' })

      await expect(attempt).rejects.toBeInstanceOf(ServerUnavailableError)
      await expect(attempt).rejects.toThrow(`HTTP ${status}: ${statusText}`)
    })

    it('should reject other 4xx with the server detail', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ detail: 'Note not found' }, 404, 'Not Found'))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      const attempt = transport.apply({ method: 'DELETE', target: '/api/v1/notes/99' })

      await expect(attempt).rejects.toBeInstanceOf(RejectedDispatchError)
      await expect(attempt).rejects.toMatchObject({ status: 404, message: 'Note not found', target: '/api/v1/notes/99' })
    })

    it('should fall back to the status line for non-JSON errors', async () => {
      fetchMock.mockResolvedValue(new Response('<html>nope</html>', { status: 400, statusText: 'Bad Request' }))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      await expect(transport.apply({ method: 'DELETE', target: '/api/v1/notes/1' })).rejects.toThrow(
        'HTTP 400: Bad Request'
      )
    })

    it('should warn when the token is refused', async () => {
      const sink = vi.fn()
      fetchMock.mockResolvedValue(jsonResponse({ detail: 'Could not validate credentials' }, 401, 'Unauthorized'))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock, debug: sink })

      await expect(transport.apply({ method: 'DELETE', target: '/api/v1/notes/1' })).rejects.toThrow(
        'Could not validate credentials'
      )
      expect(sink).toHaveBeenCalledWith('warn', 'Server rejected the auth token', {
        scope: 'HttpTransport',
        target: '/api/v1/notes/1',
      })
    })
  })

  describe('failures before a response', () => {
    it('should wrap a fetch failure in NetworkError', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      const attempt = transport.apply({ method: 'DELETE', target: '/api/v1/notes/1' })

      await expect(attempt).rejects.toBeInstanceOf(NetworkError)
      await expect(attempt).rejects.toThrow('fetch failed')
    })

    it('should raise RequestTimeoutError when the timeout expires', async () => {
      const transport = new HttpTransport(BASE_URL, { timeout: 10, fetch: hangingFetch() })

      const attempt = transport.apply({ method: 'DELETE', target: '/api/v1/notes/1' })

      await expect(attempt).rejects.toBeInstanceOf(RequestTimeoutError)
      await expect(attempt).rejects.toThrow('Request timed out after 10ms')
    })

    it('should not call fetch for an already aborted signal', async () => {
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })
      const controller = new AbortController()
      controller.abort()

      await expect(
        transport.apply({ method: 'DELETE', target: '/api/v1/notes/1' }, { signal: controller.signal })
      ).rejects.toThrow('Request aborted')
      expect(fetchMock).not.toHaveBeenCalled()
    })

    it('should abort in-flight requests on abortAll', async () => {
      const transport = new HttpTransport(BASE_URL, { fetch: hangingFetch() })

      const attempt = transport.apply({ method: 'DELETE', target: '/api/v1/notes/1' })
      transport.abortAll('shutting down')

      await expect(attempt).rejects.toBeInstanceOf(NetworkError)
      await expect(attempt).rejects.toThrow('Request aborted')
    })
  })

  describe('ping', () => {
    it('should report 2xx as reachable', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ status: 'healthy' }))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock, healthPath: '/api/v1/health' })

      expect(await transport.ping()).toBe(true)
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:8000/api/v1/health')
    })

    it('should report errors and other statuses as unreachable', async () => {
      fetchMock
        .mockResolvedValueOnce(new Response(null, { status: 503 }))
        .mockRejectedValueOnce(new TypeError('fetch failed'))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock })

      expect(await transport.ping()).toBe(false)
      expect(await transport.ping()).toBe(false)
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:8000/health')
    })
  })

  describe('pullChanges', () => {
    it('should be absent without a changes path', () => {
      expect(new HttpTransport(BASE_URL, { fetch: fetchMock }).pullChanges).toBeUndefined()
    })

    it('should request changes since the checkpoint', async () => {
      const page = {
        changes: [
          { target: '/api/v1/notes/1', updatedAt: '2024-03-01T11:00:00.000Z', record: { title: 'A' } },
          { target: '/api/v1/tasks/2', updatedAt: '2024-03-01T11:05:00.000Z', deleted: true },
        ],
        checkpoint: '2024-03-01T11:05:00.000Z',
      }
      fetchMock.mockResolvedValue(jsonResponse(page))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock, changesPath: '/api/v1/sync/changes' })

      const result = await transport.pullChanges?.('2024-03-01T10:00:00.000Z')

      expect(result).toEqual(page)
      expect(fetchMock.mock.calls[0]?.[0]).toBe(
        'http://localhost:8000/api/v1/sync/changes?since=2024-03-01T10%3A00%3A00.000Z'
      )
    })

    it('should omit since on the first pull', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ changes: [], checkpoint: '2024-03-01T10:00:00.000Z' }))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock, changesPath: '/api/v1/sync/changes' })

      await transport.pullChanges?.(undefined)

      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://localhost:8000/api/v1/sync/changes')
    })

    it('should reject a malformed page', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ items: [] }))
      const transport = new HttpTransport(BASE_URL, { fetch: fetchMock, changesPath: '/api/v1/sync/changes' })

      await expect(transport.pullChanges?.(undefined)).rejects.toBeInstanceOf(InvalidResponseError)
    })
  })
})
