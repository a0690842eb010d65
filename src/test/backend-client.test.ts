import { Hono } from 'hono'
import { afterEach, describe, expect, it, vi } from 'vitest'

import {
  TEST_BACKEND_URL,
  TEST_MODEL,
  chatBody,
  completionFor,
  installBackend,
  installUnreachableBackend,
  sseResponse,
  sseStream,
  waitUntil,
} from './helpers.js'
import { BackendClient } from '../services/backend-client.js'
import {
  BackendError,
  BackendTimeoutError,
  BackendUnavailableError,
  CancelledByClientError,
} from '../services/errors.js'

import type { BackendStream } from '../services/backend-client.js'

const decoder = new TextDecoder()

function createClient(): BackendClient {
  return new BackendClient({ baseUrl: `${TEST_BACKEND_URL}/`, requestTimeoutMs: 5_000, probeTimeoutMs: 1_000 })
}

async function collect(stream: BackendStream): Promise<string> {
  let text = ''
  for await (const chunk of stream) {
    text += decoder.decode(chunk)
  }
  return text
}

// Emits one event, then never sends anything again
function stalledStream(onCancel: () => void): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('data: first\n\n'))
    },
    cancel() {
      onCancel()
    },
  })
}

describe('BackendClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
  })

  describe('chatCompletion', () => {
    it('posts the payload and returns the parsed body', async () => {
      const backend = new Hono()
      const received: unknown[] = []
      backend.post('/v1/chat/completions', async (c) => {
        received.push(await c.req.json())
        return c.json(completionFor('hello'))
      })
      installBackend(backend)

      const body = await createClient().chatCompletion(chatBody('hello', { model: TEST_MODEL }), {
        timeoutMs: 1_000,
      })

      expect(body).toEqual(completionFor('hello'))
      expect(received).toEqual([chatBody('hello', { model: TEST_MODEL })])
    })

    it('keeps the status and body of a non-2xx answer', async () => {
      const backend = new Hono()
      backend.post('/v1/chat/completions', (c) => c.json({ error: { message: 'model not loaded' } }, 404))
      installBackend(backend)

      const error = await createClient()
        .chatCompletion(chatBody('hello'), { timeoutMs: 1_000 })
        .catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(BackendError)
      if (error instanceof BackendError) {
        expect(error.status).toBe(404)
        expect(error.backendStatus).toBe(404)
        expect(error.backendBody).toEqual({ error: { message: 'model not loaded' } })
      }
    })

    it('times out a backend that never answers', async () => {
      const backend = new Hono()
      backend.post('/v1/chat/completions', () => new Promise<Response>(() => {}))
      installBackend(backend)

      await expect(
        createClient().chatCompletion(chatBody('hello'), { timeoutMs: 30 })
      ).rejects.toBeInstanceOf(BackendTimeoutError)
    })

    it('stops waiting when the caller aborts', async () => {
      const backend = new Hono()
      let calls = 0
      backend.post('/v1/chat/completions', () => {
        calls++
        return new Promise<Response>(() => {})
      })
      installBackend(backend)
      const controller = new AbortController()

      const call = createClient().chatCompletion(chatBody('hello'), { timeoutMs: 1_000, signal: controller.signal })
      await waitUntil(() => calls === 1)
      controller.abort()

      await expect(call).rejects.toBeInstanceOf(CancelledByClientError)
    })

    it('reports an unreachable backend as unavailable', async () => {
      installUnreachableBackend()

      await expect(createClient().chatCompletion(chatBody('hello'), { timeoutMs: 1_000 })).rejects.toThrow(
        new BackendUnavailableError('Backend request failed: fetch failed')
      )
    })

    it('rejects a 2xx body that is not JSON', async () => {
      const backend = new Hono()
      backend.post('/v1/chat/completions', (c) => c.text('not json'))
      installBackend(backend)

      await expect(createClient().chatCompletion(chatBody('hello'), { timeoutMs: 1_000 })).rejects.toThrow(
        'Backend returned a body that is not valid JSON'
      )
    })
  })

  describe('openChatStream', () => {
    it('relays every chunk and closes once drained', async () => {
      const backend = new Hono()
      backend.post('/v1/chat/completions', () => sseResponse(sseStream(['data: one\n\n', 'data: two\n\n', 'data: [DONE]\n\n'])))
      installBackend(backend)
      const onClose = vi.fn()

      const stream = await createClient().openChatStream(chatBody('hello', { stream: true }), {
        timeoutMs: 1_000,
        onClose,
      })

      expect(stream.contentType).toBe('text/event-stream')
      expect(await collect(stream)).toBe('data: one\n\ndata: two\n\ndata: [DONE]\n\n')
      expect(onClose).toHaveBeenCalledTimes(1)
      expect(onClose).toHaveBeenCalledWith(null)
    })

    it('fails before streaming when the backend answers with an error status', async () => {
      const backend = new Hono()
      backend.post('/v1/chat/completions', (c) => c.json({ error: { message: 'overloaded' } }, 503))
      installBackend(backend)
      const onClose = vi.fn()

      await expect(
        createClient().openChatStream(chatBody('hello', { stream: true }), { timeoutMs: 1_000, onClose })
      ).rejects.toBeInstanceOf(BackendError)
      expect(onClose).not.toHaveBeenCalled()
    })

    it('drops the backend connection when aborted mid-stream', async () => {
      const backend = new Hono()
      let cancelled = false
      backend.post('/v1/chat/completions', () => sseResponse(stalledStream(() => (cancelled = true))))
      installBackend(backend)
      const onClose = vi.fn()

      const stream = await createClient().openChatStream(chatBody('hello', { stream: true }), {
        timeoutMs: 5_000,
        onClose,
      })
      const received: string[] = []
      const relay = (async () => {
        for await (const chunk of stream) {
          received.push(decoder.decode(chunk))
          stream.abort()
        }
      })()

      await expect(relay).rejects.toBeInstanceOf(CancelledByClientError)
      expect(received).toEqual(['data: first\n\n'])
      expect(onClose).toHaveBeenCalledTimes(1)
      expect(onClose.mock.calls[0][0]).toBeInstanceOf(CancelledByClientError)
      await waitUntil(() => cancelled)
    })

    it('stays quiet when the aborted fetch has already failed the body', async () => {
      const backend = new Hono()
      backend.post('/v1/chat/completions', (c) => {
        const signal = c.req.raw.signal
        return sseResponse(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.enqueue(new TextEncoder().encode('data: first\n\n'))
              // Mirrors undici, which errors the body with the abort reason
              signal.addEventListener('abort', () => controller.error(signal.reason))
            },
          })
        )
      })
      installBackend(backend)
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
      const onClose = vi.fn()

      const stream = await createClient().openChatStream(chatBody('hello', { stream: true }), {
        timeoutMs: 5_000,
        onClose,
      })
      const relay = (async () => {
        for await (const chunk of stream) {
          expect(decoder.decode(chunk)).toBe('data: first\n\n')
          stream.abort()
        }
      })()

      await expect(relay).rejects.toBeInstanceOf(CancelledByClientError)
      await new Promise<void>((resolve) => setImmediate(resolve))
      expect(onClose).toHaveBeenCalledTimes(1)
      expect(warn).not.toHaveBeenCalled()
    })

    it('ends a stream that outlives its deadline', async () => {
      const backend = new Hono()
      backend.post('/v1/chat/completions', () => sseResponse(stalledStream(() => {})))
      installBackend(backend)
      const onClose = vi.fn()

      const stream = await createClient().openChatStream(chatBody('hello', { stream: true }), {
        timeoutMs: 50,
        onClose,
      })

      await expect(collect(stream)).rejects.toBeInstanceOf(BackendTimeoutError)
      expect(onClose).toHaveBeenCalledTimes(1)
      expect(onClose.mock.calls[0][0]).toBeInstanceOf(BackendTimeoutError)
    })

    it('reports the consumer leaving early as a cancellation', async () => {
      const backend = new Hono()
      backend.post('/v1/chat/completions', () => sseResponse(sseStream(['data: one\n\n', 'data: two\n\n'])))
      installBackend(backend)
      const onClose = vi.fn()

      const stream = await createClient().openChatStream(chatBody('hello', { stream: true }), {
        timeoutMs: 1_000,
        onClose,
      })
      for await (const chunk of stream) {
        expect(decoder.decode(chunk)).toBe('data: one\n\n')
        break
      }

      expect(onClose).toHaveBeenCalledTimes(1)
      expect(onClose.mock.calls[0][0]).toBeInstanceOf(CancelledByClientError)
    })

    it('can only be consumed once', async () => {
      const backend = new Hono()
      backend.post('/v1/chat/completions', () => sseResponse(sseStream(['data: one\n\n'])))
      installBackend(backend)

      const stream = await createClient().openChatStream(chatBody('hello', { stream: true }), { timeoutMs: 1_000 })
      await collect(stream)

      expect(() => stream[Symbol.asyncIterator]()).toThrow('BackendStream can only be consumed once')
    })
  })

  describe('healthCheck', () => {
    it('reports a healthy backend with its own answer', async () => {
      const backend = new Hono()
      backend.get('/health', (c) => c.json({ status: 'ok' }))
      installBackend(backend)

      expect(await createClient().healthCheck()).toEqual({ status: 'ok', http_status: 200, details: { status: 'ok' } })
    })

    it('reports a non-2xx health answer as degraded', async () => {
      const backend = new Hono()
      backend.get('/health', (c) => c.text('loading model', 503))
      installBackend(backend)

      expect(await createClient().healthCheck()).toEqual({
        status: 'degraded',
        http_status: 503,
        details: 'loading model',
      })
    })

    it('reports an unreachable backend without throwing', async () => {
      installUnreachableBackend()

      expect(await createClient().healthCheck()).toEqual({
        status: 'error',
        error: 'Backend request failed: fetch failed',
      })
    })
  })

  describe('listModels', () => {
    const fallback = { object: 'list', data: [{ id: TEST_MODEL, object: 'model', owned_by: 'local' }] }

    it('returns the backend model list', async () => {
      const backend = new Hono()
      backend.get('/v1/models', (c) => c.json({ object: 'list', data: [{ id: 'served-model', object: 'model' }] }))
      installBackend(backend)

      expect(await createClient().listModels(TEST_MODEL)).toEqual({
        object: 'list',
        data: [{ id: 'served-model', object: 'model' }],
      })
    })

    it('falls back to the default model on an error status', async () => {
      const backend = new Hono()
      backend.get('/v1/models', (c) => c.text('boom', 500))
      installBackend(backend)

      expect(await createClient().listModels(TEST_MODEL)).toEqual(fallback)
    })

    it('falls back to the default model when the backend is unreachable', async () => {
      installUnreachableBackend()

      expect(await createClient().listModels(TEST_MODEL)).toEqual(fallback)
    })
  })

  describe('passthrough', () => {
    it('forwards method, path, query and body and returns the answer as-is', async () => {
      const backend = new Hono()
      backend.post('/v1/embeddings', async (c) => {
        return c.json(
          {
            query: c.req.query('dims'),
            contentType: c.req.header('content-type'),
            body: await c.req.json(),
          },
          201,
          { 'x-backend': 'fake' }
        )
      })
      installBackend(backend)

      const request = new Request('http://gateway.test/v1/embeddings?dims=3', {
        method: 'POST',
        body: JSON.stringify({ input: 'hello' }),
      })
      const response = await createClient().passthrough(request, 'embeddings')

      expect(response.status).toBe(201)
      expect(response.headers.get('x-backend')).toBe('fake')
      expect(await response.json()).toEqual({
        query: '3',
        contentType: 'text/plain;charset=UTF-8',
        body: { input: 'hello' },
      })
    })
  })
})
