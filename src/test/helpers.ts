/**
 * Test helpers: settings, an in-process fake backend and small async utilities
 */

import { Hono } from 'hono'
import { vi } from 'vitest'

import { loadSettings } from '../services/settings.js'

import type { Settings } from '../schemas/settings.js'
import type { Environment } from '../services/settings.js'

export const TEST_BACKEND_URL = 'http://backend.test'
export const TEST_MODEL = 'test-model'

const encoder = new TextEncoder()

/**
 * Settings pointing at the fake backend, with any variable overridden
 */
export function createTestSettings(env: Environment = {}): Settings {
  return loadSettings({
    GATEWAY_BACKEND_URL: TEST_BACKEND_URL,
    GATEWAY_DEFAULT_MODEL: TEST_MODEL,
    ...env,
  })
}

/**
 * Route every outbound fetch to an in-process Hono app
 */
export function installBackend(backend: Hono): void {
  vi.stubGlobal('fetch', (input: RequestInfo | URL, init?: RequestInit) =>
    backend.fetch(input instanceof Request ? input : new Request(input, init))
  )
}

// Every outbound fetch fails the way undici does when nothing listens
export function installUnreachableBackend(): void {
  vi.stubGlobal('fetch', () => Promise.reject(new TypeError('fetch failed')))
}

/**
 * Yield to the event loop until the predicate holds.
 * Uses setImmediate so it keeps working while setTimeout is faked.
 */
export async function waitUntil(predicate: () => boolean, maxTurns = 1000): Promise<void> {
  for (let turn = 0; turn < maxTurns; turn++) {
    if (predicate()) {
      return
    }
    await new Promise<void>((resolve) => setImmediate(resolve))
  }
  throw new Error(`Condition not met after ${maxTurns} event loop turns`)
}

export function chatBody(content: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { messages: [{ role: 'user', content }], ...extra }
}

export function completionFor(content: string): Record<string, unknown> {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    model: TEST_MODEL,
    choices: [{ index: 0, message: { role: 'assistant', content: `echo: ${content}` }, finish_reason: 'stop' }],
  }
}

/**
 * SSE body that emits the given events and ends
 */
export function sseStream(chunks: string[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(encoder.encode(chunk))
      }
      controller.close()
    },
  })
}

export function sseResponse(body: ReadableStream<Uint8Array>): Response {
  return new Response(body, { headers: { 'content-type': 'text/event-stream' } })
}

export function firstMessageContent(body: Record<string, unknown>): string {
  const messages = body.messages
  if (Array.isArray(messages) && messages.length > 0) {
    const first: unknown = messages[0]
    if (typeof first === 'object' && first !== null && 'content' in first && typeof first.content === 'string') {
      return first.content
    }
  }
  return ''
}

export interface HoldingBackendOptions {
  // Answer immediately instead of waiting for release()
  hold?: boolean
  reply?: (content: string, body: Record<string, unknown>) => Response
}

/**
 * Fake inference backend whose chat completions wait until the test releases them
 */
export class HoldingBackend {
  readonly app = new Hono()
  readonly received: Record<string, unknown>[] = []
  private readonly releases: (() => void)[] = []

  constructor(options: HoldingBackendOptions = {}) {
    const hold = options.hold ?? true
    const reply = options.reply ?? ((content: string) => Response.json(completionFor(content)))

    this.app.post('/v1/chat/completions', async (c) => {
      const body = await c.req.json<Record<string, unknown>>()
      this.received.push(body)
      if (hold) {
        await new Promise<void>((resolve) => this.releases.push(resolve))
      }
      return reply(firstMessageContent(body), body)
    })
  }

  get calls(): number {
    return this.received.length
  }

  release(index: number): void {
    const release = this.releases[index]
    if (!release) {
      throw new Error(`No held backend call at index ${index}`)
    }
    release()
  }
}
