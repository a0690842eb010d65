import { proxy } from 'hono/proxy'

import {
  BackendError,
  BackendTimeoutError,
  BackendUnavailableError,
  CancelledByClientError,
  GatewayError,
} from './errors.js'

import type { BackendHealth } from '../types/gateway.js'

const BACKEND_CONSTANTS = {
  PROBE_TIMEOUT_MS: 5_000,
  CHAT_COMPLETIONS_PATH: '/v1/chat/completions',
  MODELS_PATH: '/v1/models',
  HEALTH_PATH: '/health',
  // Request headers copied onto pass-through calls
  FORWARDED_HEADERS: ['content-type', 'accept'],
} as const

export interface BackendClientOptions {
  baseUrl: string
  // Timeout applied to pass-through calls, in milliseconds
  requestTimeoutMs: number
  probeTimeoutMs?: number
}

export interface CallOptions {
  timeoutMs: number
  signal?: AbortSignal
}

export interface StreamCallOptions extends CallOptions {
  /**
   * Invoked exactly once when the stream ends for any reason.
   * `failure` is null only when the backend stream was fully drained.
   */
  onClose?: (failure: GatewayError | null) => void
}

type InterruptListener = (error: GatewayError) => void

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message
  }
  return String(error)
}

function parseBody(text: string): unknown {
  if (text === '') {
    return null
  }
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}

/**
 * Deadline and cancellation scope of one backend call.
 * The first of timer expiry or caller abort wins and is what every later failure is reported as.
 */
class UpstreamCall {
  private readonly controller = new AbortController()
  private readonly listeners = new Set<InterruptListener>()
  private readonly timer: ReturnType<typeof setTimeout>
  private failure: GatewayError | null = null
  private finished = false

  constructor(
    timeoutMs: number,
    private readonly callerSignal?: AbortSignal
  ) {
    this.timer = setTimeout(() => this.interrupt(new BackendTimeoutError(timeoutMs)), timeoutMs)
    if (callerSignal?.aborted) {
      this.interrupt(new CancelledByClientError('calling'))
    } else {
      callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true })
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  getFailure(): GatewayError | null {
    return this.failure
  }

  onInterrupt(listener: InterruptListener): void {
    this.listeners.add(listener)
  }

  interrupt(error: GatewayError): void {
    if (this.failure || this.finished) {
      return
    }
    this.failure = error
    this.controller.abort(error)
    for (const listener of [...this.listeners]) {
      listener(error)
    }
  }

  /**
   * Settle with the operation, or reject as soon as the call is interrupted
   */
  race<T>(operation: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      if (this.failure) {
        reject(this.failure)
        return
      }
      const onInterrupt: InterruptListener = (error) => reject(error)
      this.listeners.add(onInterrupt)
      operation.then(
        (value) => {
          this.listeners.delete(onInterrupt)
          resolve(value)
        },
        (error: unknown) => {
          this.listeners.delete(onInterrupt)
          reject(this.classify(error))
        }
      )
    })
  }

  /**
   * Map a low-level failure to the taxonomy; an interrupt always takes precedence
   */
  classify(error: unknown): GatewayError {
    if (this.failure) {
      return this.failure
    }
    if (error instanceof GatewayError) {
      return error
    }
    return new BackendUnavailableError(`Backend request failed: ${describeError(error)}`, error)
  }

  finish(): void {
    if (this.finished) {
      return
    }
    this.finished = true
    clearTimeout(this.timer)
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort)
    this.listeners.clear()
  }

  private readonly onCallerAbort = () => {
    this.interrupt(new CancelledByClientError('calling'))
  }
}

/**
 * Streamed backend response: a finite, single-use sequence of raw chunks.
 *
 * The call's deadline keeps running while chunks are read. Whatever ends the
 * stream (drained, backend failure, timeout, abort(), or the consumer leaving the
 * loop early) closes it once, cancels the underlying reader when it was not
 * drained, and reports to `onClose`.
 */
export class BackendStream implements AsyncIterable<Uint8Array> {
  readonly contentType: string
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>
  private iterated = false
  private closed = false

  constructor(
    response: Response,
    body: ReadableStream<Uint8Array>,
    private readonly call: UpstreamCall,
    private readonly onClose?: (failure: GatewayError | null) => void
  ) {
    this.contentType = response.headers.get('content-type') ?? 'text/event-stream'
    this.reader = body.getReader()
    // Deadline or caller abort ends the stream right away, even if nobody is reading
    call.onInterrupt((error) => this.close(error))
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    if (this.iterated) {
      throw new Error('BackendStream can only be consumed once')
    }
    this.iterated = true
    return this.chunks()
  }

  /**
   * Stop relaying and drop the backend connection
   */
  abort(): void {
    const error = new CancelledByClientError('calling')
    this.call.interrupt(error)
    this.close(this.call.getFailure() ?? error)
  }

  private async *chunks(): AsyncGenerator<Uint8Array, void, undefined> {
    let failure: GatewayError | null = null
    let drained = false
    try {
      while (true) {
        const { done, value } = await this.read()
        if (done) {
          drained = true
          return
        }
        yield value
      }
    } catch (error) {
      failure = this.call.classify(error)
      throw failure
    } finally {
      // Leaving the loop early without a backend failure means the consumer went away
      this.close(failure ?? (drained ? null : new CancelledByClientError('calling')))
    }
  }

  private async read(): Promise<ReadableStreamReadResult<Uint8Array>> {
    let result: ReadableStreamReadResult<Uint8Array>
    try {
      result = await this.reader.read()
    } catch (error) {
      throw this.call.classify(error)
    }
    // A cancelled reader reports done; the interrupt says why
    const failure = this.call.getFailure()
    if (failure) {
      throw failure
    }
    return result
  }

  private close(failure: GatewayError | null): void {
    if (this.closed) {
      return
    }
    this.closed = true
    this.call.finish()
    if (failure) {
      this.cancelReader(failure.message)
    }
    this.onClose?.(failure)
  }

  private cancelReader(reason: string): void {
    this.reader.cancel(reason).catch((error: unknown) => {
      // An aborted fetch rejects the cancel with its abort reason
      if (this.call.signal.aborted) {
        return
      }
      console.warn('[BackendClient] Failed to cancel backend stream:', error)
    })
  }
}

/**
 * HTTP client for the single inference backend
 */
export class BackendClient {
  private readonly baseUrl: string
  private readonly requestTimeoutMs: number
  private readonly probeTimeoutMs: number

  constructor(options: BackendClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.requestTimeoutMs = options.requestTimeoutMs
    this.probeTimeoutMs = options.probeTimeoutMs ?? BACKEND_CONSTANTS.PROBE_TIMEOUT_MS
  }

  /**
   * Buffered chat completion. Resolves with the parsed JSON body.
   * @throws BackendError, BackendUnavailableError, BackendTimeoutError or CancelledByClientError
   */
  async chatCompletion(payload: Record<string, unknown>, options: CallOptions): Promise<unknown> {
    const call = new UpstreamCall(options.timeoutMs, options.signal)
    try {
      const response = await call.race(this.postChatCompletion(payload, call.signal))
      if (!response.ok) {
        throw await this.toBackendError(response, call)
      }

      const text = await call.race(response.text())
      try {
        return JSON.parse(text)
      } catch (error) {
        throw new BackendUnavailableError('Backend returned a body that is not valid JSON', error)
      }
    } finally {
      call.finish()
    }
  }

  /**
   * Streamed chat completion. Resolves once the backend has answered with a 2xx
   * status; the returned stream owns the call from then on.
   */
  async openChatStream(
    payload: Record<string, unknown>,
    options: StreamCallOptions
  ): Promise<BackendStream> {
    const call = new UpstreamCall(options.timeoutMs, options.signal)
    try {
      const response = await call.race(this.postChatCompletion(payload, call.signal))
      if (!response.ok) {
        throw await this.toBackendError(response, call)
      }
      if (!response.body) {
        throw new BackendUnavailableError('Backend returned no response body')
      }
      return new BackendStream(response, response.body, call, options.onClose)
    } catch (error) {
      call.finish()
      throw call.classify(error)
    }
  }

  /**
   * Probe the backend's own health endpoint. Never throws.
   */
  async healthCheck(): Promise<BackendHealth> {
    const call = new UpstreamCall(this.probeTimeoutMs)
    try {
      const response = await call.race(
        proxy(`${this.baseUrl}${BACKEND_CONSTANTS.HEALTH_PATH}`, { method: 'GET', signal: call.signal })
      )
      const text = await call.race(response.text())
      return {
        status: response.ok ? 'ok' : 'degraded',
        http_status: response.status,
        details: parseBody(text),
      }
    } catch (error) {
      return { status: 'error', error: call.classify(error).message }
    } finally {
      call.finish()
    }
  }

  /**
   * The backend's model list, or a single-entry list naming the default model
   * when the backend cannot answer
   */
  async listModels(defaultModel: string): Promise<unknown> {
    const call = new UpstreamCall(this.probeTimeoutMs)
    try {
      const response = await call.race(
        proxy(`${this.baseUrl}${BACKEND_CONSTANTS.MODELS_PATH}`, { method: 'GET', signal: call.signal })
      )
      if (response.ok) {
        return JSON.parse(await call.race(response.text()))
      }
      console.warn(`[BackendClient] Model list returned status ${response.status}, reporting default model`)
    } catch (error) {
      console.warn(`[BackendClient] Model list unavailable, reporting default model: ${describeError(error)}`)
    } finally {
      call.finish()
    }

    return {
      object: 'list',
      data: [{ id: defaultModel, object: 'model', owned_by: 'local' }],
    }
  }

  /**
   * Forward a request to `{backend}/v1/{path}` as-is. Not admission controlled.
   */
  async passthrough(request: Request, path: string): Promise<Response> {
    const search = new URL(request.url).search
    const target = `${this.baseUrl}/v1/${path}${search}`
    const hasBody = request.method !== 'GET' && request.method !== 'HEAD'

    const headers: Record<string, string> = {}
    for (const name of BACKEND_CONSTANTS.FORWARDED_HEADERS) {
      const value = request.headers.get(name)
      if (value) {
        headers[name] = value
      }
    }
    if (hasBody && !headers['content-type']) {
      headers['content-type'] = 'application/json'
    }

    const call = new UpstreamCall(this.requestTimeoutMs, request.signal)
    try {
      const body = hasBody ? await call.race(request.arrayBuffer()) : undefined
      const response = await call.race(
        proxy(target, { method: request.method, headers, body, signal: call.signal })
      )
      const buffered = await call.race(response.arrayBuffer())

      const responseHeaders = new Headers(response.headers)
      responseHeaders.delete('content-length')
      return new Response(buffered, { status: response.status, headers: responseHeaders })
    } finally {
      call.finish()
    }
  }

  private postChatCompletion(payload: Record<string, unknown>, signal: AbortSignal): Promise<Response> {
    return proxy(`${this.baseUrl}${BACKEND_CONSTANTS.CHAT_COMPLETIONS_PATH}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal,
    })
  }

  private async toBackendError(response: Response, call: UpstreamCall): Promise<BackendError> {
    const text = await call.race(response.text())
    console.warn(`[BackendClient] Backend returned non-2xx status: ${response.status}`)
    return new BackendError(response.status, parseBody(text))
  }
}
