import { chatCompletionRequestSchema } from '../schemas/chat.js'
import {
  BackendTimeoutError,
  CancelledByClientError,
  QueueTimeoutError,
  ValidationError,
  toGatewayError,
} from './errors.js'

import type { BackendClient, BackendStream } from './backend-client.js'
import type { GatewayError } from './errors.js'
import type { GatewayMetrics } from './metrics.js'
import type { RequestQueue } from './request-queue.js'
import type { LifecycleEvent, LifecycleState, SlotLease, TerminalState } from '../types/gateway.js'

// Waits shorter than this are not worth a log line
const QUEUE_WAIT_LOG_THRESHOLD_MS = 100

export interface DispatcherOptions {
  queue: RequestQueue
  backend: BackendClient
  // Total budget per request, queue wait included
  requestTimeoutMs: number
  defaultModel: string
  metrics?: GatewayMetrics
  onStateChange?: (event: LifecycleEvent) => void
}

export interface DispatchOptions {
  // Aborts when the caller disconnects
  signal?: AbortSignal
}

export type DispatchResult =
  | { kind: 'completion'; sequence: number; body: unknown }
  | { kind: 'stream'; sequence: number; stream: BackendStream }

interface Attempt {
  sequence: number
  stream: boolean
  queueWaitMs?: number
  callStartedAt?: number
}

function terminalStateOf(failure: GatewayError | null): TerminalState {
  if (failure === null) {
    return 'completed'
  }
  if (failure instanceof QueueTimeoutError || failure instanceof BackendTimeoutError) {
    return 'timed_out'
  }
  if (failure instanceof CancelledByClientError) {
    return 'cancelled'
  }
  return 'failed'
}

/**
 * Dispatcher drives one chat completion through
 * arrived → queued → admitted → calling → completed | failed | timed_out | cancelled.
 *
 * Every arrived request reaches exactly one terminal state. A request that was
 * admitted releases its slot exactly once: right after a buffered call settles,
 * or when a stream closes (drained, failed, timed out or abandoned).
 */
export class Dispatcher {
  private readonly queue: RequestQueue
  private readonly backend: BackendClient
  private readonly requestTimeoutMs: number
  private readonly defaultModel: string
  private readonly metrics?: GatewayMetrics
  private readonly onStateChange?: (event: LifecycleEvent) => void

  constructor(options: DispatcherOptions) {
    this.queue = options.queue
    this.backend = options.backend
    this.requestTimeoutMs = options.requestTimeoutMs
    this.defaultModel = options.defaultModel
    this.metrics = options.metrics
    this.onStateChange = options.onStateChange
  }

  async dispatch(body: unknown, options: DispatchOptions = {}): Promise<DispatchResult> {
    const arrivedAt = Date.now()
    const { payload, stream } = this.prepare(body, arrivedAt)
    const deadline = arrivedAt + this.requestTimeoutMs

    const pending = this.queue.enqueue(arrivedAt)
    const attempt: Attempt = { sequence: pending.sequence, stream }
    this.transition(attempt, 'queued')

    let lease: SlotLease
    try {
      lease = await this.queue.wait(pending, deadline, options.signal)
    } catch (error) {
      throw this.fail(attempt, error)
    }

    attempt.queueWaitMs = lease.waitedMs
    if (lease.waitedMs > QUEUE_WAIT_LOG_THRESHOLD_MS) {
      console.log(
        `[Dispatcher] Request ${attempt.sequence} queued for ${(lease.waitedMs / 1000).toFixed(2)}s before processing`
      )
    }
    this.transition(attempt, 'admitted')

    // Queue wait is part of the budget, not added on top of it
    const remainingMs = deadline - Date.now()
    if (remainingMs <= 0) {
      lease.release()
      throw this.fail(attempt, new BackendTimeoutError(0))
    }

    attempt.callStartedAt = Date.now()
    this.transition(attempt, 'calling')

    if (!stream) {
      let responseBody: unknown
      try {
        responseBody = await this.backend.chatCompletion(payload, {
          timeoutMs: remainingMs,
          signal: options.signal,
        })
      } catch (error) {
        lease.release()
        throw this.fail(attempt, error)
      }
      lease.release()
      this.settle(attempt, null)
      return { kind: 'completion', sequence: attempt.sequence, body: responseBody }
    }

    try {
      const backendStream = await this.backend.openChatStream(payload, {
        timeoutMs: remainingMs,
        signal: options.signal,
        // The slot is held until the last chunk has been relayed
        onClose: (failure) => {
          lease.release()
          this.settle(attempt, failure)
        },
      })
      return { kind: 'stream', sequence: attempt.sequence, stream: backendStream }
    } catch (error) {
      lease.release()
      throw this.fail(attempt, error)
    }
  }

  /**
   * Record a request refused before it was queued, such as a body that is not JSON.
   * Returns the failure for the caller to throw.
   */
  reject(failure: GatewayError, arrivedAt: number = Date.now()): GatewayError {
    this.emit({ state: 'arrived', stream: false, at: arrivedAt })
    console.warn(`[Dispatcher] Rejected malformed request: ${failure.message}`)
    this.emit({ state: 'failed', stream: false, at: Date.now(), error: failure })
    return failure
  }

  /**
   * Validate the inbound payload and build the body forwarded to the backend.
   * Null fields are dropped and a missing or empty model is replaced by the default one.
   */
  private prepare(body: unknown, arrivedAt: number): { payload: Record<string, unknown>; stream: boolean } {
    const result = chatCompletionRequestSchema.safeParse(body)
    if (!result.success) {
      const issues = result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`
      )
      throw this.reject(new ValidationError(`Invalid chat completion request: ${issues.join('; ')}`, issues), arrivedAt)
    }
    this.emit({ state: 'arrived', stream: false, at: arrivedAt })

    const payload: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(result.data)) {
      if (value !== null && value !== undefined) {
        payload[key] = value
      }
    }
    if (!payload.model) {
      payload.model = this.defaultModel
    }

    return { payload, stream: result.data.stream === true }
  }

  private transition(attempt: Attempt, state: LifecycleState): void {
    this.emit({
      sequence: attempt.sequence,
      state,
      stream: attempt.stream,
      at: Date.now(),
      queueWaitMs: attempt.queueWaitMs,
    })
  }

  private fail(attempt: Attempt, error: unknown): GatewayError {
    const failure = toGatewayError(error)
    this.settle(attempt, failure)
    return failure
  }

  private settle(attempt: Attempt, failure: GatewayError | null): void {
    const now = Date.now()
    const state = terminalStateOf(failure)
    const callDurationMs = attempt.callStartedAt === undefined ? undefined : now - attempt.callStartedAt

    if (failure === null) {
      console.log(`[Dispatcher] Request ${attempt.sequence} completed in ${callDurationMs ?? 0}ms`)
    } else if (state === 'cancelled') {
      console.log(`[Dispatcher] Request ${attempt.sequence} cancelled: ${failure.message}`)
    } else {
      console.warn(`[Dispatcher] Request ${attempt.sequence} ${state}: ${failure.message}`)
    }

    this.emit({
      sequence: attempt.sequence,
      state,
      stream: attempt.stream,
      at: now,
      queueWaitMs: attempt.queueWaitMs,
      callDurationMs,
      error: failure ?? undefined,
    })
  }

  // Observer failures are logged and never interrupt the lifecycle
  private emit(event: LifecycleEvent): void {
    try {
      this.metrics?.observe(event)
    } catch (error) {
      console.error(`[Dispatcher] Metrics failed to record ${event.state}:`, error)
    }
    try {
      this.onStateChange?.(event)
    } catch (error) {
      console.error(`[Dispatcher] State change observer failed on ${event.state}:`, error)
    }
  }
}
