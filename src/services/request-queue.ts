import { CancelledByClientError, InvariantViolationError, QueueTimeoutError } from './errors.js'

import type { AdmissionGate } from './admission-gate.js'
import type { GatewayError } from './errors.js'
import type { SlotLease } from '../types/gateway.js'

export type PendingState = 'queued' | 'admitted' | 'cancelled'

/**
 * Handle returned by enqueue(); pass it back to wait()
 */
export interface PendingRequest {
  readonly sequence: number
  // Epoch milliseconds
  readonly arrivedAt: number
  readonly state: PendingState
}

class Waiter implements PendingRequest {
  state: PendingState = 'queued'
  lease: SlotLease | null = null
  failure: GatewayError | null = null
  resolve: ((lease: SlotLease) => void) | null = null
  reject: ((error: GatewayError) => void) | null = null
  detach: (() => void) | null = null

  constructor(
    readonly owner: RequestQueue,
    readonly sequence: number,
    readonly arrivedAt: number
  ) {}
}

/**
 * RequestQueue keeps callers waiting for an AdmissionGate slot in arrival order.
 *
 * Checking capacity, granting the slot and removing the waiter happen in one
 * synchronous step, so no other waiter, timer or abort handler can interleave.
 * Every waiter ends in exactly one of admitted or cancelled: whichever decision
 * is taken first is final and the other one becomes a no-op.
 */
export class RequestQueue {
  private readonly waiting: Waiter[] = []
  private nextSequence = 1

  constructor(private readonly gate: AdmissionGate) {}

  /**
   * Append a new waiter. Sequence numbers start at 1 and never repeat.
   */
  enqueue(now: number = Date.now()): PendingRequest {
    const waiter = new Waiter(this, this.nextSequence++, now)
    this.waiting.push(waiter)
    return waiter
  }

  /**
   * Suspend until the waiter is granted a slot, the deadline passes or the signal aborts.
   * Resolves with the lease on admission; rejects with QueueTimeoutError or
   * CancelledByClientError otherwise. Either way the waiter has left the queue.
   * @param deadline - Absolute time in epoch milliseconds
   */
  wait(pending: PendingRequest, deadline: number, signal?: AbortSignal): Promise<SlotLease> {
    const waiter = this.ownWaiter(pending)

    // A slot may already be free; older waiters are served first
    this.admitWaiting()
    if (waiter.state !== 'queued') {
      return this.outcomeOf(waiter)
    }

    if (waiter.resolve) {
      throw new InvariantViolationError(`Request ${waiter.sequence} is already waiting`)
    }

    if (signal?.aborted) {
      this.cancel(waiter, new CancelledByClientError('queued'))
      return this.outcomeOf(waiter)
    }

    const remainingMs = deadline - Date.now()
    if (remainingMs <= 0) {
      this.cancel(waiter, new QueueTimeoutError(Date.now() - waiter.arrivedAt))
      return this.outcomeOf(waiter)
    }

    return new Promise<SlotLease>((resolve, reject) => {
      waiter.resolve = resolve
      waiter.reject = reject

      const timer = setTimeout(() => {
        this.cancel(waiter, new QueueTimeoutError(Date.now() - waiter.arrivedAt))
      }, remainingMs)
      const onAbort = () => {
        this.cancel(waiter, new CancelledByClientError('queued'))
      }
      signal?.addEventListener('abort', onAbort, { once: true })

      waiter.detach = () => {
        clearTimeout(timer)
        signal?.removeEventListener('abort', onAbort)
      }
    })
  }

  /**
   * Number of callers currently waiting
   */
  size(): number {
    return this.waiting.length
  }

  /**
   * Arrival time of the oldest waiter, or null when nobody waits
   */
  oldestArrival(): number | null {
    return this.waiting.length > 0 ? this.waiting[0].arrivedAt : null
  }

  /**
   * Grant free slots to the oldest waiters, in sequence order
   */
  private admitWaiting(): void {
    while (this.waiting.length > 0 && this.gate.tryAcquire()) {
      this.grant(this.waiting[0])
    }
  }

  private grant(waiter: Waiter): void {
    if (waiter.state !== 'queued') {
      const error = new InvariantViolationError(
        `Request ${waiter.sequence} granted a slot while ${waiter.state}`
      )
      console.error('[RequestQueue] Invariant violation:', error)
      throw error
    }

    this.remove(waiter)
    waiter.state = 'admitted'
    waiter.lease = this.createLease(waiter)
    waiter.detach?.()
    waiter.resolve?.(waiter.lease)
  }

  /**
   * Withdraw a waiter that has not been admitted yet.
   * Returns false if it was already admitted or cancelled.
   */
  private cancel(waiter: Waiter, error: GatewayError): boolean {
    if (waiter.state !== 'queued') {
      return false
    }

    this.remove(waiter)
    waiter.state = 'cancelled'
    waiter.failure = error
    waiter.detach?.()
    waiter.reject?.(error)
    return true
  }

  private remove(waiter: Waiter): void {
    const index = this.waiting.indexOf(waiter)
    if (index !== -1) {
      this.waiting.splice(index, 1)
    }
  }

  private createLease(waiter: Waiter): SlotLease {
    let released = false
    return {
      sequence: waiter.sequence,
      waitedMs: Date.now() - waiter.arrivedAt,
      release: () => {
        if (released) {
          const error = new InvariantViolationError(
            `Slot of request ${waiter.sequence} released more than once`
          )
          console.error('[RequestQueue] Invariant violation:', error)
          throw error
        }
        released = true
        this.release()
      },
    }
  }

  /**
   * Return a slot to the gate and hand it straight to the next waiter, if any
   */
  private release(): void {
    this.gate.release()
    this.admitWaiting()
  }

  private outcomeOf(waiter: Waiter): Promise<SlotLease> {
    if (waiter.state === 'admitted' && waiter.lease) {
      return Promise.resolve(waiter.lease)
    }
    return Promise.reject(
      waiter.failure ?? new InvariantViolationError(`Request ${waiter.sequence} has no outcome`)
    )
  }

  private ownWaiter(pending: PendingRequest): Waiter {
    if (!(pending instanceof Waiter) || pending.owner !== this) {
      throw new InvariantViolationError(`Request ${pending.sequence} does not belong to this queue`)
    }
    return pending
  }
}
