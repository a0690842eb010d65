import { InvariantViolationError } from './errors.js'

/**
 * AdmissionGate bounds how many requests may be in flight to the backend.
 *
 * Only the counter lives here. Waiting, ordering and cancellation belong to the
 * RequestQueue, which is the only caller of tryAcquire/release in the gateway.
 */
export class AdmissionGate {
  private readonly capacity: number
  private active = 0

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Admission capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  /**
   * Take a slot if one is free.
   * Returns true if acquired, false if at capacity
   */
  tryAcquire(): boolean {
    if (this.active >= this.capacity) {
      return false
    }
    this.active++
    return true
  }

  /**
   * Give back a slot taken by tryAcquire().
   * A release without a matching acquire is a bug in the caller and is thrown, not clamped.
   */
  release(): void {
    if (this.active <= 0) {
      const error = new InvariantViolationError(
        `AdmissionGate.release() called with no active slots (capacity ${this.capacity})`
      )
      console.error('[AdmissionGate] Invariant violation:', error)
      throw error
    }
    this.active--
  }

  getActive(): number {
    return this.active
  }

  getCapacity(): number {
    return this.capacity
  }
}
