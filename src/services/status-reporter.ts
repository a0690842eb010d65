import type { AdmissionGate } from './admission-gate.js'
import type { RequestQueue } from './request-queue.js'
import type { StatusSnapshot } from '../types/gateway.js'

/**
 * Read-only view of gateway saturation, computed on every call and never stored
 */
export class StatusReporter {
  constructor(
    private readonly gate: AdmissionGate,
    private readonly queue: RequestQueue
  ) {}

  snapshot(now: number = Date.now()): StatusSnapshot {
    const oldestArrival = this.queue.oldestArrival()
    const oldestWaitMs = oldestArrival === null ? 0 : Math.max(0, now - oldestArrival)

    return {
      capacity: this.gate.getCapacity(),
      active: this.gate.getActive(),
      queued: this.queue.size(),
      oldest_wait_seconds: Math.round(oldestWaitMs) / 1000,
    }
  }
}
