import type { GatewayError } from '../services/errors.js'

/**
 * Proof of admission handed to a waiter when the queue grants it a slot.
 * release() must be called exactly once, on every exit path.
 */
export interface SlotLease {
  sequence: number
  // Time spent queued, in milliseconds
  waitedMs: number
  release(): void
}

// Saturation snapshot served on /v1/queue/status (field names are part of the wire format)
export interface StatusSnapshot {
  capacity: number
  active: number
  queued: number
  oldest_wait_seconds: number
}

export type LifecycleState =
  | 'arrived'
  | 'queued'
  | 'admitted'
  | 'calling'
  | 'completed'
  | 'failed'
  | 'timed_out'
  | 'cancelled'

export type TerminalState = Extract<LifecycleState, 'completed' | 'failed' | 'timed_out' | 'cancelled'>

export interface LifecycleEvent {
  // Undefined only for requests rejected before they were queued
  sequence?: number
  state: LifecycleState
  stream: boolean
  // Epoch milliseconds
  at: number
  queueWaitMs?: number
  // Set on terminal states reached after the backend was called
  callDurationMs?: number
  error?: GatewayError
}

// Backend health probe result included in /health
export type BackendHealth =
  | { status: 'ok' | 'degraded'; http_status: number; details: unknown }
  | { status: 'error'; error: string }
