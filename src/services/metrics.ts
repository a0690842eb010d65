import { Counter, Gauge, Histogram, Registry } from 'prom-client'

import type { StatusReporter } from './status-reporter.js'
import type { LifecycleEvent } from '../types/gateway.js'

const TERMINAL_STATES = new Set(['completed', 'failed', 'timed_out', 'cancelled'])

/**
 * Prometheus metrics for the gateway.
 *
 * Saturation gauges are read from the StatusReporter at scrape time so they can
 * never drift from the gate and queue. Outcomes and timings come from the
 * dispatcher's lifecycle events.
 */
export class GatewayMetrics {
  private registry: Registry

  private requestsTotal: Counter
  private queueWait: Histogram
  private backendCall: Histogram

  constructor(reporter: StatusReporter) {
    this.registry = new Registry()

    new Gauge({
      name: 'llm_gateway_capacity',
      help: 'Maximum number of concurrent backend calls',
      registers: [this.registry],
      collect() {
        this.set(reporter.snapshot().capacity)
      },
    })

    new Gauge({
      name: 'llm_gateway_active_requests',
      help: 'Requests currently holding a backend slot',
      registers: [this.registry],
      collect() {
        this.set(reporter.snapshot().active)
      },
    })

    new Gauge({
      name: 'llm_gateway_queued_requests',
      help: 'Requests waiting for a backend slot',
      registers: [this.registry],
      collect() {
        this.set(reporter.snapshot().queued)
      },
    })

    new Gauge({
      name: 'llm_gateway_oldest_wait_seconds',
      help: 'How long the oldest queued request has been waiting',
      registers: [this.registry],
      collect() {
        this.set(reporter.snapshot().oldest_wait_seconds)
      },
    })

    // Terminal outcomes; code is "none" for completed requests
    this.requestsTotal = new Counter({
      name: 'llm_gateway_requests_total',
      help: 'Chat completion requests by terminal outcome',
      labelNames: ['outcome', 'code'],
      registers: [this.registry],
    })

    this.queueWait = new Histogram({
      name: 'llm_gateway_queue_wait_seconds',
      help: 'Time spent queued before admission',
      buckets: [0.01, 0.1, 0.5, 1, 5, 10, 30, 60, 120, 300],
      registers: [this.registry],
    })

    this.backendCall = new Histogram({
      name: 'llm_gateway_backend_call_seconds',
      help: 'Backend call duration, until the last streamed chunk for streams',
      labelNames: ['stream'],
      buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300],
      registers: [this.registry],
    })
  }

  observe(event: LifecycleEvent): void {
    if (event.state === 'admitted' && event.queueWaitMs !== undefined) {
      this.queueWait.observe(event.queueWaitMs / 1000)
      return
    }
    if (!TERMINAL_STATES.has(event.state)) {
      return
    }

    this.requestsTotal.inc({ outcome: event.state, code: event.error?.code ?? 'none' })
    if (event.callDurationMs !== undefined) {
      this.backendCall.observe({ stream: String(event.stream) }, event.callDurationMs / 1000)
    }
  }

  // Get Prometheus metrics in text format
  async getMetrics(): Promise<string> {
    return this.registry.metrics()
  }

  getContentType(): string {
    return this.registry.contentType
  }
}
