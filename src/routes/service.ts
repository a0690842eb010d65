import { Hono } from 'hono'

import type { Settings } from '../schemas/settings.js'
import type { BackendClient } from '../services/backend-client.js'
import type { GatewayMetrics } from '../services/metrics.js'
import type { StatusReporter } from '../services/status-reporter.js'

export const SERVICE_INFO = {
  service: 'LLM Admission Gateway',
  version: '0.1.0',
} as const

export interface ServiceRouteDeps {
  settings: Settings
  backend: BackendClient
  reporter: StatusReporter
  metrics: GatewayMetrics
}

/**
 * Operational routes mounted at the root
 */
export function createServiceRoutes(deps: ServiceRouteDeps): Hono {
  const { settings, backend, reporter, metrics } = deps
  const serviceApp = new Hono()

  serviceApp.get('/', (c) => {
    return c.json({
      ...SERVICE_INFO,
      endpoints: {
        chat: '/v1/chat/completions',
        models: '/v1/models',
        queue_status: '/v1/queue/status',
        health: '/health',
        metrics: '/metrics',
      },
    })
  })

  // Reports ok even when the backend is down; backend state is in the body
  serviceApp.get('/health', async () => {
    const backendHealth = await backend.healthCheck()
    return Response.json({
      status: 'ok',
      backend: backendHealth,
      queue: reporter.snapshot(),
      config: {
        max_concurrent_requests: settings.maxConcurrentRequests,
        request_timeout_seconds: settings.requestTimeout,
        default_model: settings.defaultModel,
      },
    })
  })

  // GET /metrics - Prometheus text format
  serviceApp.get('/metrics', async (c) => {
    return c.text(await metrics.getMetrics(), 200, {
      'Content-Type': metrics.getContentType(),
    })
  })

  return serviceApp
}
