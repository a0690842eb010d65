import { Hono } from 'hono'
import { logger } from 'hono/logger'

import { createErrorResponse, toErrorResponse } from './routes/proxy-helpers.js'
import { createProxyRoutes } from './routes/proxy.js'
import { createServiceRoutes } from './routes/service.js'
import { AdmissionGate } from './services/admission-gate.js'
import { BackendClient } from './services/backend-client.js'
import { Dispatcher } from './services/dispatcher.js'
import { GatewayError, toGatewayError } from './services/errors.js'
import { GatewayMetrics } from './services/metrics.js'
import { RequestQueue } from './services/request-queue.js'
import { StatusReporter } from './services/status-reporter.js'

import type { Settings } from './schemas/settings.js'
import type { LifecycleEvent } from './types/gateway.js'

export interface GatewayOptions {
  // Access log middleware; tests turn it off
  accessLog?: boolean
  onStateChange?: (event: LifecycleEvent) => void
}

export interface Gateway {
  app: Hono
  gate: AdmissionGate
  queue: RequestQueue
  backend: BackendClient
  reporter: StatusReporter
  metrics: GatewayMetrics
  dispatcher: Dispatcher
}

/**
 * Wire one gate, queue and backend client into the HTTP app.
 * Every route shares these instances, so there is a single admission domain per gateway.
 */
export function createGateway(settings: Settings, options: GatewayOptions = {}): Gateway {
  const requestTimeoutMs = settings.requestTimeout * 1000

  const gate = new AdmissionGate(settings.maxConcurrentRequests)
  const queue = new RequestQueue(gate)
  const backend = new BackendClient({ baseUrl: settings.backendUrl, requestTimeoutMs })
  const reporter = new StatusReporter(gate, queue)
  const metrics = new GatewayMetrics(reporter)
  const dispatcher = new Dispatcher({
    queue,
    backend,
    requestTimeoutMs,
    defaultModel: settings.defaultModel,
    metrics,
    onStateChange: options.onStateChange,
  })

  const app = new Hono()

  // Middleware
  if (options.accessLog ?? true) {
    app.use('*', logger())
  }

  // Mount routes
  app.route('/', createServiceRoutes({ settings, backend, reporter, metrics }))
  app.route('/v1', createProxyRoutes({ dispatcher, backend, reporter, defaultModel: settings.defaultModel }))

  app.notFound((c) => {
    return createErrorResponse(`Route not found: ${c.req.method} ${c.req.path}`, 'invalid_request_error', 'not_found', 404)
  })

  app.onError((error) => {
    if (!(error instanceof GatewayError)) {
      console.error('[Gateway] Unhandled error:', error)
    }
    return toErrorResponse(toGatewayError(error))
  })

  return { app, gate, queue, backend, reporter, metrics, dispatcher }
}
