import { Hono } from 'hono'
import { stream } from 'hono/streaming'

import { ValidationError, toGatewayError } from '../services/errors.js'
import { formatSseError } from './proxy-helpers.js'

import type { BackendClient } from '../services/backend-client.js'
import type { Dispatcher } from '../services/dispatcher.js'
import type { StatusReporter } from '../services/status-reporter.js'

export interface ProxyRouteDeps {
  dispatcher: Dispatcher
  backend: BackendClient
  reporter: StatusReporter
  defaultModel: string
}

/**
 * Routes mounted under /v1
 */
export function createProxyRoutes(deps: ProxyRouteDeps): Hono {
  const { dispatcher, backend, reporter, defaultModel } = deps
  const proxyApp = new Hono()

  // POST /v1/chat/completions - Admission controlled, buffered or streamed
  proxyApp.post('/chat/completions', async (c) => {
    let body: unknown
    try {
      body = await c.req.json()
    } catch (error) {
      throw dispatcher.reject(
        new ValidationError(`Request body must be valid JSON: ${error instanceof Error ? error.message : String(error)}`)
      )
    }

    // Aborted by the node server when the client disconnects
    const result = await dispatcher.dispatch(body, { signal: c.req.raw.signal })

    if (result.kind === 'completion') {
      return Response.json(result.body)
    }

    const backendStream = result.stream
    c.header('Content-Type', backendStream.contentType)
    c.header('Cache-Control', 'no-cache')

    return stream(
      c,
      async (streamWriter) => {
        streamWriter.onAbort(() => {
          backendStream.abort()
        })
        for await (const chunk of backendStream) {
          await streamWriter.write(chunk)
        }
      },
      async (error, streamWriter) => {
        // Headers are already sent; the failure goes out as the last event
        const failure = toGatewayError(error)
        console.warn(`[Gateway] Stream for request ${result.sequence} ended early: ${failure.message}`)
        await streamWriter.write(formatSseError(failure))
      }
    )
  })

  // GET /v1/models - Backend model list, or the default model if it cannot answer
  proxyApp.get('/models', async () => {
    return Response.json(await backend.listModels(defaultModel))
  })

  // GET /v1/queue/status - Saturation snapshot
  proxyApp.get('/queue/status', (c) => {
    return c.json(reporter.snapshot())
  })

  // ANY /v1/* - Forwarded as-is, outside admission control
  proxyApp.all('/*', async (c) => {
    const path = c.req.path.replace(/^\/v1\/?/, '')
    return backend.passthrough(c.req.raw, path)
  })

  return proxyApp
}
