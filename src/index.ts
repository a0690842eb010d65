import { serve } from '@hono/node-server'

import { createGateway } from './app.js'
import { deregisterDns, registerDns } from './services/dns-registration.js'
import { SettingsError, loadSettings } from './services/settings.js'

import type { Settings } from './schemas/settings.js'

function readSettings(): Settings {
  try {
    return loadSettings()
  } catch (error) {
    if (error instanceof SettingsError) {
      console.error(`[Gateway] ${error.message}`)
      process.exit(1)
    }
    throw error
  }
}

async function startServer() {
  const settings = readSettings()
  const { app, reporter } = createGateway(settings)

  console.log(`[Gateway] Backend: ${settings.backendUrl}`)
  console.log(
    `[Gateway] Max concurrent requests: ${settings.maxConcurrentRequests}, request timeout: ${settings.requestTimeout}s`
  )

  // Start the HTTP server
  const server = serve(
    {
      fetch: app.fetch,
      hostname: settings.host,
      port: settings.port,
    },
    (info) => {
      console.log(`[Gateway] Listening on http://${settings.host}:${info.port}`)
      console.log(`[Gateway] Proxy API: http://${settings.host}:${info.port}/v1/chat/completions`)
    }
  )

  await registerDns(settings.dns, settings.port)

  // Handle graceful shutdown
  const shutdown = (signal: string) => {
    const { active, queued } = reporter.snapshot()
    console.log(`\n[Gateway] ${signal} received, shutting down (${active} active, ${queued} queued)`)
    server.close()
    deregisterDns()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[Gateway] Shutdown failed:', error)
        process.exit(1)
      })
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
}

startServer().catch((error) => {
  console.error('[Gateway] Failed to start server:', error)
  process.exit(1)
})
