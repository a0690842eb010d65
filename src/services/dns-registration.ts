import { proxy } from 'hono/proxy'

import type { DnsSettings } from '../schemas/settings.js'

const DNS_CONSTANTS = {
  REGISTER_PATH: '/add-record/',
  REGISTER_TIMEOUT_MS: 10_000,
  // Service label recorded alongside the DNS entry
  SERVICE_LABEL: 'llm-gateway',
} as const

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Announce this gateway to the DNS API so clients can find it by name.
 * Returns false when registration failed; never throws.
 */
export async function registerDns(settings: DnsSettings, port: number): Promise<boolean> {
  if (!settings.registerOnStartup) {
    console.log('[DNS] Registration disabled, skipping')
    return true
  }

  const payload = {
    name: settings.serviceName,
    port,
    service_name: DNS_CONSTANTS.SERVICE_LABEL,
    target_device: settings.targetDevice,
  }

  try {
    const response = await proxy(`${settings.apiUrl}${DNS_CONSTANTS.REGISTER_PATH}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(DNS_CONSTANTS.REGISTER_TIMEOUT_MS),
    })
    if (!response.ok) {
      console.error(`[DNS] Registration failed with status ${response.status}: ${await response.text()}`)
      return false
    }
    console.log(`[DNS] Registered ${settings.serviceName}.${settings.domainBase} -> :${port}`)
    return true
  } catch (error) {
    console.warn(`[DNS] Registration failed (network error): ${describeError(error)}`)
    console.warn('[DNS] Gateway will continue without DNS registration')
    return false
  }
}

// The DNS API has no delete endpoint; records are left to expire
export async function deregisterDns(): Promise<boolean> {
  console.log('[DNS] Deregistration not supported by the DNS API, leaving record in place')
  return true
}
