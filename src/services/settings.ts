import { settingsSchema } from '../schemas/settings.js'

import type { Settings } from '../schemas/settings.js'

export type Environment = Record<string, string | undefined>

/**
 * Raised when the environment does not describe a usable configuration.
 * Carries one line per zod issue so the entry point can print them as-is.
 */
export class SettingsError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'SettingsError'
  }
}

/**
 * First non-blank value among the given variable names
 */
function readEnv(env: Environment, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim()
    if (value) {
      return value
    }
  }
  return undefined
}

/**
 * Load gateway settings from environment variables.
 * Unset or blank variables fall back to the schema defaults.
 */
export function loadSettings(env: Environment = process.env): Settings {
  const result = settingsSchema.safeParse({
    host: readEnv(env, 'GATEWAY_HOST'),
    port: readEnv(env, 'GATEWAY_PORT', 'PORT'),
    backendUrl: readEnv(env, 'GATEWAY_BACKEND_URL'),
    maxConcurrentRequests: readEnv(env, 'GATEWAY_MAX_CONCURRENT_REQUESTS'),
    requestTimeout: readEnv(env, 'GATEWAY_REQUEST_TIMEOUT'),
    defaultModel: readEnv(env, 'GATEWAY_DEFAULT_MODEL'),
    dns: {
      registerOnStartup: readEnv(env, 'GATEWAY_DNS_REGISTER_ON_STARTUP'),
      apiUrl: readEnv(env, 'GATEWAY_DNS_API_URL'),
      serviceName: readEnv(env, 'GATEWAY_DNS_SERVICE_NAME'),
      domainBase: readEnv(env, 'GATEWAY_DNS_DOMAIN_BASE'),
      targetDevice: readEnv(env, 'GATEWAY_DNS_TARGET_DEVICE'),
    },
  })

  if (!result.success) {
    throw new SettingsError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    )
  }

  return result.data
}
