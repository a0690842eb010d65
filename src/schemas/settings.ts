import { z } from 'zod'

const TRUTHY = ['true', '1', 'yes', 'on']
const FALSY = ['false', '0', 'no', 'off']

const urlSchema = z
  .string()
  .min(1, 'URL is required')
  .refine(
    (val) => {
      try {
        new URL(val)
        return true
      } catch {
        return false
      }
    },
    { message: 'Invalid URL format' }
  )
  // Joined with relative paths later, so keep a single form without the trailing slash
  .transform((val) => val.replace(/\/+$/, ''))

const booleanFlagSchema = z
  .string()
  .toLowerCase()
  .refine((val) => TRUTHY.includes(val) || FALSY.includes(val), {
    message: `Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`,
  })
  .transform((val) => TRUTHY.includes(val))

export const dnsSettingsSchema = z.object({
  registerOnStartup: booleanFlagSchema.default('false'),
  apiUrl: urlSchema.default('http://127.0.0.1:8053'),
  serviceName: z.string().min(1, 'DNS service name cannot be empty').default('chat'),
  domainBase: z.string().min(1, 'DNS domain base cannot be empty').default('internal.example'),
  targetDevice: z.string().min(1, 'DNS target device cannot be empty').default('inference-host'),
})

// Process settings, read once at startup and never re-read
export const settingsSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(1).max(65535).default(8000),
  backendUrl: urlSchema.default('http://127.0.0.1:8080'),
  maxConcurrentRequests: z.coerce
    .number()
    .int('Max concurrent requests must be an integer')
    .positive('Max concurrent requests must be at least 1')
    .default(4),
  // Seconds
  requestTimeout: z.coerce.number().positive('Request timeout must be positive').default(300),
  defaultModel: z.string().min(1, 'Default model cannot be empty').default('gpt-oss-20b'),
  dns: dnsSettingsSchema,
})

export type DnsSettings = z.infer<typeof dnsSettingsSchema>
export type Settings = z.infer<typeof settingsSchema>
