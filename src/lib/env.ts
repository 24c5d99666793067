import { z } from 'zod'

/**
 * Environment variable validation schema for the availability sync run.
 * The JSON documents (credentials, token, calendar id, scrape url, work schedule)
 * are loaded separately by `@/lib/config`.
 */
const intSchema = (fallback: number, min: number, max: number) =>
  z.preprocess(
    (val) => (val === undefined || val === '' ? fallback : val),
    z.coerce.number().int().min(min).max(max)
  )

const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Slot window
  SYNC_TIMEZONE: z
    .string()
    .min(1)
    .default('Europe/Brussels')
    .refine(isValidTimeZone, { message: 'must be an IANA time zone such as Europe/Brussels' }),
  SYNC_DAYS_AHEAD: intSchema(20, 0, 60),
  SYNC_MIN_STAFF_PER_ROLE: intSchema(1, 1, 20),

  // Room matching
  SYNC_ROOM_MATCH: z.string().min(1).default('lokaal FA1 (kooi van Faraday)'),
  SYNC_ROOM_LABEL: z.string().min(1).default('lokaal FA1'),

  // Where credentials.json, token.json and the other documents live
  SYNC_CONFIG_DIR: z.string().min(1).optional(),
})

export type SyncEnv = z.infer<typeof envSchema>

let env: SyncEnv | undefined

function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone: value })
    return true
  } catch {
    return false
  }
}

/**
 * Formats Zod validation errors for better readability
 */
export function formatZodError(error: z.ZodError): string {
  return error.errors
    .map((err) => {
      const path = err.path.join('.')
      return path ? `  - ${path}: ${err.message}` : `  - ${err.message}`
    })
    .join('\n')
}

/**
 * Validates environment variables and returns the typed environment.
 * Pass a source to validate something other than `process.env` (tests do).
 */
export function getSyncEnv(source: NodeJS.ProcessEnv = process.env): SyncEnv {
  if (source === process.env && env) return env

  const result = envSchema.safeParse(source)
  if (!result.success) {
    throw new Error(`Environment validation failed:\n${formatZodError(result.error)}`)
  }

  if (source === process.env) {
    env = result.data
  }
  return result.data
}

export function resetSyncEnvCache(): void {
  env = undefined
}
