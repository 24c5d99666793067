import fs from 'node:fs'
import path from 'node:path'
import { z } from 'zod'
import { formatZodError, type SyncEnv } from '@/lib/env'
import { logger } from '@/lib/logger'
import type { WorkSchedule } from '@/types/availability'
import {
  calendarIdSchema,
  credentialsSchema,
  scrapeUrlSchema,
  tokenSchema,
  workScheduleSchema,
  type GoogleCredentials,
  type StoredToken,
} from './schemas'

export class ConfigError extends Error {
  source: string

  constructor(message: string, source: string) {
    super(message)
    this.name = 'ConfigError'
    this.source = source
  }
}

export type ConfigOrigin = { kind: 'env'; envVar: string } | { kind: 'file'; path: string }

export interface ConfigDocumentSpec<S extends z.ZodTypeAny> {
  /** Environment variable holding the whole JSON document (CI secret) */
  envVar: string
  /** File name looked up inside the config directory */
  fileName: string
  /** Top-level key to read; the whole document is used when omitted */
  key?: string
  schema: S
}

export interface LoadedConfigDocument<T> {
  value: T
  origin: ConfigOrigin
}

export const CONFIG_DOCUMENTS = {
  credentials: { envVar: 'GOOGLE_CREDENTIALS', fileName: 'credentials.json', schema: credentialsSchema },
  token: { envVar: 'GOOGLE_TOKEN', fileName: 'token.json', schema: tokenSchema },
  calendarId: {
    envVar: 'GOOGLE_CALENDAR_ID',
    fileName: 'calendar_id.json',
    key: 'calendar_id',
    schema: calendarIdSchema,
  },
  scrapeUrl: { envVar: 'SCRAPE_URL', fileName: 'scrape_url.json', key: 'url', schema: scrapeUrlSchema },
  workSchedule: {
    envVar: 'WORK_SCHEDULE',
    fileName: 'work_schedule.json',
    key: 'work_schedule',
    schema: workScheduleSchema,
  },
} as const

function describeOrigin(origin: ConfigOrigin): string {
  return origin.kind === 'env' ? `$${origin.envVar}` : origin.path
}

function readRawDocument(
  spec: { envVar: string; fileName: string },
  configDir: string,
  source: NodeJS.ProcessEnv
): { raw: string; origin: ConfigOrigin } | null {
  const fromEnv = source[spec.envVar]
  if (fromEnv && fromEnv.trim().length > 0) {
    return { raw: fromEnv, origin: { kind: 'env', envVar: spec.envVar } }
  }

  const filePath = path.resolve(configDir, spec.fileName)
  if (!fs.existsSync(filePath)) {
    return null
  }

  return { raw: fs.readFileSync(filePath, 'utf8'), origin: { kind: 'file', path: filePath } }
}

function parseDocument<S extends z.ZodTypeAny>(
  spec: ConfigDocumentSpec<S>,
  raw: string,
  origin: ConfigOrigin
): z.output<S> {
  const label = describeOrigin(origin)

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`${label} is not valid JSON: ${reason}`, label)
  }

  let value: unknown = json
  if (spec.key) {
    if (typeof json !== 'object' || json === null || Array.isArray(json) || !(spec.key in json)) {
      throw new ConfigError(`${label} is missing the "${spec.key}" key`, label)
    }
    value = Object.entries(json).find(([entryKey]) => entryKey === spec.key)?.[1]
  }

  const result = spec.schema.safeParse(value)
  if (!result.success) {
    throw new ConfigError(`${label} is malformed:\n${formatZodError(result.error)}`, label)
  }
  return result.data
}

/**
 * Reads one JSON configuration document, preferring the environment variable
 * (CI secret) over the local file. Throws `ConfigError` when the document is
 * absent or does not match its schema.
 */
export function loadConfigDocument<S extends z.ZodTypeAny>(
  spec: ConfigDocumentSpec<S>,
  options: { configDir: string; source?: NodeJS.ProcessEnv }
): LoadedConfigDocument<z.output<S>> {
  const document = loadOptionalConfigDocument(spec, options)
  if (!document) {
    throw new ConfigError(
      `Missing configuration: set ${spec.envVar} or provide ${path.resolve(options.configDir, spec.fileName)}`,
      spec.fileName
    )
  }
  return document
}

export function loadOptionalConfigDocument<S extends z.ZodTypeAny>(
  spec: ConfigDocumentSpec<S>,
  options: { configDir: string; source?: NodeJS.ProcessEnv }
): LoadedConfigDocument<z.output<S>> | null {
  const raw = readRawDocument(spec, options.configDir, options.source ?? process.env)
  if (!raw) {
    return null
  }

  const value = parseDocument(spec, raw.raw, raw.origin)
  logger.debug(`Loaded ${spec.fileName}`, { metadata: { from: describeOrigin(raw.origin) } })
  return { value, origin: raw.origin }
}

export interface SyncConfig {
  credentials: GoogleCredentials
  token: StoredToken | null
  /** Set when the token was read from disk, so refreshed tokens can be written back */
  tokenFile: string | null
  calendarId: string
  scrapeUrl: string
  workSchedule: WorkSchedule
}

export function loadSyncConfig(env: SyncEnv, source: NodeJS.ProcessEnv = process.env): SyncConfig {
  const configDir = env.SYNC_CONFIG_DIR ?? process.cwd()
  const options = { configDir, source }

  const credentials = loadConfigDocument(CONFIG_DOCUMENTS.credentials, options).value
  const token = loadOptionalConfigDocument(CONFIG_DOCUMENTS.token, options)
  const calendarId = loadConfigDocument(CONFIG_DOCUMENTS.calendarId, options).value
  const scrapeUrl = loadConfigDocument(CONFIG_DOCUMENTS.scrapeUrl, options).value
  const workSchedule = loadConfigDocument(CONFIG_DOCUMENTS.workSchedule, options).value

  if (Object.keys(workSchedule).length === 0) {
    throw new ConfigError('work_schedule does not define any day', CONFIG_DOCUMENTS.workSchedule.fileName)
  }

  if (credentials.kind === 'oauth' && !token) {
    throw new ConfigError(
      `OAuth credentials need a stored token: set ${CONFIG_DOCUMENTS.token.envVar} or provide ${path.resolve(configDir, CONFIG_DOCUMENTS.token.fileName)}`,
      CONFIG_DOCUMENTS.token.fileName
    )
  }

  return {
    credentials,
    token: token?.value ?? null,
    tokenFile: token?.origin.kind === 'file' ? token.origin.path : null,
    calendarId,
    scrapeUrl,
    workSchedule,
  }
}
