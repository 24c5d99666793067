import fs from 'node:fs'
import { fromZonedTime } from 'date-fns-tz'
import { google, type calendar_v3 } from 'googleapis'
import type { GoogleCredentials, StoredToken } from '@/lib/config/schemas'
import { logger } from '@/lib/logger'
import type { CalendarEvent, CalendarEventDraft } from '@/types/availability'

export const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar']

export type CalendarAuth = NonNullable<calendar_v3.Options['auth']>

export class CalendarAuthError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CalendarAuthError'
  }
}

export class CalendarApiError extends Error {
  operation: string
  status?: number

  constructor(operation: string, message: string, status?: number) {
    super(message)
    this.name = 'CalendarApiError'
    this.operation = operation
    this.status = status
  }
}

export interface CalendarGateway {
  describeCalendar(): Promise<{ summary: string; timeZone?: string }>
  /** Single (expanded) events overlapping the range, ordered by start time */
  listEvents(range: { timeMin: Date; timeMax: Date }): Promise<CalendarEvent[]>
  insertEvent(draft: CalendarEventDraft): Promise<CalendarEvent>
}

type RefreshedTokens = {
  access_token?: string | null
  refresh_token?: string | null
  expiry_date?: number | null
}

// Keeps whichever key layout the file already uses: `token`/`expiry` (ISO string) or `access_token`/`expiry_date` (epoch ms)
export function persistRefreshedToken(tokenFile: string, tokens: RefreshedTokens): void {
  try {
    const existing: unknown = JSON.parse(fs.readFileSync(tokenFile, 'utf8'))
    const next: Record<string, unknown> =
      typeof existing === 'object' && existing !== null && !Array.isArray(existing) ? { ...existing } : {}
    const isoExpiryLayout = 'token' in next && !('access_token' in next)

    if (tokens.access_token) {
      next[isoExpiryLayout ? 'token' : 'access_token'] = tokens.access_token
    }
    if (tokens.expiry_date) {
      if (isoExpiryLayout) {
        next.expiry = new Date(tokens.expiry_date).toISOString()
      } else {
        next.expiry_date = tokens.expiry_date
      }
    }
    if (tokens.refresh_token) {
      next.refresh_token = tokens.refresh_token
    }

    fs.writeFileSync(tokenFile, `${JSON.stringify(next, null, 2)}\n`)
    logger.info('Stored refreshed Google token', { metadata: { tokenFile } })
  } catch (error) {
    logger.warn('Could not store refreshed Google token; the next run will refresh again', {
      error: error instanceof Error ? error : new Error(String(error)),
      metadata: { tokenFile },
    })
  }
}

/**
 * Builds the auth client for the Calendar API: a service account when the
 * credentials are a service-account key, otherwise the OAuth client with the
 * stored user token. Obtaining a first token is done outside this job.
 */
export function createCalendarAuth(params: {
  credentials: GoogleCredentials
  token: StoredToken | null
  tokenFile?: string | null
  now?: Date
}): CalendarAuth {
  const { credentials, token } = params

  if (credentials.kind === 'service_account') {
    logger.info('Using service account authentication', {
      metadata: { clientEmail: credentials.clientEmail, projectId: credentials.projectId },
    })
    return new google.auth.GoogleAuth({
      credentials: {
        client_email: credentials.clientEmail,
        private_key: credentials.privateKey,
      },
      scopes: CALENDAR_SCOPES,
    })
  }

  if (!token) {
    throw new CalendarAuthError(
      'Google Calendar authentication not configured. Provide token.json (or GOOGLE_TOKEN) for the OAuth client.'
    )
  }

  const now = (params.now ?? new Date()).getTime()
  const accessTokenUsable = Boolean(token.accessToken) && (token.expiryDate === undefined || token.expiryDate > now)
  if (!token.refreshToken && !accessTokenUsable) {
    throw new CalendarAuthError(
      'Stored Google token has expired and carries no refresh_token. Re-authorize the OAuth client and replace token.json.'
    )
  }

  const client = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret, credentials.redirectUri)
  client.setCredentials({
    access_token: token.accessToken,
    refresh_token: token.refreshToken,
    expiry_date: token.expiryDate,
  })

  const tokenFile = params.tokenFile
  if (tokenFile) {
    client.on('tokens', (tokens: RefreshedTokens) => persistRefreshedToken(tokenFile, tokens))
  }

  logger.info('Using OAuth2 with stored user token', {
    metadata: { hasRefreshToken: Boolean(token.refreshToken), persistsRefresh: Boolean(tokenFile) },
  })
  return client
}

const EXPLICIT_OFFSET = /(?:[zZ]|[+-]\d{2}:?\d{2})$/

/**
 * Converts an event's start or end into an instant. Date-times without an
 * offset and all-day dates are read as wall-clock time in `timeZone`.
 */
export function parseEventTime(
  time: calendar_v3.Schema$EventDateTime | undefined,
  timeZone: string
): Date | null {
  let parsed: Date | null = null
  if (time?.dateTime) {
    parsed = EXPLICIT_OFFSET.test(time.dateTime)
      ? new Date(time.dateTime)
      : fromZonedTime(time.dateTime, time.timeZone ?? timeZone)
  } else if (time?.date) {
    parsed = fromZonedTime(`${time.date}T00:00:00`, timeZone)
  }

  if (!parsed || Number.isNaN(parsed.getTime())) {
    return null
  }
  return parsed
}

export function normalizeEvent(item: calendar_v3.Schema$Event, timeZone: string): CalendarEvent | null {
  const start = parseEventTime(item.start, timeZone)
  const end = parseEventTime(item.end, timeZone)
  if (!start || !end) {
    return null
  }

  return {
    id: item.id ?? undefined,
    summary: item.summary ?? '',
    description: item.description ?? undefined,
    status: item.status ?? undefined,
    start,
    end,
    htmlLink: item.htmlLink ?? undefined,
    tags: item.extendedProperties?.private ?? undefined,
  }
}

function readErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined
  }
  if ('code' in error) {
    const code = Number(error.code)
    if (Number.isInteger(code) && code >= 100) return code
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status
  }
  return undefined
}

function describeFailure(status: number | undefined, calendarId: string): string {
  switch (status) {
    case 401:
      return 'Authentication rejected. Check credentials.json and token.json.'
    case 403:
      return 'Permission denied. Share the calendar with this account and grant "Make changes to events".'
    case 404:
      return `Calendar not found: ${calendarId}. Check calendar_id.`
    case 400:
      return 'Bad request. Check the event data format.'
    default:
      return 'Unexpected Calendar API error.'
  }
}

export class GoogleCalendarGateway implements CalendarGateway {
  private readonly calendar: calendar_v3.Calendar
  private readonly calendarId: string
  private readonly timeZone: string

  constructor(options: { auth: CalendarAuth; calendarId: string; timeZone: string }) {
    this.calendar = google.calendar({ version: 'v3', auth: options.auth })
    this.calendarId = options.calendarId
    this.timeZone = options.timeZone
  }

  private async request<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call()
    } catch (error) {
      const status = readErrorStatus(error)
      const message = error instanceof Error ? error.message : String(error)
      throw new CalendarApiError(
        operation,
        `${operation} failed${status ? ` (${status})` : ''}: ${message}. ${describeFailure(status, this.calendarId)}`,
        status
      )
    }
  }

  async describeCalendar(): Promise<{ summary: string; timeZone?: string }> {
    const response = await this.request('Load calendar', () =>
      this.calendar.calendars.get({ calendarId: this.calendarId })
    )
    return {
      summary: response.data.summary ?? this.calendarId,
      timeZone: response.data.timeZone ?? undefined,
    }
  }

  async listEvents(range: { timeMin: Date; timeMax: Date }): Promise<CalendarEvent[]> {
    const events: CalendarEvent[] = []
    let pageToken: string | undefined

    do {
      const response = await this.request('List calendar events', () =>
        this.calendar.events.list({
          calendarId: this.calendarId,
          timeMin: range.timeMin.toISOString(),
          timeMax: range.timeMax.toISOString(),
          singleEvents: true,
          orderBy: 'startTime',
          maxResults: 250,
          pageToken,
        })
      )

      for (const item of response.data.items ?? []) {
        const event = normalizeEvent(item, this.timeZone)
        if (event) {
          events.push(event)
        } else {
          logger.debug('Ignoring calendar event without start/end', { metadata: { id: item.id } })
        }
      }
      pageToken = response.data.nextPageToken ?? undefined
    } while (pageToken)

    return events
  }

  async insertEvent(draft: CalendarEventDraft): Promise<CalendarEvent> {
    const response = await this.request('Create calendar event', () =>
      this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: draft,
      })
    )

    const created = normalizeEvent(response.data, this.timeZone)
    if (!created) {
      throw new CalendarApiError('Create calendar event', 'Calendar API returned an event without start/end')
    }
    return created
  }
}
