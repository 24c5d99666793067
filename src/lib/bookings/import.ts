import { formatZonedDateTime } from '@/lib/dateUtils'
import type { CalendarGateway } from '@/lib/google-calendar'
import { logger } from '@/lib/logger'
import type { BookingImportResult, CalendarEventDraft, RoomBooking } from '@/types/availability'

export function bookingSummary(booking: RoomBooking): string {
  return `${booking.holder} (${booking.room})`
}

export function toBookingDraft(booking: RoomBooking, timeZone: string): CalendarEventDraft {
  return {
    summary: bookingSummary(booking),
    start: { dateTime: formatZonedDateTime(booking.start, timeZone), timeZone },
    end: { dateTime: formatZonedDateTime(booking.end, timeZone), timeZone },
  }
}

// Compared as instants: the API echoes date-times in the calendar's own offset
function signature(summary: string, start: Date, end: Date): string {
  return `${summary}|${start.getTime()}|${end.getTime()}`
}

/**
 * Copies scraped room bookings into the calendar. Bookings whose summary,
 * start and end already exist are skipped, so repeated runs add nothing new.
 */
export async function importRoomBookings(
  gateway: CalendarGateway,
  bookings: RoomBooking[],
  options: { timeZone: string; dryRun: boolean }
): Promise<BookingImportResult> {
  const result: BookingImportResult = { created: [], planned: [], skipped: [] }

  if (bookings.length === 0) {
    logger.info('No room bookings to import')
    return result
  }

  const ordered = [...bookings].sort((a, b) => a.start.getTime() - b.start.getTime())
  const timeMin = ordered[0].start
  const timeMax = new Date(Math.max(...ordered.map((booking) => booking.end.getTime())))

  const existing = await gateway.listEvents({ timeMin, timeMax })
  const signatures = new Set(
    existing
      .filter((event) => event.status !== 'cancelled')
      .map((event) => signature(event.summary, event.start, event.end))
  )
  logger.info(`Found ${signatures.size} existing events between ${timeMin.toISOString()} and ${timeMax.toISOString()}`)

  for (const booking of ordered) {
    const draft = toBookingDraft(booking, options.timeZone)
    const key = signature(draft.summary, booking.start, booking.end)

    if (signatures.has(key)) {
      logger.debug(`Skipping already existing event: ${draft.summary} on ${draft.start.dateTime}`)
      result.skipped.push(draft)
      continue
    }
    signatures.add(key)

    if (options.dryRun) {
      logger.info(`Would create event: ${draft.summary} on ${draft.start.dateTime}`)
      result.planned.push({ draft })
      continue
    }

    const created = await gateway.insertEvent(draft)
    logger.info(`Event created: ${draft.summary} on ${draft.start.dateTime}`, {
      metadata: { id: created.id, link: created.htmlLink },
    })
    result.created.push({ draft, created })
  }

  return result
}
