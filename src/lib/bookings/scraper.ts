import * as cheerio from 'cheerio'
import { isValidIsoDate, isValidWallClock, zonedDateTime } from '@/lib/dateUtils'
import { logger } from '@/lib/logger'
import type { RoomBooking } from '@/types/availability'

export class BookingScrapeError extends Error {
  url: string

  constructor(message: string, url: string) {
    super(message)
    this.name = 'BookingScrapeError'
    this.url = url
  }
}

export interface BookingPageOptions {
  /** Text a booking cell must contain to count for the room, e.g. "lokaal FA1 (kooi van Faraday)" */
  roomMatch: string
  /** Short room name stored on the parsed bookings, e.g. "lokaal FA1" */
  roomLabel: string
  timeZone: string
}

// 14/10/2026 [09:00-11:30]
const BOOKING_PATTERN = /(\d{2})\/(\d{2})\/(\d{4})\s*\[(\d{2}:\d{2})\s*-\s*(\d{2}:\d{2})\]/g

function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

export async function fetchBookingsPage(url: string): Promise<string> {
  logger.info('Fetching bookings page', { metadata: { url } })

  let response: Response
  try {
    response = await fetch(url, { headers: { accept: 'text/html' } })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new BookingScrapeError(`Could not reach ${url}: ${reason}`, url)
  }

  if (!response.ok) {
    throw new BookingScrapeError(`${url} answered ${response.status} ${response.statusText}`.trim(), url)
  }

  return response.text()
}

/**
 * Reads room reservations from the bookings page. The first table lists each
 * holder in a bold row, followed by one row per reservation:
 *
 *   <tr><td><b>Jan Peeters</b></td></tr>
 *   <tr><td>lokaal FA1 (kooi van Faraday) 14/10/2026 [09:00-11:30]</td></tr>
 */
export function parseBookingsPage(html: string, options: BookingPageOptions, source = 'bookings page'): RoomBooking[] {
  const $ = cheerio.load(html)
  const table = $('table').first()
  if (table.length === 0) {
    throw new BookingScrapeError('Bookings page contains no table', source)
  }

  const roomMatch = normalizeText(options.roomMatch)
  const bookings: RoomBooking[] = []
  let currentHolder: string | null = null

  table.find('tr').each((_, row) => {
    const $row = $(row)
    const bold = $row.find('b').first()
    if (bold.length > 0) {
      currentHolder = normalizeText(bold.text()) || null
      return
    }

    const holder = currentHolder
    const cell = $row.find('td').first()
    if (cell.length === 0 || !holder) {
      return
    }

    const text = normalizeText(cell.text())
    if (!text.includes(roomMatch)) {
      return
    }

    for (const [, day, month, year, startTime, endTime] of text.matchAll(BOOKING_PATTERN)) {
      const isoDate = `${year}-${month}-${day}`
      if (!isValidIsoDate(isoDate) || !isValidWallClock(startTime) || !isValidWallClock(endTime)) {
        logger.warn('Ignoring unreadable booking', { metadata: { holder, text } })
        continue
      }

      const start = zonedDateTime(isoDate, startTime, options.timeZone)
      const end = zonedDateTime(isoDate, endTime, options.timeZone)
      if (end <= start) {
        logger.warn('Ignoring booking that ends before it starts', { metadata: { holder, text } })
        continue
      }

      bookings.push({ holder, room: options.roomLabel, start, end })
    }
  })

  return bookings
}

export async function scrapeRoomBookings(
  url: string,
  options: BookingPageOptions,
  fetchPage: (url: string) => Promise<string> = fetchBookingsPage
): Promise<RoomBooking[]> {
  const html = await fetchPage(url)
  const bookings = parseBookingsPage(html, options, url)
  logger.info(`Found ${bookings.length} ${options.roomLabel} bookings on the bookings page`)
  return bookings
}
