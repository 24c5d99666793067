import { buildSlots } from '@/lib/availability/slots'
import { syncFree4BookingSlots } from '@/lib/availability/sync'
import { importRoomBookings } from '@/lib/bookings/import'
import { fetchBookingsPage, scrapeRoomBookings } from '@/lib/bookings/scraper'
import type { SyncConfig } from '@/lib/config/load-config'
import { toLocalIsoDate } from '@/lib/dateUtils'
import type { SyncEnv } from '@/lib/env'
import type { CalendarGateway } from '@/lib/google-calendar'
import { logger } from '@/lib/logger'
import type { BookingImportResult, Free4BookingSyncReport, RoomBooking } from '@/types/availability'

export interface AvailabilitySyncOptions {
  config: Pick<SyncConfig, 'scrapeUrl' | 'workSchedule'>
  env: Pick<
    SyncEnv,
    'SYNC_TIMEZONE' | 'SYNC_DAYS_AHEAD' | 'SYNC_MIN_STAFF_PER_ROLE' | 'SYNC_ROOM_MATCH' | 'SYNC_ROOM_LABEL'
  >
  gateway: CalendarGateway
  dryRun: boolean
  /** Copy the scraped room bookings into the calendar before publishing slots */
  importBookings?: boolean
  /** Overrides SYNC_DAYS_AHEAD */
  daysAhead?: number
  now?: Date
  fetchPage?: (url: string) => Promise<string>
}

export interface AvailabilitySyncResult {
  bookings: RoomBooking[]
  imported: BookingImportResult | null
  sync: Free4BookingSyncReport
}

export async function runAvailabilitySync(options: AvailabilitySyncOptions): Promise<AvailabilitySyncResult> {
  const { env, gateway, dryRun } = options
  const timeZone = env.SYNC_TIMEZONE

  const calendar = await gateway.describeCalendar()
  logger.info('Connected to Google Calendar', { metadata: { calendar: calendar.summary, dryRun } })
  if (calendar.timeZone && calendar.timeZone !== timeZone) {
    logger.warn(`Calendar time zone ${calendar.timeZone} differs from SYNC_TIMEZONE ${timeZone}`)
  }

  const bookings = await scrapeRoomBookings(
    options.config.scrapeUrl,
    { roomMatch: env.SYNC_ROOM_MATCH, roomLabel: env.SYNC_ROOM_LABEL, timeZone },
    options.fetchPage ?? fetchBookingsPage
  )

  let imported: BookingImportResult | null = null
  if (options.importBookings ?? true) {
    logger.info('Running room bookings import')
    imported = await importRoomBookings(gateway, bookings, { timeZone, dryRun })
  }

  const today = toLocalIsoDate(options.now ?? new Date(), timeZone)
  const daysAhead = options.daysAhead ?? env.SYNC_DAYS_AHEAD
  const slots = buildSlots({ today, daysAhead, timeZone })
  logger.info(`Running Free4Booking management for ${slots.length} slots from ${today} (+${daysAhead} days)`)

  const sync = await syncFree4BookingSlots({
    gateway,
    slots,
    schedule: options.config.workSchedule,
    roomBookings: bookings,
    roomLabel: env.SYNC_ROOM_LABEL,
    minStaffPerRole: env.SYNC_MIN_STAFF_PER_ROLE,
    timeZone,
    dryRun,
  })

  logger.info('Availability sync finished', {
    metadata: {
      dryRun,
      bookingsFound: bookings.length,
      bookingsCreated: imported ? imported.created.length : 0,
      bookingsPlanned: imported ? imported.planned.length : 0,
      free4BookingCreated: sync.created.length,
      free4BookingPlanned: sync.planned.length,
      free4BookingAlreadyPublished: sync.duplicates.length,
      free4BookingStale: sync.stale.length,
    },
  })

  return { bookings, imported, sync }
}
