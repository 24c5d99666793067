import { formatTimeRange, formatZonedDateTime, intervalsOverlap } from '@/lib/dateUtils'
import type { CalendarGateway } from '@/lib/google-calendar'
import { logger } from '@/lib/logger'
import type {
  AvailabilitySlot,
  CalendarEvent,
  CalendarEventDraft,
  Free4BookingSyncReport,
  RoomBooking,
  SlotDecision,
  WorkSchedule,
} from '@/types/availability'
import { evaluateSlot, isActiveEvent, isFree4BookingEvent } from './calculator'
import { FREE4BOOKING_DESCRIPTION, FREE4BOOKING_SUMMARY, FREE4BOOKING_TAG } from './constants'
import { slotKey, slotWindow } from './slots'

export function buildFree4BookingDraft(slot: AvailabilitySlot, timeZone: string): CalendarEventDraft {
  return {
    summary: FREE4BOOKING_SUMMARY,
    description: FREE4BOOKING_DESCRIPTION,
    start: { dateTime: formatZonedDateTime(slot.start, timeZone), timeZone },
    end: { dateTime: formatZonedDateTime(slot.end, timeZone), timeZone },
    transparency: 'transparent',
    extendedProperties: {
      private: { [FREE4BOOKING_TAG]: 'true', slot: slotKey(slot) },
    },
  }
}

function describeBlock(decision: SlotDecision): string {
  switch (decision.status) {
    case 'room-booked':
      return `room is booked by '${decision.blockedBy ?? 'unknown'}'`
    case 'unscheduled':
      return 'no staff scheduled for this slot'
    case 'understaffed': {
      const missing = decision.coverage
        .filter((role) => !role.covered)
        .map((role) => `${role.role} (booked: ${role.booked.join(', ') || 'none'} of ${role.required.join(', ') || 'nobody'})`)
      return `required staff not available: ${missing.join('; ')}`
    }
    case 'free':
      return 'free'
  }
}

export interface Free4BookingSyncInput {
  gateway: CalendarGateway
  slots: AvailabilitySlot[]
  schedule: WorkSchedule
  roomBookings: RoomBooking[]
  roomLabel: string
  minStaffPerRole: number
  timeZone: string
  dryRun: boolean
}

/**
 * Publishes a Free4Booking event for every free slot that has none yet.
 * Existing events are never changed: Free4Booking events on slots that are no
 * longer free are only reported back as `stale`.
 */
export async function syncFree4BookingSlots(input: Free4BookingSyncInput): Promise<Free4BookingSyncReport> {
  const report: Free4BookingSyncReport = { decisions: [], created: [], planned: [], duplicates: [], stale: [] }

  const window = slotWindow(input.slots, input.timeZone)
  if (!window) {
    logger.info('No weekday slots in the sync window')
    return report
  }

  const events = await input.gateway.listEvents(window)
  const published: CalendarEvent[] = events.filter((event) => isActiveEvent(event) && isFree4BookingEvent(event))
  logger.info(`Loaded ${events.length} calendar events, ${published.length} of them Free4Booking`, {
    metadata: { timeMin: window.timeMin.toISOString(), timeMax: window.timeMax.toISOString() },
  })

  for (const slot of input.slots) {
    const decision = evaluateSlot({
      slot,
      schedule: input.schedule,
      roomBookings: input.roomBookings,
      calendarEvents: events,
      roomLabel: input.roomLabel,
      minStaffPerRole: input.minStaffPerRole,
    })
    report.decisions.push(decision)

    const label = `${slot.date} ${slot.label} slot (${formatTimeRange(slot.start, slot.end, input.timeZone)})`
    const existing = published.filter((event) => intervalsOverlap(event, slot))

    if (decision.status !== 'free') {
      logger.info(`${label} blocked: ${describeBlock(decision)}`)
      for (const event of existing) {
        if (!report.stale.includes(event)) {
          report.stale.push(event)
          logger.warn(`${label} still carries a Free4Booking event`, { metadata: { id: event.id } })
        }
      }
      continue
    }

    if (existing.length > 0) {
      logger.info(`${label} is free and already published`)
      report.duplicates.push(slot)
      continue
    }

    const draft = buildFree4BookingDraft(slot, input.timeZone)

    if (input.dryRun) {
      logger.info(`${label} is free. Would create Free4Booking event.`)
      report.planned.push({ draft })
      published.push({ summary: draft.summary, start: slot.start, end: slot.end, tags: draft.extendedProperties?.private })
      continue
    }

    const created = await input.gateway.insertEvent(draft)
    logger.info(`${label} is free. Free4Booking event created.`, {
      metadata: { id: created.id, link: created.htmlLink },
    })
    report.created.push({ draft, created })
    published.push(created)
  }

  return report
}
