import { intervalsOverlap } from '@/lib/dateUtils'
import type {
  AvailabilitySlot,
  CalendarEvent,
  RoleCoverage,
  RoomBooking,
  SlotDecision,
  WorkSchedule,
} from '@/types/availability'
import { FREE4BOOKING_TAG } from './constants'

export function isFree4BookingEvent(event: CalendarEvent): boolean {
  return event.tags?.[FREE4BOOKING_TAG] === 'true' || event.summary.toLowerCase().includes(FREE4BOOKING_TAG)
}

export function isActiveEvent(event: CalendarEvent): boolean {
  return event.status !== 'cancelled'
}

// Exact key first, then a case-insensitive match ("maandag" / "MAANDAG")
function findEntry<T>(record: Record<string, T>, key: string): T | undefined {
  if (Object.prototype.hasOwnProperty.call(record, key)) {
    return record[key]
  }
  const wanted = key.trim().toLowerCase()
  return Object.entries(record).find(([candidate]) => candidate.trim().toLowerCase() === wanted)?.[1]
}

export function findSlotSchedule(
  schedule: WorkSchedule,
  slot: Pick<AvailabilitySlot, 'dayName' | 'period'>
): Record<string, string[]> | undefined {
  const day = findEntry(schedule, slot.dayName)
  return day ? findEntry(day, slot.period) : undefined
}

/**
 * A scheduled person counts as booked when an overlapping calendar event
 * mentions their name. Each role needs `minStaffPerRole` people left over.
 */
export function evaluateCoverage(
  slotSchedule: Record<string, string[]>,
  overlappingEvents: CalendarEvent[],
  minStaffPerRole: number
): RoleCoverage[] {
  const summaries = overlappingEvents.map((event) => event.summary.toLowerCase())

  return Object.entries(slotSchedule).map(([role, names]) => {
    const booked = names.filter((name) => summaries.some((summary) => summary.includes(name.toLowerCase())))
    const available = names.filter((name) => !booked.includes(name))
    return {
      role,
      required: names,
      available,
      booked,
      covered: available.length >= minStaffPerRole,
    }
  })
}

export interface EvaluateSlotInput {
  slot: AvailabilitySlot
  schedule: WorkSchedule
  roomBookings: RoomBooking[]
  calendarEvents: CalendarEvent[]
  /** Calendar events whose summary mentions this label occupy the room */
  roomLabel: string
  minStaffPerRole: number
}

export function evaluateSlot(input: EvaluateSlotInput): SlotDecision {
  const { slot } = input

  const overlappingEvents = input.calendarEvents.filter(
    (event) => isActiveEvent(event) && !isFree4BookingEvent(event) && intervalsOverlap(event, slot)
  )

  const slotSchedule = findSlotSchedule(input.schedule, slot)
  const coverage = slotSchedule ? evaluateCoverage(slotSchedule, overlappingEvents, input.minStaffPerRole) : []

  const roomNeedle = input.roomLabel.toLowerCase()
  const blockingBooking = input.roomBookings.find((booking) => intervalsOverlap(booking, slot))
  const blockingEvent = overlappingEvents.find((event) => event.summary.toLowerCase().includes(roomNeedle))

  if (blockingBooking) {
    return { slot, status: 'room-booked', coverage, blockedBy: `${blockingBooking.holder} (${blockingBooking.room})` }
  }
  if (blockingEvent) {
    return { slot, status: 'room-booked', coverage, blockedBy: blockingEvent.summary }
  }

  if (coverage.length === 0) {
    return { slot, status: 'unscheduled', coverage }
  }

  return { slot, status: coverage.every((role) => role.covered) ? 'free' : 'understaffed', coverage }
}
