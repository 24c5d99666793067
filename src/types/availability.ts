// Day name -> half-day period -> role code -> staff names
export type WorkSchedule = Record<string, Record<string, Record<string, string[]>>>

export type HalfDayPeriod = 'Voormiddag' | 'Namiddag'

export interface RoomBooking {
  holder: string
  room: string
  start: Date
  end: Date
}

export interface CalendarEvent {
  id?: string
  summary: string
  description?: string
  status?: string
  start: Date
  end: Date
  htmlLink?: string
  /** Private extended properties, e.g. `{ free4booking: 'true', slot: '2026-10-19/Voormiddag' }` */
  tags?: Record<string, string>
}

export interface CalendarEventDraft {
  summary: string
  description?: string
  start: { dateTime: string; timeZone: string }
  end: { dateTime: string; timeZone: string }
  transparency?: 'opaque' | 'transparent'
  extendedProperties?: { private: Record<string, string> }
}

export interface AvailabilitySlot {
  /** Local calendar date, yyyy-MM-dd */
  date: string
  dayName: string
  period: HalfDayPeriod
  label: string
  start: Date
  end: Date
}

export type SlotStatus = 'free' | 'room-booked' | 'understaffed' | 'unscheduled'

export interface RoleCoverage {
  role: string
  required: string[]
  available: string[]
  booked: string[]
  covered: boolean
}

export interface SlotDecision {
  slot: AvailabilitySlot
  status: SlotStatus
  coverage: RoleCoverage[]
  /** Summary of the booking or event that blocks the room, when `status` is `room-booked` */
  blockedBy?: string
}

export interface PlannedEvent {
  draft: CalendarEventDraft
  created?: CalendarEvent
}

export interface BookingImportResult {
  created: PlannedEvent[]
  planned: PlannedEvent[]
  skipped: CalendarEventDraft[]
}

export interface Free4BookingSyncReport {
  decisions: SlotDecision[]
  created: PlannedEvent[]
  planned: PlannedEvent[]
  /** Free slots that already carry a Free4Booking event */
  duplicates: AvailabilitySlot[]
  /** Free4Booking events sitting on slots that are no longer free */
  stale: CalendarEvent[]
}
