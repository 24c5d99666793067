import { addDaysIso, isoWeekday, zonedDateTime } from '@/lib/dateUtils'
import type { AvailabilitySlot } from '@/types/availability'
import { HALF_DAY_SLOTS, WEEKDAY_NAMES } from './constants'

/**
 * Morning and afternoon slots for every weekday from `today` through
 * `today + daysAhead` (inclusive). Weekends have no slots.
 */
export function buildSlots(params: { today: string; daysAhead: number; timeZone: string }): AvailabilitySlot[] {
  const slots: AvailabilitySlot[] = []

  for (let offset = 0; offset <= params.daysAhead; offset += 1) {
    const date = addDaysIso(params.today, offset)
    const dayName = WEEKDAY_NAMES[isoWeekday(date)]
    if (!dayName) {
      continue
    }

    for (const halfDay of HALF_DAY_SLOTS) {
      slots.push({
        date,
        dayName,
        period: halfDay.period,
        label: halfDay.label,
        start: zonedDateTime(date, halfDay.start, params.timeZone),
        end: zonedDateTime(date, halfDay.end, params.timeZone),
      })
    }
  }

  return slots
}

export function slotKey(slot: AvailabilitySlot): string {
  return `${slot.date}/${slot.period}`
}

/** Whole local days covered by the slots, so all-day events are listed too. */
export function slotWindow(slots: AvailabilitySlot[], timeZone: string): { timeMin: Date; timeMax: Date } | null {
  if (slots.length === 0) {
    return null
  }

  const dates = slots.map((slot) => slot.date).sort()
  return {
    timeMin: zonedDateTime(dates[0], '00:00', timeZone),
    timeMax: zonedDateTime(addDaysIso(dates[dates.length - 1], 1), '00:00', timeZone),
  }
}
