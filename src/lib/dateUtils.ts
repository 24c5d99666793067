import { addDays, format, getISODay, isValid, parseISO } from 'date-fns'
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/
const HH_MM = /^([01]\d|2[0-3]):[0-5]\d$/

export function isValidIsoDate(isoDate: string): boolean {
  return ISO_DATE.test(isoDate) && isValid(parseISO(isoDate))
}

export function isValidWallClock(time: string): boolean {
  return HH_MM.test(time)
}

function assertIsoDate(isoDate: string): void {
  if (!isValidIsoDate(isoDate)) {
    throw new Error(`Expected a yyyy-MM-dd date, got "${isoDate}"`)
  }
}

/** Calendar date of `date` as seen in `timeZone`, formatted yyyy-MM-dd. */
export function toLocalIsoDate(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, 'yyyy-MM-dd')
}

export function addDaysIso(isoDate: string, days: number): string {
  assertIsoDate(isoDate)
  return format(addDays(parseISO(isoDate), days), 'yyyy-MM-dd')
}

/** ISO weekday of a calendar date: 1 = Monday … 7 = Sunday. */
export function isoWeekday(isoDate: string): number {
  assertIsoDate(isoDate)
  return getISODay(parseISO(isoDate))
}

/** The instant at which the wall clock in `timeZone` reads `time` on `isoDate`. */
export function zonedDateTime(isoDate: string, time: string, timeZone: string): Date {
  assertIsoDate(isoDate)
  if (!isValidWallClock(time)) {
    throw new Error(`Expected an HH:mm time, got "${time}"`)
  }
  return fromZonedTime(`${isoDate}T${time}:00`, timeZone)
}

/** RFC 3339 date-time with the zone's offset, e.g. 2026-10-19T09:00:00+02:00 */
export function formatZonedDateTime(date: Date, timeZone: string): string {
  return formatInTimeZone(date, timeZone, "yyyy-MM-dd'T'HH:mm:ssXXX")
}

export function formatTimeRange(start: Date, end: Date, timeZone: string): string {
  return `${formatInTimeZone(start, timeZone, 'HH:mm')}-${formatInTimeZone(end, timeZone, 'HH:mm')}`
}

export function intervalsOverlap(
  a: { start: Date; end: Date },
  b: { start: Date; end: Date }
): boolean {
  return Math.max(a.start.getTime(), b.start.getTime()) < Math.min(a.end.getTime(), b.end.getTime())
}
