import type { HalfDayPeriod } from '@/types/availability'

export const FREE4BOOKING_SUMMARY = 'Free4Booking'
export const FREE4BOOKING_TAG = 'free4booking'
export const FREE4BOOKING_DESCRIPTION =
  'Automatisch aangemaakt Free4Booking event. Gecheckt op basis van werkschema.'

// ISO weekday -> day name used as key in work_schedule.json
export const WEEKDAY_NAMES: Readonly<Record<number, string>> = {
  1: 'MAANDAG',
  2: 'DINSDAG',
  3: 'WOENSDAG',
  4: 'DONDERDAG',
  5: 'VRIJDAG',
}

export const HALF_DAY_SLOTS: ReadonlyArray<{
  period: HalfDayPeriod
  label: string
  start: string
  end: string
}> = [
  { period: 'Voormiddag', label: 'Morning', start: '09:00', end: '12:00' },
  { period: 'Namiddag', label: 'Afternoon', start: '13:00', end: '17:00' },
]
