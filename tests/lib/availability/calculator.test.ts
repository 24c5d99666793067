import { describe, expect, it } from 'vitest'
import { evaluateSlot, isFree4BookingEvent, type EvaluateSlotInput } from '@/lib/availability/calculator'
import { buildSlots } from '@/lib/availability/slots'
import type { WorkSchedule } from '@/types/availability'
import { calendarEvent } from '../../helpers/fake-calendar'

const [mondayMorning, mondayAfternoon] = buildSlots({
  today: '2026-10-19',
  daysAhead: 0,
  timeZone: 'Europe/Brussels',
})

const schedule: WorkSchedule = {
  MAANDAG: {
    Voormiddag: { exp1: ['Sofie', 'Wout'], exp2: ['Kato'] },
    Namiddag: { exp1: [], exp2: ['Kato'] },
  },
}

function input(overrides: Partial<EvaluateSlotInput> = {}): EvaluateSlotInput {
  return {
    slot: mondayMorning,
    schedule,
    roomBookings: [],
    calendarEvents: [],
    roomLabel: 'lokaal FA1',
    minStaffPerRole: 1,
    ...overrides,
  }
}

describe('evaluateSlot', () => {
  it('marks a slot free when the room is empty and every role is staffed', () => {
    const decision = evaluateSlot(input())

    expect(decision.status).toBe('free')
    expect(decision.coverage).toEqual([
      { role: 'exp1', required: ['Sofie', 'Wout'], available: ['Sofie', 'Wout'], booked: [], covered: true },
      { role: 'exp2', required: ['Kato'], available: ['Kato'], booked: [], covered: true },
    ])
  })

  it('marks a slot occupied by an overlapping scraped booking regardless of staffing', () => {
    const decision = evaluateSlot(
      input({
        roomBookings: [
          {
            holder: 'Jan Peeters',
            room: 'lokaal FA1',
            start: new Date('2026-10-19T08:00:00.000Z'),
            end: new Date('2026-10-19T08:30:00.000Z'),
          },
        ],
      })
    )

    expect(decision.status).toBe('room-booked')
    expect(decision.blockedBy).toBe('Jan Peeters (lokaal FA1)')
    expect(decision.coverage.every((role) => role.covered)).toBe(true)
  })

  it('treats calendar events naming the room as room bookings', () => {
    const decision = evaluateSlot(
      input({
        calendarEvents: [calendarEvent('Practicum (LOKAAL FA1)', '2026-10-19T09:30:00.000Z', '2026-10-19T11:00:00.000Z')],
      })
    )

    expect(decision).toMatchObject({ status: 'room-booked', blockedBy: 'Practicum (LOKAAL FA1)' })
  })

  it('does not count a booking that ends exactly when the slot starts', () => {
    const decision = evaluateSlot(
      input({
        roomBookings: [
          {
            holder: 'Jan Peeters',
            room: 'lokaal FA1',
            start: new Date('2026-10-19T06:00:00.000Z'),
            end: new Date('2026-10-19T07:00:00.000Z'),
          },
        ],
      })
    )

    expect(decision.status).toBe('free')
  })

  it('ignores Free4Booking and cancelled events when looking for the room or staff', () => {
    const decision = evaluateSlot(
      input({
        calendarEvents: [
          calendarEvent('Free4Booking lokaal FA1', '2026-10-19T07:00:00.000Z', '2026-10-19T10:00:00.000Z'),
          calendarEvent('Kato (lokaal FA1)', '2026-10-19T07:00:00.000Z', '2026-10-19T10:00:00.000Z', {
            status: 'cancelled',
          }),
        ],
      })
    )

    expect(decision.status).toBe('free')
  })

  it('marks a slot understaffed when the only person for a role is booked', () => {
    const decision = evaluateSlot(
      input({
        calendarEvents: [calendarEvent('Overleg kato', '2026-10-19T08:00:00.000Z', '2026-10-19T09:00:00.000Z')],
      })
    )

    expect(decision.status).toBe('understaffed')
    expect(decision.coverage[1]).toEqual({
      role: 'exp2',
      required: ['Kato'],
      available: [],
      booked: ['Kato'],
      covered: false,
    })
  })

  it('keeps a role covered while another scheduled person is still free', () => {
    const decision = evaluateSlot(
      input({
        calendarEvents: [calendarEvent('Sofie ziek', '2026-10-19T07:00:00.000Z', '2026-10-19T15:00:00.000Z')],
      })
    )

    expect(decision.status).toBe('free')
    expect(decision.coverage[0]).toMatchObject({ available: ['Wout'], booked: ['Sofie'], covered: true })
  })

  it('applies the minimum staff per role', () => {
    const decision = evaluateSlot(input({ minStaffPerRole: 2 }))

    expect(decision.status).toBe('understaffed')
    expect(decision.coverage.map((role) => role.covered)).toEqual([true, false])
  })

  it('marks a role with nobody scheduled as understaffed', () => {
    const decision = evaluateSlot(input({ slot: mondayAfternoon }))

    expect(decision.status).toBe('understaffed')
    expect(decision.coverage[0]).toMatchObject({ role: 'exp1', required: [], covered: false })
  })

  it('marks days and periods missing from the schedule as unscheduled', () => {
    expect(evaluateSlot(input({ schedule: { DINSDAG: schedule.MAANDAG } })).status).toBe('unscheduled')
    expect(evaluateSlot(input({ schedule: { MAANDAG: { Namiddag: { exp1: ['Kato'] } } } })).status).toBe(
      'unscheduled'
    )
    expect(evaluateSlot(input({ schedule: { MAANDAG: { Voormiddag: {} } } })).status).toBe('unscheduled')
  })

  it('matches day and period names case-insensitively', () => {
    const decision = evaluateSlot(input({ schedule: { maandag: { voormiddag: { exp1: ['Kato'] } } } }))

    expect(decision.status).toBe('free')
  })
})

describe('isFree4BookingEvent', () => {
  it('recognises the tag and the title', () => {
    const start = '2026-10-19T07:00:00.000Z'
    const end = '2026-10-19T10:00:00.000Z'

    expect(isFree4BookingEvent(calendarEvent('Vrij', start, end, { tags: { free4booking: 'true' } }))).toBe(true)
    expect(isFree4BookingEvent(calendarEvent('FREE4BOOKING', start, end))).toBe(true)
    expect(isFree4BookingEvent(calendarEvent('Jan Peeters (lokaal FA1)', start, end))).toBe(false)
  })
})
