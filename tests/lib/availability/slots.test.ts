import { describe, expect, it } from 'vitest'
import { buildSlots, slotKey, slotWindow } from '@/lib/availability/slots'

const TZ = 'Europe/Brussels'

describe('buildSlots', () => {
  it('creates a morning and an afternoon slot per weekday and skips the weekend', () => {
    const slots = buildSlots({ today: '2026-10-16', daysAhead: 3, timeZone: TZ })

    expect(slots.map(slotKey)).toEqual([
      '2026-10-16/Voormiddag',
      '2026-10-16/Namiddag',
      '2026-10-19/Voormiddag',
      '2026-10-19/Namiddag',
    ])
    expect(slots[0]).toMatchObject({ dayName: 'VRIJDAG', label: 'Morning' })
    expect(slots[2]).toMatchObject({ dayName: 'MAANDAG', label: 'Morning' })
  })

  it('anchors slot times to the local wall clock', () => {
    const [morning, afternoon] = buildSlots({ today: '2026-10-19', daysAhead: 0, timeZone: TZ })

    expect(morning.start.toISOString()).toBe('2026-10-19T07:00:00.000Z')
    expect(morning.end.toISOString()).toBe('2026-10-19T10:00:00.000Z')
    expect(afternoon.start.toISOString()).toBe('2026-10-19T11:00:00.000Z')
    expect(afternoon.end.toISOString()).toBe('2026-10-19T15:00:00.000Z')
  })

  it('keeps 09:00 local after the switch to winter time', () => {
    const [morning] = buildSlots({ today: '2026-10-26', daysAhead: 0, timeZone: TZ })

    expect(morning.start.toISOString()).toBe('2026-10-26T08:00:00.000Z')
  })

  it('returns no slots for a window that only covers a weekend', () => {
    expect(buildSlots({ today: '2026-10-17', daysAhead: 1, timeZone: TZ })).toEqual([])
  })

  it('includes the last day of the window', () => {
    const slots = buildSlots({ today: '2026-10-19', daysAhead: 18, timeZone: TZ })

    expect(slots).toHaveLength(30)
    expect(slots[slots.length - 1].date).toBe('2026-11-06')
  })
})

describe('slotWindow', () => {
  it('spans whole local days from the first to the last slot', () => {
    const slots = buildSlots({ today: '2026-10-16', daysAhead: 3, timeZone: TZ })

    const window = slotWindow(slots, TZ)

    expect(window?.timeMin.toISOString()).toBe('2026-10-15T22:00:00.000Z')
    expect(window?.timeMax.toISOString()).toBe('2026-10-19T22:00:00.000Z')
  })

  it('returns null without slots', () => {
    expect(slotWindow([], TZ)).toBeNull()
  })
})
