import type { CalendarGateway } from '@/lib/google-calendar'
import type { CalendarEvent, CalendarEventDraft } from '@/types/availability'

/**
 * In-memory stand-in for the Google calendar: listEvents returns stored events
 * overlapping the range, insertEvent stores the draft as a new event.
 */
export class FakeCalendarGateway implements CalendarGateway {
  events: CalendarEvent[]
  inserted: CalendarEventDraft[] = []
  listCalls: Array<{ timeMin: Date; timeMax: Date }> = []

  constructor(events: CalendarEvent[] = [], private readonly timeZone = 'Europe/Brussels') {
    this.events = [...events]
  }

  async describeCalendar() {
    return { summary: 'Test calendar', timeZone: this.timeZone }
  }

  async listEvents(range: { timeMin: Date; timeMax: Date }) {
    this.listCalls.push(range)
    return this.events
      .filter((event) => event.end > range.timeMin && event.start < range.timeMax)
      .sort((a, b) => a.start.getTime() - b.start.getTime())
  }

  async insertEvent(draft: CalendarEventDraft) {
    this.inserted.push(draft)
    const event: CalendarEvent = {
      id: `fake-event-${this.inserted.length}`,
      summary: draft.summary,
      description: draft.description,
      status: 'confirmed',
      start: new Date(draft.start.dateTime),
      end: new Date(draft.end.dateTime),
      htmlLink: `https://calendar.example.test/event/${this.inserted.length}`,
      tags: draft.extendedProperties?.private,
    }
    this.events.push(event)
    return event
  }
}

export function calendarEvent(summary: string, start: string, end: string, extra: Partial<CalendarEvent> = {}): CalendarEvent {
  return { summary, start: new Date(start), end: new Date(end), ...extra }
}
