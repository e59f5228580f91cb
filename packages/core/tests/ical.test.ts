import { describe, it, expect } from 'vitest'
import { escapeICalText, generateICalEvent, parseICalEvents } from '../src/backends/ical.js'
import type { CalendarObject } from '../src/federation/types.js'

const NOW = new Date('2024-01-01T12:00:00Z')

const dentist: CalendarObject = {
  uid: 'abc',
  kind: 'event',
  start: new Date('2024-01-10T09:00:00Z'),
  end: new Date('2024-01-10T10:00:00Z'),
  properties: { SUMMARY: 'Dentist, checkup', LOCATION: 'Main St; 4', 'X-COLOR': 'red' },
}

describe('escapeICalText', () => {
  it('escapes separators, backslashes and newlines', () => {
    expect(escapeICalText('a,b;c\\d\ne')).toBe('a\\,b\\;c\\\\d\\ne')
  })
})

describe('generateICalEvent', () => {
  it('writes one VEVENT with UTC times and escaped text', () => {
    expect(generateICalEvent(dentist, NOW).split('\r\n')).toEqual([
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      'PRODID:-//calendar-federation//caldav//EN',
      'BEGIN:VEVENT',
      'UID:abc',
      'DTSTAMP:20240101T120000Z',
      'DTSTART:20240110T090000Z',
      'DTEND:20240110T100000Z',
      'SUMMARY:Dentist\\, checkup',
      'LOCATION:Main St\\; 4',
      'END:VEVENT',
      'END:VCALENDAR',
    ])
  })

  it('writes date values for all-day events', () => {
    const lines = generateICalEvent(
      {
        uid: 'trip',
        kind: 'event',
        start: new Date('2024-03-04T00:00:00Z'),
        end: new Date('2024-03-06T00:00:00Z'),
        properties: { 'X-ALL-DAY': true, RRULE: 'FREQ=YEARLY' },
      },
      NOW,
    ).split('\r\n')

    expect(lines).toContain('DTSTART;VALUE=DATE:20240304')
    expect(lines).toContain('DTEND;VALUE=DATE:20240306')
    expect(lines).toContain('RRULE:FREQ=YEARLY')
  })

  it('omits missing bounds', () => {
    const ics = generateICalEvent({ ...dentist, end: null, properties: {} }, NOW)
    expect(ics).not.toContain('DTEND')
  })
})

describe('parseICalEvents', () => {
  it('reads back generated events', () => {
    expect(parseICalEvents(generateICalEvent(dentist, NOW))).toEqual([
      {
        uid: 'abc',
        kind: 'event',
        start: new Date('2024-01-10T09:00:00Z'),
        end: new Date('2024-01-10T10:00:00Z'),
        properties: { SUMMARY: 'Dentist, checkup', LOCATION: 'Main St; 4' },
      },
    ])
  })

  it('reports a recurring event once, by its master', () => {
    const ics = [
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      'PRODID:-//test//test//EN',
      'BEGIN:VEVENT',
      'UID:weekly',
      'DTSTAMP:20240101T120000Z',
      'DTSTART:20240105T080000Z',
      'DTEND:20240105T083000Z',
      'SUMMARY:Standup',
      'RRULE:FREQ=WEEKLY;COUNT=4',
      'END:VEVENT',
      'END:VCALENDAR',
    ].join('\r\n')

    const parsed = parseICalEvents(ics)

    expect(parsed).toHaveLength(1)
    expect(parsed[0].uid).toBe('weekly')
    expect(parsed[0].start).toEqual(new Date('2024-01-05T08:00:00Z'))
    expect(parsed[0].properties.SUMMARY).toBe('Standup')
  })

  it('flags date-only events as all-day', () => {
    const ics = [
      'BEGIN:VCALENDAR',
      'VERSION:2.0',
      'PRODID:-//test//test//EN',
      'BEGIN:VEVENT',
      'UID:holiday',
      'DTSTAMP:20240101T120000Z',
      'DTSTART;VALUE=DATE:20240101',
      'DTEND;VALUE=DATE:20240102',
      'SUMMARY:New Year',
      'END:VEVENT',
      'END:VCALENDAR',
    ].join('\r\n')

    expect(parseICalEvents(ics)[0].properties['X-ALL-DAY']).toBe(true)
  })
})
