/**
 * iCalendar helpers for the CalDAV backend: VEVENT generation and parsing
 * through ical-expander.
 *
 * @module backends/ical
 */

import IcalExpander, { type ICalComponent, type ICalEvent } from 'ical-expander'
import { DateTime } from 'luxon'
import type { CalendarObject, PropertyMap } from '../federation/types.js'

/** VEVENT properties carried through `CalendarObject.properties` */
export const EVENT_PROPERTIES = [
  'SUMMARY',
  'DESCRIPTION',
  'LOCATION',
  'STATUS',
  'TRANSP',
  'RRULE',
  'CATEGORIES',
] as const

const MAX_ITERATIONS = 365 // Limit recurring event expansion

/**
 * Escape text for iCalendar format
 */
export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\n/g, '\\n')
}

function formatUtc(date: Date): string {
  return DateTime.fromJSDate(date).toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'")
}

/**
 * Generate a VCALENDAR wrapping one VEVENT.
 */
export function generateICalEvent(event: CalendarObject, now: Date = new Date()): string {
  const lines: string[] = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    'PRODID:-//calendar-federation//caldav//EN',
    'BEGIN:VEVENT',
    `UID:${event.uid}`,
    `DTSTAMP:${formatUtc(now)}`,
  ]

  const allDay = event.properties['X-ALL-DAY'] === true
  if (event.start) {
    lines.push(
      allDay
        ? `DTSTART;VALUE=DATE:${DateTime.fromJSDate(event.start).toUTC().toFormat('yyyyMMdd')}`
        : `DTSTART:${formatUtc(event.start)}`,
    )
  }
  if (event.end) {
    lines.push(
      allDay
        ? `DTEND;VALUE=DATE:${DateTime.fromJSDate(event.end).toUTC().toFormat('yyyyMMdd')}`
        : `DTEND:${formatUtc(event.end)}`,
    )
  }

  for (const name of EVENT_PROPERTIES) {
    const value = event.properties[name]
    if (value === undefined || value === null) continue
    // RRULE is structured, not text
    lines.push(name === 'RRULE' ? `RRULE:${value}` : `${name}:${escapeICalText(String(value))}`)
  }

  lines.push('END:VEVENT', 'END:VCALENDAR')

  return lines.join('\r\n')
}

/**
 * Extract a property value as a string (ical.js hands back objects for
 * structured values such as RRULE)
 */
function propertyText(component: ICalComponent, name: string): string | null {
  const value = component.getFirstPropertyValue(name.toLowerCase())
  if (value === null || value === undefined) return null
  if (typeof value === 'string') return value
  return String(value)
}

function eventToObject(event: ICalEvent): CalendarObject {
  const properties: PropertyMap = {}
  for (const name of EVENT_PROPERTIES) {
    const value = propertyText(event.component, name)
    if (value !== null) properties[name] = value
  }
  if (event.startDate.isDate) properties['X-ALL-DAY'] = true

  return {
    uid: event.uid,
    kind: 'event',
    start: event.startDate.toJSDate(),
    end: event.endDate.toJSDate(),
    properties,
  }
}

/**
 * Parse the VEVENTs of an iCalendar document, one object per UID. Recurring
 * events are reported by their master, not by occurrence.
 */
export function parseICalEvents(icalData: string): CalendarObject[] {
  const expander = new IcalExpander({ ics: icalData, maxIterations: MAX_ITERATIONS })
  const expanded = expander.all()

  const byUid = new Map<string, CalendarObject>()
  for (const event of expanded.events) {
    byUid.set(event.uid, eventToObject(event))
  }
  for (const occurrence of expanded.occurrences) {
    if (!byUid.has(occurrence.item.uid)) {
      byUid.set(occurrence.item.uid, eventToObject(occurrence.item))
    }
  }
  return Array.from(byUid.values())
}
