import { ID_DELIMITER, decodeCalendarId, encodeObjectId, isValidSegment } from './object-id.js'
import type { Calendar, CalendarObject, FederatedCalendar, FederatedObject } from './types.js'

/** Property carrying the composite calendar identifier on returned calendars */
export const CALENDAR_ID_PROPERTY = 'X-FEDERATION-CALENDAR-ID'

function isTaggedUri(uri: string, backend: string): boolean {
  const segments = uri.split(ID_DELIMITER)
  return segments.length === 2 && segments[0] === backend && isValidSegment(segments[1])
}

/**
 * Prefix the backend name onto a calendar's URI and attach its composite
 * identifier. Tagging an already tagged calendar changes nothing.
 */
export function tagCalendar(calendar: Calendar, backend: string): FederatedCalendar {
  const id = isTaggedUri(calendar.uri, backend)
    ? calendar.uri
    : encodeObjectId(backend, calendar.uri)

  return {
    ...calendar,
    uri: id,
    id,
    backend,
    properties: { ...calendar.properties, [CALENDAR_ID_PROPERTY]: id },
  }
}

export function tagObject(object: CalendarObject, calendarId: string): FederatedObject {
  const { backend, calendar } = decodeCalendarId(calendarId)
  return {
    ...object,
    id: encodeObjectId(backend, calendar, object.uid),
    calendarId,
  }
}
