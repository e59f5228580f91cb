/**
 * Composite identifiers: `backend.calendar` addresses a calendar,
 * `backend.calendar.object` one object inside it.
 *
 * Example: database.defaultcalendar.7sm626oar9a7t5k4p4ljhlnqbk
 *
 * @module federation/object-id
 */

import { InvalidSegmentError, MalformedIdentifierError } from './errors.js'

export const ID_DELIMITER = '.'

export interface DecodedId {
  backend: string
  calendar: string
  object?: string
}

export function isValidSegment(segment: string): boolean {
  return segment.length > 0 && !segment.includes(ID_DELIMITER)
}

export function assertSegment(segment: string): string {
  if (!isValidSegment(segment)) {
    throw new InvalidSegmentError(segment)
  }
  return segment
}

export function encodeObjectId(backend: string, calendar: string, object?: string): string {
  const segments = [assertSegment(backend), assertSegment(calendar)]
  if (object !== undefined) {
    segments.push(assertSegment(object))
  }
  return segments.join(ID_DELIMITER)
}

export function decodeObjectId(id: string): DecodedId {
  const segments = id.split(ID_DELIMITER)
  if (segments.length < 2 || segments.length > 3 || segments.some((s) => s.length === 0)) {
    throw new MalformedIdentifierError(id)
  }
  const [backend, calendar, object] = segments
  return segments.length === 2 ? { backend, calendar } : { backend, calendar, object }
}

/**
 * Decode an identifier that must address a calendar.
 */
export function decodeCalendarId(id: string): { backend: string; calendar: string } {
  const decoded = decodeObjectId(id)
  if (decoded.object !== undefined) {
    throw new MalformedIdentifierError(id)
  }
  return { backend: decoded.backend, calendar: decoded.calendar }
}

/**
 * Decode an identifier that must address an object.
 */
export function decodeObjectRef(id: string): Required<DecodedId> {
  const decoded = decodeObjectId(id)
  if (decoded.object === undefined) {
    throw new MalformedIdentifierError(id)
  }
  return { backend: decoded.backend, calendar: decoded.calendar, object: decoded.object }
}

/**
 * Calendar identifier of the calendar holding an object.
 */
export function parentCalendarId(objectId: string): string {
  const { backend, calendar } = decodeObjectRef(objectId)
  return encodeObjectId(backend, calendar)
}
