import { describe, it, expect } from 'vitest'
import { TtlCalendarCache } from '../src/federation/cache.js'
import { filterByPeriod, overlapsPeriod } from '../src/federation/period.js'
import { CALENDAR_ID_PROPERTY, tagCalendar, tagObject } from '../src/federation/tagging.js'
import { UidIndex } from '../src/federation/uid-index.js'
import { MemoryVisibilityStore } from '../src/federation/visibility.js'
import type { Calendar, CalendarObject, FederatedCalendar } from '../src/federation/types.js'

function object(uid: string, start: string | null, end: string | null): CalendarObject {
  return {
    uid,
    kind: 'event',
    start: start === null ? null : new Date(start),
    end: end === null ? null : new Date(end),
    properties: {},
  }
}

// -------------------------------------------------------------------
// Period filter
// -------------------------------------------------------------------

describe('overlapsPeriod', () => {
  const start = new Date('2024-01-01T00:00:00Z')
  const end = new Date('2024-01-31T23:59:59Z')

  it('matches objects intersecting the period', () => {
    expect(overlapsPeriod(object('a', '2024-01-10T09:00:00Z', '2024-01-10T10:00:00Z'), start, end)).toBe(true)
    expect(overlapsPeriod(object('b', '2023-12-31T22:00:00Z', '2024-01-01T01:00:00Z'), start, end)).toBe(true)
  })

  it('includes objects touching a period bound', () => {
    expect(overlapsPeriod(object('a', '2023-12-31T00:00:00Z', '2024-01-01T00:00:00Z'), start, end)).toBe(true)
    expect(overlapsPeriod(object('b', '2024-01-31T23:59:59Z', '2024-02-01T00:00:00Z'), start, end)).toBe(true)
  })

  it('excludes objects outside the period', () => {
    expect(overlapsPeriod(object('a', '2024-02-03T10:00:00Z', '2024-02-03T11:00:00Z'), start, end)).toBe(false)
  })

  it('treats an object with one bound as an instant', () => {
    expect(overlapsPeriod(object('a', '2024-01-15T00:00:00Z', null), start, end)).toBe(true)
    expect(overlapsPeriod(object('b', null, '2023-06-01T00:00:00Z'), start, end)).toBe(false)
  })

  it('never matches an object without bounds', () => {
    expect(overlapsPeriod(object('a', null, null), start, end)).toBe(false)
  })

  it('filters and keeps order', () => {
    const objects = [
      object('x', '2024-01-20T00:00:00Z', '2024-01-20T01:00:00Z'),
      object('y', '2024-03-01T00:00:00Z', '2024-03-01T01:00:00Z'),
      object('z', '2024-01-02T00:00:00Z', '2024-01-02T01:00:00Z'),
    ]
    expect(filterByPeriod(objects, start, end).map((o) => o.uid)).toEqual(['x', 'z'])
  })
})

// -------------------------------------------------------------------
// Tagging
// -------------------------------------------------------------------

describe('tagCalendar', () => {
  const calendar: Calendar = {
    uri: 'personal',
    owner: 'alice',
    displayName: 'Personal',
    properties: { COLOR: '#ff0000' },
    isActive: true,
  }

  it('prefixes the backend and records the composite identifier', () => {
    expect(tagCalendar(calendar, 'database')).toEqual({
      uri: 'database.personal',
      id: 'database.personal',
      backend: 'database',
      owner: 'alice',
      displayName: 'Personal',
      properties: { COLOR: '#ff0000', [CALENDAR_ID_PROPERTY]: 'database.personal' },
      isActive: true,
    })
  })

  it('is idempotent', () => {
    const once = tagCalendar(calendar, 'database')
    const twice = tagCalendar(once, 'database')
    expect(twice).toEqual(once)
  })

  it('does not mutate its input', () => {
    tagCalendar(calendar, 'database')
    expect(calendar.uri).toBe('personal')
    expect(calendar.properties).toEqual({ COLOR: '#ff0000' })
  })
})

describe('tagObject', () => {
  it('attaches the object and calendar identifiers', () => {
    const tagged = tagObject(object('abc', null, null), 'database.personal')
    expect(tagged.id).toBe('database.personal.abc')
    expect(tagged.calendarId).toBe('database.personal')
  })
})

// -------------------------------------------------------------------
// Cache, UID index, visibility
// -------------------------------------------------------------------

describe('TtlCalendarCache', () => {
  const calendar: FederatedCalendar = tagCalendar(
    { uri: 'work', owner: 'alice', displayName: 'Work', properties: {}, isActive: true },
    'database',
  )

  it('treats unknown calendars as stale', () => {
    const cache = new TtlCalendarCache()
    expect(cache.lookup('database.work')).toBeUndefined()
    expect(cache.isStale('database.work')).toBe(true)
  })

  it('goes stale once the TTL has passed', () => {
    let now = 1_000
    const cache = new TtlCalendarCache({ ttlMs: 500, now: () => now })
    cache.remember(calendar)
    expect(cache.isStale('database.work')).toBe(false)
    now = 1_499
    expect(cache.isStale('database.work')).toBe(false)
    now = 1_500
    expect(cache.isStale('database.work')).toBe(true)
  })

  it('forgets evicted calendars', () => {
    const cache = new TtlCalendarCache()
    cache.remember(calendar)
    cache.forget('database.work')
    expect(cache.lookup('database.work')).toBeUndefined()
  })
})

describe('UidIndex', () => {
  it('resolves a uid to the identifier it was last seen under', () => {
    const index = new UidIndex()
    index.record('abc', 'database.work.abc')
    index.record('abc', 'database.personal.abc')
    expect(index.resolve('abc')).toBe('database.personal.abc')
    expect(index.resolve('nope')).toBeUndefined()
    expect(index.size).toBe(1)
  })
})

describe('MemoryVisibilityStore', () => {
  it('keeps calendars and objects apart', () => {
    const store = new MemoryVisibilityStore()
    store.hideCalendar('database.work')
    store.hideObject('database.work.abc')
    expect(store.isCalendarHidden('database.work')).toBe(true)
    expect(store.isObjectHidden('database.work')).toBe(false)
    expect(store.isObjectHidden('database.work.abc')).toBe(true)
  })
})
