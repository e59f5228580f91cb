/**
 * Calendar cache gate consulted by the dispatcher before trusting a
 * previously resolved calendar.
 *
 * @module federation/cache
 */

import type { FederatedCalendar } from './types.js'

export interface CalendarCache {
  lookup(calendarId: string): FederatedCalendar | undefined
  isStale(calendarId: string): boolean
  /** Store a freshly resolved calendar */
  remember?(calendar: FederatedCalendar): void
  /** Drop a calendar after it changed */
  forget?(calendarId: string): void
}

const DEFAULT_TTL_MS = 60_000 // 60 seconds

interface CacheEntry {
  calendar: FederatedCalendar
  expiresAt: number
}

/**
 * In-memory cache where an entry goes stale once its TTL has passed.
 */
export class TtlCalendarCache implements CalendarCache {
  private entries = new Map<string, CacheEntry>()
  private ttlMs: number
  private now: () => number

  constructor(options: { ttlMs?: number; now?: () => number } = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS
    this.now = options.now ?? Date.now
  }

  lookup(calendarId: string): FederatedCalendar | undefined {
    return this.entries.get(calendarId)?.calendar
  }

  isStale(calendarId: string): boolean {
    const entry = this.entries.get(calendarId)
    return !entry || this.now() >= entry.expiresAt
  }

  remember(calendar: FederatedCalendar): void {
    this.entries.set(calendar.id, { calendar, expiresAt: this.now() + this.ttlMs })
  }

  forget(calendarId: string): void {
    this.entries.delete(calendarId)
  }
}
