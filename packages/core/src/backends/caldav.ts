/**
 * CalDAV Backend
 *
 * Federates one CalDAV account using tsdav. Calendars are the account's
 * collections, addressed by the last segment of their URL. Only VEVENT
 * objects are handled.
 */

import { createDAVClient, type DAVCalendar, type DAVCalendarObject } from 'tsdav'
import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type {
  BackendOperation,
  Calendar,
  CalendarBackend,
  CalendarInput,
  CalendarObject,
  ObjectInput,
  ObjectPatch,
} from '../federation/types.js'
import { generateICalEvent, parseICalEvents } from './ical.js'

// Type for the DAV client returned by createDAVClient
type DAVClientInstance = Awaited<ReturnType<typeof createDAVClient>>

/**
 * The part of the tsdav client this backend talks to.
 */
export type CalDAVConnection = Pick<
  DAVClientInstance,
  | 'fetchCalendars'
  | 'fetchCalendarObjects'
  | 'makeCalendar'
  | 'createCalendarObject'
  | 'updateCalendarObject'
  | 'deleteCalendarObject'
>

export const calDAVBackendOptionsSchema = z
  .object({
    serverUrl: z.string().url(),
    username: z.string().min(1),
    password: z.string(),
    /** Calendars the account can only read (e.g. subscriptions) */
    readOnly: z.array(z.string()).default([]),
  })
  .strict()

export type CalDAVBackendOptions = z.input<typeof calDAVBackendOptionsSchema>

const SUPPORTED: ReadonlySet<BackendOperation> = new Set<BackendOperation>([
  'create-calendar',
  'create-object',
  'edit-object',
  'delete-object',
  'get-in-period',
])

const CACHE_TTL_MS = 60_000 // 60 seconds

function calendarIdFromUrl(url: string): string {
  const urlParts = url.replace(/\/$/, '').split('/')
  return urlParts[urlParts.length - 1]
}

export class CalDAVBackend implements CalendarBackend {
  private client: CalDAVConnection | null = null
  private options: z.output<typeof calDAVBackendOptionsSchema>
  private connect: () => Promise<CalDAVConnection>
  private calendarsCache: Map<string, DAVCalendar> = new Map()
  private cacheExpiry: number = 0

  constructor(options: CalDAVBackendOptions, connect?: () => Promise<CalDAVConnection>) {
    this.options = calDAVBackendOptionsSchema.parse(options)
    this.connect =
      connect ??
      (() =>
        createDAVClient({
          serverUrl: this.options.serverUrl,
          credentials: {
            username: this.options.username,
            password: this.options.password,
          },
          authMethod: 'Basic',
          defaultAccountType: 'caldav',
        }))
  }

  supports(operation: BackendOperation): boolean {
    return SUPPORTED.has(operation)
  }

  /**
   * Get or create the DAV client connection
   */
  private async getClient(): Promise<CalDAVConnection> {
    if (!this.client) {
      this.client = await this.connect()
    }
    return this.client
  }

  /**
   * Get DAVCalendar objects keyed by calendar id, with caching
   */
  private async getDAVCalendars(): Promise<Map<string, DAVCalendar>> {
    const now = Date.now()
    if (this.calendarsCache.size > 0 && now < this.cacheExpiry) {
      return this.calendarsCache
    }

    const client = await this.getClient()
    const davCalendars = await client.fetchCalendars()

    this.calendarsCache.clear()
    for (const cal of davCalendars) {
      this.calendarsCache.set(calendarIdFromUrl(cal.url), cal)
    }

    this.cacheExpiry = now + CACHE_TTL_MS
    return this.calendarsCache
  }

  private async findDAVCalendar(uri: string): Promise<DAVCalendar | null> {
    const calendars = await this.getDAVCalendars()
    return calendars.get(uri) ?? null
  }

  private toCalendar(uri: string, dav: DAVCalendar): Calendar {
    // displayName can be string or object, extract string value
    const displayName = typeof dav.displayName === 'string' ? dav.displayName : uri
    return {
      uri,
      owner: this.options.username,
      displayName,
      properties: { URL: dav.url },
      isActive: true,
    }
  }

  /**
   * Find the raw CalDAV object holding an event
   */
  private async findDAVObject(uri: string, uid: string): Promise<DAVCalendarObject | null> {
    const calendar = await this.findDAVCalendar(uri)
    if (!calendar) return null
    const client = await this.getClient()
    const objects = await client.fetchCalendarObjects({ calendar })
    return (
      objects.find(
        (o) => typeof o.data === 'string' && parseICalEvents(o.data).some((e) => e.uid === uid),
      ) ?? null
    )
  }

  private parseAll(objects: DAVCalendarObject[]): CalendarObject[] {
    const result: CalendarObject[] = []
    for (const obj of objects) {
      if (typeof obj.data === 'string') {
        result.push(...parseICalEvents(obj.data))
      }
    }
    return result
  }

  // ─── Calendars ───

  async getCalendars(userId: string): Promise<Calendar[]> {
    // The account's collections belong to the account user only
    if (userId !== this.options.username) return []
    const calendars = await this.getDAVCalendars()
    return Array.from(calendars, ([uri, dav]) => this.toCalendar(uri, dav))
  }

  async findCalendar(uri: string): Promise<Calendar | null> {
    const dav = await this.findDAVCalendar(uri)
    return dav ? this.toCalendar(uri, dav) : null
  }

  async isCalendarWritableByUser(uri: string, userId: string): Promise<boolean> {
    return userId === this.options.username && !this.options.readOnly.includes(uri)
  }

  async createCalendar(input: CalendarInput): Promise<boolean> {
    const client = await this.getClient()
    const base = this.options.serverUrl.replace(/\/$/, '')
    const calendarUrl = `${base}/${this.options.username}/${input.uri}/`

    await client.makeCalendar({
      url: calendarUrl,
      props: {
        displayname: input.displayName,
      },
    })

    this.invalidateCache()
    return true
  }

  // ─── Objects ───

  async getObjects(uri: string): Promise<CalendarObject[]> {
    const calendar = await this.findDAVCalendar(uri)
    if (!calendar) return []
    const client = await this.getClient()
    return this.parseAll(await client.fetchCalendarObjects({ calendar }))
  }

  /**
   * Server-side time-range query
   */
  async getInPeriod(uri: string, start: Date, end: Date): Promise<CalendarObject[]> {
    const calendar = await this.findDAVCalendar(uri)
    if (!calendar) return []
    const client = await this.getClient()
    const objects = await client.fetchCalendarObjects({
      calendar,
      timeRange: { start: start.toISOString(), end: end.toISOString() },
    })
    return this.parseAll(objects)
  }

  async findObject(uri: string, uid: string): Promise<CalendarObject | null> {
    const objects = await this.getObjects(uri)
    return objects.find((o) => o.uid === uid) ?? null
  }

  async createObject(uri: string, input: ObjectInput): Promise<CalendarObject | null> {
    if (input.kind !== 'event') return null
    const calendar = await this.findDAVCalendar(uri)
    if (!calendar) return null

    const object: CalendarObject = { ...input, uid: input.uid ?? randomUUID() }
    const client = await this.getClient()
    const response = await client.createCalendarObject({
      calendar,
      filename: `${object.uid}.ics`,
      iCalString: generateICalEvent(object),
    })
    return response.ok ? object : null
  }

  async editObject(uri: string, uid: string, patch: ObjectPatch): Promise<boolean> {
    const existing = await this.findDAVObject(uri, uid)
    if (!existing || typeof existing.data !== 'string') return false

    const current = parseICalEvents(existing.data).find((o) => o.uid === uid)
    if (!current) return false

    // Full replacement of the VEVENT with the merged values
    const updated: CalendarObject = { ...current, ...patch, uid }
    if (updated.kind !== 'event') return false

    const client = await this.getClient()
    const response = await client.updateCalendarObject({
      calendarObject: {
        ...existing,
        data: generateICalEvent(updated),
      },
    })
    return response.ok
  }

  async deleteObject(uri: string, uid: string): Promise<boolean> {
    const existing = await this.findDAVObject(uri, uid)
    if (!existing) return false

    const client = await this.getClient()
    const response = await client.deleteCalendarObject({
      calendarObject: existing,
    })
    return response.ok
  }

  /**
   * Invalidate the calendar list cache
   */
  invalidateCache(): void {
    this.cacheExpiry = 0
    this.calendarsCache.clear()
  }
}

/**
 * Factory for registry descriptors: `{ name: 'caldav', args: [options] }`.
 */
export function createCalDAVBackend(args: readonly unknown[]): CalDAVBackend {
  return new CalDAVBackend(calDAVBackendOptionsSchema.parse(args[0]))
}
