/**
 * Calendar Federation
 *
 * Public operation surface. Every call decodes its identifier, resolves the
 * owning backend from the registry and dispatches to it, after asking the
 * negotiator whether the backend can do the work itself.
 *
 * Backend failures never escape as exceptions: they are logged and returned
 * as a failed Outcome. Malformed identifiers are thrown.
 *
 * @module federation/dispatcher
 */

import { CapabilityNegotiator } from './capabilities.js'
import type { CalendarCache } from './cache.js'
import {
  BackendNotFoundError,
  BackendOperationFailedError,
  InvalidSegmentError,
  NotFoundError,
  UidNotIndexedError,
  UnsupportedOperationError,
  fail,
  succeed,
} from './errors.js'
import {
  assertSegment,
  decodeCalendarId,
  decodeObjectId,
  decodeObjectRef,
  encodeObjectId,
  isValidSegment,
} from './object-id.js'
import { filterByPeriod } from './period.js'
import type { BackendRegistry } from './registry.js'
import { tagCalendar, tagObject } from './tagging.js'
import type {
  BackendOperation,
  Calendar,
  CalendarFilters,
  CalendarInput,
  CalendarObject,
  CalendarPatch,
  DeleteMode,
  FederatedCalendar,
  FederatedObject,
  FederationLog,
  ObjectInput,
  ObjectPatch,
  Outcome,
} from './types.js'
import { UidIndex } from './uid-index.js'
import { MemoryVisibilityStore, type VisibilityStore } from './visibility.js'
import { silentLog } from '../logger.js'

export interface CalendarFederationOptions {
  registry: BackendRegistry
  negotiator?: CapabilityNegotiator
  cache?: CalendarCache
  uidIndex?: UidIndex
  visibility?: VisibilityStore
  log?: FederationLog
}

const CATEGORY = 'federation'

export class CalendarFederation {
  readonly registry: BackendRegistry
  readonly uidIndex: UidIndex
  private negotiator: CapabilityNegotiator
  private cache: CalendarCache | null
  private visibility: VisibilityStore
  private log: FederationLog

  constructor(options: CalendarFederationOptions) {
    this.registry = options.registry
    this.negotiator = options.negotiator ?? new CapabilityNegotiator()
    this.cache = options.cache ?? null
    this.uidIndex = options.uidIndex ?? new UidIndex()
    this.visibility = options.visibility ?? new MemoryVisibilityStore()
    this.log = options.log ?? silentLog
  }

  // ─── Calendars ───

  /**
   * Calendars of a user across backends, in backend order. Each backend's own
   * ordering is kept; no cross-backend sort is applied.
   */
  async listCalendars(userId: string, filters: CalendarFilters = {}): Promise<FederatedCalendar[]> {
    const names = filters.backends ?? Array.from(this.registry.listActivatedNames())
    const result: FederatedCalendar[] = []

    for (const name of names) {
      const backend = this.registry.get(name)
      if (!backend) {
        this.backendNotFound(name)
        continue
      }

      try {
        let calendars = await backend.getCalendars(userId)

        if (filters.activeOnly) {
          calendars = calendars.filter((calendar) => calendar.isActive)
        }

        if (filters.writableOnly) {
          const writable: Calendar[] = []
          for (const calendar of calendars) {
            if (await backend.isCalendarWritableByUser(calendar.uri, userId)) {
              writable.push(calendar)
            }
          }
          calendars = writable
        }

        for (const calendar of calendars) {
          const tagged = tagCalendar(calendar, name)
          if (!this.visibility.isCalendarHidden(tagged.id)) {
            result.push(tagged)
          }
        }
      } catch (err) {
        this.failed(name, 'list calendars', err)
      }
    }

    return result
  }

  async getCalendar(calendarId: string): Promise<Outcome<FederatedCalendar>> {
    const { backend: name, calendar: uri } = decodeCalendarId(calendarId)

    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    if (this.visibility.isCalendarHidden(calendarId)) return this.notFound(calendarId)

    const cached = this.cache?.lookup(calendarId)
    if (cached && this.cache && !this.cache.isStale(calendarId)) {
      return succeed(cached)
    }

    const found = await this.attempt(name, 'find a calendar', () => backend.findCalendar(uri))
    if (!found.ok) return found
    if (!found.value) return this.notFound(calendarId)

    const calendar = tagCalendar(found.value, name)
    this.cache?.remember?.(calendar)
    return succeed(calendar)
  }

  /**
   * Create a calendar in a backend.
   *
   * @returns The new calendar's composite identifier
   */
  async createCalendar(backendName: string, input: CalendarInput): Promise<Outcome<string>> {
    assertSegment(input.uri)
    const backend = this.registry.get(backendName)
    if (!backend) return this.backendNotFound(backendName)

    if (!this.negotiator.supports(backend, 'create-calendar')) {
      return this.unsupported(backendName, 'create-calendar')
    }

    const created = await this.mutate(backendName, 'create a calendar', () =>
      backend.createCalendar(input),
    )
    if (!created.ok) return created
    return succeed(encodeObjectId(backendName, input.uri))
  }

  async editCalendar(calendarId: string, patch: CalendarPatch): Promise<Outcome<void>> {
    const { backend: name, calendar: uri } = decodeCalendarId(calendarId)
    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    if (!this.negotiator.supports(backend, 'edit-calendar')) {
      return this.unsupported(name, 'edit-calendar')
    }

    const edited = await this.mutate(name, 'edit a calendar', () => backend.editCalendar(uri, patch))
    if (edited.ok) this.cache?.forget?.(calendarId)
    return edited
  }

  /**
   * Delete a calendar. A backend that cannot delete gets the calendar hidden
   * instead, and the call still succeeds.
   */
  async deleteCalendar(calendarId: string): Promise<Outcome<DeleteMode>> {
    const { backend: name, calendar: uri } = decodeCalendarId(calendarId)
    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    if (this.negotiator.supports(backend, 'delete-calendar')) {
      const deleted = await this.mutate(name, 'delete a calendar', () => backend.deleteCalendar(uri))
      if (!deleted.ok) return deleted
      this.cache?.forget?.(calendarId)
      return succeed<DeleteMode>('deleted')
    }

    this.visibility.hideCalendar(calendarId)
    this.cache?.forget?.(calendarId)
    this.log.record(
      CATEGORY,
      `Backend ${name} does not implement delete-calendar, ${calendarId} will be hidden`,
      'info',
    )
    return succeed<DeleteMode>('hidden')
  }

  async touchCalendar(calendarId: string): Promise<Outcome<void>> {
    const { backend: name, calendar: uri } = decodeCalendarId(calendarId)
    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    if (!this.negotiator.supports(backend, 'touch-calendar')) {
      return this.unsupported(name, 'touch-calendar')
    }

    const touched = await this.mutate(name, 'touch a calendar', () => backend.touchCalendar(uri))
    if (touched.ok) this.cache?.forget?.(calendarId)
    return touched
  }

  /**
   * Native merge only: both calendars in one backend that merges by itself.
   * Anything else is emulated by the MergeEngine.
   */
  async mergeCalendar(sourceId: string, destinationId: string): Promise<Outcome<void>> {
    const source = decodeCalendarId(sourceId)
    const destination = decodeCalendarId(destinationId)
    const backend = this.registry.get(destination.backend)
    if (!backend) return this.backendNotFound(destination.backend)

    if (source.backend !== destination.backend) {
      return this.unsupported(
        destination.backend,
        'merge-calendar',
        `Cannot merge ${sourceId} into ${destinationId} natively across backends`,
      )
    }
    if (!this.negotiator.supports(backend, 'merge-calendar')) {
      return this.unsupported(destination.backend, 'merge-calendar')
    }

    const merged = await this.mutate(destination.backend, 'merge calendars', () =>
      backend.mergeCalendar(source.calendar, destination.calendar),
    )
    if (merged.ok) {
      this.cache?.forget?.(sourceId)
      this.cache?.forget?.(destinationId)
    }
    return merged
  }

  // ─── Objects ───

  async listObjects(calendarId: string): Promise<Outcome<FederatedObject[]>> {
    const { backend: name, calendar: uri } = decodeCalendarId(calendarId)
    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    const listed = await this.attempt(name, 'list objects', () => backend.getObjects(uri))
    if (!listed.ok) return listed
    return succeed(this.present(calendarId, listed.value))
  }

  /**
   * Objects whose time bounds intersect [start, end]. Backends without a
   * native period query are filtered locally.
   */
  async listObjectsInPeriod(
    calendarId: string,
    start: Date,
    end: Date,
  ): Promise<Outcome<FederatedObject[]>> {
    const { backend: name, calendar: uri } = decodeCalendarId(calendarId)
    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    const listed = this.negotiator.supports(backend, 'get-in-period')
      ? await this.attempt(name, 'list objects in a period', () =>
          backend.getInPeriod(uri, start, end),
        )
      : await this.attempt(name, 'list objects', async () =>
          filterByPeriod(await backend.getObjects(uri), start, end),
        )
    if (!listed.ok) return listed
    return succeed(this.present(calendarId, listed.value))
  }

  async findObject(objectId: string): Promise<Outcome<FederatedObject>> {
    const { backend: name, calendar: uri, object: uid } = decodeObjectRef(objectId)
    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    if (this.visibility.isObjectHidden(objectId)) return this.notFound(objectId)

    const found = await this.attempt(name, 'find an object', () => backend.findObject(uri, uid))
    if (!found.ok) return found
    if (!found.value) return this.notFound(objectId)

    const object = tagObject(found.value, encodeObjectId(name, uri))
    this.uidIndex.record(object.uid, object.id)
    return succeed(object)
  }

  /**
   * Look an object up through the UID index. Only objects the federation has
   * already seen can be found this way.
   */
  async findObjectByUid(uid: string): Promise<Outcome<FederatedObject>> {
    const objectId = this.uidIndex.resolve(uid)
    if (objectId === undefined) {
      const error = new UidNotIndexedError(uid)
      this.log.record(CATEGORY, error.message, 'debug')
      return fail(error)
    }
    return this.findObject(objectId)
  }

  async createObject(calendarId: string, input: ObjectInput): Promise<Outcome<FederatedObject>> {
    const { backend: name, calendar: uri } = decodeCalendarId(calendarId)
    if (input.uid !== undefined) assertSegment(input.uid)
    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    if (!this.negotiator.supports(backend, 'create-object')) {
      return this.unsupported(name, 'create-object')
    }

    const created = await this.attempt(name, 'create an object', () =>
      backend.createObject(uri, input),
    )
    if (!created.ok) return created
    if (!created.value) return this.failed(name, 'create an object')
    if (!isValidSegment(created.value.uid)) {
      return this.failed(name, 'create an object', new InvalidSegmentError(created.value.uid))
    }

    const object = tagObject(created.value, calendarId)
    this.uidIndex.record(object.uid, object.id)
    return succeed(object)
  }

  async editObject(objectId: string, patch: ObjectPatch): Promise<Outcome<void>> {
    const { backend: name, calendar: uri, object: uid } = decodeObjectRef(objectId)
    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    if (!this.negotiator.supports(backend, 'edit-object')) {
      return this.unsupported(name, 'edit-object')
    }

    return this.mutate(name, 'edit an object', () => backend.editObject(uri, uid, patch))
  }

  /**
   * Delete an object, or hide it when the backend cannot delete.
   */
  async deleteObject(objectId: string): Promise<Outcome<DeleteMode>> {
    const { backend: name, calendar: uri, object: uid } = decodeObjectRef(objectId)
    const backend = this.registry.get(name)
    if (!backend) return this.backendNotFound(name)

    if (this.negotiator.supports(backend, 'delete-object')) {
      const deleted = await this.mutate(name, 'delete an object', () =>
        backend.deleteObject(uri, uid),
      )
      if (!deleted.ok) return deleted
      return succeed<DeleteMode>('deleted')
    }

    this.visibility.hideObject(objectId)
    this.log.record(
      CATEGORY,
      `Backend ${name} does not implement delete-object, ${objectId} will be hidden`,
      'info',
    )
    return succeed<DeleteMode>('hidden')
  }

  /**
   * Native move only: same backend and the backend moves by itself.
   *
   * @returns The object's new composite identifier
   */
  async moveObject(objectId: string, destinationCalendarId: string): Promise<Outcome<string>> {
    const source = decodeObjectRef(objectId)
    const destination = decodeCalendarId(destinationCalendarId)
    const backend = this.registry.get(source.backend)
    if (!backend) return this.backendNotFound(source.backend)

    if (source.backend !== destination.backend) {
      return this.unsupported(
        source.backend,
        'move-object',
        `Cannot move ${objectId} to ${destinationCalendarId} natively across backends`,
      )
    }
    if (!this.negotiator.supports(backend, 'move-object')) {
      return this.unsupported(source.backend, 'move-object')
    }

    const moved = await this.mutate(source.backend, 'move an object', () =>
      backend.moveObject(source.calendar, source.object, destination.calendar),
    )
    if (!moved.ok) return moved

    const movedId = encodeObjectId(destination.backend, destination.calendar, source.object)
    this.uidIndex.record(source.object, movedId)
    return succeed(movedId)
  }

  // ─── Capability Queries ───

  /**
   * Whether the backend owning `id` performs `operation` natively.
   */
  canDelegate(id: string, operation: BackendOperation): boolean {
    const backend = this.registry.get(decodeObjectId(id).backend)
    return backend !== null && this.negotiator.supports(backend, operation)
  }

  // ─── Internals ───

  /**
   * Tag objects with their identifiers, drop hidden ones, and index UIDs.
   */
  private present(calendarId: string, objects: CalendarObject[]): FederatedObject[] {
    const result: FederatedObject[] = []
    for (const object of objects) {
      if (!isValidSegment(object.uid)) {
        this.log.record(
          CATEGORY,
          `Skipping object with unaddressable uid "${object.uid}" in ${calendarId}`,
          'warn',
        )
        continue
      }
      const tagged = tagObject(object, calendarId)
      this.uidIndex.record(tagged.uid, tagged.id)
      if (!this.visibility.isObjectHidden(tagged.id)) {
        result.push(tagged)
      }
    }
    return result
  }

  private async attempt<T>(
    backend: string,
    operation: string,
    call: () => Promise<T>,
  ): Promise<Outcome<T>> {
    try {
      return succeed(await call())
    } catch (err) {
      return this.failed(backend, operation, err)
    }
  }

  /**
   * Run a mutating backend call; `false` counts as a reported failure.
   */
  private async mutate(
    backend: string,
    operation: string,
    call: () => Promise<boolean>,
  ): Promise<Outcome<void>> {
    const result = await this.attempt(backend, operation, call)
    if (!result.ok) return result
    if (!result.value) return this.failed(backend, operation)
    return succeed(undefined)
  }

  private backendNotFound<T>(name: string): Outcome<T> {
    const error = new BackendNotFoundError(name)
    this.log.record(CATEGORY, `Backend with the name "${name}" was not found`, 'warn')
    return fail(error)
  }

  private unsupported<T>(name: string, operation: BackendOperation, detail?: string): Outcome<T> {
    const error = new UnsupportedOperationError(name, operation, detail)
    this.log.record(CATEGORY, error.message, 'debug')
    return fail(error)
  }

  private failed<T>(name: string, operation: string, cause?: unknown): Outcome<T> {
    const error = new BackendOperationFailedError(name, operation, cause)
    this.log.record(CATEGORY, error.message, 'error')
    return fail(error)
  }

  private notFound<T>(identifier: string): Outcome<T> {
    const error = new NotFoundError(identifier)
    this.log.record(CATEGORY, `${identifier} was not found`, 'debug')
    return fail(error)
  }
}
