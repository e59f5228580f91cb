/**
 * Federation Types
 *
 * Data model shared by the registry, dispatcher and backends.
 *
 * @module federation/types
 */

import type { FederationError } from './errors.js'

// ─── Calendar Data ───

export type PropertyValue = string | number | boolean | null

export type PropertyMap = Record<string, PropertyValue>

/**
 * A calendar as a backend stores it.
 * `uri` is backend-local and never contains the identifier delimiter.
 */
export interface Calendar {
  uri: string
  owner: string
  displayName: string
  properties: PropertyMap
  /** False when the calendar is disabled; disabled calendars drop out of active listings */
  isActive: boolean
}

/**
 * A calendar as the federation hands it out: `uri` carries the backend prefix
 * and `id` is the composite calendar identifier.
 */
export interface FederatedCalendar extends Calendar {
  id: string
  backend: string
}

export interface CalendarInput {
  uri: string
  owner: string
  displayName: string
  properties?: PropertyMap
  isActive?: boolean
}

export type CalendarPatch = Partial<Pick<Calendar, 'displayName' | 'properties' | 'isActive'>>

export type ObjectKind = 'event' | 'journal' | 'todo'

/**
 * An event, journal or to-do inside one calendar, unique by `uid` there.
 */
export interface CalendarObject {
  uid: string
  kind: ObjectKind
  /** Start of the object's time bounds, null for undated journals and to-dos */
  start: Date | null
  end: Date | null
  properties: PropertyMap
}

export interface FederatedObject extends CalendarObject {
  /** Composite identifier: backend.calendar.uid */
  id: string
  calendarId: string
}

/**
 * Input for a new object. A backend generates the uid when none is given.
 */
export type ObjectInput = Omit<CalendarObject, 'uid'> & { uid?: string }

export type ObjectPatch = Partial<Omit<CalendarObject, 'uid'>>

// ─── Backend Capability Surface ───

export const BACKEND_OPERATIONS = [
  'create-calendar',
  'edit-calendar',
  'delete-calendar',
  'touch-calendar',
  'merge-calendar',
  'create-object',
  'edit-object',
  'delete-object',
  'move-object',
  'get-in-period',
] as const

export type BackendOperation = (typeof BACKEND_OPERATIONS)[number]

/**
 * Storage provider the federation dispatches to.
 * The optional methods are capability-gated: they are only called when
 * `supports()` advertises the matching operation.
 */
export interface CalendarBackend {
  supports(operation: BackendOperation): boolean

  getCalendars(userId: string): Promise<Calendar[]>
  findCalendar(uri: string): Promise<Calendar | null>
  isCalendarWritableByUser(uri: string, userId: string): Promise<boolean>
  getObjects(uri: string): Promise<CalendarObject[]>
  findObject(uri: string, uid: string): Promise<CalendarObject | null>

  getInPeriod?(uri: string, start: Date, end: Date): Promise<CalendarObject[]>

  createCalendar?(input: CalendarInput): Promise<boolean>
  editCalendar?(uri: string, patch: CalendarPatch): Promise<boolean>
  deleteCalendar?(uri: string): Promise<boolean>
  touchCalendar?(uri: string): Promise<boolean>
  /** Move every object of `sourceUri` into `destinationUri` and drop the source */
  mergeCalendar?(sourceUri: string, destinationUri: string): Promise<boolean>

  /** Resolves to the stored object, or null when the backend refused it */
  createObject?(uri: string, input: ObjectInput): Promise<CalendarObject | null>
  editObject?(uri: string, uid: string, patch: ObjectPatch): Promise<boolean>
  deleteObject?(uri: string, uid: string): Promise<boolean>
  moveObject?(uri: string, uid: string, destinationUri: string): Promise<boolean>
}

/**
 * Which backend method carries each operation.
 */
export const OPERATION_METHODS = {
  'create-calendar': 'createCalendar',
  'edit-calendar': 'editCalendar',
  'delete-calendar': 'deleteCalendar',
  'touch-calendar': 'touchCalendar',
  'merge-calendar': 'mergeCalendar',
  'create-object': 'createObject',
  'edit-object': 'editObject',
  'delete-object': 'deleteObject',
  'move-object': 'moveObject',
  'get-in-period': 'getInPeriod',
} as const satisfies Record<BackendOperation, keyof CalendarBackend>

export type OperationMethod<K extends BackendOperation> = (typeof OPERATION_METHODS)[K]

/**
 * A backend narrowed to one that implements the method behind operation `K`.
 */
export type CapableBackend<K extends BackendOperation> = CalendarBackend &
  Required<Pick<CalendarBackend, OperationMethod<K>>>

// ─── Registry ───

/**
 * Registered, not yet constructed backend.
 * `name` keys the registry's factory table; `args` are handed to the factory.
 */
export interface BackendDescriptor {
  readonly name: string
  readonly args: readonly unknown[]
}

export type BackendFactory = (args: readonly unknown[]) => CalendarBackend

export interface SetupReport {
  activated: string[]
  skipped: Array<{ name: string; reason: string }>
}

// ─── Dispatcher Results ───

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: FederationError }

export type DeleteMode = 'deleted' | 'hidden'

export interface CalendarFilters {
  /** Drop disabled calendars */
  activeOnly?: boolean
  /** Drop calendars the backend reports as not writable by the user */
  writableOnly?: boolean
  /** Restrict to these backends, in this order */
  backends?: string[]
}

export type Severity = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logging sink. Invoked on failure and degraded paths only.
 */
export interface FederationLog {
  record(category: string, message: string, severity: Severity): void
}
