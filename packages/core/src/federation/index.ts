/**
 * Calendar Federation
 *
 * Addresses calendars and calendar objects spread over several storage
 * backends through one identifier scheme: backend.calendar[.object]
 */

// Types
export type {
  PropertyValue,
  PropertyMap,
  Calendar,
  FederatedCalendar,
  CalendarInput,
  CalendarPatch,
  ObjectKind,
  CalendarObject,
  FederatedObject,
  ObjectInput,
  ObjectPatch,
  BackendOperation,
  CalendarBackend,
  CapableBackend,
  BackendDescriptor,
  BackendFactory,
  SetupReport,
  Outcome,
  DeleteMode,
  CalendarFilters,
  Severity,
  FederationLog,
} from './types.js'
export { BACKEND_OPERATIONS, OPERATION_METHODS } from './types.js'

// Errors
export {
  FederationError,
  MalformedIdentifierError,
  InvalidSegmentError,
  BackendNotFoundError,
  InvalidBackendError,
  UnsupportedOperationError,
  BackendOperationFailedError,
  UidNotIndexedError,
  NotFoundError,
  succeed,
  fail,
} from './errors.js'
export type { FederationErrorCode } from './errors.js'

// Implementation
export {
  ID_DELIMITER,
  encodeObjectId,
  decodeObjectId,
  decodeCalendarId,
  decodeObjectRef,
  parentCalendarId,
  isValidSegment,
  assertSegment,
} from './object-id.js'
export type { DecodedId } from './object-id.js'
export { BackendRegistry, canonicalBackendName, isCalendarBackend } from './registry.js'
export type { BackendRegistryOptions } from './registry.js'
export { CapabilityNegotiator } from './capabilities.js'
export type { Strategy } from './capabilities.js'
export { TtlCalendarCache } from './cache.js'
export type { CalendarCache } from './cache.js'
export { UidIndex } from './uid-index.js'
export { MemoryVisibilityStore } from './visibility.js'
export type { VisibilityStore } from './visibility.js'
export { overlapsPeriod, filterByPeriod } from './period.js'
export { CALENDAR_ID_PROPERTY, tagCalendar, tagObject } from './tagging.js'
export { CalendarFederation } from './dispatcher.js'
export type { CalendarFederationOptions } from './dispatcher.js'
export { MergeEngine } from './merge-engine.js'
export type { MergeReport, SourceMergeReport } from './merge-engine.js'
