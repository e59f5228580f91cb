/**
 * Built-in storage backends and the factory table the registry resolves
 * descriptors through.
 */

import type { BackendFactory } from '../federation/types.js'
import { createCalDAVBackend } from './caldav.js'
import { createDatabaseBackend } from './database.js'

export { DatabaseBackend, createDatabaseBackend, databaseBackendOptionsSchema } from './database.js'
export type { DatabaseBackendOptions } from './database.js'
export { CalDAVBackend, createCalDAVBackend, calDAVBackendOptionsSchema } from './caldav.js'
export type { CalDAVBackendOptions, CalDAVConnection } from './caldav.js'
export { generateICalEvent, parseICalEvents, escapeICalText } from './ical.js'

export const builtinBackendFactories: Record<string, BackendFactory> = {
  database: createDatabaseBackend,
  caldav: createCalDAVBackend,
}
