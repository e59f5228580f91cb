// Public API for consumption by other packages (gateway)

// Federation
export * from './federation/index.js'

// Backends
export {
  DatabaseBackend,
  createDatabaseBackend,
  databaseBackendOptionsSchema,
  CalDAVBackend,
  createCalDAVBackend,
  calDAVBackendOptionsSchema,
  builtinBackendFactories,
  generateICalEvent,
  parseICalEvents,
  escapeICalText,
} from './backends/index.js'
export type {
  DatabaseBackendOptions,
  CalDAVBackendOptions,
  CalDAVConnection,
} from './backends/index.js'

// Config
export { loadConfig, findConfigDir, defaultConfig, backendDescriptors } from './config.js'
export type { FederationConfig } from './config.js'

// Logging
export { createLogger, createPinoLog, silentLog } from './logger.js'

// Bootstrap
export { createFederationContext } from './bootstrap.js'
export type { FederationContext, FederationContextOptions } from './bootstrap.js'
