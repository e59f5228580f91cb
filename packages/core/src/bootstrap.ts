/**
 * Builds one federation context from configuration: registry with the
 * built-in factories, dispatcher, merge engine.
 *
 * @module bootstrap
 */

import { builtinBackendFactories, DatabaseBackend } from './backends/index.js'
import { backendDescriptors, type FederationConfig } from './config.js'
import { TtlCalendarCache } from './federation/cache.js'
import { CalendarFederation } from './federation/dispatcher.js'
import { MergeEngine } from './federation/merge-engine.js'
import { BackendRegistry } from './federation/registry.js'
import type { BackendFactory, FederationLog, SetupReport } from './federation/types.js'
import { silentLog } from './logger.js'

export interface FederationContext {
  registry: BackendRegistry
  federation: CalendarFederation
  engine: MergeEngine
  /** What `setupAll()` activated and skipped at startup */
  report: SetupReport
}

export interface FederationContextOptions {
  log?: FederationLog
  /** Extra factories, consulted alongside the built-in ones */
  factories?: Record<string, BackendFactory>
}

export function createFederationContext(
  config: FederationConfig,
  options: FederationContextOptions = {},
): FederationContext {
  const log = options.log ?? silentLog

  const registry = new BackendRegistry({
    factories: { ...builtinBackendFactories, ...options.factories },
    defaultBackend: () => new DatabaseBackend(),
    log,
  })
  for (const descriptor of backendDescriptors(config)) {
    registry.register(descriptor)
  }
  const report = registry.setupAll()

  const ttlSeconds = config.federation.cache.ttlSeconds
  const federation = new CalendarFederation({
    registry,
    cache: ttlSeconds > 0 ? new TtlCalendarCache({ ttlMs: ttlSeconds * 1000 }) : undefined,
    log,
  })

  return { registry, federation, engine: new MergeEngine(federation), report }
}
