/**
 * Backend Registry
 * Holds registered backend descriptors and the activated backend instances.
 *
 * One registry is built per application context at startup and handed to the
 * dispatcher; activation during serving needs external exclusion.
 *
 * @module federation/registry
 */

import { InvalidBackendError } from './errors.js'
import { isValidSegment } from './object-id.js'
import type {
  BackendDescriptor,
  BackendFactory,
  CalendarBackend,
  FederationLog,
  SetupReport,
} from './types.js'

export interface BackendRegistryOptions {
  /** Factories keyed by descriptor name */
  factories?: Record<string, BackendFactory>
  /** Backend constructed by `activate()` when called without an instance */
  defaultBackend?: () => CalendarBackend
  log?: FederationLog
}

const REQUIRED_METHODS = [
  'supports',
  'getCalendars',
  'findCalendar',
  'isCalendarWritableByUser',
  'getObjects',
  'findObject',
] as const

/**
 * Check that a value exposes the backend capability surface.
 */
export function isCalendarBackend(value: unknown): value is CalendarBackend {
  if (typeof value !== 'object' || value === null) return false
  return REQUIRED_METHODS.every(
    (method) => typeof Reflect.get(value, method) === 'function',
  )
}

/**
 * Name a backend is activated under: its constructor name without a trailing
 * "Backend", lowercased. `DatabaseBackend` becomes `database`.
 */
export function canonicalBackendName(backend: CalendarBackend): string {
  const typeName = backend.constructor.name
  const stripped = typeName.endsWith('Backend') ? typeName.slice(0, -'Backend'.length) : typeName
  return stripped.toLowerCase()
}

export class BackendRegistry {
  private descriptors: BackendDescriptor[] = []
  private activated = new Map<string, CalendarBackend>()
  private setUp = new Set<BackendDescriptor>()
  private factories: Map<string, BackendFactory>
  private defaultBackend: (() => CalendarBackend) | null
  private log: FederationLog | null

  constructor(options: BackendRegistryOptions = {}) {
    this.factories = new Map(Object.entries(options.factories ?? {}))
    this.defaultBackend = options.defaultBackend ?? null
    this.log = options.log ?? null
  }

  /**
   * Register a backend descriptor. Nothing is constructed; descriptors with the
   * same name are all kept.
   */
  register(descriptor: BackendDescriptor): void {
    this.descriptors.push({ name: descriptor.name, args: [...descriptor.args] })
  }

  listDescriptors(): BackendDescriptor[] {
    return [...this.descriptors]
  }

  listActivatedNames(): Set<string> {
    return new Set(this.activated.keys())
  }

  /**
   * Activate a backend instance, or the default backend when none is given.
   * Re-activating a canonical name replaces the previous instance.
   *
   * @returns The canonical name the backend is activated under
   */
  activate(backend?: CalendarBackend): string {
    let instance: unknown = backend
    if (instance === undefined) {
      if (!this.defaultBackend) {
        throw new InvalidBackendError('No default backend configured')
      }
      instance = this.defaultBackend()
    }

    if (!isCalendarBackend(instance)) {
      throw new InvalidBackendError('Backend does not implement the calendar backend surface')
    }

    const name = canonicalBackendName(instance)
    if (!isValidSegment(name)) {
      throw new InvalidBackendError(`Backend type name "${name}" is not a valid identifier segment`)
    }

    this.activated.set(name, instance)
    return name
  }

  get(name: string): CalendarBackend | null {
    return this.activated.get(name) ?? null
  }

  has(name: string): boolean {
    return this.activated.has(name)
  }

  /**
   * Activated backends in activation order.
   */
  entries(): Array<[string, CalendarBackend]> {
    return Array.from(this.activated.entries())
  }

  /**
   * Construct and activate every descriptor not set up yet.
   * Descriptors without a factory, or whose factory throws, are skipped.
   */
  setupAll(): SetupReport {
    const report: SetupReport = { activated: [], skipped: [] }

    for (const descriptor of this.descriptors) {
      if (this.setUp.has(descriptor)) continue

      const factory = this.factories.get(descriptor.name)
      if (!factory) {
        this.skip(report, descriptor.name, `Calendar backend ${descriptor.name} not found`)
        continue
      }

      try {
        const name = this.activate(factory(descriptor.args))
        this.setUp.add(descriptor)
        report.activated.push(name)
      } catch (err) {
        this.skip(
          report,
          descriptor.name,
          `Calendar backend ${descriptor.name} could not be set up: ${err instanceof Error ? err.message : String(err)}`,
        )
      }
    }

    return report
  }

  /**
   * Drop every activated backend. Descriptors stay registered and can be set
   * up again.
   */
  reset(): void {
    this.activated.clear()
    this.setUp.clear()
  }

  private skip(report: SetupReport, name: string, reason: string): void {
    report.skipped.push({ name, reason })
    this.log?.record('registry', reason, 'error')
  }
}
