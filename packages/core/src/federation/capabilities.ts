/**
 * Capability negotiation: decides whether an operation is delegated to the
 * backend, emulated by the federation, or unsupported.
 *
 * @module federation/capabilities
 */

import {
  OPERATION_METHODS,
  type BackendOperation,
  type CalendarBackend,
  type CapableBackend,
} from './types.js'

export type Strategy = 'delegate' | 'emulate' | 'unsupported'

/** Operations the federation can compose from other primitives */
const EMULATED: ReadonlySet<BackendOperation> = new Set<BackendOperation>([
  'delete-calendar', // hide
  'delete-object', // hide
  'get-in-period', // filter all objects locally
  'merge-calendar', // move objects one by one
  'move-object', // create in destination, delete from source
])

export class CapabilityNegotiator {
  /**
   * True when the backend both advertises the operation and implements the
   * method behind it.
   */
  supports<K extends BackendOperation>(
    backend: CalendarBackend,
    operation: K,
  ): backend is CapableBackend<K> {
    return (
      backend.supports(operation) &&
      typeof backend[OPERATION_METHODS[operation]] === 'function'
    )
  }

  negotiate(backend: CalendarBackend, operation: BackendOperation): Strategy {
    if (this.supports(backend, operation)) return 'delegate'
    return EMULATED.has(operation) ? 'emulate' : 'unsupported'
  }
}
