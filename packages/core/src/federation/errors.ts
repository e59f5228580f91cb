/**
 * Federation error taxonomy.
 *
 * Identifier and registry errors are thrown. Everything a backend reports is
 * carried inside an Outcome instead.
 *
 * @module federation/errors
 */

import type { BackendOperation, Outcome } from './types.js'

export type FederationErrorCode =
  | 'MALFORMED_IDENTIFIER'
  | 'INVALID_SEGMENT'
  | 'BACKEND_NOT_FOUND'
  | 'INVALID_BACKEND'
  | 'UNSUPPORTED_OPERATION'
  | 'BACKEND_OPERATION_FAILED'
  | 'UID_NOT_INDEXED'
  | 'NOT_FOUND'

export class FederationError extends Error {
  readonly code: FederationErrorCode

  constructor(code: FederationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FederationError'
    this.code = code
  }
}

export class MalformedIdentifierError extends FederationError {
  constructor(readonly identifier: string) {
    super('MALFORMED_IDENTIFIER', `Malformed identifier: "${identifier}"`)
    this.name = 'MalformedIdentifierError'
  }
}

export class InvalidSegmentError extends FederationError {
  constructor(readonly segment: string) {
    super('INVALID_SEGMENT', `Invalid identifier segment: "${segment}"`)
    this.name = 'InvalidSegmentError'
  }
}

export class BackendNotFoundError extends FederationError {
  constructor(readonly backend: string) {
    super('BACKEND_NOT_FOUND', `Backend not found: ${backend}`)
    this.name = 'BackendNotFoundError'
  }
}

export class InvalidBackendError extends FederationError {
  constructor(message: string) {
    super('INVALID_BACKEND', message)
    this.name = 'InvalidBackendError'
  }
}

export class UnsupportedOperationError extends FederationError {
  constructor(
    readonly backend: string,
    readonly operation: BackendOperation,
    detail?: string,
  ) {
    super(
      'UNSUPPORTED_OPERATION',
      detail ?? `Backend ${backend} does not support ${operation}`,
    )
    this.name = 'UnsupportedOperationError'
  }
}

export class BackendOperationFailedError extends FederationError {
  constructor(
    readonly backend: string,
    readonly operation: string,
    cause?: unknown,
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : ''
    super('BACKEND_OPERATION_FAILED', `Backend ${backend} failed to ${operation}${reason}`, {
      cause,
    })
    this.name = 'BackendOperationFailedError'
  }
}

export class UidNotIndexedError extends FederationError {
  constructor(readonly uid: string) {
    super('UID_NOT_INDEXED', `No object indexed for uid ${uid}`)
    this.name = 'UidNotIndexedError'
  }
}

export class NotFoundError extends FederationError {
  constructor(readonly identifier: string) {
    super('NOT_FOUND', `Not found: ${identifier}`)
    this.name = 'NotFoundError'
  }
}

export function succeed<T>(value: T): Outcome<T> {
  return { ok: true, value }
}

export function fail<T = never>(error: FederationError): Outcome<T> {
  return { ok: false, error }
}
