/**
 * Merge/Move Engine
 *
 * Multi-backend merges and moves built from dispatcher primitives. When a
 * backend cannot do the work natively, objects are copied one at a time and
 * the originals deleted afterwards. Nothing is rolled back: a failure leaves
 * the source partially drained.
 *
 * @module federation/merge-engine
 */

import type { CalendarFederation } from './dispatcher.js'
import { UnsupportedOperationError, fail, succeed, type FederationError } from './errors.js'
import { decodeCalendarId, decodeObjectRef } from './object-id.js'
import type { FederatedObject, ObjectInput, Outcome } from './types.js'

export interface SourceMergeReport {
  source: string
  strategy: 'native' | 'emulated'
  ok: boolean
  /** Objects moved before finishing or failing (emulated merges only) */
  moved: number
  error?: FederationError
}

export interface MergeReport {
  destination: string
  ok: boolean
  sources: SourceMergeReport[]
}

function toInput(object: FederatedObject): ObjectInput {
  return {
    uid: object.uid,
    kind: object.kind,
    start: object.start,
    end: object.end,
    properties: { ...object.properties },
  }
}

export class MergeEngine {
  constructor(private readonly federation: CalendarFederation) {}

  /**
   * Merge each source calendar into the destination, in the order given.
   */
  async mergeCalendars(destinationId: string, ...sourceIds: string[]): Promise<MergeReport> {
    const destination = decodeCalendarId(destinationId)
    // Malformed identifiers throw here, before any source is touched
    const decoded = sourceIds.map((sourceId) => ({ sourceId, source: decodeCalendarId(sourceId) }))
    const sources: SourceMergeReport[] = []

    for (const { sourceId, source } of decoded) {

      if (sourceId === destinationId) {
        sources.push({
          source: sourceId,
          strategy: 'native',
          ok: false,
          moved: 0,
          error: new UnsupportedOperationError(
            destination.backend,
            'merge-calendar',
            `Cannot merge ${sourceId} into itself`,
          ),
        })
        continue
      }

      if (
        source.backend === destination.backend &&
        this.federation.canDelegate(destinationId, 'merge-calendar')
      ) {
        const merged = await this.federation.mergeCalendar(sourceId, destinationId)
        sources.push(
          merged.ok
            ? { source: sourceId, strategy: 'native', ok: true, moved: 0 }
            : { source: sourceId, strategy: 'native', ok: false, moved: 0, error: merged.error },
        )
        continue
      }

      sources.push(await this.drain(sourceId, destinationId))
    }

    return { destination: destinationId, ok: sources.every((s) => s.ok), sources }
  }

  /**
   * Move one object into another calendar, natively when the backend can,
   * otherwise by creating a copy in the destination and deleting the original.
   *
   * @returns The object's new composite identifier
   */
  async moveObject(objectId: string, destinationCalendarId: string): Promise<Outcome<string>> {
    const source = decodeObjectRef(objectId)
    const destination = decodeCalendarId(destinationCalendarId)

    if (
      source.backend === destination.backend &&
      this.federation.canDelegate(objectId, 'move-object')
    ) {
      return this.federation.moveObject(objectId, destinationCalendarId)
    }

    const found = await this.federation.findObject(objectId)
    if (!found.ok) return found

    const created = await this.federation.createObject(destinationCalendarId, toInput(found.value))
    if (!created.ok) return created

    const removed = await this.federation.deleteObject(objectId)
    if (!removed.ok) return fail(removed.error)

    return succeed(created.value.id)
  }

  private async drain(sourceId: string, destinationId: string): Promise<SourceMergeReport> {
    let moved = 0
    const failure = (error: FederationError): SourceMergeReport => ({
      source: sourceId,
      strategy: 'emulated',
      ok: false,
      moved,
      error,
    })

    const listed = await this.federation.listObjects(sourceId)
    if (!listed.ok) return failure(listed.error)

    for (const { id } of listed.value) {
      const found = await this.federation.findObject(id)
      if (!found.ok) return failure(found.error)

      const created = await this.federation.createObject(destinationId, toInput(found.value))
      if (!created.ok) return failure(created.error)

      const removed = await this.federation.deleteObject(id)
      if (!removed.ok) return failure(removed.error)

      moved++
    }

    const deleted = await this.federation.deleteCalendar(sourceId)
    if (!deleted.ok) return failure(deleted.error)

    return { source: sourceId, strategy: 'emulated', ok: true, moved }
  }
}
