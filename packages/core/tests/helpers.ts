import { DatabaseBackend } from '../src/backends/database.js'
import {
  BACKEND_OPERATIONS,
  type BackendOperation,
  type FederationLog,
  type ObjectInput,
  type Severity,
} from '../src/federation/types.js'

export interface RecordingLog extends FederationLog {
  records: Array<{ category: string; message: string; severity: Severity }>
}

export function recordingLog(): RecordingLog {
  const records: RecordingLog['records'] = []
  return {
    records,
    record(category, message, severity) {
      records.push({ category, message, severity })
    },
  }
}

/** Every operation except the ones listed */
export function allBut(...excluded: BackendOperation[]): BackendOperation[] {
  return BACKEND_OPERATIONS.filter((operation) => !excluded.includes(operation))
}

export function event(uid: string, start: string, end: string, summary = uid): ObjectInput {
  return {
    uid,
    kind: 'event',
    start: new Date(start),
    end: new Date(end),
    properties: { SUMMARY: summary },
  }
}

export async function seedCalendar(
  backend: DatabaseBackend,
  uri: string,
  owner = 'alice',
  objects: ObjectInput[] = [],
): Promise<void> {
  await backend.createCalendar({ uri, owner, displayName: uri })
  for (const object of objects) {
    await backend.createObject(uri, object)
  }
}
