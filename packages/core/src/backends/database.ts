/**
 * Database Backend
 * Stores calendars and calendar objects in SQLite via better-sqlite3.
 * Implements every federation operation natively.
 *
 * @module backends/database
 */

import Database from 'better-sqlite3'
import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import {
  BACKEND_OPERATIONS,
  type BackendOperation,
  type Calendar,
  type CalendarBackend,
  type CalendarInput,
  type CalendarObject,
  type CalendarPatch,
  type ObjectInput,
  type ObjectKind,
  type ObjectPatch,
  type PropertyMap,
} from '../federation/types.js'

export interface DatabaseBackendOptions {
  /** SQLite file; defaults to an in-memory database */
  path?: string
  /** Advertise only these operations (e.g. for a read-only replica) */
  capabilities?: readonly BackendOperation[]
}

export const databaseBackendOptionsSchema = z
  .object({
    path: z.string().min(1).optional(),
    capabilities: z.array(z.enum(BACKEND_OPERATIONS)).optional(),
  })
  .strict()

interface CalendarRow {
  uri: string
  owner: string
  displayname: string
  properties: string
  active: number
}

interface ObjectRow {
  uid: string
  kind: string
  dtstart: string | null
  dtend: string | null
  properties: string
}

const OBJECT_KINDS: readonly ObjectKind[] = ['event', 'journal', 'todo']

function parseProperties(raw: string): PropertyMap {
  const parsed: unknown = JSON.parse(raw)
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {}
  const properties: PropertyMap = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      properties[key] = value
    }
  }
  return properties
}

function toDate(value: string | null): Date | null {
  return value === null ? null : new Date(value)
}

function toIso(value: Date | null): string | null {
  return value === null ? null : value.toISOString()
}

function rowToCalendar(row: CalendarRow): Calendar {
  return {
    uri: row.uri,
    owner: row.owner,
    displayName: row.displayname,
    properties: parseProperties(row.properties),
    isActive: row.active === 1,
  }
}

function rowToObject(row: ObjectRow): CalendarObject {
  return {
    uid: row.uid,
    kind: OBJECT_KINDS.find((kind) => kind === row.kind) ?? 'event',
    start: toDate(row.dtstart),
    end: toDate(row.dtend),
    properties: parseProperties(row.properties),
  }
}

export class DatabaseBackend implements CalendarBackend {
  private db: Database.Database
  private capabilities: ReadonlySet<BackendOperation>

  constructor(options: DatabaseBackendOptions = {}) {
    this.db = new Database(options.path ?? ':memory:')
    this.capabilities = new Set(options.capabilities ?? BACKEND_OPERATIONS)

    this.db.pragma('journal_mode = WAL')
    this.db.pragma('busy_timeout = 5000')
    this.db.pragma('foreign_keys = ON')

    this.initSchema()
  }

  private initSchema(): void {
    this.db
      .prepare(
        `
      CREATE TABLE IF NOT EXISTS calendars (
        uri TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        displayname TEXT NOT NULL,
        properties TEXT NOT NULL DEFAULT '{}',
        active INTEGER NOT NULL DEFAULT 1,
        ctag INTEGER NOT NULL DEFAULT 0,
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `,
      )
      .run()

    // Calendars shared with users other than the owner
    this.db
      .prepare(
        `
      CREATE TABLE IF NOT EXISTS shares (
        calendar_uri TEXT NOT NULL REFERENCES calendars(uri) ON DELETE CASCADE ON UPDATE CASCADE,
        user_id TEXT NOT NULL,
        writable INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (calendar_uri, user_id)
      )
    `,
      )
      .run()

    this.db
      .prepare(
        `
      CREATE TABLE IF NOT EXISTS objects (
        calendar_uri TEXT NOT NULL REFERENCES calendars(uri) ON DELETE CASCADE ON UPDATE CASCADE,
        uid TEXT NOT NULL,
        kind TEXT NOT NULL,
        dtstart TEXT,
        dtend TEXT,
        properties TEXT NOT NULL DEFAULT '{}',
        PRIMARY KEY (calendar_uri, uid)
      )
    `,
      )
      .run()

    this.db
      .prepare('CREATE INDEX IF NOT EXISTS idx_objects_period ON objects(calendar_uri, dtstart, dtend)')
      .run()
  }

  supports(operation: BackendOperation): boolean {
    return this.capabilities.has(operation)
  }

  // ─── Sharing ───

  /**
   * Give another user access to a calendar.
   */
  shareCalendar(uri: string, userId: string, writable: boolean): void {
    this.db
      .prepare(
        `INSERT INTO shares (calendar_uri, user_id, writable) VALUES (?, ?, ?)
         ON CONFLICT(calendar_uri, user_id) DO UPDATE SET writable = excluded.writable`,
      )
      .run(uri, userId, writable ? 1 : 0)
  }

  // ─── Calendars ───

  async getCalendars(userId: string): Promise<Calendar[]> {
    const rows = this.db
      .prepare(
        `SELECT uri, owner, displayname, properties, active FROM calendars
         WHERE owner = ? OR uri IN (SELECT calendar_uri FROM shares WHERE user_id = ?)
         ORDER BY rowid`,
      )
      .all(userId, userId) as CalendarRow[]
    return rows.map(rowToCalendar)
  }

  async findCalendar(uri: string): Promise<Calendar | null> {
    const row = this.db
      .prepare('SELECT uri, owner, displayname, properties, active FROM calendars WHERE uri = ?')
      .get(uri) as CalendarRow | undefined
    return row ? rowToCalendar(row) : null
  }

  async isCalendarWritableByUser(uri: string, userId: string): Promise<boolean> {
    const row = this.db
      .prepare(
        `SELECT 1 FROM calendars WHERE uri = ? AND owner = ?
         UNION SELECT 1 FROM shares WHERE calendar_uri = ? AND user_id = ? AND writable = 1`,
      )
      .get(uri, userId, uri, userId)
    return row !== undefined
  }

  async createCalendar(input: CalendarInput): Promise<boolean> {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO calendars (uri, owner, displayname, properties, active)
         VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        input.uri,
        input.owner,
        input.displayName,
        JSON.stringify(input.properties ?? {}),
        input.isActive === false ? 0 : 1,
      )
    return result.changes === 1
  }

  async editCalendar(uri: string, patch: CalendarPatch): Promise<boolean> {
    const current = await this.findCalendar(uri)
    if (!current) return false

    const result = this.db
      .prepare(
        `UPDATE calendars SET displayname = ?, properties = ?, active = ?,
         ctag = ctag + 1, updated_at = datetime('now') WHERE uri = ?`,
      )
      .run(
        patch.displayName ?? current.displayName,
        JSON.stringify(patch.properties ?? current.properties),
        (patch.isActive ?? current.isActive) ? 1 : 0,
        uri,
      )
    return result.changes === 1
  }

  async deleteCalendar(uri: string): Promise<boolean> {
    const result = this.db.prepare('DELETE FROM calendars WHERE uri = ?').run(uri)
    return result.changes === 1
  }

  async touchCalendar(uri: string): Promise<boolean> {
    const result = this.db
      .prepare(`UPDATE calendars SET ctag = ctag + 1, updated_at = datetime('now') WHERE uri = ?`)
      .run(uri)
    return result.changes === 1
  }

  /**
   * Sync token that changes whenever the calendar or its objects change.
   */
  getCtag(uri: string): number | null {
    const row = this.db.prepare('SELECT ctag FROM calendars WHERE uri = ?').get(uri) as
      | { ctag: number }
      | undefined
    return row?.ctag ?? null
  }

  async mergeCalendar(sourceUri: string, destinationUri: string): Promise<boolean> {
    if (sourceUri === destinationUri) return false
    if (!(await this.findCalendar(sourceUri)) || !(await this.findCalendar(destinationUri))) {
      return false
    }

    const merge = this.db.transaction((): boolean => {
      // A uid present in both calendars refuses the whole merge
      const clash = this.db
        .prepare(
          `SELECT 1 FROM objects s JOIN objects d ON d.uid = s.uid
           WHERE s.calendar_uri = ? AND d.calendar_uri = ? LIMIT 1`,
        )
        .get(sourceUri, destinationUri)
      if (clash) return false

      this.db
        .prepare('UPDATE objects SET calendar_uri = ? WHERE calendar_uri = ?')
        .run(destinationUri, sourceUri)
      this.db.prepare('DELETE FROM calendars WHERE uri = ?').run(sourceUri)
      this.bump(destinationUri)
      return true
    })
    return merge()
  }

  // ─── Objects ───

  async getObjects(uri: string): Promise<CalendarObject[]> {
    const rows = this.db
      .prepare(
        'SELECT uid, kind, dtstart, dtend, properties FROM objects WHERE calendar_uri = ? ORDER BY rowid',
      )
      .all(uri) as ObjectRow[]
    return rows.map(rowToObject)
  }

  async getInPeriod(uri: string, start: Date, end: Date): Promise<CalendarObject[]> {
    // Timestamps are stored as UTC ISO strings, which sort chronologically
    const rows = this.db
      .prepare(
        `SELECT uid, kind, dtstart, dtend, properties FROM objects
         WHERE calendar_uri = ?
           AND COALESCE(dtstart, dtend) IS NOT NULL
           AND COALESCE(dtstart, dtend) <= ?
           AND COALESCE(dtend, dtstart) >= ?
         ORDER BY rowid`,
      )
      .all(uri, end.toISOString(), start.toISOString()) as ObjectRow[]
    return rows.map(rowToObject)
  }

  async findObject(uri: string, uid: string): Promise<CalendarObject | null> {
    const row = this.db
      .prepare(
        'SELECT uid, kind, dtstart, dtend, properties FROM objects WHERE calendar_uri = ? AND uid = ?',
      )
      .get(uri, uid) as ObjectRow | undefined
    return row ? rowToObject(row) : null
  }

  async createObject(uri: string, input: ObjectInput): Promise<CalendarObject | null> {
    if (!(await this.findCalendar(uri))) return null

    const uid = input.uid ?? randomUUID()
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO objects (calendar_uri, uid, kind, dtstart, dtend, properties)
         VALUES (?, ?, ?, ?, ?, ?)`,
      )
      .run(uri, uid, input.kind, toIso(input.start), toIso(input.end), JSON.stringify(input.properties))
    if (result.changes !== 1) return null

    this.bump(uri)
    return {
      uid,
      kind: input.kind,
      start: input.start,
      end: input.end,
      properties: { ...input.properties },
    }
  }

  async editObject(uri: string, uid: string, patch: ObjectPatch): Promise<boolean> {
    const current = await this.findObject(uri, uid)
    if (!current) return false

    const start = patch.start === undefined ? current.start : patch.start
    const end = patch.end === undefined ? current.end : patch.end

    this.db
      .prepare(
        `UPDATE objects SET kind = ?, dtstart = ?, dtend = ?, properties = ?
         WHERE calendar_uri = ? AND uid = ?`,
      )
      .run(
        patch.kind ?? current.kind,
        toIso(start),
        toIso(end),
        JSON.stringify(patch.properties ?? current.properties),
        uri,
        uid,
      )
    this.bump(uri)
    return true
  }

  async deleteObject(uri: string, uid: string): Promise<boolean> {
    const result = this.db
      .prepare('DELETE FROM objects WHERE calendar_uri = ? AND uid = ?')
      .run(uri, uid)
    if (result.changes !== 1) return false
    this.bump(uri)
    return true
  }

  async moveObject(uri: string, uid: string, destinationUri: string): Promise<boolean> {
    if (!(await this.findCalendar(destinationUri))) return false

    const result = this.db
      .prepare('UPDATE OR IGNORE objects SET calendar_uri = ? WHERE calendar_uri = ? AND uid = ?')
      .run(destinationUri, uri, uid)
    if (result.changes !== 1) return false
    this.bump(uri)
    this.bump(destinationUri)
    return true
  }

  close(): void {
    this.db.close()
  }

  private bump(uri: string): void {
    this.db
      .prepare(`UPDATE calendars SET ctag = ctag + 1, updated_at = datetime('now') WHERE uri = ?`)
      .run(uri)
  }
}

/**
 * Factory for registry descriptors: `{ name: 'database', args: [options?] }`.
 */
export function createDatabaseBackend(args: readonly unknown[]): DatabaseBackend {
  const options = databaseBackendOptionsSchema.parse(args[0] ?? {})
  return new DatabaseBackend(options)
}
