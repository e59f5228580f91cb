import { describe, it, expect, beforeEach } from 'vitest'
import { DatabaseBackend } from '../src/backends/database.js'
import { CalendarFederation } from '../src/federation/dispatcher.js'
import { MergeEngine } from '../src/federation/merge-engine.js'
import { BackendRegistry } from '../src/federation/registry.js'
import { allBut, event, seedCalendar } from './helpers.js'

class ArchiveBackend extends DatabaseBackend {}

let registry: BackendRegistry
let federation: CalendarFederation
let engine: MergeEngine

async function uids(backend: DatabaseBackend, uri: string): Promise<string[]> {
  return (await backend.getObjects(uri)).map((o) => o.uid)
}

beforeEach(() => {
  registry = new BackendRegistry()
  federation = new CalendarFederation({ registry })
  engine = new MergeEngine(federation)
})

// -------------------------------------------------------------------
// Merge
// -------------------------------------------------------------------

describe('mergeCalendars', () => {
  it('moves objects one by one when the backend cannot merge', async () => {
    const database = new DatabaseBackend({ capabilities: allBut('merge-calendar') })
    registry.activate(database)
    await seedCalendar(database, 'work', 'alice', [
      event('a', '2024-01-10T09:00:00Z', '2024-01-10T10:00:00Z'),
      event('b', '2024-01-11T09:00:00Z', '2024-01-11T10:00:00Z'),
    ])
    await seedCalendar(database, 'personal', 'alice', [
      event('c', '2024-01-12T09:00:00Z', '2024-01-12T10:00:00Z'),
    ])

    const report = await engine.mergeCalendars('database.personal', 'database.work')

    expect(report).toEqual({
      destination: 'database.personal',
      ok: true,
      sources: [{ source: 'database.work', strategy: 'emulated', ok: true, moved: 2 }],
    })
    expect(await uids(database, 'personal')).toEqual(['c', 'a', 'b'])
    expect(await database.findCalendar('work')).toBeNull()
  })

  it('delegates to a backend that merges natively', async () => {
    const database = new DatabaseBackend()
    registry.activate(database)
    await seedCalendar(database, 'work', 'alice', [
      event('a', '2024-01-10T09:00:00Z', '2024-01-10T10:00:00Z'),
    ])
    await seedCalendar(database, 'personal')

    const report = await engine.mergeCalendars('database.personal', 'database.work')

    expect(report.sources).toEqual([
      { source: 'database.work', strategy: 'native', ok: true, moved: 0 },
    ])
    expect(await uids(database, 'personal')).toEqual(['a'])
    expect(await database.findCalendar('work')).toBeNull()
  })

  it('merges across backends by copying', async () => {
    const database = new DatabaseBackend()
    const archive = new ArchiveBackend()
    registry.activate(database)
    registry.activate(archive)
    await seedCalendar(database, 'work', 'alice', [
      event('a', '2024-01-10T09:00:00Z', '2024-01-10T10:00:00Z', 'Standup'),
    ])
    await seedCalendar(archive, 'old')

    const report = await engine.mergeCalendars('archive.old', 'database.work')

    expect(report.ok).toBe(true)
    expect(report.sources[0].strategy).toBe('emulated')
    const copied = await archive.findObject('old', 'a')
    expect(copied?.properties).toEqual({ SUMMARY: 'Standup' })
    expect(copied?.start).toEqual(new Date('2024-01-10T09:00:00Z'))
    expect(await database.findCalendar('work')).toBeNull()
  })

  it('stops draining a source at the first failure', async () => {
    const database = new DatabaseBackend({ capabilities: allBut('merge-calendar') })
    registry.activate(database)
    await seedCalendar(database, 'work', 'alice', [
      event('a', '2024-01-10T09:00:00Z', '2024-01-10T10:00:00Z'),
      event('b', '2024-01-11T09:00:00Z', '2024-01-11T10:00:00Z'),
    ])
    // Destination already holds a "b"
    await seedCalendar(database, 'personal', 'alice', [
      event('b', '2024-01-12T09:00:00Z', '2024-01-12T10:00:00Z'),
    ])

    const report = await engine.mergeCalendars('database.personal', 'database.work')

    expect(report.ok).toBe(false)
    expect(report.sources[0]).toMatchObject({ strategy: 'emulated', ok: false, moved: 1 })
    expect(report.sources[0].error?.code).toBe('BACKEND_OPERATION_FAILED')
    // Partially drained, nothing rolled back
    expect(await uids(database, 'work')).toEqual(['b'])
    expect(await uids(database, 'personal')).toEqual(['b', 'a'])
  })

  it('reports merging a calendar into itself as unsupported', async () => {
    registry.activate(new DatabaseBackend())
    const report = await engine.mergeCalendars('database.personal', 'database.personal')
    expect(report.ok).toBe(false)
    expect(report.sources[0].error?.code).toBe('UNSUPPORTED_OPERATION')
  })

  it('continues with later sources after a failed one', async () => {
    const database = new DatabaseBackend()
    registry.activate(database)
    await seedCalendar(database, 'work', 'alice', [
      event('a', '2024-01-10T09:00:00Z', '2024-01-10T10:00:00Z'),
    ])
    await seedCalendar(database, 'personal')

    const report = await engine.mergeCalendars('database.personal', 'exchange.inbox', 'database.work')

    expect(report.ok).toBe(false)
    expect(report.sources.map((s) => [s.source, s.ok])).toEqual([
      ['exchange.inbox', false],
      ['database.work', true],
    ])
    expect(report.sources[0].error?.code).toBe('BACKEND_NOT_FOUND')
    expect(await uids(database, 'personal')).toEqual(['a'])
  })

  it('rejects malformed identifiers', async () => {
    await expect(engine.mergeCalendars('database', 'database.work')).rejects.toThrow(
      'Malformed identifier: "database"',
    )
  })

  it('checks every source identifier before merging any', async () => {
    const database = new DatabaseBackend()
    registry.activate(database)
    await seedCalendar(database, 'work', 'alice', [
      event('a', '2024-01-10T09:00:00Z', '2024-01-10T10:00:00Z'),
    ])
    await seedCalendar(database, 'personal')

    await expect(
      engine.mergeCalendars('database.personal', 'database.work', 'bad'),
    ).rejects.toThrow('Malformed identifier: "bad"')

    expect(await uids(database, 'work')).toEqual(['a'])
    expect(await uids(database, 'personal')).toEqual([])
  })

  it('refuses a native merge when both calendars hold the same uid', async () => {
    const database = new DatabaseBackend()
    registry.activate(database)
    await seedCalendar(database, 'work', 'alice', [
      event('a', '2024-01-10T09:00:00Z', '2024-01-10T10:00:00Z', 'from work'),
    ])
    await seedCalendar(database, 'personal', 'alice', [
      event('a', '2024-01-12T09:00:00Z', '2024-01-12T10:00:00Z', 'from personal'),
    ])

    const report = await engine.mergeCalendars('database.personal', 'database.work')

    expect(report.ok).toBe(false)
    expect(report.sources[0]).toMatchObject({ strategy: 'native', ok: false, moved: 0 })
    expect(report.sources[0].error?.code).toBe('BACKEND_OPERATION_FAILED')
    expect((await database.findObject('personal', 'a'))?.properties).toEqual({
      SUMMARY: 'from personal',
    })
    expect(await uids(database, 'work')).toEqual(['a'])
  })
})

// -------------------------------------------------------------------
// Move
// -------------------------------------------------------------------

describe('moveObject', () => {
  let database: DatabaseBackend
  let archive: ArchiveBackend

  beforeEach(async () => {
    database = new DatabaseBackend()
    archive = new ArchiveBackend()
    registry.activate(database)
    registry.activate(archive)
    await seedCalendar(database, 'work', 'alice', [
      event('abc', '2024-01-10T09:00:00Z', '2024-01-10T10:00:00Z'),
    ])
    await seedCalendar(database, 'personal')
    await seedCalendar(archive, 'old')
  })

  it('moves natively within one backend', async () => {
    const moved = await engine.moveObject('database.work.abc', 'database.personal')
    expect(moved).toEqual({ ok: true, value: 'database.personal.abc' })
    expect(await uids(database, 'personal')).toEqual(['abc'])
  })

  it('copies and deletes across backends, keeping the uid', async () => {
    const moved = await engine.moveObject('database.work.abc', 'archive.old')
    expect(moved).toEqual({ ok: true, value: 'archive.old.abc' })
    expect(await uids(archive, 'old')).toEqual(['abc'])
    expect(await uids(database, 'work')).toEqual([])
    expect(federation.uidIndex.resolve('abc')).toBe('archive.old.abc')
  })

  it('reports a missing object', async () => {
    const moved = await engine.moveObject('database.work.nope', 'archive.old')
    expect(moved.ok).toBe(false)
    expect(moved.ok ? null : moved.error.code).toBe('NOT_FOUND')
  })
})
