import { describe, it, expect } from 'vitest'
import { pino } from 'pino'
import { createPinoLog, silentLog } from '../src/logger.js'

function capture(level: string) {
  const lines: Array<Record<string, unknown>> = []
  const logger = pino(
    { level },
    {
      write(message: string) {
        lines.push(JSON.parse(message))
      },
    },
  )
  return { lines, logger }
}

describe('createPinoLog', () => {
  it('forwards records at their severity with the category', () => {
    const { lines, logger } = capture('debug')
    const log = createPinoLog(logger)

    log.record('federation', 'Backend with the name "exchange" was not found', 'warn')
    log.record('registry', 'Calendar backend exchange not found', 'error')

    expect(lines.map(({ level, category, msg }) => ({ level, category, msg }))).toEqual([
      { level: 40, category: 'federation', msg: 'Backend with the name "exchange" was not found' },
      { level: 50, category: 'registry', msg: 'Calendar backend exchange not found' },
    ])
  })

  it('respects the logger level', () => {
    const { lines, logger } = capture('info')
    createPinoLog(logger).record('federation', 'database.work.abc was not found', 'debug')
    expect(lines).toEqual([])
  })
})

describe('silentLog', () => {
  it('discards records', () => {
    expect(() => silentLog.record('federation', 'ignored', 'error')).not.toThrow()
  })
})
