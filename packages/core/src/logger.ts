/**
 * Logging
 *
 * pino-backed sink for the federation's `record(category, message, severity)`
 * calls.
 */

import { pino, type BaseLogger, type LevelWithSilent, type Logger } from 'pino'
import type { FederationLog } from './federation/types.js'

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({ name: 'calendar-federation', level })
}

/**
 * Route federation records to a pino logger (or anything pino-shaped, such as
 * a Fastify instance's `log`).
 */
export function createPinoLog(logger: BaseLogger = createLogger()): FederationLog {
  return {
    record(category, message, severity) {
      logger[severity]({ category }, message)
    },
  }
}

export const silentLog: FederationLog = {
  record() {},
}
