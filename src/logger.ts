/**
 * Logging
 *
 * Components take a `Log` through their dependencies and default to a LogTape
 * logger. The host application owns `configure()`; until it calls it, LogTape
 * discards records.
 */

import { getLogger } from '@logtape/logtape'

export type LogData = Record<string, unknown>

/**
 * Logger accepted by every component
 */
export interface Log {
  debug: (msg: string, data?: LogData) => void
  info: (msg: string, data?: LogData) => void
  warn: (msg: string, data?: LogData) => void
}

/** Root LogTape category for this package */
export const LOG_CATEGORY = 'xoauth2'

/**
 * Creates a logger for a subsystem.
 * @param subsystem Category below the package root, e.g. "resolver"
 * @returns Logger writing to LogTape
 */
export function createLog(subsystem: string): Log {
  const logger = getLogger([LOG_CATEGORY, subsystem])
  return {
    debug: (msg, data) => logger.debug(msg, data),
    info: (msg, data) => logger.info(msg, data),
    warn: (msg, data) => logger.warn(msg, data),
  }
}
