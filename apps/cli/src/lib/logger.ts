/**
 * Structured logger.
 *
 * Emits one JSON line per entry with ts, level, msg and any extra fields.
 * Lines go to stderr so stdout carries only the filter output.
 */

import type { LogLevel } from '@serial-kalman/config'

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

export type LogSink = (line: string) => void

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line)
}

export function createLogger(
  minLevel: LogLevel,
  sink: LogSink = stderrSink,
  now: () => Date = () => new Date(),
): Logger {
  const emit = (level: LogLevel, msg: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return
    const entry = {
      ts: now().toISOString(),
      level,
      msg,
      ...fields,
    }
    sink(JSON.stringify(entry) + '\n')
  }

  return {
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  }
}
