import type { Logger } from './types.js'

export type LogLevel = 'INFO' | 'WARN' | 'ERROR'

export interface LoggerOptions {
  /** Fields merged into every record, before the call's own data. */
  bindings?: Record<string, unknown>
  /** Receives each serialized record. Defaults to stdout via `console.log`. */
  write?: (line: string) => void
  clock?: () => Date
}

let muted = false

export function setLoggerMuted(value: boolean): void {
  muted = value
}

/** JSON-lines logger; one record per call, `event` naming what happened. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const bindings = options.bindings ?? {}
  const clock = options.clock ?? (() => new Date())
  // eslint-disable-next-line no-console
  const write = options.write ?? ((line: string) => console.log(line))

  const record = (level: LogLevel, event: string, data?: Record<string, unknown>): void => {
    if (muted) return
    write(JSON.stringify({ ts: clock().toISOString(), level, event, ...bindings, ...(data ?? {}) }))
  }

  return {
    info: (event, data) => record('INFO', event, data),
    warn: (event, data) => record('WARN', event, data),
    error: (event, data) => record('ERROR', event, data)
  }
}

export const logger: Logger = createLogger({ bindings: { service: 'forkline' } })
