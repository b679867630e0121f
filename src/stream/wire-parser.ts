import { errorMessage, parseJsonObject } from '../core/json.js'
import type { JsonObject } from '../core/types.js'
import type { Dialect } from './dialect.js'
import type { LineSource } from './line-source.js'

/** What the event handler wants the parser to do next. */
export type StreamAction =
  | { type: 'continue' }
  | { type: 'stop' }
  | { type: 'error'; message: string }

export type StreamOutcome = { type: 'success' } | { type: 'error'; message: string }

export const CONTINUE: StreamAction = { type: 'continue' }
export const STOP: StreamAction = { type: 'stop' }

export interface WireHandler {
  onEvent(eventType: string | null, payload: JsonObject): StreamAction
  /** Called once on every successful end: done marker, stop event, `stop` action, or exhausted source. */
  onStreamEnd?(): void
  /** A single malformed data line. Never fatal. */
  onParseError?(raw: string, error: unknown): void
}

const DATA_PREFIX = 'data:'
const EVENT_PREFIX = 'event:'
const EMPTY_OBJECT = '{}'

function readEventType(payload: JsonObject, field: string | null): string | null {
  if (field === null) return null
  const value = payload[field]
  return typeof value === 'string' ? value : null
}

/**
 * Drives one server-sent-event stream through `handler` according to the
 * provider dialect. Resolves with the terminal outcome; never rejects. A
 * source that throws (network failure, abort) resolves to an error outcome.
 */
export async function parseStream(
  source: LineSource,
  dialect: Dialect,
  handler: WireHandler
): Promise<StreamOutcome> {
  const success = (): StreamOutcome => {
    handler.onStreamEnd?.()
    return { type: 'success' }
  }

  // Event name announced by the last `event:` line (event-data format only).
  let pendingEvent: string | null = null

  try {
    for await (const line of source) {
      if (line.trim() === '') continue
      if (dialect.skipKeepalives && line.startsWith(':')) continue

      if (line === `data: ${dialect.doneMarker}` || line === dialect.doneMarker) {
        return success()
      }

      if (dialect.format === 'event-data' && line.startsWith(EVENT_PREFIX)) {
        pendingEvent = line.slice(EVENT_PREFIX.length).trim() || null
        continue
      }

      if (!line.startsWith(DATA_PREFIX)) continue

      const content = line.slice(DATA_PREFIX.length).trim()
      const announced = pendingEvent
      pendingEvent = null
      if (content === '' || content === dialect.doneMarker || content === EMPTY_OBJECT) continue
      if (announced !== null && dialect.stopEvents.includes(announced)) return success()

      let payload: JsonObject
      try {
        payload = parseJsonObject(content)
      } catch (error) {
        handler.onParseError?.(content, error)
        continue
      }

      const eventType = announced ?? readEventType(payload, dialect.eventTypeField)
      const action = handler.onEvent(eventType, payload)
      if (action.type === 'stop') return success()
      if (action.type === 'error') return { type: 'error', message: action.message }
    }
  } catch (error) {
    return { type: 'error', message: errorMessage(error) }
  }

  return success()
}
