import type { ThoughtsStatus } from '../conversation/types.js'
import type { JsonObject } from '../core/types.js'
import type { RequestStatus } from './request-state.js'

export type StreamEventBody =
  | { type: 'partial_response'; text: string }
  | { type: 'thinking_started' }
  | { type: 'thinking_partial'; text: string }
  | { type: 'thinking_complete'; durationSeconds: number; status: ThoughtsStatus }
  | { type: 'tool_call_request'; toolId: string; callId: string; parameters: JsonObject }
  /** Preceding text or tool messages were persisted; the visible buffer resets. */
  | { type: 'messages_added'; messageIds: string[] }
  | { type: 'status_change'; status: RequestStatus }
  | { type: 'complete' }
  | { type: 'error'; message: string }

/** Canonical, provider-agnostic event keyed by request and chat. */
export type StreamEvent = StreamEventBody & { requestId: string; chatId: string }

export type StreamEventType = StreamEvent['type']
