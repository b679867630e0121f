import type { JsonObject } from '../core/types.js'
import type { ToolResult } from '../tools/types.js'

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool_call' | 'tool_response'

/** Whether a message carries the model's reasoning trace. */
export type ThoughtsStatus = 'none' | 'present' | 'unavailable'

export interface Attachment {
  fileName: string
  mimeType: string
  localPath?: string
  /** Provider-side file reference once uploaded. */
  remoteId?: string
}

export interface ToolCallInfo {
  toolId: string
  callId: string
  parameters: JsonObject
  result?: ToolResult
}

export interface Message {
  id: string
  role: MessageRole
  text: string
  attachments: Attachment[]
  /** ISO 8601 creation time. */
  createdAt: string
  model?: string
  toolCall?: ToolCallInfo
  /** Set on `tool_response` messages; links back to `toolCall.callId`. */
  toolResponseCallId?: string
  thoughts?: string
  thinkingDurationSeconds?: number
  thoughtsStatus?: ThoughtsStatus
}

/** One alternative content at a node. */
export interface Variant {
  message: Message
  childNodeId: string | null
}

/** A branch point. `variants` is append-only and never empty. */
export interface ConversationNode {
  id: string
  variants: Variant[]
  activeVariantIndex: number
}

export interface ConversationMeta {
  id: string
  title: string
  systemPrompt: string
  groupId: string | null
}

export interface Conversation extends ConversationMeta {
  rootNodeId: string | null
  nodes: Record<string, ConversationNode>
}

/** History saved before branching existed: a plain ordered message list. */
export interface LegacyConversation extends ConversationMeta {
  messages: Message[]
}

export type ConversationRecord = Conversation | LegacyConversation

export interface BranchInfo {
  nodeId: string
  currentVariantIndex: number
  total: number
  hasNext: boolean
  hasPrevious: boolean
}

export type BranchError =
  | { code: 'NodeNotFound'; nodeId: string }
  | { code: 'IndexOutOfRange'; nodeId: string; index: number; total: number }
  | { code: 'CannotDeleteBranchPoint'; nodeId: string; messageId: string }
  | { code: 'MessageNotFound'; messageId: string }
  | { code: 'Error'; message: string }

export type BranchResult<T> = { ok: true; value: T } | { ok: false; error: BranchError }
