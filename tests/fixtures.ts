import type { LegacyConversation, Message, MessageRole } from '../src/conversation/types.js'

export function message(id: string, text = id, role: MessageRole = 'user'): Message {
  return { id, role, text, attachments: [], createdAt: '2026-01-01T00:00:00.000Z' }
}

export function legacyHistory(...ids: string[]): LegacyConversation {
  return {
    id: 'chat-1',
    title: 'Fixture',
    systemPrompt: '',
    groupId: null,
    messages: ids.map((id, index) => message(id, id, index % 2 === 0 ? 'user' : 'assistant'))
  }
}
