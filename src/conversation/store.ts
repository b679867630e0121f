import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { randomUUID } from 'node:crypto'
import { join } from 'node:path'

import type { Logger } from '../core/types.js'
import { isRecord } from '../core/json.js'
import { migrate } from './branching.js'
import { conversationSchema, legacyConversationSchema } from './schema.js'
import type { Conversation } from './types.js'

/** Atomic read/replace persistence for one conversation per chat. */
export interface ConversationStore {
  loadConversation(chatId: string): Promise<Conversation | null>
  saveConversation(conversation: Conversation): Promise<void>
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * One JSON file per chat. Writes go to a temp file that is renamed over the
 * target, so readers never observe a partial document.
 */
export class FileConversationStore implements ConversationStore {
  constructor(
    private readonly dir: string,
    private readonly logger: Logger
  ) {}

  pathFor(chatId: string): string {
    return join(this.dir, `${encodeURIComponent(chatId)}.json`)
  }

  async loadConversation(chatId: string): Promise<Conversation | null> {
    let raw: string
    try {
      raw = await readFile(this.pathFor(chatId), 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) return null
      throw error
    }

    const document: unknown = JSON.parse(raw)
    if (isRecord(document) && 'nodes' in document) return conversationSchema.parse(document)

    const legacy = legacyConversationSchema.parse(document)
    this.logger.info('store.migrated', { chatId, messages: legacy.messages.length })
    return migrate(legacy)
  }

  async saveConversation(conversation: Conversation): Promise<void> {
    await mkdir(this.dir, { recursive: true })
    const target = this.pathFor(conversation.id)
    const temp = `${target}.${randomUUID()}.tmp`
    await writeFile(temp, JSON.stringify(conversation, null, 2), 'utf-8')
    await rename(temp, target)
  }
}

/** Keeps structured clones so callers never share state with the store. */
export class MemoryConversationStore implements ConversationStore {
  private readonly conversations = new Map<string, Conversation>()

  async loadConversation(chatId: string): Promise<Conversation | null> {
    const stored = this.conversations.get(chatId)
    return stored ? structuredClone(stored) : null
  }

  async saveConversation(conversation: Conversation): Promise<void> {
    this.conversations.set(conversation.id, structuredClone(conversation))
  }
}
