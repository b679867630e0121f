import { randomUUID } from 'node:crypto'

import { ChatBusyError } from '../core/errors.js'
import { MutexMap } from '../core/mutex.js'
import type { Logger } from '../core/types.js'
import {
  appendMessage,
  createBranch,
  createConversation,
  deleteMessage,
  findNode,
  flatten,
  getBranchInfo,
  getBranchInfoForMessage,
  switchVariant
} from './branching.js'
import type { ConversationStore } from './store.js'
import type { Attachment, BranchInfo, BranchResult, Conversation, Message } from './types.js'

/** Answers whether a turn is currently streaming for a chat. */
export interface ActiveChatLookup {
  hasActiveForChat(chatId: string): boolean
}

/** Where the orchestrator persists the messages it produces. */
export interface MessageSink {
  appendMessage(chatId: string, message: Message): Promise<string>
}

export interface ConversationServiceOptions {
  now?: () => Date
}

/**
 * Serializes every read-modify-write of a chat's tree. User-facing edits are
 * refused while a request for the same chat is in flight.
 */
export class ConversationService implements MessageSink {
  private readonly locks = new MutexMap<string>()
  private readonly now: () => Date

  constructor(
    private readonly store: ConversationStore,
    private readonly activeChats: ActiveChatLookup,
    private readonly logger: Logger,
    options: ConversationServiceOptions = {}
  ) {
    this.now = options.now ?? (() => new Date())
  }

  async getConversation(chatId: string): Promise<Conversation> {
    return (await this.store.loadConversation(chatId)) ?? createConversation({ id: chatId })
  }

  async activeMessages(chatId: string): Promise<Message[]> {
    return flatten(await this.getConversation(chatId))
  }

  /** Continues the active path. Used by the orchestrator for messages it produces. */
  async appendMessage(chatId: string, message: Message): Promise<string> {
    return this.locks.runExclusive(chatId, async () => {
      const result = appendMessage(await this.getConversation(chatId), message)
      await this.store.saveConversation(result.conversation)
      return result.nodeId
    })
  }

  async addUserMessage(chatId: string, text: string, attachments: Attachment[] = []): Promise<Message> {
    this.assertIdle(chatId)
    const message = this.newMessage('user', text, attachments)
    await this.appendMessage(chatId, message)
    return message
  }

  /** Adds an edited copy of `messageId` as a new active variant of its node. */
  async editMessage(chatId: string, messageId: string, text: string): Promise<BranchResult<Message>> {
    return this.branchFrom(chatId, messageId, (original) => this.newMessage(original.role, text, original.attachments))
  }

  /** Branches with an unchanged copy, so the turn after it can be regenerated. */
  async resendMessage(chatId: string, messageId: string): Promise<BranchResult<Message>> {
    return this.branchFrom(chatId, messageId, (original) =>
      this.newMessage(original.role, original.text, original.attachments)
    )
  }

  async switchVariant(chatId: string, nodeId: string, variantIndex: number): Promise<BranchResult<BranchInfo>> {
    return this.mutate(chatId, (conversation) => {
      const switched = switchVariant(conversation, nodeId, variantIndex)
      if (!switched.ok) return switched
      const info = getBranchInfo(switched.value, nodeId)
      if (!info.ok) return info
      return { ok: true, value: { conversation: switched.value, result: info.value } }
    })
  }

  async nextVariant(chatId: string, nodeId: string): Promise<BranchResult<BranchInfo>> {
    return this.stepVariant(chatId, nodeId, 1)
  }

  async previousVariant(chatId: string, nodeId: string): Promise<BranchResult<BranchInfo>> {
    return this.stepVariant(chatId, nodeId, -1)
  }

  async deleteMessage(chatId: string, messageId: string): Promise<BranchResult<Conversation>> {
    return this.mutate(chatId, (conversation) => {
      const deleted = deleteMessage(conversation, messageId)
      if (!deleted.ok) return deleted
      return { ok: true, value: { conversation: deleted.value, result: deleted.value } }
    })
  }

  async getBranchInfo(chatId: string, nodeId: string): Promise<BranchResult<BranchInfo>> {
    return getBranchInfo(await this.getConversation(chatId), nodeId)
  }

  async getBranchInfoForMessage(chatId: string, messageId: string): Promise<BranchResult<BranchInfo>> {
    return getBranchInfoForMessage(await this.getConversation(chatId), messageId)
  }

  private async stepVariant(chatId: string, nodeId: string, step: 1 | -1): Promise<BranchResult<BranchInfo>> {
    return this.mutate(chatId, (conversation) => {
      const current = getBranchInfo(conversation, nodeId)
      if (!current.ok) return current
      const switched = switchVariant(conversation, nodeId, current.value.currentVariantIndex + step)
      if (!switched.ok) return switched
      const info = getBranchInfo(switched.value, nodeId)
      if (!info.ok) return info
      return { ok: true, value: { conversation: switched.value, result: info.value } }
    })
  }

  private async branchFrom(
    chatId: string,
    messageId: string,
    build: (original: Message) => Message
  ): Promise<BranchResult<Message>> {
    return this.mutate(chatId, (conversation) => {
      const nodeId = findNode(conversation, messageId)
      const node = nodeId === null ? undefined : conversation.nodes[nodeId]
      if (nodeId === null || !node) return { ok: false, error: { code: 'MessageNotFound', messageId } }

      const original = node.variants[node.activeVariantIndex].message
      const message = build(original)
      const branched = createBranch(conversation, nodeId, message)
      if (!branched.ok) return branched
      return { ok: true, value: { conversation: branched.value.conversation, result: message } }
    })
  }

  /**
   * Runs a pure tree update under the chat lock and saves only when it
   * succeeded, so a failed operation leaves the stored tree untouched.
   */
  private async mutate<T>(
    chatId: string,
    update: (conversation: Conversation) => BranchResult<{ conversation: Conversation; result: T }>
  ): Promise<BranchResult<T>> {
    this.assertIdle(chatId)
    return this.locks.runExclusive(chatId, async () => {
      const outcome = update(await this.getConversation(chatId))
      if (!outcome.ok) {
        this.logger.warn('conversation.branch_rejected', { chatId, code: outcome.error.code })
        return outcome
      }
      await this.store.saveConversation(outcome.value.conversation)
      return { ok: true, value: outcome.value.result }
    })
  }

  private assertIdle(chatId: string): void {
    if (this.activeChats.hasActiveForChat(chatId)) throw new ChatBusyError(chatId)
  }

  private newMessage(role: Message['role'], text: string, attachments: Attachment[]): Message {
    return { id: randomUUID(), role, text, attachments: [...attachments], createdAt: this.now().toISOString() }
  }
}
