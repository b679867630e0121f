import { randomUUID } from 'node:crypto'

import type { ForklineConfig } from './config/schema.js'
import { describeBranchError } from './conversation/branching.js'
import { ConversationService } from './conversation/service.js'
import { FileConversationStore, type ConversationStore } from './conversation/store.js'
import type { Attachment } from './conversation/types.js'
import { logger as defaultLogger, setLoggerMuted } from './core/logger.js'
import type { Logger } from './core/types.js'
import { EventGateway } from './gateway/ws-gateway.js'
import { StreamEventBus } from './orchestrator/event-bus.js'
import { RequestOrchestrator, type RequestHandle } from './orchestrator/orchestrator.js'
import { RequestRegistry } from './orchestrator/registry.js'
import { loadProviderProfiles, type ProviderProfile } from './provider/profiles.js'
import type { ProviderCall } from './provider/provider-call.js'
import { DateTimeTool } from './tools/date-time.js'
import { ToolRegistry } from './tools/registry.js'

export interface RuntimeOptions {
  store?: ConversationStore
  logger?: Logger
  now?: () => number
}

export interface Runtime {
  config: ForklineConfig
  profiles: Map<string, ProviderProfile>
  registry: RequestRegistry
  tools: ToolRegistry
  conversations: ConversationService
  bus: StreamEventBus
  orchestrator: RequestOrchestrator
  gateway: EventGateway
  /** Persists the user turn and streams the reply over the active path. */
  sendMessage(chatId: string, text: string, call: ProviderCall, attachments?: Attachment[]): Promise<RequestHandle>
  /** Branches at `messageId` with new text and streams a reply for the new branch. */
  editAndResend(chatId: string, messageId: string, text: string, call: ProviderCall): Promise<RequestHandle>
  start(): Promise<void>
  stop(): Promise<void>
}

export function createRuntime(config: ForklineConfig, options: RuntimeOptions = {}): Runtime {
  const logger = options.logger ?? defaultLogger
  if (!options.logger) setLoggerMuted(config.logMuted)

  const profiles = loadProviderProfiles(config.providersPath)
  const store = options.store ?? new FileConversationStore(config.dataDir, logger)
  const registry = new RequestRegistry()
  const tools = new ToolRegistry(logger)
  tools.register(new DateTimeTool())

  const conversations = new ConversationService(store, registry, logger)
  const bus = new StreamEventBus(logger)
  const orchestrator = new RequestOrchestrator(
    config,
    { conversations, tools, bus, registry, now: options.now },
    logger
  )
  const gateway = new EventGateway(config.gateway, bus, orchestrator, logger)

  const dispatch = async (chatId: string, call: ProviderCall): Promise<RequestHandle> => {
    const messages = await conversations.activeMessages(chatId)
    return orchestrator.start(randomUUID(), chatId, call, messages)
  }

  return {
    config,
    profiles,
    registry,
    tools,
    conversations,
    bus,
    orchestrator,
    gateway,
    async sendMessage(chatId, text, call, attachments = []) {
      await conversations.addUserMessage(chatId, text, attachments)
      return dispatch(chatId, call)
    },
    async editAndResend(chatId, messageId, text, call) {
      const edited = await conversations.editMessage(chatId, messageId, text)
      if (!edited.ok) throw new Error(describeBranchError(edited.error))
      return dispatch(chatId, call)
    },
    async start() {
      await gateway.start()
    },
    async stop() {
      for (const request of registry.snapshot()) orchestrator.cancel(request.requestId)
      await bus.flush()
      await gateway.stop()
    }
  }
}
