export { loadConfig } from './config/load.js'
export { configSchema, type ForklineConfig } from './config/schema.js'
export * from './conversation/branching.js'
export { ConversationService, type ActiveChatLookup, type MessageSink } from './conversation/service.js'
export { FileConversationStore, MemoryConversationStore, type ConversationStore } from './conversation/store.js'
export type * from './conversation/types.js'
export * from './core/errors.js'
export { createLogger, logger, setLoggerMuted, type LoggerOptions, type LogLevel } from './core/logger.js'
export type { JsonObject, JsonValue, Logger } from './core/types.js'
export { EventGateway, type GatewayCommand, type RequestControl } from './gateway/ws-gateway.js'
export { StreamEventBus, type StreamEventListener, type SubscriptionFilter } from './orchestrator/event-bus.js'
export type { StreamEvent, StreamEventBody, StreamEventType } from './orchestrator/events.js'
export {
  RequestOrchestrator,
  type OrchestratorConfig,
  type OrchestratorDeps,
  type RequestHandle,
  type RequestOutcome
} from './orchestrator/orchestrator.js'
export { RequestRegistry, type InFlightRequest, type RequestSnapshot } from './orchestrator/registry.js'
export { isTerminal, type RequestStatus } from './orchestrator/request-state.js'
export { createHttpProviderCall, type HttpProviderOptions } from './provider/http-provider.js'
export { getProviderProfile, loadProviderProfiles, parseProviderProfiles, type ProviderProfile } from './provider/profiles.js'
export type { ProviderCall } from './provider/provider-call.js'
export { createRuntime, type Runtime, type RuntimeOptions } from './runtime.js'
export { defineDialect, type Dialect } from './stream/dialect.js'
export { classify, extractByPath, type RouteRule, type RoutedEvent } from './stream/event-router.js'
export { linesOf, readLines, readStreamLines, type LineSource } from './stream/line-source.js'
export { parseStream, type StreamAction, type StreamOutcome, type WireHandler } from './stream/wire-parser.js'
export { DateTimeTool } from './tools/date-time.js'
export { ToolRegistry } from './tools/registry.js'
export type { Tool, ToolExecutor, ToolResult, ToolSpecification } from './tools/types.js'
