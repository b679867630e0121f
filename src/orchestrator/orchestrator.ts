import { randomUUID } from 'node:crypto'

import type { ForklineConfig } from '../config/schema.js'
import type { MessageSink } from '../conversation/service.js'
import type { Message, MessageRole, ThoughtsStatus, ToolCallInfo } from '../conversation/types.js'
import { errorMessage, parseJsonObject } from '../core/json.js'
import { retry } from '../core/retry.js'
import type { JsonObject, Logger } from '../core/types.js'
import type { ProviderCall } from '../provider/provider-call.js'
import { classify } from '../stream/event-router.js'
import { CONTINUE, STOP, parseStream, type StreamAction, type WireHandler } from '../stream/wire-parser.js'
import type { ToolExecutor, ToolResult } from '../tools/types.js'
import type { StreamEventBus } from './event-bus.js'
import type { StreamEventBody } from './events.js'
import type { InFlightRequest, RequestRegistry } from './registry.js'
import { assertTransition, type RequestStatus } from './request-state.js'

export type RequestOutcome =
  | { status: 'completed' }
  | { status: 'cancelled' }
  | { status: 'failed'; message: string }

export interface RequestHandle {
  requestId: string
  chatId: string
  /** Settles with the terminal outcome; never rejects. */
  done: Promise<RequestOutcome>
}

export type OrchestratorConfig = Pick<ForklineConfig, 'maxToolIterations' | 'openRetry'>

export interface OrchestratorDeps {
  conversations: MessageSink
  tools: ToolExecutor
  bus: StreamEventBus
  registry: RequestRegistry
  /** Milliseconds clock for thinking durations and timestamps. */
  now?: () => number
}

interface PendingToolCall {
  toolId: string
  callId: string
  parameters: JsonObject
}

interface ToolCallAssembly {
  toolId: string
  callId: string
  args: string
}

interface Thoughts {
  text: string
  durationSeconds: number
  status: ThoughtsStatus
}

interface RequestRun {
  request: InFlightRequest
  call: ProviderCall
  /** History sent on every (re)open; grows with persisted tool round trips. */
  messages: Message[]
  text: string
  thinking: { startedAt: number; text: string } | null
  /** Completed thinking waiting for the next persisted message. */
  thoughts: Thoughts | null
  toolCall: PendingToolCall | null
  assembly: ToolCallAssembly | null
  toolIterations: number
  persisted: number
  /** Set once a terminal path has begun; no further events are emitted. */
  closed: boolean
  settled: Promise<RequestOutcome> | null
  /** Append in progress; a terminal path waits for it before finishing. */
  pendingWrite: Promise<string> | null
}

function abortPromise(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason)
      return
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true })
  })
}

/**
 * Drives one conversational turn per request: opens the provider stream,
 * routes wire events, runs tool round trips and persists what the model
 * produced. All terminal transitions go through `settle`, which runs at most
 * once per request.
 */
export class RequestOrchestrator {
  private readonly runs = new Map<string, RequestRun>()
  private readonly now: () => number

  constructor(
    private readonly config: OrchestratorConfig,
    private readonly deps: OrchestratorDeps,
    private readonly logger: Logger
  ) {
    this.now = deps.now ?? Date.now
  }

  start(requestId: string, chatId: string, call: ProviderCall, initialMessages: readonly Message[]): RequestHandle {
    const request: InFlightRequest = {
      requestId,
      chatId,
      providerId: call.profile.id,
      model: call.model,
      status: 'created',
      startedAt: new Date(this.now()).toISOString(),
      controller: new AbortController()
    }
    this.deps.registry.add(request)

    const run: RequestRun = {
      request,
      call,
      messages: [...initialMessages],
      text: '',
      thinking: null,
      thoughts: null,
      toolCall: null,
      assembly: null,
      toolIterations: 0,
      persisted: 0,
      closed: false,
      settled: null,
      pendingWrite: null
    }
    this.runs.set(requestId, run)
    this.logger.info('request.started', { requestId, chatId, provider: call.profile.id, model: call.model })

    return { requestId, chatId, done: this.run(run) }
  }

  /** Aborts a live request and discards unsaved text. `false` when nothing was in flight. */
  cancel(requestId: string): boolean {
    const run = this.runs.get(requestId)
    if (!run || run.settled) return false
    void this.settle(run, async () => this.finish(run, { status: 'cancelled' }))
    run.request.controller.abort()
    return true
  }

  /** Aborts a live request but keeps what streamed so far, as if it had ended normally. */
  stopAndComplete(requestId: string): boolean {
    const run = this.runs.get(requestId)
    if (!run || run.settled) return false
    this.closeThinking(run)
    void this.settle(run, async () => this.completeTurn(run, false))
    run.request.controller.abort()
    return true
  }

  isChatBusy(chatId: string): boolean {
    return this.deps.registry.hasActiveForChat(chatId)
  }

  private async run(run: RequestRun): Promise<RequestOutcome> {
    const { requestId } = run.request
    const signal = run.request.controller.signal

    try {
      while (true) {
        const source = await retry(() => run.call.open(run.messages, signal), {
          attempts: this.config.openRetry.attempts,
          backoffMs: this.config.openRetry.backoffMs,
          signal,
          onRetry: (attempt, error) => {
            this.logger.warn('request.open_retry', { requestId, attempt, error: errorMessage(error) })
          }
        })
        if (run.settled) return await run.settled
        if (run.request.status === 'created') this.transition(run, 'streaming')

        const outcome = await parseStream(source, run.call.profile.dialect, this.handlerFor(run))
        if (run.settled) return await run.settled
        if (outcome.type === 'error') return await this.fail(run, outcome.message)

        this.closeThinking(run)
        const toolCall = this.takeToolCall(run)
        if (!toolCall) return await this.settle(run, async () => this.completeTurn(run, true))

        if (run.toolIterations >= this.config.maxToolIterations) {
          return await this.fail(run, `Exceeded the maximum of ${this.config.maxToolIterations} tool iterations`)
        }
        run.toolIterations += 1
        await this.runToolCall(run, toolCall, signal)
        if (run.settled) return await run.settled
      }
    } catch (error) {
      if (run.settled) return await run.settled
      return await this.fail(run, errorMessage(error))
    }
  }

  private handlerFor(run: RequestRun): WireHandler {
    const { requestId } = run.request
    const rules = run.call.profile.rules

    return {
      onEvent: (eventType, payload): StreamAction => {
        if (run.closed) return STOP
        const routed = classify(eventType, payload, rules)

        switch (routed.kind) {
          case 'text':
            this.closeThinking(run)
            run.text += routed.text
            this.emit(run, { type: 'partial_response', text: routed.text })
            return CONTINUE
          case 'thinking_start':
            this.startThinking(run)
            return CONTINUE
          case 'thinking':
            this.startThinking(run)
            if (run.thinking) run.thinking.text += routed.text
            this.emit(run, { type: 'thinking_partial', text: routed.text })
            return CONTINUE
          case 'thinking_end':
            this.closeThinking(run)
            return CONTINUE
          case 'tool_call':
            this.closeThinking(run)
            run.toolCall = { toolId: routed.toolId, callId: routed.callId ?? randomUUID(), parameters: routed.parameters }
            return STOP
          case 'tool_call_start':
            this.closeThinking(run)
            if (run.assembly) {
              this.logger.warn('tool.extra_call_ignored', { requestId, toolId: routed.toolId })
              return CONTINUE
            }
            run.assembly = {
              toolId: routed.toolId,
              callId: routed.callId ?? randomUUID(),
              args: routed.argumentsFragment
            }
            return CONTINUE
          case 'tool_call_delta':
            if (run.assembly) run.assembly.args += routed.fragment
            return CONTINUE
          case 'stream_end':
            return STOP
          case 'error':
            return { type: 'error', message: routed.message }
          case 'unrecognized':
            return CONTINUE
        }
      },
      onParseError: (raw, error) => {
        this.logger.warn('stream.parse_error', { requestId, raw: raw.slice(0, 200), error: errorMessage(error) })
      }
    }
  }

  private takeToolCall(run: RequestRun): PendingToolCall | null {
    if (run.toolCall) {
      const call = run.toolCall
      run.toolCall = null
      run.assembly = null
      return call
    }
    if (!run.assembly) return null

    const { toolId, callId, args } = run.assembly
    run.assembly = null
    let parameters: JsonObject = {}
    if (args.trim() !== '') {
      try {
        parameters = parseJsonObject(args)
      } catch (error) {
        this.logger.warn('tool.arguments_invalid', { requestId: run.request.requestId, toolId, error: errorMessage(error) })
      }
    }
    return { toolId, callId, parameters }
  }

  private async runToolCall(run: RequestRun, call: PendingToolCall, signal: AbortSignal): Promise<void> {
    const { requestId, chatId } = run.request

    if (run.text !== '') {
      const text = run.text
      run.text = ''
      const said = await this.persist(run, this.newMessage(run, 'assistant', text))
      if (run.closed) return
      this.emit(run, { type: 'messages_added', messageIds: [said.id] })
    }

    this.transition(run, 'tool_pending')
    this.emit(run, { type: 'tool_call_request', toolId: call.toolId, callId: call.callId, parameters: call.parameters })

    const result = await Promise.race([this.executeTool(run, call, signal), abortPromise(signal)])
    if (run.closed) return

    const toolCall: ToolCallInfo = { ...call, result }
    const callMessage = await this.persist(run, { ...this.newMessage(run, 'tool_call', ''), toolCall })
    if (run.closed) return
    const responseMessage = await this.persist(run, {
      ...this.newMessage(run, 'tool_response', result.ok ? result.output : `Error: ${result.error}`),
      toolResponseCallId: call.callId
    })
    if (run.closed) return
    this.emit(run, { type: 'messages_added', messageIds: [callMessage.id, responseMessage.id] })
    this.logger.info('tool.round_trip', { requestId, chatId, toolId: call.toolId, ok: result.ok })
    this.transition(run, 'streaming')
  }

  private async executeTool(run: RequestRun, call: PendingToolCall, signal: AbortSignal): Promise<ToolResult> {
    try {
      return await this.deps.tools.execute(call.toolId, call.parameters, signal)
    } catch (error) {
      this.logger.error('tool.failed', { requestId: run.request.requestId, toolId: call.toolId, error: errorMessage(error) })
      return { ok: false, error: errorMessage(error) }
    }
  }

  /**
   * Persists the unsaved text as the final assistant message. A turn that
   * produced nothing at all fails unless it was stopped by the user.
   */
  private async completeTurn(run: RequestRun, requireContent: boolean): Promise<RequestOutcome> {
    try {
      if (run.text !== '' || run.thoughts) {
        const text = run.text
        run.text = ''
        await this.persist(run, this.newMessage(run, 'assistant', text))
      } else if (requireContent && run.persisted === 0) {
        return this.finish(run, { status: 'failed', message: `Empty response from ${run.call.profile.name}` })
      }
    } catch (error) {
      return this.finish(run, { status: 'failed', message: errorMessage(error) })
    }
    return this.finish(run, { status: 'completed' })
  }

  private fail(run: RequestRun, message: string): Promise<RequestOutcome> {
    return this.settle(run, async () => this.finish(run, { status: 'failed', message }))
  }

  private settle(run: RequestRun, terminate: () => Promise<RequestOutcome>): Promise<RequestOutcome> {
    if (run.settled) return run.settled
    run.closed = true
    const write = run.pendingWrite
    run.settled = write ? Promise.allSettled([write]).then(() => terminate()) : terminate()
    return run.settled
  }

  private finish(run: RequestRun, outcome: RequestOutcome): RequestOutcome {
    const { requestId, chatId } = run.request
    assertTransition(requestId, run.request.status, outcome.status)
    run.request.status = outcome.status
    this.runs.delete(requestId)
    if (!this.deps.registry.remove(requestId)) return outcome

    if (outcome.status === 'completed') {
      this.deps.bus.publish({ type: 'complete', requestId, chatId })
      this.logger.info('request.completed', { requestId, chatId, toolIterations: run.toolIterations })
    } else if (outcome.status === 'failed') {
      this.deps.bus.publish({ type: 'error', message: outcome.message, requestId, chatId })
      this.logger.error('request.failed', { requestId, chatId, error: outcome.message })
    } else {
      this.logger.info('request.cancelled', { requestId, chatId })
    }
    return outcome
  }

  private transition(run: RequestRun, to: RequestStatus): void {
    assertTransition(run.request.requestId, run.request.status, to)
    run.request.status = to
    if (to === 'streaming' || to === 'tool_pending') this.emit(run, { type: 'status_change', status: to })
  }

  private startThinking(run: RequestRun): void {
    if (run.thinking) return
    run.thinking = { startedAt: this.now(), text: '' }
    this.emit(run, { type: 'thinking_started' })
  }

  private closeThinking(run: RequestRun): void {
    if (!run.thinking) return
    const { startedAt, text } = run.thinking
    run.thinking = null
    const durationSeconds = (this.now() - startedAt) / 1000
    const status: ThoughtsStatus = text !== '' ? 'present' : 'unavailable'
    run.thoughts = { text, durationSeconds, status }
    this.emit(run, { type: 'thinking_complete', durationSeconds, status })
  }

  /** Appends to the chat tree; assistant and tool-call messages take any pending thoughts. */
  private async persist(run: RequestRun, message: Message): Promise<Message> {
    let stored = message
    if (run.thoughts && (message.role === 'assistant' || message.role === 'tool_call')) {
      const { text, durationSeconds, status } = run.thoughts
      stored = {
        ...message,
        ...(status === 'present' ? { thoughts: text } : {}),
        thinkingDurationSeconds: durationSeconds,
        thoughtsStatus: status
      }
      run.thoughts = null
    }
    const write = this.deps.conversations.appendMessage(run.request.chatId, stored)
    run.pendingWrite = write
    try {
      await write
    } finally {
      if (run.pendingWrite === write) run.pendingWrite = null
    }
    run.messages.push(stored)
    run.persisted += 1
    return stored
  }

  private newMessage(run: RequestRun, role: MessageRole, text: string): Message {
    return {
      id: randomUUID(),
      role,
      text,
      attachments: [],
      createdAt: new Date(this.now()).toISOString(),
      model: run.call.model
    }
  }

  private emit(run: RequestRun, body: StreamEventBody): void {
    if (run.closed) return
    this.deps.bus.publish({ ...body, requestId: run.request.requestId, chatId: run.request.chatId })
  }
}
