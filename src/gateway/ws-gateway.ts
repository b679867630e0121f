import type { IncomingMessage } from 'node:http'

import WebSocket, { WebSocketServer } from 'ws'
import { z } from 'zod'

import type { ForklineConfig } from '../config/schema.js'
import { errorMessage } from '../core/json.js'
import type { Logger } from '../core/types.js'
import type { StreamEventBus } from '../orchestrator/event-bus.js'

const commandSchema = z.object({
  type: z.enum(['cancel', 'stop']),
  requestId: z.string().min(1)
})

export type GatewayCommand = z.infer<typeof commandSchema>

/** The orchestrator operations a client may trigger. */
export interface RequestControl {
  cancel(requestId: string): boolean
  stopAndComplete(requestId: string): boolean
}

function chatIdFrom(request: IncomingMessage): string | undefined {
  const url = new URL(request.url ?? '/', 'http://localhost')
  return url.searchParams.get('chatId') ?? undefined
}

/**
 * Relays stream events to WebSocket clients as JSON and accepts
 * `cancel` / `stop` commands. `?chatId=` narrows a connection to one chat.
 */
export class EventGateway {
  private server: WebSocketServer | null = null

  constructor(
    private readonly config: ForklineConfig['gateway'],
    private readonly bus: StreamEventBus,
    private readonly control: RequestControl,
    private readonly logger: Logger
  ) {}

  get address(): { host: string; port: number } | null {
    const address = this.server?.address()
    if (!address || typeof address === 'string') return null
    return { host: address.address, port: address.port }
  }

  async start(): Promise<void> {
    if (!this.config.enabled || this.server) return

    const server = new WebSocketServer({ host: this.config.host, port: this.config.port })
    await new Promise<void>((resolve, reject) => {
      server.once('listening', () => resolve())
      server.once('error', reject)
    })
    server.on('connection', (socket, request) => this.accept(socket, request))
    server.on('error', (error) => this.logger.error('gateway.error', { error: errorMessage(error) }))
    this.server = server
    this.logger.info('gateway.started', { host: this.config.host, port: this.address?.port })
  }

  async stop(): Promise<void> {
    const server = this.server
    if (!server) return
    this.server = null
    for (const client of server.clients) client.terminate()
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()))
    })
    this.logger.info('gateway.stopped', {})
  }

  private accept(socket: WebSocket, request: IncomingMessage): void {
    const chatId = chatIdFrom(request)
    const unsubscribe = this.bus.subscribe(
      (event) => {
        if (socket.readyState === WebSocket.OPEN) socket.send(JSON.stringify(event))
      },
      chatId === undefined ? {} : { chatId }
    )
    this.logger.info('gateway.client_connected', { chatId: chatId ?? null })

    socket.on('message', (data) => this.handleCommand(socket, String(data)))
    // Malformed frames; ws closes the connection itself afterwards.
    socket.on('error', (error) => {
      this.logger.warn('gateway.client_error', { chatId: chatId ?? null, error: errorMessage(error) })
    })
    socket.on('close', () => {
      unsubscribe()
      this.logger.info('gateway.client_disconnected', { chatId: chatId ?? null })
    })
  }

  private handleCommand(socket: WebSocket, raw: string): void {
    let input: unknown
    try {
      input = JSON.parse(raw)
    } catch (error) {
      this.logger.warn('gateway.parse_error', { error: errorMessage(error) })
      this.reply(socket, { type: 'gateway_error', message: 'Invalid JSON' })
      return
    }

    const parsed = commandSchema.safeParse(input)
    if (!parsed.success) {
      this.reply(socket, { type: 'gateway_error', message: parsed.error.issues.map((i) => i.message).join('; ') })
      return
    }

    const command = parsed.data
    const accepted =
      command.type === 'cancel'
        ? this.control.cancel(command.requestId)
        : this.control.stopAndComplete(command.requestId)
    this.logger.info('gateway.command', { type: command.type, requestId: command.requestId, accepted })
    this.reply(socket, { type: 'command_result', command: command.type, requestId: command.requestId, accepted })
  }

  private reply(socket: WebSocket, payload: Record<string, unknown>): void {
    if (socket.readyState === WebSocket.OPEN) socket.send(JSON.stringify(payload))
  }
}
