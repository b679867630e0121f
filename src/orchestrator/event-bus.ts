import { errorMessage } from '../core/json.js'
import type { Logger } from '../core/types.js'
import type { StreamEvent } from './events.js'

export type StreamEventListener = (event: StreamEvent) => void | Promise<void>

export interface SubscriptionFilter {
  chatId?: string
  requestId?: string
}

interface Subscriber {
  listener: StreamEventListener
  filter: SubscriptionFilter
  queue: StreamEvent[]
  draining: Promise<void> | null
}

/**
 * Fan-out of stream events. Every subscriber has its own FIFO queue drained
 * asynchronously, so `publish` never waits on a listener and a slow one only
 * delays itself.
 */
export class StreamEventBus {
  private readonly subscribers = new Set<Subscriber>()

  constructor(private readonly logger: Logger) {}

  /** Returns the unsubscribe function. */
  subscribe(listener: StreamEventListener, filter: SubscriptionFilter = {}): () => void {
    const subscriber: Subscriber = { listener, filter, queue: [], draining: null }
    this.subscribers.add(subscriber)
    return () => {
      subscriber.queue.length = 0
      this.subscribers.delete(subscriber)
    }
  }

  publish(event: StreamEvent): void {
    for (const subscriber of this.subscribers) {
      if (subscriber.filter.chatId !== undefined && subscriber.filter.chatId !== event.chatId) continue
      if (subscriber.filter.requestId !== undefined && subscriber.filter.requestId !== event.requestId) continue
      subscriber.queue.push(event)
      if (!subscriber.draining) {
        subscriber.draining = Promise.resolve().then(() => this.drain(subscriber))
      }
    }
  }

  /** Resolves once every queued event has been delivered. */
  async flush(): Promise<void> {
    while (true) {
      const pending = [...this.subscribers].flatMap((s) => (s.draining ? [s.draining] : []))
      if (pending.length === 0) return
      await Promise.all(pending)
    }
  }

  get subscriberCount(): number {
    return this.subscribers.size
  }

  private async drain(subscriber: Subscriber): Promise<void> {
    while (subscriber.queue.length > 0) {
      const event = subscriber.queue.shift()
      if (!event) break
      try {
        await subscriber.listener(event)
      } catch (error) {
        this.logger.error('bus.listener_failed', {
          requestId: event.requestId,
          type: event.type,
          error: errorMessage(error)
        })
      }
    }
    subscriber.draining = null
  }
}
