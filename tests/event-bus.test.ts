import { describe, expect, it, vi } from 'vitest'

import { StreamEventBus } from '../src/orchestrator/event-bus.js'
import type { StreamEvent } from '../src/orchestrator/events.js'

const partial = (text: string, chatId = 'chat-1', requestId = 'r1'): StreamEvent => ({
  type: 'partial_response',
  text,
  chatId,
  requestId
})

describe('StreamEventBus', () => {
  it('delivers events to each subscriber in publish order', async () => {
    const bus = new StreamEventBus({ info: vi.fn(), warn: vi.fn(), error: vi.fn() })
    const first: string[] = []
    const second: string[] = []
    bus.subscribe((event) => {
      if (event.type === 'partial_response') first.push(event.text)
    })
    bus.subscribe(async (event) => {
      await new Promise((resolve) => setTimeout(resolve, 1))
      if (event.type === 'partial_response') second.push(event.text)
    })

    bus.publish(partial('a'))
    bus.publish(partial('b'))
    bus.publish(partial('c'))
    await bus.flush()

    expect(first).toEqual(['a', 'b', 'c'])
    expect(second).toEqual(['a', 'b', 'c'])
  })

  it('does not call listeners synchronously from publish', async () => {
    const bus = new StreamEventBus({ info: vi.fn(), warn: vi.fn(), error: vi.fn() })
    const listener = vi.fn()
    bus.subscribe(listener)

    bus.publish(partial('a'))
    expect(listener).not.toHaveBeenCalled()

    await bus.flush()
    expect(listener).toHaveBeenCalledTimes(1)
  })

  it('isolates a failing listener and logs it', async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const bus = new StreamEventBus(logger)
    const received: string[] = []
    bus.subscribe(() => {
      throw new Error('render failed')
    })
    bus.subscribe((event) => {
      if (event.type === 'partial_response') received.push(event.text)
    })

    bus.publish(partial('a'))
    bus.publish(partial('b'))
    await bus.flush()

    expect(received).toEqual(['a', 'b'])
    expect(logger.error).toHaveBeenCalledTimes(2)
    expect(logger.error).toHaveBeenCalledWith('bus.listener_failed', {
      requestId: 'r1',
      type: 'partial_response',
      error: 'render failed'
    })
  })

  it('filters by chat and request', async () => {
    const bus = new StreamEventBus({ info: vi.fn(), warn: vi.fn(), error: vi.fn() })
    const byChat: string[] = []
    const byRequest: string[] = []
    bus.subscribe(
      (event) => {
        if (event.type === 'partial_response') byChat.push(event.text)
      },
      { chatId: 'chat-2' }
    )
    bus.subscribe(
      (event) => {
        if (event.type === 'partial_response') byRequest.push(event.text)
      },
      { requestId: 'r9' }
    )

    bus.publish(partial('one', 'chat-1', 'r1'))
    bus.publish(partial('two', 'chat-2', 'r2'))
    bus.publish(partial('three', 'chat-2', 'r9'))
    await bus.flush()

    expect(byChat).toEqual(['two', 'three'])
    expect(byRequest).toEqual(['three'])
  })

  it('stops delivering after unsubscribe', async () => {
    const bus = new StreamEventBus({ info: vi.fn(), warn: vi.fn(), error: vi.fn() })
    const listener = vi.fn()
    const unsubscribe = bus.subscribe(listener)

    bus.publish(partial('a'))
    unsubscribe()
    bus.publish(partial('b'))
    await bus.flush()

    expect(listener).not.toHaveBeenCalled()
    expect(bus.subscriberCount).toBe(0)
  })
})
