import { DuplicateRequestError } from '../core/errors.js'
import type { RequestStatus } from './request-state.js'

export interface InFlightRequest {
  requestId: string
  chatId: string
  providerId: string
  model: string
  status: RequestStatus
  startedAt: string
  controller: AbortController
}

export type RequestSnapshot = Omit<InFlightRequest, 'controller'>

/**
 * requestId → in-flight request. Entries are removed on the terminal
 * transition, so removal doubles as the exactly-once completion gate.
 */
export class RequestRegistry {
  private readonly requests = new Map<string, InFlightRequest>()

  add(request: InFlightRequest): void {
    if (this.requests.has(request.requestId)) throw new DuplicateRequestError(request.requestId)
    this.requests.set(request.requestId, request)
  }

  get(requestId: string): InFlightRequest | undefined {
    return this.requests.get(requestId)
  }

  /** Returns `false` when the request was already gone. */
  remove(requestId: string): boolean {
    return this.requests.delete(requestId)
  }

  hasActiveForChat(chatId: string): boolean {
    for (const request of this.requests.values()) {
      if (request.chatId === chatId) return true
    }
    return false
  }

  snapshot(): RequestSnapshot[] {
    return [...this.requests.values()].map(({ controller: _controller, ...rest }) => ({ ...rest }))
  }

  get size(): number {
    return this.requests.size
  }
}
