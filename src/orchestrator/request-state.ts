import { InvalidTransitionError } from '../core/errors.js'

export type RequestStatus = 'created' | 'streaming' | 'tool_pending' | 'completed' | 'cancelled' | 'failed'

const TRANSITIONS: Record<RequestStatus, readonly RequestStatus[]> = {
  created: ['streaming', 'completed', 'cancelled', 'failed'],
  streaming: ['tool_pending', 'completed', 'cancelled', 'failed'],
  tool_pending: ['streaming', 'completed', 'cancelled', 'failed'],
  completed: [],
  cancelled: [],
  failed: []
}

export function isTerminal(status: RequestStatus): boolean {
  return TRANSITIONS[status].length === 0
}

export function canTransition(from: RequestStatus, to: RequestStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

export function assertTransition(requestId: string, from: RequestStatus, to: RequestStatus): void {
  if (!canTransition(from, to)) throw new InvalidTransitionError(requestId, from, to)
}
