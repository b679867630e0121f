/** Non-2xx answer from a provider endpoint before any stream was read. */
export class ProviderHttpError extends Error {
  readonly status: number
  readonly body: string

  constructor(status: number, body: string) {
    super(`Provider responded with HTTP ${status}${body ? `: ${body.slice(0, 200)}` : ''}`)
    this.name = 'ProviderHttpError'
    this.status = status
    this.body = body
  }
}

export class DuplicateRequestError extends Error {
  constructor(requestId: string) {
    super(`Request ${requestId} is already in flight`)
    this.name = 'DuplicateRequestError'
  }
}

export class InvalidTransitionError extends Error {
  constructor(requestId: string, from: string, to: string) {
    super(`Request ${requestId} cannot move from ${from} to ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

/** Raised when history is edited while a turn for the same chat is streaming. */
export class ChatBusyError extends Error {
  readonly chatId: string

  constructor(chatId: string) {
    super(`Chat ${chatId} has a request in flight`)
    this.name = 'ChatBusyError'
    this.chatId = chatId
  }
}
