import type { Message } from '../conversation/types.js'
import { ProviderHttpError } from '../core/errors.js'
import type { JsonObject } from '../core/types.js'
import { readStreamLines } from '../stream/line-source.js'
import type { ProviderProfile } from './profiles.js'
import type { ProviderCall } from './provider-call.js'

export interface HttpProviderOptions {
  profile: ProviderProfile
  model: string
  url: string
  headers?: Record<string, string>
  /** Provider-specific request body for the current message list. */
  buildBody: (messages: readonly Message[], model: string) => JsonObject
  fetchImpl?: typeof fetch
}

/** Streams a provider response over `fetch`. */
export function createHttpProviderCall(options: HttpProviderOptions): ProviderCall {
  const fetchImpl = options.fetchImpl ?? fetch

  return {
    profile: options.profile,
    model: options.model,
    async open(messages, signal) {
      const response = await fetchImpl(options.url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          accept: 'text/event-stream',
          ...(options.headers ?? {})
        },
        body: JSON.stringify(options.buildBody(messages, options.model)),
        signal
      })

      if (!response.ok) {
        const body = await response.text().catch(() => '')
        throw new ProviderHttpError(response.status, body)
      }
      if (!response.body) {
        throw new Error(`Empty response body from ${options.profile.name}`)
      }
      return readStreamLines(response.body)
    }
  }
}
