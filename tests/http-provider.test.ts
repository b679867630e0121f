import { describe, expect, it, vi } from 'vitest'

import { ProviderHttpError } from '../src/core/errors.js'
import { createHttpProviderCall } from '../src/provider/http-provider.js'
import { getProviderProfile, loadProviderProfiles } from '../src/provider/profiles.js'
import { parseStream } from '../src/stream/wire-parser.js'
import { message } from './fixtures.js'

const profile = getProviderProfile(loadProviderProfiles(), 'openai')

function sseResponse(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'text/event-stream' } })
}

describe('createHttpProviderCall', () => {
  it('posts the built body and streams the response as lines', async () => {
    const fetchImpl = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      sseResponse('data: {"type":"response.output_text.delta","delta":"Hi"}\n\ndata: [DONE]\n')
    )
    const call = createHttpProviderCall({
      profile,
      model: 'test-model',
      url: 'https://provider.invalid/v1/responses',
      headers: { authorization: 'Bearer test-secret' },
      buildBody: (messages, model) => ({ model, input: messages.map((m) => m.text), stream: true }),
      fetchImpl
    })

    const source = await call.open([message('u1', 'hello')], new AbortController().signal)
    const seen: Array<string | null> = []
    const outcome = await parseStream(source, profile.dialect, {
      onEvent: (eventType) => {
        seen.push(eventType)
        return { type: 'continue' }
      }
    })

    expect(outcome).toEqual({ type: 'success' })
    expect(seen).toEqual(['response.output_text.delta'])

    const [url, init] = fetchImpl.mock.calls[0]
    expect(url).toBe('https://provider.invalid/v1/responses')
    expect(init?.method).toBe('POST')
    expect(init?.headers).toEqual({
      'content-type': 'application/json',
      accept: 'text/event-stream',
      authorization: 'Bearer test-secret'
    })
    expect(JSON.parse(String(init?.body))).toEqual({ model: 'test-model', input: ['hello'], stream: true })
    expect(init?.signal).toBeInstanceOf(AbortSignal)
  })

  it('raises a typed error for non-2xx responses', async () => {
    const call = createHttpProviderCall({
      profile,
      model: 'test-model',
      url: 'https://provider.invalid/v1/responses',
      buildBody: () => ({}),
      fetchImpl: async () => new Response('{"error":"rate limited"}', { status: 429 })
    })

    const opened = call.open([], new AbortController().signal)
    await expect(opened).rejects.toBeInstanceOf(ProviderHttpError)
    await expect(opened).rejects.toMatchObject({
      status: 429,
      message: 'Provider responded with HTTP 429: {"error":"rate limited"}'
    })
  })
})
