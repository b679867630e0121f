import type { Message } from '../conversation/types.js'
import type { LineSource } from '../stream/line-source.js'
import type { ProviderProfile } from './profiles.js'

/**
 * One provider endpoint bound to a model. `open` is called for the first
 * request of a turn and again for every continuation after a tool result.
 */
export interface ProviderCall {
  readonly profile: ProviderProfile
  readonly model: string
  open(messages: readonly Message[], signal: AbortSignal): Promise<LineSource>
}
