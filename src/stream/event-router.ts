import { z } from 'zod'

import { isJsonObject, parseJsonObject } from '../core/json.js'
import type { JsonObject, JsonValue } from '../core/types.js'

/** Provider-agnostic classification of one wire payload. */
export type RoutedEvent =
  | { kind: 'text'; text: string }
  | { kind: 'thinking_start' }
  | { kind: 'thinking'; text: string }
  | { kind: 'thinking_end' }
  | { kind: 'tool_call'; toolId: string; callId: string | null; parameters: JsonObject }
  | { kind: 'tool_call_start'; toolId: string; callId: string | null; argumentsFragment: string }
  | { kind: 'tool_call_delta'; fragment: string }
  | { kind: 'stream_end' }
  | { kind: 'error'; message: string }
  | { kind: 'unrecognized' }

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

const matchSchema = {
  /** Must equal the event type when set. */
  eventName: z.string().min(1).optional(),
  /** Dotted payload path that must equal a scalar. */
  when: z.object({ path: z.string().min(1), equals: scalarSchema }).optional()
}

const textRuleSchema = z.object({
  ...matchSchema,
  kind: z.enum(['text', 'thinking', 'tool_call_delta', 'error']),
  fieldPath: z.string().min(1)
})

const signalRuleSchema = z.object({
  ...matchSchema,
  kind: z.enum(['thinking_start', 'thinking_end', 'stream_end']),
  fieldPath: z.string().min(1).optional()
})

const toolRuleSchema = z.object({
  ...matchSchema,
  kind: z.enum(['tool_call', 'tool_call_start']),
  namePath: z.string().min(1),
  idPath: z.string().min(1).optional(),
  argumentsPath: z.string().min(1).optional()
})

export const routeRuleSchema = z.discriminatedUnion('kind', [textRuleSchema, signalRuleSchema, toolRuleSchema])

export type RouteRule = z.infer<typeof routeRuleSchema>
type ToolRule = z.infer<typeof toolRuleSchema>

const UNRECOGNIZED: RoutedEvent = { kind: 'unrecognized' }

/**
 * Walks a dotted path through objects and arrays (`choices.0.delta.content`).
 * Returns `undefined` when any segment is missing.
 */
export function extractByPath(payload: JsonObject, path: string): JsonValue | undefined {
  let current: JsonValue | undefined = payload
  for (const part of path.split('.')) {
    if (Array.isArray(current)) {
      const index = Number(part)
      if (!Number.isInteger(index)) return undefined
      current = current[index]
    } else if (isJsonObject(current)) {
      current = current[part]
    } else {
      return undefined
    }
    if (current === undefined) return undefined
  }
  return current
}

/** Scalars as text, objects and arrays as JSON; `null` when absent or null. */
export function extractText(payload: JsonObject, path: string): string | null {
  const value = extractByPath(payload, path)
  if (value === undefined || value === null) return null
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}

function toParameters(value: JsonValue | undefined): JsonObject {
  if (isJsonObject(value)) return value
  if (typeof value === 'string' && value.trim() !== '') {
    try {
      return parseJsonObject(value)
    } catch {
      return {}
    }
  }
  return {}
}

function matches(rule: RouteRule, eventType: string | null, payload: JsonObject): boolean {
  if (rule.eventName !== undefined && rule.eventName !== eventType) return false
  if (rule.when !== undefined && extractByPath(payload, rule.when.path) !== rule.when.equals) return false
  return true
}

function routeTool(rule: ToolRule, payload: JsonObject): RoutedEvent | null {
  const toolId = extractText(payload, rule.namePath)
  if (!toolId) return null
  const callId = rule.idPath ? extractText(payload, rule.idPath) || null : null

  if (rule.kind === 'tool_call') {
    const args = rule.argumentsPath ? extractByPath(payload, rule.argumentsPath) : undefined
    return { kind: 'tool_call', toolId, callId, parameters: toParameters(args) }
  }
  const fragment = rule.argumentsPath ? extractText(payload, rule.argumentsPath) ?? '' : ''
  return { kind: 'tool_call_start', toolId, callId, argumentsFragment: fragment }
}

function route(rule: RouteRule, payload: JsonObject): RoutedEvent | null {
  switch (rule.kind) {
    case 'text':
    case 'thinking':
    case 'tool_call_delta':
    case 'error': {
      const value = extractText(payload, rule.fieldPath)
      if (!value) return null
      if (rule.kind === 'tool_call_delta') return { kind: 'tool_call_delta', fragment: value }
      if (rule.kind === 'error') return { kind: 'error', message: value }
      return { kind: rule.kind, text: value }
    }
    case 'thinking_start':
    case 'thinking_end':
    case 'stream_end':
      if (rule.fieldPath !== undefined && extractByPath(payload, rule.fieldPath) === undefined) return null
      return { kind: rule.kind }
    case 'tool_call':
    case 'tool_call_start':
      return routeTool(rule, payload)
  }
}

/**
 * Classifies a parsed payload against ordered rules; the first rule that
 * matches and yields a value wins. Pure: all stateful reactions (buffers,
 * timers, tool assembly) belong to the orchestrator.
 */
export function classify(eventType: string | null, payload: JsonObject, rules: readonly RouteRule[]): RoutedEvent {
  for (const rule of rules) {
    if (!matches(rule, eventType, payload)) continue
    const routed = route(rule, payload)
    if (routed) return routed
  }
  return UNRECOGNIZED
}
