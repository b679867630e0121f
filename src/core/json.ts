import type { JsonObject, JsonValue } from './types.js'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return value !== null && value !== undefined && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Parses text that must hold a JSON object. Arrays and scalars are rejected
 * the same way malformed JSON is.
 */
export function parseJsonObject(text: string): JsonObject {
  const value: JsonValue = JSON.parse(text)
  if (!isJsonObject(value)) {
    throw new SyntaxError(`Expected a JSON object, got ${Array.isArray(value) ? 'array' : typeof value}`)
  }
  return value
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
