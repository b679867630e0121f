import type { z } from 'zod'

import type { JsonObject } from '../core/types.js'

export type ToolResult =
  | { ok: true; output: string; details?: JsonObject }
  | { ok: false; error: string }

/** Boundary the orchestrator calls for every model-initiated tool call. */
export interface ToolExecutor {
  execute(toolId: string, parameters: JsonObject, signal?: AbortSignal): Promise<ToolResult>
}

/** How a tool is advertised to a provider. */
export interface ToolSpecification {
  name: string
  description: string
  parameters: JsonObject
}

export interface Tool<Input = unknown> {
  readonly id: string
  readonly name: string
  readonly description: string
  /** JSON schema advertised to providers. */
  readonly parameters: JsonObject
  /** Validates model-supplied parameters before `execute` runs. */
  readonly inputSchema: z.ZodType<Input>
  execute(input: Input, signal?: AbortSignal): Promise<ToolResult>
}
