import { z } from 'zod'

import type { JsonObject, JsonValue } from '../core/types.js'

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
)

const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema)

const toolResultSchema = z.union([
  z.object({ ok: z.literal(true), output: z.string(), details: jsonObjectSchema.optional() }),
  z.object({ ok: z.literal(false), error: z.string() })
])

export const messageSchema = z.object({
  id: z.string().min(1),
  role: z.enum(['system', 'user', 'assistant', 'tool_call', 'tool_response']),
  text: z.string(),
  attachments: z
    .array(
      z.object({
        fileName: z.string(),
        mimeType: z.string(),
        localPath: z.string().optional(),
        remoteId: z.string().optional()
      })
    )
    .default([]),
  createdAt: z.string(),
  model: z.string().optional(),
  toolCall: z
    .object({
      toolId: z.string(),
      callId: z.string(),
      parameters: jsonObjectSchema,
      result: toolResultSchema.optional()
    })
    .optional(),
  toolResponseCallId: z.string().optional(),
  thoughts: z.string().optional(),
  thinkingDurationSeconds: z.number().nonnegative().optional(),
  thoughtsStatus: z.enum(['none', 'present', 'unavailable']).optional()
})

const nodeSchema = z
  .object({
    id: z.string().min(1),
    variants: z.array(z.object({ message: messageSchema, childNodeId: z.string().nullable() })).min(1),
    activeVariantIndex: z.number().int().nonnegative()
  })
  .refine((node) => node.activeVariantIndex < node.variants.length, {
    message: 'activeVariantIndex is out of range'
  })

const metaShape = {
  id: z.string().min(1),
  title: z.string().default(''),
  systemPrompt: z.string().default(''),
  groupId: z.string().nullable().default(null)
}

export const conversationSchema = z.object({
  ...metaShape,
  rootNodeId: z.string().nullable(),
  nodes: z.record(nodeSchema)
})

export const legacyConversationSchema = z.object({
  ...metaShape,
  messages: z.array(messageSchema)
})
