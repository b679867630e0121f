import { z } from 'zod'

export const dialectSchema = z.object({
  /** `data-only`: `data: {json}` lines. `event-data`: `event: name` followed by `data: {json}`. */
  format: z.enum(['data-only', 'event-data']).default('data-only'),
  eventTypeField: z.string().min(1).nullable().default(null),
  doneMarker: z.string().min(1).default('[DONE]'),
  skipKeepalives: z.boolean().default(false),
  /** Event names that end an `event-data` stream before their payload is parsed. */
  stopEvents: z.array(z.string()).default([])
})

export type Dialect = z.infer<typeof dialectSchema>

export function defineDialect(input: z.input<typeof dialectSchema> = {}): Dialect {
  return dialectSchema.parse(input)
}
