import { z } from 'zod'

export const configSchema = z.object({
  dataDir: z.string().min(1),
  providersPath: z.string().min(1).optional(),
  maxToolIterations: z.number().int().positive(),
  openRetry: z.object({
    attempts: z.number().int().min(1),
    backoffMs: z.number().int().nonnegative()
  }),
  gateway: z.object({
    enabled: z.boolean(),
    host: z.string().min(1),
    port: z.number().int().min(0).max(65_535)
  }),
  logMuted: z.boolean()
})

export type ForklineConfig = z.infer<typeof configSchema>
