import { z } from 'zod'

import type { JsonObject } from '../core/types.js'
import type { Tool, ToolResult } from './types.js'

const inputSchema = z.object({
  timeZone: z.string().min(1).optional()
})

type DateTimeInput = z.infer<typeof inputSchema>

function formatInZone(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23'
  }).formatToParts(date)
  const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find((p) => p.type === type)?.value ?? ''
  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`
}

/** Current date and time, optionally in an IANA time zone. */
export class DateTimeTool implements Tool<DateTimeInput> {
  readonly id = 'get_date_time'
  readonly name = 'Date and time'
  readonly description = 'Returns the current date and time. Pass an IANA timeZone such as "Europe/Berlin"; defaults to UTC.'
  readonly parameters: JsonObject = {
    type: 'object',
    properties: {
      timeZone: { type: 'string', description: 'IANA time zone name' }
    },
    required: []
  }
  readonly inputSchema = inputSchema

  constructor(private readonly now: () => Date = () => new Date()) {}

  async execute(input: DateTimeInput): Promise<ToolResult> {
    const timeZone = input.timeZone ?? 'UTC'
    const date = this.now()
    let formatted: string
    try {
      formatted = formatInZone(date, timeZone)
    } catch (error) {
      if (error instanceof RangeError) return { ok: false, error: `Unknown time zone: ${timeZone}` }
      throw error
    }
    return {
      ok: true,
      output: `${formatted} (${timeZone})`,
      details: { iso: date.toISOString(), timeZone }
    }
  }
}
