import { errorMessage } from '../core/json.js'
import type { JsonObject, Logger } from '../core/types.js'
import type { Tool, ToolExecutor, ToolResult, ToolSpecification } from './types.js'

interface RegisteredTool {
  id: string
  name: string
  description: string
  parameters: JsonObject
  enabled: boolean
  run(parameters: JsonObject, signal?: AbortSignal): Promise<ToolResult>
}

/**
 * Explicitly constructed tool catalog. Read-only while requests run; only
 * `register`, `unregister` and `setEnabled` change it.
 */
export class ToolRegistry implements ToolExecutor {
  private readonly tools = new Map<string, RegisteredTool>()

  constructor(private readonly logger: Logger) {}

  register<Input>(tool: Tool<Input>): void {
    if (this.tools.has(tool.id)) {
      throw new Error(`Tool already registered: ${tool.id}`)
    }
    this.tools.set(tool.id, {
      id: tool.id,
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
      enabled: true,
      async run(parameters, signal) {
        const parsed = tool.inputSchema.safeParse(parameters)
        if (!parsed.success) {
          const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          return { ok: false, error: `Invalid parameters for ${tool.id}: ${issues.join('; ')}` }
        }
        return tool.execute(parsed.data, signal)
      }
    })
  }

  unregister(toolId: string): boolean {
    return this.tools.delete(toolId)
  }

  setEnabled(toolId: string, enabled: boolean): boolean {
    const tool = this.tools.get(toolId)
    if (!tool) return false
    tool.enabled = enabled
    return true
  }

  has(toolId: string): boolean {
    return this.tools.has(toolId)
  }

  list(): Array<{ id: string; name: string; description: string; enabled: boolean }> {
    return [...this.tools.values()].map(({ id, name, description, enabled }) => ({ id, name, description, enabled }))
  }

  /** Definitions to advertise to a provider; `enabledIds` narrows the set further. */
  specifications(enabledIds?: readonly string[]): ToolSpecification[] {
    return [...this.tools.values()]
      .filter((tool) => tool.enabled && (enabledIds === undefined || enabledIds.includes(tool.id)))
      .map((tool) => ({ name: tool.id, description: tool.description, parameters: tool.parameters }))
  }

  async execute(toolId: string, parameters: JsonObject, signal?: AbortSignal): Promise<ToolResult> {
    const tool = this.tools.get(toolId)
    if (!tool) return { ok: false, error: `Tool not found: ${toolId}` }
    if (!tool.enabled) return { ok: false, error: `Tool is disabled: ${toolId}` }

    try {
      const result = await tool.run(parameters, signal)
      this.logger.info('tool.executed', { toolId, ok: result.ok })
      return result
    } catch (error) {
      this.logger.error('tool.failed', { toolId, error: errorMessage(error) })
      return { ok: false, error: `Tool ${toolId} failed: ${errorMessage(error)}` }
    }
  }
}
