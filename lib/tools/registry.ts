import { errorMessage, isFatalError } from '@/lib/errors';
import type { Tool, ToolContext, ToolDefinition } from './types';

interface RegisteredTool {
  definition: ToolDefinition;
  run(rawInput: unknown, context: ToolContext): Promise<string>;
}

/**
 * Name-keyed tool lookup used by the response generator.
 *
 * Adding a tool never touches the generation loop: register it here and the
 * model sees its definition on the next query.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<TInput>(tool: Tool<TInput>): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`);
    }

    this.tools.set(tool.name, {
      definition: {
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      },
      run: async (rawInput, context) => {
        const parsed = tool.inputSchema.safeParse(rawInput);
        if (!parsed.success) {
          const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`)
            .join('; ');
          return `Invalid arguments for tool '${tool.name}': ${issues}`;
        }
        return tool.execute(parsed.data, context);
      },
    });
    return this;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  definitions(): ToolDefinition[] {
    return Array.from(this.tools.values(), (t) => t.definition);
  }

  /**
   * Execute a tool by name.
   *
   * Unknown tools, invalid arguments and recoverable failures come back as
   * text for the model. Store and transport failures are rethrown.
   */
  async execute(name: string, rawInput: unknown, context: ToolContext): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      console.warn(`[Tools] Model requested unknown tool '${name}'`);
      return `Tool '${name}' not found`;
    }

    try {
      return await tool.run(rawInput, context);
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      console.error(`[Tools] Tool '${name}' failed:`, errorMessage(error));
      return `Tool '${name}' failed: ${errorMessage(error)}`;
    }
  }
}
