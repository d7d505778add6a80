import type { z } from 'zod';

import type { SourceCollector } from '@/lib/sources/source-collector';

/**
 * Per-query state a tool may write to. A fresh context is built for every
 * query, so concurrent queries never see each other's sources.
 */
export interface ToolContext {
  sources: SourceCollector;
}

/**
 * What the model sees when tools are advertised.
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: z.ZodType<unknown, z.ZodTypeDef, unknown>;
}

export interface Tool<TInput> {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  /**
   * Run the tool with validated input. Conditions the model can recover from
   * are returned as text; fatal errors are thrown.
   */
  execute(input: TInput, context: ToolContext): Promise<string>;
}
