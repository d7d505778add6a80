/**
 * Types for the LLM and embedding collaborators.
 *
 * These are provider-neutral; the OpenRouter client translates them to the
 * AI SDK's message format.
 */

import { z } from 'zod';

import type { ToolDefinition } from '@/lib/tools/types';

/**
 * Text → fixed-dimension vector. Deterministic for identical input within a model version.
 */
export type EmbedFn = (text: string) => Promise<number[]>;

/**
 * The model's structured intent to invoke a named tool.
 */
export interface ToolCallRequest {
  id: string;
  name: string;
  /** Raw arguments as produced by the model; validated by the tool registry */
  input: unknown;
}

/**
 * Tool output fed back to the model for the matching request id.
 */
export interface ToolCallResult {
  id: string;
  name: string;
  output: string;
}

export type LLMMessage =
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; results: ToolCallResult[] };

/**
 * What the model did with a completion request.
 */
export type LLMReply =
  | { type: 'answer'; text: string }
  | { type: 'tool_calls'; text: string; calls: ToolCallRequest[] };

export interface CompletionRequest {
  system: string;
  messages: LLMMessage[];
  /** Empty when the model must answer without tools */
  tools: ToolDefinition[];
}

export interface LLMClient {
  /**
   * @throws LLMTransportError when the provider cannot be reached
   */
  complete(request: CompletionRequest): Promise<LLMReply>;
}

/**
 * OpenRouter embedding API response shape. Only the vectors are read.
 */
export const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    })
  ),
  model: z.string().optional(),
});

export type EmbeddingResponse = z.infer<typeof EmbeddingResponseSchema>;
