/**
 * AI module exports.
 *
 * This module provides:
 * - embed/createEmbedder: OpenRouter embedding functions
 * - OpenRouterLLMClient: single-step chat completions with tool calls
 * - ResponseGenerator: the bounded tool-calling loop
 * - SYSTEM_PROMPT: Default system prompt for the assistant
 */

export { embed, createEmbedder } from './embeddings';
export { OpenRouterLLMClient, toModelMessages, toToolSet } from './openrouter-client';
export { ResponseGenerator, historyToMessages } from './response-generator';
export { SYSTEM_PROMPT, FALLBACK_ANSWER, formatUserQuery } from './prompts';
export type {
  GenerationResult,
  GenerationState,
  HistoryExchange,
} from './response-generator';
export type {
  EmbedFn,
  LLMClient,
  LLMMessage,
  LLMReply,
  CompletionRequest,
  ToolCallRequest,
  ToolCallResult,
} from './types';
