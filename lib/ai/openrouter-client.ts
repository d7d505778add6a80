import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import {
  generateText,
  tool,
  type ModelMessage,
  type TextPart,
  type ToolCallPart,
  type ToolSet,
} from 'ai';

import { LLMTransportError, errorMessage } from '@/lib/errors';
import type { ToolDefinition } from '@/lib/tools/types';
import type { CompletionRequest, LLMClient, LLMMessage, LLMReply } from './types';

export interface OpenRouterClientOptions {
  apiKey: string;
  model: string;
  maxOutputTokens: number;
  temperature: number;
}

/**
 * Convert provider-neutral messages into AI SDK model messages.
 */
export function toModelMessages(messages: LLMMessage[]): ModelMessage[] {
  return messages.map((message): ModelMessage => {
    if (message.role === 'user') {
      return { role: 'user', content: message.content };
    }

    if (message.role === 'tool') {
      return {
        role: 'tool',
        content: message.results.map((result) => ({
          type: 'tool-result' as const,
          toolCallId: result.id,
          toolName: result.name,
          output: { type: 'text' as const, value: result.output },
        })),
      };
    }

    if (!message.toolCalls || message.toolCalls.length === 0) {
      return { role: 'assistant', content: message.content };
    }

    const parts: Array<TextPart | ToolCallPart> = [];
    if (message.content) {
      parts.push({ type: 'text', text: message.content });
    }
    for (const call of message.toolCalls) {
      parts.push({
        type: 'tool-call',
        toolCallId: call.id,
        toolName: call.name,
        input: call.input,
      });
    }
    return { role: 'assistant', content: parts };
  });
}

/**
 * Advertise tools without an execute function, so the SDK hands tool calls
 * back to us instead of running them.
 */
export function toToolSet(definitions: ToolDefinition[]): ToolSet {
  const tools: ToolSet = {};
  for (const definition of definitions) {
    tools[definition.name] = tool({
      description: definition.description,
      inputSchema: definition.inputSchema,
    });
  }
  return tools;
}

/**
 * LLM client backed by OpenRouter through the AI SDK.
 *
 * Each call is a single generation step; the tool loop lives in the
 * response generator. Retries are left to the SDK defaults.
 */
export class OpenRouterLLMClient implements LLMClient {
  private readonly openrouter: ReturnType<typeof createOpenRouter>;

  constructor(private readonly options: OpenRouterClientOptions) {
    this.openrouter = createOpenRouter({ apiKey: options.apiKey });
  }

  async complete(request: CompletionRequest): Promise<LLMReply> {
    let result;
    try {
      result = await generateText({
        model: this.openrouter.chat(this.options.model),
        system: request.system,
        messages: toModelMessages(request.messages),
        tools: request.tools.length > 0 ? toToolSet(request.tools) : undefined,
        maxOutputTokens: this.options.maxOutputTokens,
        temperature: this.options.temperature,
      });
    } catch (error) {
      console.error('[OpenRouter] Completion failed:', errorMessage(error));
      throw new LLMTransportError(`LLM request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (result.usage.inputTokens) {
      console.log(
        `[OpenRouter] ${this.options.model}: ${result.usage.inputTokens} prompt tokens, finish=${result.finishReason}`
      );
    }

    if (result.toolCalls.length > 0) {
      return {
        type: 'tool_calls',
        text: result.text,
        calls: result.toolCalls.map((call) => ({
          id: call.toolCallId,
          name: call.toolName,
          input: call.input,
        })),
      };
    }

    return { type: 'answer', text: result.text };
  }
}
