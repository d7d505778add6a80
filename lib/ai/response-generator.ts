import type { ToolRegistry } from '@/lib/tools/registry';
import type { ToolContext } from '@/lib/tools/types';
import { FALLBACK_ANSWER, SYSTEM_PROMPT, formatUserQuery } from './prompts';
import type { LLMClient, LLMMessage, LLMReply, ToolCallResult } from './types';

/**
 * States of one generation. Recorded in order so a caller (or a test) can see
 * the path a query took.
 */
export type GenerationState =
  | 'INIT'
  | 'AWAITING_LLM'
  | 'DIRECT_ANSWER'
  | 'TOOL_REQUESTED'
  | 'TOOL_EXECUTING'
  | 'AWAITING_LLM_WITH_TOOL_RESULT'
  | 'DONE';

export interface HistoryExchange {
  userMessage: string;
  assistantMessage: string;
}

export interface GenerateOptions {
  query: string;
  history: readonly HistoryExchange[];
  context: ToolContext;
}

export interface GenerationResult {
  text: string;
  toolRounds: number;
  states: GenerationState[];
}

export interface ResponseGeneratorOptions {
  llm: LLMClient;
  tools: ToolRegistry;
  /** Upper bound on tool execution rounds per query */
  maxToolRounds: number;
  systemPrompt?: string;
}

/**
 * Prior exchanges as alternating user/assistant messages, oldest first.
 */
export function historyToMessages(history: readonly HistoryExchange[]): LLMMessage[] {
  return history.flatMap((turn): LLMMessage[] => [
    { role: 'user', content: turn.userMessage },
    { role: 'assistant', content: turn.assistantMessage },
  ]);
}

/**
 * Drives the tool-calling loop for a single query.
 *
 * The model is offered tools while rounds remain. Once the last round has run,
 * the follow-up request carries no tools, so the model has to answer from what
 * it already has. Fatal errors from the LLM client or the tools propagate.
 */
export class ResponseGenerator {
  private readonly systemPrompt: string;

  constructor(private readonly options: ResponseGeneratorOptions) {
    this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
  }

  async generateResponse({ query, history, context }: GenerateOptions): Promise<GenerationResult> {
    const { llm, tools, maxToolRounds } = this.options;
    const states: GenerationState[] = ['INIT'];
    const messages: LLMMessage[] = [
      ...historyToMessages(history),
      { role: 'user', content: formatUserQuery(query) },
    ];

    let toolRounds = 0;
    let lastText = '';

    states.push('AWAITING_LLM');
    let reply: LLMReply = await llm.complete({
      system: this.systemPrompt,
      messages,
      tools: maxToolRounds > 0 ? tools.definitions() : [],
    });

    while (reply.type === 'tool_calls') {
      if (reply.text.trim()) {
        lastText = reply.text;
      }

      if (toolRounds >= maxToolRounds) {
        console.warn(
          `[ResponseGenerator] Model requested tools after ${toolRounds} round(s); stopping`
        );
        states.push('DONE');
        return { text: lastText || FALLBACK_ANSWER, toolRounds, states };
      }

      states.push('TOOL_REQUESTED', 'TOOL_EXECUTING');
      toolRounds++;

      // Calls within a round run in order so sources keep a stable ordering
      const results: ToolCallResult[] = [];
      for (const call of reply.calls) {
        const output = await tools.execute(call.name, call.input, context);
        results.push({ id: call.id, name: call.name, output });
      }

      messages.push(
        { role: 'assistant', content: reply.text, toolCalls: reply.calls },
        { role: 'tool', results }
      );

      states.push('AWAITING_LLM_WITH_TOOL_RESULT');
      reply = await llm.complete({
        system: this.systemPrompt,
        messages,
        tools: toolRounds < maxToolRounds ? tools.definitions() : [],
      });
    }

    if (toolRounds === 0) {
      states.push('DIRECT_ANSWER');
    }
    states.push('DONE');

    const text = reply.text.trim() ? reply.text : lastText || FALLBACK_ANSWER;
    return { text, toolRounds, states };
  }
}
