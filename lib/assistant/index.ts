/**
 * Assistant wiring.
 *
 * createCourseAssistant builds the production graph: OpenRouter chat and
 * embeddings, the pgvector store, both course tools and in-memory sessions.
 */

import { createEmbedder } from '@/lib/ai/embeddings';
import { OpenRouterLLMClient } from '@/lib/ai/openrouter-client';
import { ResponseGenerator } from '@/lib/ai/response-generator';
import type { AssistantConfig } from '@/lib/config';
import { createDb } from '@/lib/db';
import { ConfigError } from '@/lib/errors';
import { PgVectorStore } from '@/lib/search/pg-vector-store';
import type { VectorStore } from '@/lib/search/types';
import { SessionManager } from '@/lib/sessions/session-manager';
import type { SessionStore } from '@/lib/sessions/session-store';
import { CourseOutlineTool } from '@/lib/tools/course-outline';
import { CourseSearchTool } from '@/lib/tools/course-search';
import { ToolRegistry } from '@/lib/tools/registry';
import { CourseAssistant } from './course-assistant';

export { CourseAssistant } from './course-assistant';
export type { CourseAssistantDeps } from './course-assistant';

/**
 * Both course tools, bound to one store.
 */
export function createToolRegistry(store: VectorStore, searchTopK: number): ToolRegistry {
  return new ToolRegistry()
    .register(new CourseSearchTool(store, searchTopK))
    .register(new CourseOutlineTool(store));
}

export interface CreateAssistantOverrides {
  store?: VectorStore;
  sessionStore?: SessionStore;
}

/**
 * @throws ConfigError when the API key or database URL is missing
 */
export function createCourseAssistant(
  config: AssistantConfig,
  overrides: CreateAssistantOverrides = {}
): CourseAssistant {
  const { apiKey, databaseUrl } = config;
  if (!apiKey) {
    throw new ConfigError('Missing configuration: OPENROUTER_API_KEY', ['OPENROUTER_API_KEY']);
  }

  let store = overrides.store;
  if (!store) {
    if (!databaseUrl) {
      throw new ConfigError('Missing configuration: DATABASE_URL', ['DATABASE_URL']);
    }
    store = new PgVectorStore({
      db: createDb(databaseUrl),
      embed: createEmbedder({ apiKey, model: config.embeddingModel }),
      courseMatchThreshold: config.courseMatchThreshold,
    });
  }

  const generator = new ResponseGenerator({
    llm: new OpenRouterLLMClient({
      apiKey,
      model: config.chatModel,
      maxOutputTokens: config.maxOutputTokens,
      temperature: config.temperature,
    }),
    tools: createToolRegistry(store, config.searchTopK),
    maxToolRounds: config.maxToolRounds,
  });

  const sessions = new SessionManager({
    maxHistoryTurns: config.maxHistoryTurns,
    store: overrides.sessionStore,
  });

  return new CourseAssistant({ generator, sessions, store });
}
