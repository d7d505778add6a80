import { z } from 'zod';

import { ConfigError } from './errors';

/**
 * Treat unset and empty environment variables the same way.
 */
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional()
);

function numberWithDefault(defaultValue: number) {
  return z.preprocess(
    (value) => (value === undefined || value === '' ? defaultValue : value),
    z.coerce.number()
  );
}

const ConfigSchema = z.object({
  OPENROUTER_API_KEY: optionalString,
  DATABASE_URL: optionalString,
  CHAT_MODEL: optionalString,
  EMBEDDING_MODEL: optionalString,
  /**
   * Number of chunks a single search returns. Tunable: larger values give
   * the model more evidence at the cost of prompt size.
   */
  SEARCH_TOP_K: numberWithDefault(5).pipe(z.number().int().min(1).max(50)),
  /**
   * Minimum cosine similarity between a course reference and a catalog title
   * before the reference is treated as that course. Tunable per embedding model.
   */
  COURSE_MATCH_THRESHOLD: numberWithDefault(0.5).pipe(z.number().min(0).max(1)),
  MAX_HISTORY_TURNS: numberWithDefault(2).pipe(z.number().int().min(0)),
  MAX_TOOL_ROUNDS: numberWithDefault(1).pipe(z.number().int().min(0).max(10)),
  MAX_OUTPUT_TOKENS: numberWithDefault(800).pipe(z.number().int().positive()),
  TEMPERATURE: numberWithDefault(0).pipe(z.number().min(0).max(2)),
});

export const DEFAULT_CHAT_MODEL = 'anthropic/claude-sonnet-4';
export const DEFAULT_EMBEDDING_MODEL = 'openai/text-embedding-3-small';

export interface AssistantConfig {
  apiKey?: string;
  databaseUrl?: string;
  chatModel: string;
  embeddingModel: string;
  searchTopK: number;
  courseMatchThreshold: number;
  maxHistoryTurns: number;
  maxToolRounds: number;
  maxOutputTokens: number;
  temperature: number;
}

/**
 * Read assistant settings from the environment.
 *
 * @throws ConfigError listing every invalid key
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AssistantConfig {
  const parsed = ConfigSchema.safeParse(env);

  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError(`Invalid configuration: ${keys.join(', ')}`, keys);
  }

  const values = parsed.data;

  return {
    apiKey: values.OPENROUTER_API_KEY,
    databaseUrl: values.DATABASE_URL,
    chatModel: values.CHAT_MODEL ?? DEFAULT_CHAT_MODEL,
    embeddingModel: values.EMBEDDING_MODEL ?? DEFAULT_EMBEDDING_MODEL,
    searchTopK: values.SEARCH_TOP_K,
    courseMatchThreshold: values.COURSE_MATCH_THRESHOLD,
    maxHistoryTurns: values.MAX_HISTORY_TURNS,
    maxToolRounds: values.MAX_TOOL_ROUNDS,
    maxOutputTokens: values.MAX_OUTPUT_TOKENS,
    temperature: values.TEMPERATURE,
  };
}
