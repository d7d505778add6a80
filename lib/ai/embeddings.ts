import { DEFAULT_EMBEDDING_MODEL } from '@/lib/config';
import { EmbeddingError, errorMessage } from '@/lib/errors';
import { EmbeddingResponseSchema, type EmbedFn, type EmbeddingResponse } from './types';

/**
 * OpenRouter embeddings endpoint URL.
 */
const OPENROUTER_EMBEDDINGS_URL = 'https://openrouter.ai/api/v1/embeddings';

export interface EmbeddingOptions {
  /** Defaults to the OPENROUTER_API_KEY env var */
  apiKey?: string;
  /** Defaults to openai/text-embedding-3-small (1536 dimensions) */
  model?: string;
}

async function requestEmbeddings(
  input: string,
  options: EmbeddingOptions
): Promise<EmbeddingResponse> {
  const key = options.apiKey ?? process.env.OPENROUTER_API_KEY;

  if (!key) {
    throw new EmbeddingError('No API key provided for embeddings', 'MISSING_API_KEY');
  }

  let response: Response;
  try {
    response = await fetch(OPENROUTER_EMBEDDINGS_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${key}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: options.model ?? DEFAULT_EMBEDDING_MODEL,
        input,
      }),
    });
  } catch (error) {
    console.error('[Embeddings] Request failed:', errorMessage(error));
    throw new EmbeddingError(`Embedding request failed: ${errorMessage(error)}`, 'EMBEDDING_FAILED', {
      cause: error,
    });
  }

  if (!response.ok) {
    throw new EmbeddingError(`Embedding failed: ${response.statusText}`);
  }

  let body: unknown;
  try {
    body = await response.json();
  } catch (error) {
    throw new EmbeddingError('Embedding response was not valid JSON', 'EMBEDDING_FAILED', {
      cause: error,
    });
  }

  const parsed = EmbeddingResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new EmbeddingError('Embedding response was malformed', 'EMBEDDING_FAILED', {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Generate an embedding vector for the given text using OpenRouter.
 *
 * @throws EmbeddingError if the API call fails or no API key is available
 */
export async function embed(text: string, options: EmbeddingOptions = {}): Promise<number[]> {
  const data = await requestEmbeddings(text, options);
  const first = data.data[0];

  if (!first) {
    throw new EmbeddingError('Embedding response contained no vectors');
  }
  return first.embedding;
}

/**
 * Bind options once and hand the vector store a plain text → vector function.
 */
export function createEmbedder(options: EmbeddingOptions = {}): EmbedFn {
  return (text) => embed(text, options);
}
