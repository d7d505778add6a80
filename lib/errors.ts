/**
 * Error types shared across the assistant.
 *
 * Fatal errors (store, embedding, LLM transport) abort the current query.
 * Everything else is turned into tool-result text the model can react to.
 */

export class StoreUnavailableError extends Error {
  readonly code = 'STORE_UNAVAILABLE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export type EmbeddingErrorCode = 'EMBEDDING_FAILED' | 'MISSING_API_KEY';

export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code: EmbeddingErrorCode = 'EMBEDDING_FAILED',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EmbeddingError';
  }
}

export class LLMTransportError extends Error {
  readonly code = 'LLM_TRANSPORT';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LLMTransportError';
  }
}

export class QueryFailedError extends Error {
  readonly code = 'QUERY_FAILED';

  constructor(options?: { cause?: unknown }) {
    super('Could not complete the request.', options);
    this.name = 'QueryFailedError';
  }
}

export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG';

  constructor(
    message: string,
    public readonly keys: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Errors that must abort the turn instead of being shown to the model.
 */
export function isFatalError(error: unknown): boolean {
  return (
    error instanceof StoreUnavailableError ||
    error instanceof LLMTransportError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
