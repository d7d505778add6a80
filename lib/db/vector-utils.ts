/**
 * Helpers for embedding vectors on both sides of the pgvector boundary.
 */

/**
 * Validate and format an embedding array as a PostgreSQL vector literal.
 *
 * Every value must be a finite number, so the literal can never carry
 * anything but digits, signs, exponents and commas.
 *
 * @returns PostgreSQL vector literal string (e.g., "[0.1,0.2,0.3]")
 * @throws Error if embedding is not a valid numeric array
 */
export function formatVectorLiteral(embedding: readonly number[]): string {
  if (!Array.isArray(embedding)) {
    throw new Error('Embedding must be an array');
  }
  if (embedding.length === 0) {
    throw new Error('Embedding array cannot be empty');
  }
  embedding.forEach((value: unknown, index) => {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new Error(`Invalid embedding value at index ${index}: must be a finite number`);
    }
  });
  return `[${embedding.join(',')}]`;
}

/**
 * Cosine similarity in [-1, 1]. A zero vector is similar to nothing (0).
 *
 * @throws Error when the vectors have different dimensions
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
