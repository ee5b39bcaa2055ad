// Error types shared by the clustering core and its collaborators

/**
 * Malformed input to a pure operation (empty or mismatched vectors, bad
 * signal records). Fatal to the single call; never retried.
 */
export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/**
 * An embedding provider could not produce a vector for a text.
 */
export class EmbeddingFailureError extends Error {
  public readonly textLength: number;

  constructor(message: string, options: { cause?: unknown; textLength?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'EmbeddingFailureError';
    this.textLength = options.textLength ?? 0;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
