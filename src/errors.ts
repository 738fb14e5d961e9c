/** The documentation corpus could not be read (missing root, unreadable file, no documents). */
export class CorpusReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorpusReadError";
  }
}

/** The embedding endpoint failed or returned an unusable payload. */
export class EmbeddingServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingServiceError";
  }
}

/** The chat-completion endpoint failed or returned no content. */
export class CompletionServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CompletionServiceError";
  }
}

/** No persisted index exists at the configured location. */
export class IndexNotFoundError extends Error {
  constructor(indexDir: string) {
    super(`No index found at ${indexDir}. Run "npm run build-index" first.`);
    this.name = "IndexNotFoundError";
  }
}

/**
 * The persisted index was built with a different embedding model than the one
 * configured for queries. Query and chunk vectors must share one embedding space.
 */
export class IncompatibleIndexError extends Error {
  constructor(indexModel: string, configuredModel: string) {
    super(
      `Index was built with embedding model "${indexModel}" but "${configuredModel}" is configured. Rebuild the index.`,
    );
    this.name = "IncompatibleIndexError";
  }
}

/** Best-effort human readable message for an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
