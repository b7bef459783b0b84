// Error taxonomy shared by the crawler, embedder, stores and worker

export type ErrorCode =
  | "FETCH_ERROR"
  | "EMBEDDING_ERROR"
  | "INDEX_ERROR"
  | "NOT_FOUND"
  | "VALIDATION_ERROR"
  | "RETRY_EXHAUSTED"
  | "GENERATION_ERROR";

export class DocsageError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DocsageError";
  }
}

export type FetchErrorKind = "transient" | "permanent";

export class FetchError extends DocsageError {
  constructor(
    message: string,
    public readonly kind: FetchErrorKind,
    public readonly url: string,
    public readonly status: number | null = null,
    public readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, "FETCH_ERROR", options);
    this.name = "FetchError";
  }
}

export type EmbeddingErrorKind = "transient" | "exhausted";

export class EmbeddingError extends DocsageError {
  constructor(
    message: string,
    public readonly kind: EmbeddingErrorKind,
    public readonly retryAfterMs: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, "EMBEDDING_ERROR", options);
    this.name = "EmbeddingError";
  }
}

/** Vector or keyword store unavailable */
export class IndexError extends DocsageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "INDEX_ERROR", options);
    this.name = "IndexError";
  }
}

/** Answer generation backend failed or returned something unusable */
export class GenerationError extends DocsageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "GENERATION_ERROR", options);
    this.name = "GenerationError";
  }
}

export class NotFoundError extends DocsageError {
  constructor(
    public readonly resource: string,
    public readonly id: string
  ) {
    super(`${resource} not found: ${id}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class ValidationError extends DocsageError {
  constructor(
    message: string,
    public readonly field: string | null = null
  ) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class RetryExhaustedError extends DocsageError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown
  ) {
    super(
      `Gave up after ${attempts} attempts: ${errorMessage(lastError)}`,
      "RETRY_EXHAUSTED",
      { cause: lastError }
    );
    this.name = "RetryExhaustedError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}
