/**
 * Base error for everything the service reports on purpose.
 * `code` is machine-readable and stable; `statusCode` is what the HTTP layer answers with.
 *
 * @example
 * throw new AppError("Something went wrong", "CUSTOM_ERROR", 500, { context: "value" });
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** Parameter out of bounds, overlap >= chunk size, text too short. */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "INVALID_INPUT", 400, details);
    this.name = "InvalidInputError";
  }
}

/** The upstream text source (URL, PDF) yielded no usable text. */
export class ExtractionError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "EXTRACTION_FAILURE", 422, details);
    this.name = "ExtractionError";
  }
}

export class EmbeddingServiceError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "EMBEDDING_SERVICE_UNAVAILABLE", 503, details);
    this.name = "EmbeddingServiceError";
  }
}

export class IndexEmptyError extends AppError {
  constructor() {
    super("Cannot search an index with no vectors", "INDEX_EMPTY", 422);
    this.name = "IndexEmptyError";
  }
}

/** No language model backend is configured or reachable. */
export class ModelUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "MODEL_UNAVAILABLE", 503, details);
    this.name = "ModelUnavailableError";
  }
}

/** The model answered but nothing usable survived parsing. */
export class GenerationEmptyError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "GENERATION_EMPTY", 422, details);
    this.name = "GenerationEmptyError";
  }
}

/**
 * The model call itself failed: transport error, timeout, bad status, malformed body.
 *
 * @param provider - Name of the backend that failed
 */
export class ModelInvocationError extends AppError {
  constructor(provider: string, message: string, details?: Record<string, unknown>) {
    super(`Model invocation failed (${provider}): ${message}`, "MODEL_INVOCATION_ERROR", 502, {
      provider,
      ...details,
    });
    this.name = "ModelInvocationError";
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "PERSISTENCE_FAILURE", 500, details);
    this.name = "PersistenceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Aborts and timeouts surface from fetch as DOMExceptions named "AbortError"/"TimeoutError". */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}
