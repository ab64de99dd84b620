export type PipelineErrorCode =
  | "FETCH_FAILED"
  | "CLASSIFICATION_AMBIGUOUS"
  | "SPLIT_FAILED"
  | "EMBEDDING_FAILED"
  | "UPLOAD_FAILED"
  | "PROVIDER_HTTP_ERROR"
  | "ARTIFACT_ERROR"
  | "CONFIG_ERROR";

export class PipelineError extends Error {
  constructor(
    readonly code: PipelineErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FetchError extends PipelineError {
  constructor(
    readonly url: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super("FETCH_FAILED", message, options);
  }
}

export class ClassificationAmbiguousError extends PipelineError {
  constructor(
    readonly url: string,
    readonly candidates: string[],
  ) {
    super(
      "CLASSIFICATION_AMBIGUOUS",
      `Ambiguous category for ${url}: ${candidates.join(", ")}`,
    );
  }
}

export class SplitError extends PipelineError {
  constructor(
    readonly url: string,
    message: string,
  ) {
    super("SPLIT_FAILED", message);
  }
}

export class EmbeddingError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_FAILED", message, options);
  }
}

export class UploadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("UPLOAD_FAILED", message, options);
  }
}

/** Non-2xx answer from an HTTP API; `status` decides whether a retry makes sense. */
export class ProviderHttpError extends PipelineError {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super("PROVIDER_HTTP_ERROR", message);
  }
}

export class ArtifactError extends PipelineError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("ARTIFACT_ERROR", message, options);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * Transient failures: timeouts, network errors and retryable HTTP statuses.
 * Everything else (bad request, auth, validation) fails on the first attempt.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ProviderHttpError) {
    return isRetryableStatus(error.status);
  }
  if (error instanceof FetchError) {
    return error.status === undefined || isRetryableStatus(error.status);
  }
  if (error instanceof PipelineError) {
    return false;
  }
  return error instanceof Error;
}

export function toFailureReason(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
