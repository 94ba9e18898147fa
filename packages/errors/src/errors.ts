import { AppError } from "./app-error.js";

type ErrorExtras = { details?: Record<string, unknown>; cause?: unknown };

export class UnsupportedFileTypeError extends AppError {
  public readonly extension: string;

  constructor(fileName: string, extension: string, options?: ErrorExtras) {
    super({
      message: `Unsupported file type${extension ? ` '${extension}'` : ""}: ${fileName}`,
      code: "UNSUPPORTED_FILE_TYPE",
      stage: "classify",
      details: options?.details,
      cause: options?.cause,
    });
    this.extension = extension;
  }
}

export class ExtractionError extends AppError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, options?: ErrorExtras) {
    super({
      message,
      code: "EXTRACTION_FAILED",
      stage: "extract",
      details: options?.details,
      cause: options?.cause,
    });
    this.filePath = filePath;
  }
}

export class EmptyContentError extends AppError {
  public readonly filePath: string;

  constructor(filePath: string, options?: ErrorExtras) {
    super({
      message: "Empty text extracted",
      code: "EMPTY_CONTENT",
      stage: "extract",
      details: options?.details,
      cause: options?.cause,
    });
    this.filePath = filePath;
  }
}

export class EmbeddingError extends AppError {
  public readonly provider: string;

  constructor(message: string, provider: string, options?: ErrorExtras) {
    super({
      message,
      code: "EMBEDDING_FAILED",
      stage: "embed",
      details: options?.details,
      cause: options?.cause,
    });
    this.provider = provider;
  }
}

export class FileRoutingError extends AppError {
  public readonly destination: string;

  constructor(message: string, destination: string, options?: ErrorExtras) {
    super({
      message,
      code: "FILE_ROUTING_FAILED",
      stage: "route",
      details: options?.details,
      cause: options?.cause,
    });
    this.destination = destination;
  }
}

/**
 * One-line reason for logs and the run summary. Appends the cause's message
 * when the error wraps a lower-level failure.
 */
export function toFailureReason(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause;
    if (AppError.isAppError(err) && cause instanceof Error && cause.message !== err.message) {
      return `${err.message}: ${cause.message}`;
    }
    return err.message;
  }
  return String(err);
}
