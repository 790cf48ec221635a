/**
 * Error taxonomy for the report service.
 * Every error carries the HTTP status it maps to at the request boundary
 * and a stable machine-readable code.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode = 500, code = "INTERNAL_ERROR", options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class InputValidationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 400, "INPUT_VALIDATION", options);
  }
}

export class LocatorFormatError extends InputValidationError {
  constructor(readonly locator: string, reason: string) {
    super(`Invalid locator "${locator}": ${reason}`);
  }
}

export class LocatorNotFoundError extends AppError {
  constructor(readonly locator: string, options?: { cause?: unknown }) {
    super(`Object not found: ${locator}`, 404, "LOCATOR_NOT_FOUND", options);
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 401, "AUTHENTICATION", options);
  }
}

export class UpstreamServiceError extends AppError {
  constructor(message: string, code = "UPSTREAM_SERVICE", options?: { cause?: unknown }) {
    super(message, 502, code, options);
  }
}

export class TranscriptionServiceError extends UpstreamServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Transcription failed: ${message}`, "TRANSCRIPTION_SERVICE", options);
  }
}

export class SummarizationServiceError extends UpstreamServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Summarization failed: ${message}`, "SUMMARIZATION_SERVICE", options);
  }
}

export class ReviewServiceError extends UpstreamServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Transcript review failed: ${message}`, "REVIEW_SERVICE", options);
  }
}

export class TemplateNotFoundError extends AppError {
  constructor(readonly templatePath: string, options?: { cause?: unknown }) {
    super(`Template not found: ${templatePath}`, 422, "TEMPLATE_NOT_FOUND", options);
  }
}

export class TemplateFormatError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 422, "TEMPLATE_FORMAT", options);
  }
}

export class AudioSplitError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Audio splitting failed: ${message}`, 500, "AUDIO_SPLIT", options);
  }
}

export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 503, "STORAGE", options);
  }
}

export class OperationCancelledError extends AppError {
  constructor(message = "Operation was cancelled", options?: { cause?: unknown }) {
    super(message, 499, "CANCELLED", options);
  }
}

export class ConfigurationError extends AppError {
  constructor(readonly missing: string[], message?: string) {
    super(message ?? `Missing or invalid configuration: ${missing.join(", ")}`, 500, "CONFIGURATION");
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Throws OperationCancelledError when the signal has been aborted.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(
      signal.reason instanceof Error ? signal.reason.message : "Operation was cancelled"
    );
  }
}
