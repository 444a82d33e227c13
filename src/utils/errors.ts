/**
 * Errors that carry their own HTTP status. Controllers forward them with
 * `next(err)` and the terminal handler in app.ts turns them into
 * `{ message, details? }` responses.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class BadRequestError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Could not validate credentials") {
    super(401, message);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, message);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, message);
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string) {
    super(413, message);
  }
}

export class UnsupportedMediaTypeError extends AppError {
  constructor(message: string) {
    super(415, message);
  }
}

export class TooManyRequestsError extends AppError {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message = "Too many requests") {
    super(429, message);
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class UpstreamError extends AppError {
  constructor(message: string, details?: unknown) {
    super(502, message, details);
  }
}

/* ---------- document pipeline ---------- */

export class DocumentProcessingError extends Error {
  /** Prefix used when the failure is stored on the document record. */
  readonly label: string = "Processing error";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidFileError extends DocumentProcessingError {
  override readonly label = "Invalid file";
}

export class FileSizeError extends DocumentProcessingError {
  override readonly label = "File size error";
}

export class UnsupportedFileTypeError extends DocumentProcessingError {
  override readonly label = "Unsupported file";
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

/** Status code carried by an SDK error (`status`, `statusCode` or `response.status`). */
export function getHttpStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  if (
    "response" in error &&
    typeof error.response === "object" &&
    error.response !== null &&
    "status" in error.response &&
    typeof error.response.status === "number"
  ) {
    return error.response.status;
  }
  return undefined;
}

/** Message stored on a failed document: "<label>: <message>". */
export function describeProcessingFailure(error: unknown): string {
  if (error instanceof DocumentProcessingError) {
    return `${error.label}: ${error.message}`;
  }
  return `Processing error: ${getErrorMessage(error)}`;
}
