export type ErrorCode =
  | "validation"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "upstream";

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly httpStatus: 400 | 401 | 403 | 404 | 502;
}

export class ValidationError extends AppError {
  readonly code = "validation";
  readonly httpStatus = 400;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AuthenticationError extends AppError {
  readonly code = "unauthorized";
  readonly httpStatus = 401;

  constructor(message = "Missing or invalid authentication token") {
    super(message);
    this.name = "AuthenticationError";
  }
}

export class AuthorizationError extends AppError {
  readonly code = "forbidden";
  readonly httpStatus = 403;

  constructor(message: string) {
    super(message);
    this.name = "AuthorizationError";
  }
}

export class NotFoundError extends AppError {
  readonly code = "not_found";
  readonly httpStatus = 404;
  readonly id: string;

  constructor(kind: string, id: string) {
    super(`${kind} not found: ${id}`);
    this.name = "NotFoundError";
    this.id = id;
  }
}

/** A store or notification channel call failed. */
export class UpstreamError extends AppError {
  readonly code = "upstream";
  readonly httpStatus = 502;
  readonly service: string;

  constructor(service: string, message: string, options?: { cause?: unknown }) {
    super(`${service}: ${message}`, options);
    this.name = "UpstreamError";
    this.service = service;
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

const GENERIC_MESSAGE = "An internal error occurred. Please try again.";

/** Error text that is safe to return to an API client. */
export function sanitizeError(err: unknown): string {
  if (isAppError(err)) {
    return err.message;
  }
  if (!(err instanceof Error)) {
    return GENERIC_MESSAGE;
  }
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string" && code.startsWith("SQLITE_")) {
    return GENERIC_MESSAGE;
  }
  return err.message;
}
