/**
 * Error taxonomy shared by the service and its HTTP surface.
 * Every error carries a stable machine-readable code and the HTTP status it maps to.
 */

export interface FieldIssue {
  readonly field: string;
  readonly message: string;
}

/**
 * Base application error class
 */
export class AppError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code = 'APP_ERROR', status = 500, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.status = status;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed or out-of-range input. Raised before the store is touched.
 */
export class ValidationError extends AppError {
  readonly details: readonly FieldIssue[];

  constructor(message: string, details: readonly FieldIssue[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
    this.details = details;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404);
  }
}

export class MethodNotAllowedError extends AppError {
  readonly allowed: readonly string[];

  constructor(method: string, allowed: readonly string[]) {
    super(`Method ${method} is not allowed here`, 'METHOD_NOT_ALLOWED', 405);
    this.allowed = allowed;
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(limitBytes: number) {
    super(`Request body exceeds ${limitBytes} bytes`, 'PAYLOAD_TOO_LARGE', 413);
  }
}

export class RateLimitedError extends AppError {
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number) {
    super('Rate limit exceeded. Please try again later.', 'RATE_LIMITED', 429);
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Cache or rate-limiter backend unreachable. Callers degrade instead of surfacing it.
 */
export class DependencyUnavailableError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'DEPENDENCY_UNAVAILABLE', 503, options);
  }
}

/**
 * Durable store failure on a read or a write transaction.
 */
export class StoreFailureError extends AppError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'STORE_FAILURE', 500, options);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500);
  }
}
