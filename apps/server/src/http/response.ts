import { MethodNotAllowedError, RateLimitedError, ValidationError } from '@tasktrack/core';
import type { AppError } from '@tasktrack/core';

export interface ErrorBody {
  kind: string;
  message: string;
  details?: readonly { field: string; message: string }[];
}

export function json(data: unknown, status = 200, headers: Record<string, string> = {}): Response {
  const response = new Response(JSON.stringify(data), { status, headers });
  response.headers.set('Content-Type', 'application/json; charset=utf-8');
  return response;
}

export function noContent(): Response {
  return new Response(null, { status: 204 });
}

/** Response for an AppError: `{ kind, message, details? }` plus any headers its status needs */
export function errorResponse(error: AppError): Response {
  const body: ErrorBody = { kind: error.code, message: error.message };
  if (error instanceof ValidationError && error.details.length > 0) {
    body.details = error.details;
  }

  const response = json(body, error.status);
  if (error instanceof RateLimitedError) {
    response.headers.set('Retry-After', String(error.retryAfterSeconds));
  }
  if (error instanceof MethodNotAllowedError) {
    response.headers.set('Allow', error.allowed.join(', '));
  }
  return response;
}

export function internalErrorResponse(): Response {
  return json({ kind: 'INTERNAL_ERROR', message: 'Internal server error' } satisfies ErrorBody, 500);
}
