export * from './app-error.js';

import { AppError } from './app-error.js';

/** Normalize anything thrown into an Error */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
