import { ErrorCode } from '../types/enums.js';
import type { CoreError, Result } from '../types/error.js';
import { nowInstant } from './time.js';

export function makeError(code: ErrorCode, message: string, details?: Record<string, unknown>): CoreError {
  const error: CoreError = { code, message, at: nowInstant() };
  if (details) error.details = details;
  return error;
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(code: ErrorCode, message: string, details?: Record<string, unknown>): Result<T> {
  return { ok: false, error: makeError(code, message, details) };
}

export function rangeError<T>(message: string, details?: Record<string, unknown>): Result<T> {
  return fail(ErrorCode.RANGE_ERROR, message, details);
}
