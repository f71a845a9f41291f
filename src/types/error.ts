import type { Instant } from './ids.js';
import type { ErrorCode } from './enums.js';

export interface CoreError {
  code: ErrorCode;
  message: string;
  at: Instant;
  command?: string;
  details?: Record<string, unknown>;
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: CoreError };
