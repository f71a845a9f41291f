import { ErrorCode } from '../types/enums.js';
import type { CoreError, Result } from '../types/error.js';
import { makeError } from '../utils/errors.js';

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR']);
const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);

function osCodeOf(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/** Turns an exception thrown by a loader, VCS or persistence collaborator into a CoreError. */
export function mapCollaboratorError(err: unknown, code: ErrorCode, details: Record<string, unknown> = {}): CoreError {
  const osCode = osCodeOf(err);
  const message = err instanceof Error ? err.message : String(err);
  const reason = osCode === undefined ? undefined : NOT_FOUND_CODES.has(osCode) ? 'not-found' : PERMISSION_CODES.has(osCode) ? 'permission-denied' : 'io-error';
  return makeError(code, message, osCode === undefined ? details : { ...details, osCode, reason });
}

/** Calls a collaborator; a thrown exception becomes a failed result carrying `code`. */
export function callCollaborator<T>(call: () => Result<T>, code: ErrorCode, details?: Record<string, unknown>): Result<T> {
  try {
    return call();
  } catch (err) {
    return { ok: false, error: mapCollaboratorError(err, code, details) };
  }
}
