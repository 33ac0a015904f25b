/**
 * PostgreSQL codes that mean another writer currently holds the row:
 * lock_not_available, serialization_failure, deadlock_detected.
 */
const BUSY_CODES = new Set(['55P03', '40001', '40P01']);

type PostgrestLikeError = {
  message: string;
  code?: string;
  details?: string | null;
  hint?: string | null;
};

export class StoreBusyError extends Error {
  code: string;

  constructor(action: string, code: string, detail: string) {
    super(`${action}: store busy (${code}) ${detail}`.trim());
    this.name = 'StoreBusyError';
    this.code = code;
  }
}

export function isStoreBusyError(error: unknown): error is StoreBusyError {
  return error instanceof StoreBusyError;
}

export function isBusyCode(code: string | undefined): boolean {
  return code !== undefined && BUSY_CODES.has(code);
}

export function toStoreError(action: string, error: PostgrestLikeError): Error {
  if (error.code !== undefined && isBusyCode(error.code)) {
    return new StoreBusyError(action, error.code, error.message);
  }
  return new Error(`${action}: ${error.message}`, { cause: error });
}
