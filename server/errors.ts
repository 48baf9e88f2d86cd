import type { ErrorCode } from '../src/types';

export class CaptionerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CaptionerError';
    this.code = code;
  }
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  auth: 401,
  backend: 502,
  model_load: 500,
  image: 422,
  io: 500
};

export function statusForError(error: unknown): number {
  return error instanceof CaptionerError ? STATUS_BY_CODE[error.code] : 500;
}

export function errorCodeOf(error: unknown): ErrorCode {
  return error instanceof CaptionerError ? error.code : 'backend';
}

export function toErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === 'string' && error.trim()) {
    return error;
  }

  return fallback;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) {
    return undefined;
  }

  const { status } = error;
  return typeof status === 'number' ? status : undefined;
}

/**
 * True for failures caused by the credentials themselves. The SDKs surface these as errors carrying an
 * HTTP `status`; the Gemini SDK reports an invalid key as a 400 with `API_KEY_INVALID` in the message.
 */
export function isAuthError(error: unknown): boolean {
  if (error instanceof CaptionerError) {
    return error.code === 'auth';
  }

  const status = readStatus(error);
  if (status === 401 || status === 403) {
    return true;
  }

  return /API_KEY_INVALID|invalid api key|incorrect api key/i.test(toErrorMessage(error, ''));
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'APIUserAbortError');
}

export function wrapIoError(error: unknown, action: string, filePath: string): CaptionerError {
  return new CaptionerError('io', `Unable to ${action} ${filePath}: ${toErrorMessage(error)}`, { cause: error });
}
