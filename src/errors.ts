import type { SyncErrorCode, SyncErrorPayload } from './types';

/**
 * Typed listener error with code, detail, and cause fields.
 */
export class SyncError extends Error implements SyncErrorPayload {
  code: SyncErrorCode;
  detail?: unknown;
  cause?: unknown;

  constructor(code: SyncErrorCode, message: string, detail?: unknown, cause?: unknown) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.detail = detail;
    this.cause = cause;
  }
}

/**
 * Render any thrown value as text. Never throws, even for values without a
 * usable `toString`.
 */
export const formatError = (error: unknown): string => {
  if (error instanceof SyncError) return `${error.name}(${error.code}): ${error.message}`;
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  try {
    return String(error);
  } catch {
    return Object.prototype.toString.call(error);
  }
};
