import type { SecurityLevel } from '../types';

export const HIDDEN = '<hidden>';

/**
 * Value shown only in secure logs.
 */
export const secretOnly = (sl: SecurityLevel, value: unknown): string => (sl === 'secure' ? String(value) : HIDDEN);

export interface SafeBuildable {
  toSafeString(sl: SecurityLevel): string;
}

export const isSafeBuildable = (value: unknown): value is SafeBuildable =>
  typeof value === 'object' && value !== null && 'toSafeString' in value && typeof value.toSafeString === 'function';

/**
 * Render a value that knows how to redact itself; anything else is hidden in public logs.
 */
export const buildSafe = (sl: SecurityLevel, value: unknown): string => {
  if (isSafeBuildable(value)) return value.toSafeString(sl);
  return secretOnly(sl, value);
};
