/**
 * Clamp a numeric option into bounds, falling back when it is not a finite number.
 */
export const toBoundedNumber = (value: unknown, fallback: number, bounds: { min: number; max?: number }): number => {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  const max = bounds.max ?? Number.POSITIVE_INFINITY;
  return Math.min(max, Math.max(bounds.min, value));
};
