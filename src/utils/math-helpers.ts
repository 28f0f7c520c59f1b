/**
 * Math Helper Utilities
 *
 * Safe mathematical operations that guard against division by zero and
 * NaN propagation.
 */

/**
 * Calculate safe division that guards against division by zero
 *
 * @param numerator - Numerator
 * @param denominator - Denominator
 * @param defaultValue - Value to return if denominator is 0 (default: 0)
 * @returns numerator / denominator, or defaultValue if denominator is 0
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * safeDivide(10, 0, 100)   // => 100
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Round to a fixed number of decimal places
 *
 * @example
 * ```typescript
 * roundTo(12.3456, 2)   // => 12.35
 * roundTo(7.25, 1)      // => 7.3
 * ```
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Share of `part` in `total` as a percentage, 0 when total is 0
 */
export function percentOf(part: number, total: number, decimals = 2): number {
  return roundTo(safeDivide(part * 100, total), decimals);
}
