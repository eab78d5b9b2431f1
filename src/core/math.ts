/**
 * Numeric helpers shared by the subsystem models
 */

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Division that yields `fallback` instead of Infinity/NaN for a zero divisor
 */
export function safeDivide(numerator: number, denominator: number, fallback: number = 0): number {
  return denominator === 0 ? fallback : numerator / denominator;
}
