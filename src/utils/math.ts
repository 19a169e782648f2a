/**
 * Numeric helpers for chunk statistics.
 *
 * Math.min(...arr) / Math.max(...arr) spread every element as a function
 * argument and throw a RangeError past ~65 536 elements. The helpers here
 * iterate instead.
 */

/**
 * Minimum of a numeric array, or `undefined` when empty.
 */
export function safeMin(arr: number[]): number | undefined {
  if (arr.length === 0) return undefined;
  let min = arr[0];
  for (let i = 1; i < arr.length; i++) {
    if (arr[i] < min) min = arr[i];
  }
  return min;
}

/**
 * Maximum of a numeric array, or `undefined` when empty.
 */
export function safeMax(arr: number[]): number | undefined {
  if (arr.length === 0) return undefined;
  let max = arr[0];
  for (let i = 1; i < arr.length; i++) {
    if (arr[i] > max) max = arr[i];
  }
  return max;
}

/** Sum of a numeric array (0 when empty) */
export function sum(arr: number[]): number {
  let total = 0;
  for (const value of arr) total += value;
  return total;
}

/**
 * Round half away from zero to a fixed number of decimals.
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.sign(value) * (Math.round(Math.abs(value) * factor) / factor);
}
