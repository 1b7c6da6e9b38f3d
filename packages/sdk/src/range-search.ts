/**
 * Boundary searches over listings sorted ascending by price
 */

import type { Listing } from "./types.js";

/**
 * Smallest index whose price is >= min
 * @returns sorted.length when no listing qualifies
 */
export function lowerBoundByPrice(sorted: readonly Listing[], min: number): number {
  let left = 0;
  let right = sorted.length - 1;
  let result = sorted.length;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    if (sorted[mid].price >= min) {
      result = mid;
      right = mid - 1;
    } else {
      left = mid + 1;
    }
  }

  return result;
}

/**
 * Largest index whose price is <= max
 * @returns -1 when no listing qualifies
 */
export function upperBoundByPrice(sorted: readonly Listing[], max: number): number {
  let left = 0;
  let right = sorted.length - 1;
  let result = -1;

  while (left <= right) {
    const mid = Math.floor((left + right) / 2);
    if (sorted[mid].price <= max) {
      result = mid;
      left = mid + 1;
    } else {
      right = mid - 1;
    }
  }

  return result;
}

/**
 * Contiguous run of listings with min <= price <= max
 *
 * Empty when the bounds miss every listing or cross each other.
 */
export function sliceByPriceRange(sorted: readonly Listing[], min: number, max: number): Listing[] {
  const lower = lowerBoundByPrice(sorted, min);
  const upper = upperBoundByPrice(sorted, max);

  if (lower <= upper && lower < sorted.length) {
    return sorted.slice(lower, upper + 1);
  }
  return [];
}
