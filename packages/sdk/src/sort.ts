/**
 * Price ordering
 *
 * Quicksort with a middle-index pivot, so already-sorted input partitions
 * evenly. Not stable: listings with equal prices may change relative order.
 */

import type { Listing } from "./types.js";

function swap<T>(items: T[], i: number, j: number): void {
  const tmp = items[i];
  items[i] = items[j];
  items[j] = tmp;
}

/**
 * Partition items[low..high] around the middle element
 * @returns Final index of the pivot; everything left of it scores <= pivot
 */
function partition<T>(items: T[], low: number, high: number, score: (item: T) => number): number {
  swap(items, Math.floor((low + high) / 2), high);
  const pivot = score(items[high]);

  let boundary = low;
  for (let current = low; current < high; current++) {
    if (score(items[current]) <= pivot) {
      swap(items, boundary, current);
      boundary++;
    }
  }

  swap(items, boundary, high);
  return boundary;
}

/**
 * Sort items ascending by score, in place
 *
 * Recurses into the smaller side of each partition and loops on the larger,
 * keeping stack depth O(log n) even when the partitions are lopsided.
 */
export function quickSortBy<T>(
  items: T[],
  score: (item: T) => number,
  low = 0,
  high = items.length - 1
): void {
  while (low < high) {
    const pivotIndex = partition(items, low, high, score);

    if (pivotIndex - low < high - pivotIndex) {
      quickSortBy(items, score, low, pivotIndex - 1);
      low = pivotIndex + 1;
    } else {
      quickSortBy(items, score, pivotIndex + 1, high);
      high = pivotIndex - 1;
    }
  }
}

/**
 * Copy listings and order them by price
 *
 * Descending order is the ascending result reversed, so ties come out in the
 * reverse of their ascending order.
 *
 * @param listings - Left untouched
 * @param ascending - Default true
 */
export function sortByPrice(listings: readonly Listing[], ascending = true): Listing[] {
  const result = [...listings];
  quickSortBy(result, (listing) => listing.price);
  return ascending ? result : result.reverse();
}
