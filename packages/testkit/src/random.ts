/**
 * Seeded listing generators for property-style tests
 */

import type { ListingInput } from "@listing-engine/sdk";

/**
 * Deterministic PRNG (mulberry32)
 * @returns Function yielding floats in [0, 1)
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export interface RandomListingOptions {
  /** Location strings to draw from */
  locations?: string[];
  /** Category strings to draw from */
  categories?: string[];
  /** Prices are whole multiples of priceStep in [0, maxPrice] */
  maxPrice?: number;
  priceStep?: number;
}

const DEFAULT_LOCATIONS = ["Austin", "austin", "New York", "Lisbon", "Porto", "Oslo"];
const DEFAULT_CATEGORIES = ["house", "condo", "apartment", "plot"];

/**
 * Generate listing inputs; a coarse priceStep produces plenty of ties
 */
export function randomListings(
  count: number,
  seed: number,
  options: RandomListingOptions = {}
): ListingInput[] {
  const random = seededRandom(seed);
  const locations = options.locations ?? DEFAULT_LOCATIONS;
  const categories = options.categories ?? DEFAULT_CATEGORIES;
  const maxPrice = options.maxPrice ?? 1_000_000;
  const priceStep = options.priceStep ?? 25_000;
  const steps = Math.floor(maxPrice / priceStep);

  const pick = (values: string[]): string => values[Math.floor(random() * values.length)] ?? "";

  return Array.from({ length: count }, (_, i) => ({
    title: `Listing ${i + 1}`,
    location: pick(locations),
    price: Math.floor(random() * (steps + 1)) * priceStep,
    category: pick(categories),
  }));
}
