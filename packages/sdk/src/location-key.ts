/**
 * Location bucket keys
 *
 * Invariants:
 * - Keys are unsigned 32-bit integers
 * - Case and whitespace never affect the key
 * - Distinct locations may share a key; callers treat them as one bucket
 */

import type { LocationKey } from "./types.js";

const HASH_BASE = 31;
const WHITESPACE = /\s+/g;

/**
 * Lower-case and drop all whitespace
 * @example normalizeLocation("New  York") === "newyork"
 */
export function normalizeLocation(location: string): string {
  return location.toLowerCase().replace(WHITESPACE, "");
}

/**
 * Polynomial rolling hash (base 31, mod 2^32) over the normalized location
 */
export function locationKey(location: string): LocationKey {
  const normalized = normalizeLocation(location);
  let hash = 0;

  for (let i = 0; i < normalized.length; i++) {
    // Math.imul keeps the multiply exact in 32 bits; >>> 0 reduces mod 2^32
    hash = (Math.imul(HASH_BASE, hash) + normalized.charCodeAt(i)) >>> 0;
  }

  return hash;
}
