/**
 * Core types for the listing engine
 */

import type { MetricsSnapshot } from "./observability/metrics.js";

/**
 * Identifier assigned to a listing on insertion (integer >= 1, never reused)
 */
export type ListingId = number;

/**
 * Unsigned 32-bit bucket key derived from a location string
 */
export type LocationKey = number;

/**
 * Fields supplied by the caller when adding a listing
 */
export interface ListingInput {
  title: string;
  location: string;
  /** Non-negative, finite */
  price: number;
  /** Free text, e.g. "house", "condo", "plot" */
  category: string;
}

/**
 * A catalog entry. Frozen once created; updates are delete + re-add.
 */
export interface Listing extends Readonly<ListingInput> {
  readonly id: ListingId;
}

/**
 * Inclusive price bounds
 */
export interface PriceRange {
  min: number;
  max: number;
}

/**
 * Options accepted by openCatalog()
 */
export interface CatalogOptions {
  /** Listings added, in order, when the catalog is created */
  listings?: ListingInput[];
  /** Record per-operation metrics (default: true) */
  metrics?: boolean;
}

/**
 * Result of checking that the index views agree with each other
 */
export interface IntegrityReport {
  ok: boolean;
  /** Human-readable description of every disagreement found */
  issues: string[];
}

/**
 * Catalog statistics
 */
export interface CatalogStats {
  /** Live listings */
  count: number;
  /** Non-empty location buckets */
  buckets: number;
  /** Id the next add() will assign */
  nextId: ListingId;
  integrity: IntegrityReport;
  operations: MetricsSnapshot;
}

/**
 * Public catalog API
 *
 * All operations are synchronous. Returned arrays are snapshots or read-only
 * views; callers must not mutate them.
 */
export interface Catalog {
  /**
   * Add a listing
   * @returns The id assigned to the new listing
   */
  add(input: ListingInput): ListingId;

  /**
   * Remove a listing from every view
   * @returns false if the id is unknown (nothing changes)
   */
  delete(id: ListingId): boolean;

  /**
   * Exact-key lookup
   */
  get(id: ListingId): Listing | null;

  /**
   * Listings whose location hashes to the same bucket as `location`, in
   * insertion order
   */
  searchByLocation(location: string): readonly Listing[];

  /**
   * Listings with min <= price <= max, ascending by price
   */
  searchByPriceRange(min: number, max: number): Listing[];

  /**
   * Copy of all listings ordered by price. Not stable on ties.
   */
  sortByPrice(ascending?: boolean): Listing[];

  /**
   * All listings in insertion order
   */
  listAll(): readonly Listing[];

  /**
   * Sizes, integrity and operation metrics
   */
  stats(): CatalogStats;
}
