/**
 * Catalog index: the owning listing store plus its location buckets
 *
 * Views:
 * - listings: Map<id, Listing>, insertion-ordered, the only owner of Listing
 *   objects (serves as both the primary collection and the id view)
 * - buckets: Map<locationKey, id[]>, ids in insertion order, no copies of
 *   listings
 *
 * Invariants:
 * - A listing is in `listings` iff its id is in exactly one bucket, the one
 *   keyed by locationKey(listing.location)
 * - Ids strictly increase and are never reassigned, even after delete
 * - Deleting an unknown id changes nothing
 * - Empty buckets are pruned
 */

import { locationKey } from "./location-key.js";
import { logger } from "./observability/logs.js";
import type { IntegrityReport, Listing, ListingId, ListingInput, LocationKey } from "./types.js";

export class CatalogIndex {
  #listings = new Map<ListingId, Listing>();
  #buckets = new Map<LocationKey, ListingId[]>();
  #nextId: ListingId = 1;
  /** Cached lookupAll() result, dropped on every mutation */
  #snapshot: readonly Listing[] | null = null;

  get size(): number {
    return this.#listings.size;
  }

  get bucketCount(): number {
    return this.#buckets.size;
  }

  get nextId(): ListingId {
    return this.#nextId;
  }

  /**
   * Store a new listing and file it under its location bucket
   */
  insert(input: ListingInput): ListingId {
    const id = this.#nextId++;
    const listing: Listing = Object.freeze({
      id,
      title: input.title,
      location: input.location,
      price: input.price,
      category: input.category,
    });

    this.#listings.set(id, listing);

    const key = locationKey(listing.location);
    const bucket = this.#buckets.get(key);
    if (bucket) {
      bucket.push(id);
    } else {
      this.#buckets.set(key, [id]);
    }

    this.#snapshot = null;
    logger.debug("catalog.add", { details: { id, key } });
    return id;
  }

  /**
   * Remove a listing from every view
   * @returns false if the id is unknown
   */
  delete(id: ListingId): boolean {
    const listing = this.#listings.get(id);
    if (!listing) {
      logger.debug("catalog.delete.miss", { details: { id } });
      return false;
    }

    this.#listings.delete(id);

    const key = locationKey(listing.location);
    const bucket = this.#buckets.get(key);
    if (bucket) {
      const remaining = bucket.filter((bucketId) => bucketId !== id);
      if (remaining.length === 0) {
        this.#buckets.delete(key);
      } else {
        this.#buckets.set(key, remaining);
      }
    }

    this.#snapshot = null;
    logger.debug("catalog.delete", { details: { id, key } });
    return true;
  }

  get(id: ListingId): Listing | null {
    return this.#listings.get(id) ?? null;
  }

  /**
   * Listings sharing the location's bucket, in insertion order
   */
  lookupByLocation(location: string): readonly Listing[] {
    const bucket = this.#buckets.get(locationKey(location));
    if (!bucket) {
      return [];
    }
    return bucket.map((id) => this.#require(id));
  }

  /**
   * All listings in insertion order
   */
  lookupAll(): readonly Listing[] {
    if (!this.#snapshot) {
      this.#snapshot = Object.freeze([...this.#listings.values()]);
    }
    return this.#snapshot;
  }

  /**
   * Cross-check the views against each other
   */
  verifyIntegrity(): IntegrityReport {
    const issues: string[] = [];
    const seen = new Map<ListingId, number>();

    for (const [key, ids] of this.#buckets) {
      if (ids.length === 0) {
        issues.push(`bucket ${key} is empty`);
      }
      for (const id of ids) {
        seen.set(id, (seen.get(id) ?? 0) + 1);
        const listing = this.#listings.get(id);
        if (!listing) {
          issues.push(`bucket ${key} references missing listing ${id}`);
        } else if (locationKey(listing.location) !== key) {
          issues.push(`listing ${id} is filed under bucket ${key} instead of its own`);
        }
      }
    }

    for (const [id, listing] of this.#listings) {
      if (listing.id !== id) {
        issues.push(`listing ${listing.id} is stored under id ${id}`);
      }
      if (id >= this.#nextId) {
        issues.push(`listing ${id} is not below next id ${this.#nextId}`);
      }
      const count = seen.get(id) ?? 0;
      if (count !== 1) {
        issues.push(`listing ${id} appears in ${count} buckets`);
      }
    }

    return { ok: issues.length === 0, issues };
  }

  #require(id: ListingId): Listing {
    const listing = this.#listings.get(id);
    if (!listing) {
      throw new Error(`Location bucket references missing listing ${id}`);
    }
    return listing;
  }
}
