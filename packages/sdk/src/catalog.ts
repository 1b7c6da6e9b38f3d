/**
 * Catalog engine
 */

import { CatalogIndex } from "./catalog-index.js";
import { sortByPrice } from "./sort.js";
import { sliceByPriceRange } from "./range-search.js";
import { MetricsCollector } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";
import type {
  Catalog,
  CatalogOptions,
  CatalogStats,
  Listing,
  ListingId,
  ListingInput,
} from "./types.js";

/**
 * In-memory listing catalog
 *
 * Mutations go to the index, which keeps its views in step. Price queries
 * sort a snapshot of the index and narrow it with two boundary searches.
 *
 * @example
 * ```typescript
 * const catalog = openCatalog();
 *
 * const id = catalog.add({ title: "Loft", location: "Austin", price: 250000, category: "condo" });
 * catalog.searchByLocation("austin");          // [{ id, title: "Loft", ... }]
 * catalog.searchByPriceRange(200000, 300000);  // same listing
 * catalog.delete(id);                          // true
 * ```
 */
export class ListingCatalog implements Catalog {
  #index = new CatalogIndex();
  #metrics: MetricsCollector;

  constructor(options: CatalogOptions = {}) {
    const resolved: Required<CatalogOptions> = {
      listings: options.listings ?? [],
      metrics: options.metrics ?? true,
    };

    this.#metrics = new MetricsCollector(resolved.metrics);

    for (const input of resolved.listings) {
      this.#index.insert(input);
    }
    if (resolved.listings.length > 0) {
      logger.info("catalog.seed", { details: { listings: resolved.listings.length } });
    }
  }

  get metrics(): MetricsCollector {
    return this.#metrics;
  }

  add(input: ListingInput): ListingId {
    return this.#metrics.time("add", () => this.#index.insert(input));
  }

  delete(id: ListingId): boolean {
    return this.#metrics.time("delete", () => {
      const deleted = this.#index.delete(id);
      if (!deleted) {
        this.#metrics.recordDeleteMiss();
      }
      return deleted;
    });
  }

  get(id: ListingId): Listing | null {
    return this.#metrics.time("get", () => this.#index.get(id));
  }

  searchByLocation(location: string): readonly Listing[] {
    return this.#metrics.time("searchByLocation", () => {
      const results = this.#index.lookupByLocation(location);
      this.#metrics.recordBucketLookup(results.length > 0);
      return results;
    });
  }

  searchByPriceRange(min: number, max: number): Listing[] {
    return this.#metrics.time("searchByPriceRange", () =>
      sliceByPriceRange(sortByPrice(this.#index.lookupAll(), true), min, max)
    );
  }

  sortByPrice(ascending = true): Listing[] {
    return this.#metrics.time("sortByPrice", () => sortByPrice(this.#index.lookupAll(), ascending));
  }

  listAll(): readonly Listing[] {
    return this.#metrics.time("listAll", () => this.#index.lookupAll());
  }

  stats(): CatalogStats {
    return {
      count: this.#index.size,
      buckets: this.#index.bucketCount,
      nextId: this.#index.nextId,
      integrity: this.#index.verifyIntegrity(),
      operations: this.#metrics.snapshot(),
    };
  }
}

/**
 * Create an independent catalog
 */
export function openCatalog(options: CatalogOptions = {}): ListingCatalog {
  return new ListingCatalog(options);
}
