/**
 * Listing Engine SDK
 *
 * An in-memory listing catalog with location buckets, price sorting and
 * price range search
 */

// Re-export types
export type {
  ListingId,
  LocationKey,
  ListingInput,
  Listing,
  PriceRange,
  CatalogOptions,
  IntegrityReport,
  CatalogStats,
  Catalog,
} from "./types.js";

// Engine
export { ListingCatalog, openCatalog } from "./catalog.js";
export { CatalogIndex } from "./catalog-index.js";

// Algorithms
export { locationKey, normalizeLocation } from "./location-key.js";
export { quickSortBy, sortByPrice } from "./sort.js";
export { lowerBoundByPrice, upperBoundByPrice, sliceByPriceRange } from "./range-search.js";

// Validation
export {
  parseListingInput,
  parsePriceRange,
  ListingInputSchema,
  PriceRangeSchema,
  type ParseResult,
} from "./validation.js";

// Observability
export {
  logger,
  Logger,
  resolveLogLevel,
  type LogLevel,
  type LogEntry,
  type LogData,
} from "./observability/logs.js";
export {
  MetricsCollector,
  type OperationName,
  type OperationMetrics,
  type OperationSummary,
  type MetricsSnapshot,
} from "./observability/metrics.js";

// Re-export errors
export {
  CatalogError,
  ListingValidationError,
  PriceRangeError,
  type ValidationIssue,
} from "./errors.js";
