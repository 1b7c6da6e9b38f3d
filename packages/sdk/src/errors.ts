/**
 * Error types for listing engine operations
 *
 * Invariants:
 * - All errors support a `cause` property for wrapping underlying errors
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - The engine itself never throws these; validation returns them in results
 */

/**
 * Base class for all listing engine errors
 */
export abstract class CatalogError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * One failed check, keyed by the offending field
 */
export interface ValidationIssue {
  /** Field name, or "" when the whole value is wrong */
  field: string;
  message: string;
}

/**
 * Input does not have the expected shape
 */
export class ListingValidationError extends CatalogError {
  readonly code = "E_VALIDATION";

  constructor(
    public readonly issues: ValidationIssue[],
    options?: ErrorOptions
  ) {
    super(
      `Invalid input: ${issues.map((i) => (i.field ? `${i.field}: ${i.message}` : i.message)).join("; ")}`,
      options
    );
  }
}

/**
 * Lower bound of a price range is above the upper bound
 */
export class PriceRangeError extends CatalogError {
  readonly code = "E_PRICE_RANGE";

  constructor(
    public readonly min: number,
    public readonly max: number,
    options?: ErrorOptions
  ) {
    super(`Minimum price ${min} is greater than maximum price ${max}`, options);
  }
}
