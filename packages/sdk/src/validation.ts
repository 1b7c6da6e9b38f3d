/**
 * Type-shape validation for values arriving from outside the engine
 *
 * The engine trusts its typed inputs; front ends call these first. Nothing
 * here throws: failures come back as result objects carrying the error.
 */

import { z } from "zod";
import { ListingValidationError, PriceRangeError, type ValidationIssue } from "./errors.js";
import type { ListingInput, PriceRange } from "./types.js";

export type ParseResult<T, E extends Error = ListingValidationError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

const text = (field: string) =>
  z.string({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a string`,
  });

const amount = (field: string) =>
  z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .finite(`${field} must be finite`);

export const ListingInputSchema = z.object({
  title: text("title"),
  location: text("location"),
  price: amount("price").nonnegative("price cannot be negative"),
  category: text("category"),
});

export const PriceRangeSchema = z.object({
  min: amount("min"),
  max: amount("max"),
});

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));
}

/**
 * Check that a value has the shape of a listing input
 * Unknown keys are dropped from the returned value.
 */
export function parseListingInput(raw: unknown): ParseResult<ListingInput> {
  const parsed = ListingInputSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: new ListingValidationError(toIssues(parsed.error)) };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Check a price range: both bounds finite numbers and min <= max
 */
export function parsePriceRange(
  raw: unknown
): ParseResult<PriceRange, ListingValidationError | PriceRangeError> {
  const parsed = PriceRangeSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: new ListingValidationError(toIssues(parsed.error)) };
  }

  const { min, max } = parsed.data;
  if (min > max) {
    return { ok: false, error: new PriceRangeError(min, max) };
  }
  return { ok: true, value: { min, max } };
}
