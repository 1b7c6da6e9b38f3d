/**
 * Argument parsing and validation helpers
 *
 * Menu answers come back as result objects so the menu can re-prompt without
 * exceptions; commander options throw InvalidArgumentError as commander expects.
 */

import { InvalidArgumentError } from "commander";
import { z } from "zod";
import type { LogLevel } from "@listing-engine/sdk";

export type ArgResult<T> = { ok: true; value: T } | { ok: false; message: string };

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;

const AmountText = z
  .string()
  .trim()
  .regex(DECIMAL)
  .transform(Number)
  .pipe(z.number().finite());

const IdText = z.string().trim().regex(INTEGER).transform(Number).pipe(z.number().int().safe());

export const INVALID_PRICE = "Invalid price. Please enter a number.";
export const NEGATIVE_PRICE = "Price cannot be negative. Please try again.";
export const INVALID_ID = "Invalid ID. Please enter a number.";
export const INVALID_SORT_ORDER = "Invalid choice. Please enter 'A' or 'D'.";

/**
 * Parse a decimal amount (any sign)
 */
export function parseAmount(value: string): ArgResult<number> {
  const parsed = AmountText.safeParse(value);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false, message: INVALID_PRICE };
}

/**
 * Parse a listing price: a decimal amount that is not negative
 */
export function parsePrice(value: string): ArgResult<number> {
  const amount = parseAmount(value);
  if (amount.ok && amount.value < 0) {
    return { ok: false, message: NEGATIVE_PRICE };
  }
  return amount;
}

/**
 * Parse a listing id; unknown ids are the engine's concern, not ours
 */
export function parseListingId(value: string): ArgResult<number> {
  const parsed = IdText.safeParse(value);
  return parsed.success ? { ok: true, value: parsed.data } : { ok: false, message: INVALID_ID };
}

/**
 * Parse "A"/"D" (any case) into an ascending flag
 */
export function parseSortOrder(value: string): ArgResult<boolean> {
  const order = value.trim().toUpperCase();
  if (order === "A") return { ok: true, value: true };
  if (order === "D") return { ok: true, value: false };
  return { ok: false, message: INVALID_SORT_ORDER };
}

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Commander parser for --log-level
 */
export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw new InvalidArgumentError(`log level must be one of ${LOG_LEVELS.join(", ")}`);
  }
  return level;
}
