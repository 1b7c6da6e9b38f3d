/**
 * Output rendering helpers
 */

import type { Listing } from "@listing-engine/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Format a price as dollars with two decimals
 * @example formatPrice(1500) === "$1500.00"
 */
export function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`;
}

/**
 * Render listings as a fixed-width table
 *
 * Columns: ID (5), Title (20), Location (15), Price (10), Type (10). Longer
 * values are not truncated. Trailing padding is trimmed.
 */
export function formatListingsTable(listings: readonly Listing[]): string[] {
  const header = ["ID".padEnd(5), "Title".padEnd(20), "Location".padEnd(15), "Price".padEnd(10), "Type"];
  const lines = [header.join(" ").trimEnd(), "-".repeat(65)];

  for (const listing of listings) {
    const row = [
      String(listing.id).padEnd(5),
      listing.title.padEnd(20),
      listing.location.padEnd(15),
      formatPrice(listing.price).padEnd(10),
      listing.category,
    ];
    lines.push(row.join(" ").trimEnd());
  }

  return lines;
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
