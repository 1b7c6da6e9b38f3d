/**
 * Interactive menu over a catalog
 *
 * Reads answers through a Prompter and writes through an Output, so the same
 * loop runs against a terminal or a scripted test double. Every handler
 * returns false once input has ended, which stops the loop.
 */

import {
  PriceRangeError,
  parseListingInput,
  parsePriceRange,
  type Catalog,
  type Listing,
} from "@listing-engine/sdk";
import { parseAmount, parseListingId, parsePrice, parseSortOrder } from "./lib/arg.js";
import { formatListingsTable, formatPrice } from "./lib/render.js";
import { emitMetric, withTiming } from "./lib/telemetry.js";
import type { Output, Prompter } from "./lib/io.js";

export const MENU_TITLE = "=== LISTING ENGINE - PROPERTY LISTINGS ===";
export const MENU_OPTIONS = [
  "1. Add Property",
  "2. Delete Property",
  "3. Search by Location",
  "4. Search by Price Range",
  "5. Sort Properties by Price",
  "6. Display All Properties",
  "7. Exit",
];
export const CHOICE_PROMPT = "Enter your choice (1-7): ";
export const GOODBYE = "Thank you for using the Listing Engine. Goodbye!";

export interface MenuOptions {
  /** Emit per-action timing metrics on stderr */
  verbose?: boolean;
  /** Skip the option list before each prompt */
  quiet?: boolean;
}

type Handler = () => Promise<boolean>;

export class MenuSession {
  #catalog: Catalog;
  #prompter: Prompter;
  #output: Output;
  #verbose: boolean;
  #quiet: boolean;

  constructor(catalog: Catalog, prompter: Prompter, output: Output, options: MenuOptions = {}) {
    this.#catalog = catalog;
    this.#prompter = prompter;
    this.#output = output;
    this.#verbose = options.verbose ?? false;
    this.#quiet = options.quiet ?? false;
  }

  /**
   * Loop until the user exits or input ends
   */
  async run(): Promise<void> {
    const handlers: Record<string, [string, Handler]> = {
      "1": ["menu.add", () => this.#add()],
      "2": ["menu.delete", () => this.#delete()],
      "3": ["menu.location", () => this.#searchByLocation()],
      "4": ["menu.price_range", () => this.#searchByPriceRange()],
      "5": ["menu.sort", () => this.#sort()],
      "6": ["menu.list", async () => this.#listAll()],
    };

    for (;;) {
      this.#printMenu();

      const choice = await this.#prompter.ask(CHOICE_PROMPT);
      if (choice === null) {
        break;
      }

      const key = choice.trim();
      if (key === "7") {
        this.#write(GOODBYE);
        break;
      }

      const entry = handlers[key];
      if (!entry) {
        this.#write("Invalid choice. Please try again.");
        continue;
      }

      const [label, handler] = entry;
      const keepGoing = await withTiming(label, handler, this.#verbose);
      if (!keepGoing) {
        break;
      }
    }

    const stats = this.#catalog.stats();
    emitMetric("catalog.stats", { listings: stats.count, buckets: stats.buckets }, this.#verbose);
  }

  #printMenu(): void {
    if (this.#quiet) return;
    this.#write("");
    this.#write(MENU_TITLE);
    for (const option of MENU_OPTIONS) {
      this.#write(option);
    }
  }

  async #add(): Promise<boolean> {
    const title = await this.#prompter.ask("Enter property title: ");
    if (title === null) return false;

    const location = await this.#prompter.ask("Enter location: ");
    if (location === null) return false;

    let price: number | undefined;
    while (price === undefined) {
      const answer = await this.#prompter.ask("Enter price: $");
      if (answer === null) return false;

      const parsed = parsePrice(answer);
      if (parsed.ok) {
        price = parsed.value;
      } else {
        this.#write(parsed.message);
      }
    }

    const category = await this.#prompter.ask("Enter property type (apartment, house, plot, etc.): ");
    if (category === null) return false;

    const input = parseListingInput({ title, location, price, category });
    if (!input.ok) {
      this.#write(input.error.message);
      return true;
    }

    const id = this.#catalog.add(input.value);
    this.#write(`Property added successfully with ID: ${id}`);
    return true;
  }

  async #delete(): Promise<boolean> {
    const answer = await this.#prompter.ask("Enter property ID to delete: ");
    if (answer === null) return false;

    const id = parseListingId(answer);
    if (!id.ok) {
      this.#write(id.message);
      return true;
    }

    if (this.#catalog.delete(id.value)) {
      this.#write(`Property with ID ${id.value} deleted successfully.`);
    } else {
      this.#write(`Property with ID ${id.value} not found.`);
    }
    return true;
  }

  async #searchByLocation(): Promise<boolean> {
    const location = await this.#prompter.ask("Enter location to search: ");
    if (location === null) return false;

    const results = this.#catalog.searchByLocation(location);
    if (results.length > 0) {
      this.#printTable(`Found ${results.length} properties in ${location}:`, results);
    } else {
      this.#write(`No properties found in ${location}.`);
    }
    return true;
  }

  async #searchByPriceRange(): Promise<boolean> {
    const minAnswer = await this.#prompter.ask("Enter minimum price: $");
    if (minAnswer === null) return false;

    const min = parseAmount(minAnswer);
    if (!min.ok) {
      this.#write(min.message);
      return true;
    }

    const maxAnswer = await this.#prompter.ask("Enter maximum price: $");
    if (maxAnswer === null) return false;

    const max = parseAmount(maxAnswer);
    if (!max.ok) {
      this.#write(max.message);
      return true;
    }

    const range = parsePriceRange({ min: min.value, max: max.value });
    if (!range.ok) {
      this.#write(
        range.error instanceof PriceRangeError
          ? "Minimum price cannot be greater than maximum price."
          : range.error.message
      );
      return true;
    }

    const { min: low, max: high } = range.value;
    const bounds = `${formatPrice(low)} and ${formatPrice(high)}`;
    const results = this.#catalog.searchByPriceRange(low, high);
    if (results.length > 0) {
      this.#printTable(`Found ${results.length} properties between ${bounds}:`, results);
    } else {
      this.#write(`No properties found between ${bounds}.`);
    }
    return true;
  }

  async #sort(): Promise<boolean> {
    const answer = await this.#prompter.ask("Sort by price (A)scending or (D)escending? ");
    if (answer === null) return false;

    const order = parseSortOrder(answer);
    if (!order.ok) {
      this.#write(order.message);
      return true;
    }

    const sorted = this.#catalog.sortByPrice(order.value);
    if (sorted.length > 0) {
      const direction = order.value ? "ascending" : "descending";
      this.#printTable(`Properties sorted by price (${direction}):`, sorted);
    } else {
      this.#write("No properties to sort.");
    }
    return true;
  }

  #listAll(): boolean {
    const listings = this.#catalog.listAll();
    if (listings.length > 0) {
      this.#printTable(`All Properties (${listings.length}):`, listings);
    } else {
      this.#write("No properties found.");
    }
    return true;
  }

  #printTable(heading: string, listings: readonly Listing[]): void {
    this.#write("");
    this.#write(heading);
    for (const line of formatListingsTable(listings)) {
      this.#write(line);
    }
  }

  #write(line: string): void {
    this.#output.writeLine(line);
  }
}
