import { describe, it, expect } from "vitest";
import { locationKey, normalizeLocation } from "./location-key.js";

/**
 * Reference implementation with exact integer arithmetic
 */
function referenceKey(location: string): number {
  let hash = 0n;
  for (const char of normalizeLocation(location)) {
    hash = (31n * hash + BigInt(char.charCodeAt(0))) % 2n ** 32n;
  }
  return Number(hash);
}

describe("normalizeLocation", () => {
  it("should lower-case and drop all whitespace", () => {
    expect(normalizeLocation("New  York")).toBe("newyork");
    expect(normalizeLocation(" San\tFrancisco\n")).toBe("sanfrancisco");
  });
});

describe("locationKey", () => {
  it("should hash known locations", () => {
    expect(locationKey("austin")).toBe(2888620410);
    expect(locationKey("New York")).toBe(1846315375);
    expect(locationKey("San Francisco Bay Area, California")).toBe(1214844317);
  });

  it("should return 0 for empty or blank locations", () => {
    expect(locationKey("")).toBe(0);
    expect(locationKey("   ")).toBe(0);
  });

  it("should ignore case and whitespace", () => {
    expect(locationKey("Austin")).toBe(locationKey("austin"));
    expect(locationKey("new  york")).toBe(locationKey("New York"));
    expect(locationKey("NEWYORK")).toBe(locationKey("New York"));
  });

  it("should be order-sensitive", () => {
    expect(locationKey("ab")).not.toBe(locationKey("ba"));
  });

  it("should map distinct locations to the same key on collision", () => {
    expect(locationKey("a~")).toBe(3133);
    expect(locationKey("b_")).toBe(3133);
  });

  it("should stay an unsigned 32-bit integer for long input", () => {
    const long = "Rua Augusta, Baixa, Lisboa, Portugal ".repeat(20);
    const key = locationKey(long);

    expect(Number.isInteger(key)).toBe(true);
    expect(key).toBeGreaterThanOrEqual(0);
    expect(key).toBeLessThan(2 ** 32);
    expect(key).toBe(referenceKey(long));
  });
});
