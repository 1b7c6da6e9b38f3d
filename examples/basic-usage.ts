/**
 * Basic Usage Example
 *
 * Demonstrates adding, searching, sorting and deleting listings.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { openCatalog, parseListingInput } from "@listing-engine/sdk";

function main() {
  console.log("📂 Opening catalog...");
  const catalog = openCatalog();

  // CREATE
  console.log("\n✏️  Adding listings...");
  const austin = catalog.add({ title: "Bungalow", location: "Austin", price: 100000, category: "house" });
  const loft = catalog.add({ title: "Loft", location: "austin", price: 250000, category: "condo" });
  catalog.add({ title: "Cabin", location: "Oslo", price: 180000, category: "house" });
  console.log(`✅ Added ${catalog.listAll().length} listings`);

  // VALIDATE untrusted input before adding it
  const untrusted: unknown = { title: "Lot", location: "Porto", price: -1, category: "plot" };
  const checked = parseListingInput(untrusted);
  if (checked.ok) {
    catalog.add(checked.value);
  } else {
    console.log(`⚠️  Rejected: ${checked.error.message}`);
  }

  // SEARCH by location (case and whitespace do not matter)
  console.log("\n🔍 Listings in AUSTIN:");
  for (const listing of catalog.searchByLocation("AUSTIN")) {
    console.log(`   #${listing.id} ${listing.title} $${listing.price}`);
  }

  // SEARCH by price range
  console.log("\n💰 Between $150,000 and $300,000:");
  for (const listing of catalog.searchByPriceRange(150000, 300000)) {
    console.log(`   #${listing.id} ${listing.title} $${listing.price}`);
  }

  // SORT
  console.log("\n📊 Most expensive first:");
  for (const listing of catalog.sortByPrice(false)) {
    console.log(`   #${listing.id} ${listing.title} $${listing.price}`);
  }

  // DELETE
  console.log("\n🗑️  Deleting...");
  console.log(`   delete #${austin}: ${catalog.delete(austin)}`);
  console.log(`   delete #${austin} again: ${catalog.delete(austin)}`);
  console.log(`   #${loft} still present: ${catalog.get(loft) !== null}`);

  const stats = catalog.stats();
  console.log(`\n📈 ${stats.count} listings in ${stats.buckets} location buckets`);
}

main();
