/**
 * Search the product catalog from the terminal
 * Usage: npx tsx scripts/search-catalog.ts "winter wedding guest dress under $150" [topK]
 */

import { loadConfig } from '../server/config';
import { DEFAULT_TOP_K, loadCatalog, runShopSearch } from '../server/search';

function main() {
  const [query = '', topKArg] = process.argv.slice(2);
  const topK = topKArg === undefined ? DEFAULT_TOP_K : parseInt(topKArg, 10);
  if (Number.isNaN(topK)) {
    console.error(`Result count must be a whole number, got "${topKArg}"`);
    process.exit(1);
  }

  const config = loadConfig();
  const catalog = loadCatalog(config.catalogPath);
  const outcome = runShopSearch(query, catalog, topK);

  console.log(`\nQuery: "${query}"`);
  console.log(`Constraints: ${JSON.stringify(outcome.constraints)}`);
  console.log(`Ranked: ${outcome.unfilteredCount}, after constraints: ${outcome.results.length}\n`);

  if (outcome.results.length === 0) {
    console.log('No matches found.');
    return;
  }

  outcome.results.forEach((r, i) => {
    console.log(`${i + 1}. ${r.title} - ${r.brand} - ${r.price}`);
    console.log(`   Category: ${r.category} • Rating: ${r.rating} (${r.numReviews} reviews) • Score: ${r.score}`);
    console.log(`   ${r.description}`);
    console.log(`   Matched terms: ${r.matchedTerms.join(', ')}`);
  });
}

main();
