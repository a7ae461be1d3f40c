import type { CatalogItem } from '@shared/schema';
import { parseConstraints } from './constraints';
import { filterResults } from './filters';
import { presentResult } from './presentation';
import { searchCatalog } from './ranking';
import type { SearchOutcome } from './types';

/**
 * query -> rank -> parse constraints -> filter -> present.
 * Ranking and constraint parsing each read the raw query on their own.
 */
export function runShopSearch(query: string, catalog: readonly CatalogItem[], topK: number): SearchOutcome {
  const ranked = searchCatalog(query, catalog, topK);
  const constraints = parseConstraints(query);
  const filtered = filterResults(ranked, constraints);

  return {
    query,
    constraints,
    unfilteredCount: ranked.length,
    results: filtered.map(presentResult),
  };
}
