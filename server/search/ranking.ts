/**
 * Catalog Search and Ranking
 *
 * Keyword scoring over the in-memory catalog:
 *   score = distinct query tokens found anywhere in the item
 *         + 0.5 per distinct query token also found in the title
 *
 * Ties are broken by rating (higher first), then price (cheaper first).
 */

import type { CatalogItem, SearchableItem, SearchResult } from '@shared/schema';
import { loadCatalog } from './catalog';
import { tokenize } from './tokenizer';

export const DEFAULT_TOP_K = 8;
export const TITLE_BOOST = 0.5;

function asText(value: unknown): string {
  return value === undefined || value === null ? '' : String(value);
}

/**
 * All fields are tokenized together, so only token membership matters,
 * not which field a token came from.
 */
export function searchableTokens(item: SearchableItem): Set<string> {
  const fields: unknown[] = [
    item.title,
    item.description,
    item.brand,
    item.category,
    ...(item.style_tags ?? []),
    ...(item.colors ?? []),
  ];
  return new Set(tokenize(fields.map(asText).join(' ')));
}

function ratingOf(item: SearchableItem): number {
  return item.rating ?? 0;
}

// Unpriced items sort after priced ones with the same score and rating
function priceOf(item: SearchableItem): number {
  return item.price_usd ?? Number.POSITIVE_INFINITY;
}

export function compareResults(a: SearchResult<SearchableItem>, b: SearchResult<SearchableItem>): number {
  if (b.score !== a.score) return b.score - a.score;

  const ratingA = ratingOf(a.item);
  const ratingB = ratingOf(b.item);
  if (ratingB !== ratingA) return ratingB - ratingA;

  const priceA = priceOf(a.item);
  const priceB = priceOf(b.item);
  if (priceA === priceB) return 0;
  return priceA < priceB ? -1 : 1;
}

/**
 * Score every catalog item against the query and return the best `topK`.
 * When no catalog is given the default catalog file is loaded, but only once
 * the query is known to contain at least one token.
 */
export function searchCatalog(query: string, catalog?: undefined, topK?: number): SearchResult<CatalogItem>[];
export function searchCatalog<T extends SearchableItem>(
  query: string,
  catalog: readonly T[],
  topK?: number,
): SearchResult<T>[];
export function searchCatalog(
  query: string,
  catalog?: readonly SearchableItem[],
  topK: number = DEFAULT_TOP_K,
): SearchResult<SearchableItem>[] {
  const queryTokens = Array.from(new Set(tokenize(query)));
  if (queryTokens.length === 0 || topK <= 0) {
    return [];
  }

  const items = catalog ?? loadCatalog();
  const results: SearchResult<SearchableItem>[] = [];

  for (const item of items) {
    const haystack = searchableTokens(item);
    const matched = queryTokens.filter(token => haystack.has(token));
    if (matched.length === 0) continue;

    const titleTokens = new Set(tokenize(asText(item.title)));
    const titleMatches = queryTokens.filter(token => titleTokens.has(token)).length;

    results.push({
      item,
      score: matched.length + TITLE_BOOST * titleMatches,
      matchedTerms: [...matched].sort(),
    });
  }

  results.sort(compareResults);
  return results.slice(0, topK);
}
