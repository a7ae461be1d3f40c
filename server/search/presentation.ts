/**
 * Result Presentation
 *
 * Turns a scored result into the flat view the page and the CLI render.
 * This is the only place that insists on title, brand, price and category
 * being present; scoring and filtering tolerate their absence.
 */

import type { ResultView, SearchableItem, SearchResult } from '@shared/schema';
import { FieldAccessError } from './errors';

function requireText(item: SearchableItem, field: 'title' | 'brand' | 'category'): string {
  const value = item[field];
  if (value == null) {
    throw new FieldAccessError(field, item.title);
  }
  return String(value);
}

function requirePrice(item: SearchableItem): number {
  const value = item.price_usd;
  if (value == null) {
    throw new FieldAccessError('price_usd', item.title);
  }
  return Number(value);
}

export function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`;
}

export function presentResult(result: SearchResult<SearchableItem>): ResultView {
  const { item } = result;
  return {
    title: requireText(item, 'title'),
    brand: requireText(item, 'brand'),
    price: formatPrice(requirePrice(item)),
    category: requireText(item, 'category'),
    rating: item.rating === undefined ? 'N/A' : String(item.rating),
    numReviews: item.num_reviews ?? 0,
    description: item.description ?? '',
    matchedTerms: result.matchedTerms,
    score: result.score,
  };
}
