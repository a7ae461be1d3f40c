/**
 * Constraint Filters
 *
 * Hard post-filters applied to already ranked results. Survivors keep their
 * relative order; nothing is re-sorted here.
 */

import type { Constraints, SearchableItem, SearchResult } from '@shared/schema';

/**
 * An item without a price can't be compared, so it passes.
 */
export function matchesBudget(item: SearchableItem, budgetMax: number): boolean {
  if (item.price_usd === undefined) return true;
  return item.price_usd <= budgetMax;
}

// Exact, case-sensitive match against the catalog's own category field
export function matchesCategory(item: SearchableItem, categories: readonly string[]): boolean {
  return item.category !== undefined && categories.includes(item.category);
}

export function matchesColor(item: SearchableItem, colors: readonly string[]): boolean {
  const itemColors = (item.colors ?? []).map(color => color.trim().toLowerCase());
  return itemColors.some(color => colors.includes(color));
}

export function satisfiesConstraints(item: SearchableItem, constraints: Constraints): boolean {
  if (constraints.budgetMax !== undefined && !matchesBudget(item, constraints.budgetMax)) {
    return false;
  }
  if (constraints.categories && !matchesCategory(item, constraints.categories)) {
    return false;
  }
  if (constraints.colors && !matchesColor(item, constraints.colors)) {
    return false;
  }
  return true;
}

export function filterResults<T extends SearchableItem>(
  results: readonly SearchResult<T>[],
  constraints: Constraints,
): SearchResult<T>[] {
  return results.filter(result => satisfiesConstraints(result.item, constraints));
}
