/**
 * Constraint Parser - Extracts hard filters from natural language queries
 *
 * "winter wedding guest dress under $150" -> { budgetMax: 150, categories: ['dress'] }
 *
 * Colors and categories use plain substring matching, so a color hidden
 * inside a longer word ("tailored" contains "red") still counts.
 */

import type { Constraints } from '@shared/schema';

// Tried in this order; the first pattern that matches anywhere wins.
const BUDGET_PATTERNS = [
  /(?:under|below|less\s+than)\s*\$?\s*(\d+(?:\.\d+)?)/i,
  /\$?(\d+(?:\.\d+)?)\s*(?:max|maximum|or\s+less)/i,
];

export const COLORS = [
  'black', 'white', 'ivory', 'cream', 'beige', 'camel', 'brown',
  'red', 'burgundy', 'pink', 'blush', 'orange', 'yellow', 'gold', 'silver',
  'green', 'olive', 'emerald', 'blue', 'light blue', 'navy',
  'purple', 'lavender', 'gray', 'grey',
];

// Product keyword -> catalog category
export const CATEGORY_KEYWORDS: Record<string, string> = {
  'dress': 'dress',
  'gown': 'dress',
  'sundress': 'dress',
  'slip dress': 'dress',
  'midi dress': 'dress',
  'maxi dress': 'dress',
  'cocktail dress': 'dress',
  'coat': 'outerwear',
  'jacket': 'outerwear',
  'blazer': 'outerwear',
  'parka': 'outerwear',
  'trench coat': 'outerwear',
  'blouse': 'top',
  'shirt': 'top',
  'sweater': 'top',
  'cardigan': 'top',
  'jeans': 'bottom',
  'trousers': 'bottom',
  'pants': 'bottom',
  'skirt': 'bottom',
  'boots': 'shoes',
  'heels': 'shoes',
  'sneakers': 'shoes',
  'sandals': 'shoes',
  'loafers': 'shoes',
  'scarf': 'accessory',
  'handbag': 'accessory',
  'clutch': 'accessory',
  'belt': 'accessory',
};

// Longest first so "slip dress" is tested before "dress"
const CATEGORY_KEYS_BY_LENGTH = Object.keys(CATEGORY_KEYWORDS).sort((a, b) => b.length - a.length);

export function parseBudget(query: string): number | undefined {
  for (const pattern of BUDGET_PATTERNS) {
    const match = query.match(pattern);
    if (match) {
      return parseFloat(match[1]);
    }
  }
  return undefined;
}

export function parseColors(query: string): string[] | undefined {
  const q = query.toLowerCase();
  const found = new Set(COLORS.filter(color => q.includes(color)));
  return found.size > 0 ? Array.from(found).sort() : undefined;
}

export function parseCategories(query: string): string[] | undefined {
  const q = query.toLowerCase();
  const found = new Set<string>();
  for (const keyword of CATEGORY_KEYS_BY_LENGTH) {
    if (q.includes(keyword)) {
      found.add(CATEGORY_KEYWORDS[keyword]);
    }
  }
  return found.size > 0 ? Array.from(found).sort() : undefined;
}

/**
 * Parse budget, color and category constraints out of a free-text query.
 * Unset fields are left off the returned object entirely.
 */
export function parseConstraints(query: string): Constraints {
  const constraints: Constraints = {};

  const budgetMax = parseBudget(query);
  if (budgetMax !== undefined) constraints.budgetMax = budgetMax;

  const colors = parseColors(query);
  if (colors) constraints.colors = colors;

  const categories = parseCategories(query);
  if (categories) constraints.categories = categories;

  return constraints;
}
