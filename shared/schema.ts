import { z } from "zod";

// ============ CATALOG ============

// Field names follow the catalog JSON file, hence snake_case.
export const catalogItemSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(""),
  brand: z.string().min(1),
  category: z.string().min(1),
  style_tags: z.array(z.string()).nullish().transform(tags => tags ?? []),
  colors: z.array(z.string()).nullish().transform(colors => colors ?? []),
  price_usd: z.number().nonnegative(),
  // Left unset when absent: ranking reads it as 0, display as "N/A"
  rating: z.number().optional(),
  num_reviews: z.number().int().nonnegative().default(0),
});

export type CatalogItem = z.infer<typeof catalogItemSchema>;

/**
 * Shape the scoring and filtering code reads from. Every field is optional so
 * records that never went through `catalogItemSchema` can still be searched.
 */
export interface SearchableItem {
  title?: string;
  description?: string;
  brand?: string;
  category?: string;
  style_tags?: readonly string[] | null;
  colors?: readonly string[] | null;
  price_usd?: number;
  rating?: number;
  num_reviews?: number;
}

// ============ SEARCH ============

export interface SearchResult<T extends SearchableItem = CatalogItem> {
  /** Same object as the catalog entry, never a copy. */
  item: T;
  score: number;
  matchedTerms: string[];
}

export interface Constraints {
  budgetMax?: number;
  colors?: string[];
  categories?: string[];
}

// ============ API ============

export const shopSearchRequestSchema = z.object({
  query: z.string(),
  limit: z.coerce.number().int().min(1).max(50).default(8),
});

export type ShopSearchRequest = z.input<typeof shopSearchRequestSchema>;

export interface ResultView {
  title: string;
  brand: string;
  price: string;
  category: string;
  rating: string;
  numReviews: number;
  description: string;
  matchedTerms: string[];
  score: number;
}

export interface ShopSearchResponse {
  success: true;
  query: string;
  count: number;
  unfilteredCount: number;
  constraints: Constraints;
  results: ResultView[];
}

export interface ApiErrorResponse {
  success: false;
  error: string;
  details?: string;
}
