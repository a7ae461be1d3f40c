/**
 * Search Module Index
 *
 * Structure:
 * - tokenizer.ts: query/field tokenization
 * - catalog.ts: catalog JSON loading and validation
 * - ranking.ts: keyword scoring, ordering and top-k
 * - constraints.ts: budget/color/category extraction from the query
 * - filters.ts: constraint post-filters
 * - presentation.ts: display view of a result
 * - pipeline.ts: the full search used by the API and the CLI
 */

export * from './types';
export * from './errors';
export * from './tokenizer';
export * from './catalog';
export * from './ranking';
export * from './constraints';
export * from './filters';
export * from './presentation';
export * from './pipeline';
