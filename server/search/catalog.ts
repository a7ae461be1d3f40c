/**
 * Catalog Loader
 *
 * Reads the product catalog JSON file and validates every record against
 * catalogItemSchema. Optional fields get their defaults here, so the rest of
 * the server only ever sees complete CatalogItem records.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { catalogItemSchema, type CatalogItem } from '@shared/schema';
import { LoadError } from './errors';

export const DEFAULT_CATALOG_PATH = 'data/product_catalog.json';

const catalogSchema = z.array(catalogItemSchema);

function describeIssue(issue: z.ZodIssue): string {
  const [index, ...field] = issue.path;
  const location = field.length > 0 ? `item ${index} field "${field.join('.')}"` : `item ${index}`;
  return `${location}: ${issue.message}`;
}

export function loadCatalog(catalogPath: string = DEFAULT_CATALOG_PATH): CatalogItem[] {
  const fullPath = path.resolve(catalogPath);

  let raw: string;
  try {
    raw = fs.readFileSync(fullPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LoadError(`Could not read catalog at ${fullPath}: ${reason}`, fullPath, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LoadError(`Catalog at ${fullPath} is not valid JSON: ${reason}`, fullPath, { cause: error });
  }

  if (!Array.isArray(parsed)) {
    throw new LoadError(`Catalog at ${fullPath} must be a JSON array of products`, fullPath);
  }

  const result = catalogSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 3).map(describeIssue).join('; ');
    throw new LoadError(`Catalog at ${fullPath} failed validation: ${issues}`, fullPath, {
      cause: result.error,
    });
  }

  console.log(`[Catalog] Loaded ${result.data.length} products from ${fullPath}`);
  return result.data;
}
