import { z } from 'zod';
import { ScrapeMetadata, StoredListing, StoredPriceChange } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { DataQualityError } from '../utils/errors.js';

/*
 * Row schemas for everything read back from the store. Postgres NUMERIC and
 * BIGINT columns come over the wire as strings, so numbers are coerced here;
 * a value that does not coerce becomes null instead of failing the row.
 */

const nullableNumber = z.preprocess((value) => {
  if (value === null || value === undefined || value === '') return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}, z.number().nullable());

const requiredNumber = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number().finite()
);

const nullableString = z.preprocess(
  (value) => (value === undefined || value === '' ? null : value),
  z.string().nullable()
);

const flag = z.preprocess(
  (value) => value === true || value === 1 || value === 'true' || value === 't',
  z.boolean()
);

export const storedListingSchema = z.object({
  id: requiredNumber,
  listing_id: z.coerce.string().min(1),
  make: z.string(),
  model: z.string(),
  title: z.string().nullable().transform((value) => value ?? ''),
  url: nullableString,
  price: nullableNumber,
  mileage: nullableNumber,
  fuel_type: nullableString,
  first_registration: nullableString,
  power: nullableString,
  transmission: nullableString,
  seller_type: nullableString,
  location: nullableString,
  scraped_date: z.string(),
  scraped_timestamp: requiredNumber,
  is_active: flag,
  created_at: nullableString.optional().transform((value) => value ?? null),
  updated_at: nullableString.optional().transform((value) => value ?? null),
});

export const storedPriceChangeSchema = z.object({
  id: requiredNumber,
  listing_id: z.coerce.string().min(1),
  make: z.string(),
  model: z.string(),
  title: nullableString,
  price_old: requiredNumber,
  price_new: requiredNumber,
  price_difference: requiredNumber,
  price_change_percent: requiredNumber,
  change_type: z.enum(['DECREASE', 'INCREASE']),
  change_date: z.string(),
  change_timestamp: requiredNumber,
  last_seen: nullableString,
  created_at: nullableString.optional().transform((value) => value ?? null),
});

export const scrapeMetadataSchema = z.object({
  make: z.string(),
  model: z.string(),
  last_scrape_date: z.string(),
  last_scrape_timestamp: requiredNumber,
  total_listings: requiredNumber,
  new_listings: requiredNumber,
  updated_listings: requiredNumber.catch(0),
  price_changes: requiredNumber,
  status: z.enum(['success', 'error']),
  error_message: nullableString,
  scraper_version: z.string().nullable().transform((value) => value ?? ''),
});

export const modelRowSchema = z.object({
  make: z.string(),
  model: z.string(),
});

/**
 * Validate rows read from the store. Rows that cannot be made to fit are
 * logged and dropped; the rest come back typed.
 */
export function parseRows<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  table: string
): T[] {
  if (!Array.isArray(data)) {
    return [];
  }

  const rows: T[] = [];
  data.forEach((row, index) => {
    const result = schema.safeParse(row);
    if (result.success) {
      rows.push(result.data);
      return;
    }

    const issue = new DataQualityError(
      result.error.issues.map((i) => i.path.join('.')).join(',') || 'row',
      result.error.issues.map((i) => i.message).join('; ')
    );
    logger.warn('Dropping invalid row', { table, index, field: issue.field, error: issue.message });
  });

  return rows;
}

export function parseListingRows(data: unknown): StoredListing[] {
  return parseRows(storedListingSchema, data, 'listings');
}

export function parsePriceChangeRows(data: unknown): StoredPriceChange[] {
  return parseRows(storedPriceChangeSchema, data, 'price_history');
}

export function parseMetadataRows(data: unknown): ScrapeMetadata[] {
  return parseRows(scrapeMetadataSchema, data, 'scraping_metadata');
}
