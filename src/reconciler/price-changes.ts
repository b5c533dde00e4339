import { Listing, PriceChangeEvent, StoredListing } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { DataQualityError } from '../utils/errors.js';

function validPrice(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new DataQualityError('price', `Not a number: ${String(value)}`);
  }
  return value;
}

/**
 * Compare a fresh scrape against the stored snapshot of the same make/model.
 *
 * Listings are joined on listing_id; only pairs with two known, different
 * prices produce an event. Listings on one side only are not price changes.
 */
export function detectPriceChanges(
  fresh: Listing[],
  previous: Pick<StoredListing, 'listing_id' | 'price' | 'scraped_date'>[],
  now: Date = new Date()
): PriceChangeEvent[] {
  if (fresh.length === 0 || previous.length === 0) {
    return [];
  }

  const previousById = new Map(previous.map(row => [row.listing_id, row]));
  const changes: PriceChangeEvent[] = [];

  for (const listing of fresh) {
    const stored = previousById.get(listing.listing_id);
    if (!stored) continue;

    let priceOld: number | null;
    let priceNew: number | null;
    try {
      priceOld = validPrice(stored.price);
      priceNew = validPrice(listing.price);
      if (priceOld === 0) {
        throw new DataQualityError('price', 'Previous price is zero');
      }
    } catch (error) {
      if (!(error instanceof DataQualityError)) throw error;
      logger.warn('Skipping price comparison', {
        listingId: listing.listing_id,
        field: error.field,
        error: error.message,
      });
      continue;
    }

    if (priceOld === null || priceNew === null || priceNew === priceOld) continue;

    const difference = priceNew - priceOld;
    const change: PriceChangeEvent = {
      listing_id: listing.listing_id,
      make: listing.make,
      model: listing.model,
      title: listing.title || null,
      price_old: priceOld,
      price_new: priceNew,
      price_difference: difference,
      price_change_percent: (difference / priceOld) * 100,
      change_type: priceNew < priceOld ? 'DECREASE' : 'INCREASE',
      change_date: now.toISOString(),
      change_timestamp: Math.floor(now.getTime() / 1000),
      last_seen: stored.scraped_date,
    };

    logger.info(
      `${change.change_type}: ${listing.title} ${priceOld} -> ${priceNew} ` +
        `(${change.price_change_percent >= 0 ? '+' : ''}${change.price_change_percent.toFixed(1)}%)`
    );
    changes.push(change);
  }

  return changes;
}
