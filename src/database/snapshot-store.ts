import { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import {
  Listing,
  ListingFilter,
  ModelCount,
  PriceChangeEvent,
  ScrapeMetadata,
  StoredListing,
  StoredPriceChange,
  UpsertResult,
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { PersistenceError } from '../utils/errors.js';
import {
  modelRowSchema,
  parseListingRows,
  parseMetadataRows,
  parsePriceChangeRows,
  parseRows,
} from './rows.js';

/**
 * Durable state of the tracker: current listings, the price-change ledger
 * and one metadata row per make/model. Each write method is a single
 * statement, so a failed batch leaves nothing behind.
 */
export interface SnapshotStore {
  getActiveListings(make: string, model: string): Promise<StoredListing[]>;
  insertListings(make: string, model: string, listings: Listing[]): Promise<UpsertResult>;
  markListingsInactive(make: string, model: string, currentIds: string[]): Promise<number>;
  insertPriceChanges(events: PriceChangeEvent[]): Promise<number>;
  getPriceHistory(make: string, model: string, limit?: number): Promise<StoredPriceChange[]>;
  upsertMetadata(metadata: ScrapeMetadata): Promise<void>;
  getAllMetadata(): Promise<ScrapeMetadata[]>;
  listModels(): Promise<ModelCount[]>;
  listAllActiveListings(filter?: ListingFilter): Promise<StoredListing[]>;
  listAllPriceHistory(filter?: ListingFilter): Promise<StoredPriceChange[]>;
}

export const LISTING_CONFLICT_KEY = 'listing_id,make,model';
export const METADATA_CONFLICT_KEY = 'make,model';

/**
 * Columns written for a listing; the rest keep their stored values
 */
export function toListingRow(listing: Listing, make: string, model: string, updatedAt: string) {
  return {
    listing_id: listing.listing_id,
    make,
    model,
    title: listing.title,
    url: listing.url,
    price: listing.price,
    mileage: listing.mileage,
    fuel_type: listing.fuel_type,
    first_registration: listing.first_registration,
    power: listing.power,
    transmission: listing.transmission,
    seller_type: listing.seller_type,
    location: listing.location,
    scraped_date: listing.scraped_date,
    scraped_timestamp: listing.scraped_timestamp,
    is_active: true,
    updated_at: updatedAt,
  };
}

/**
 * Last occurrence wins when the same identifier appears twice in one batch
 */
export function uniqueById(listings: Listing[]): Listing[] {
  const byId = new Map<string, Listing>();
  for (const listing of listings) {
    byId.set(listing.listing_id, listing);
  }
  return Array.from(byId.values());
}

interface QueryError {
  message: string;
  code?: string;
}

interface QueryResult {
  data: unknown;
  error: QueryError | null;
}

const PAGE_SIZE = 1000;

export class SupabaseSnapshotStore implements SnapshotStore {
  constructor(private readonly client: SupabaseClient) {}

  async getActiveListings(make: string, model: string): Promise<StoredListing[]> {
    const rows = await this.fetchAll('getActiveListings', (from, to) =>
      this.client
        .from('listings')
        .select('*')
        .eq('make', make)
        .eq('model', model)
        .eq('is_active', true)
        .order('scraped_timestamp', { ascending: false })
        .order('id')
        .range(from, to)
    );

    const listings = parseListingRows(rows);
    logger.info('Loaded stored listings', { make, model, count: listings.length });
    return listings;
  }

  async insertListings(make: string, model: string, listings: Listing[]): Promise<UpsertResult> {
    if (listings.length === 0) {
      return { inserted: 0, updated: 0 };
    }

    const existingRows = await this.fetchAll('insertListings', (from, to) =>
      this.client
        .from('listings')
        .select('listing_id')
        .eq('make', make)
        .eq('model', model)
        .order('id')
        .range(from, to)
    );
    const existingIds = new Set(
      parseRows(z.object({ listing_id: z.coerce.string() }), existingRows, 'listings').map(r => r.listing_id)
    );

    const batch = uniqueById(listings);
    const updatedAt = new Date().toISOString();
    const rows = batch.map(listing => toListingRow(listing, make, model, updatedAt));

    const { error } = await this.client.from('listings').upsert(rows, { onConflict: LISTING_CONFLICT_KEY });
    this.throwOnError('insertListings', error, { make, model, count: rows.length });

    const updated = batch.filter(listing => existingIds.has(listing.listing_id)).length;
    const result = { inserted: batch.length - updated, updated };

    logger.info('Listings saved', { make, model, ...result });
    return result;
  }

  async markListingsInactive(make: string, model: string, currentIds: string[]): Promise<number> {
    const { data, error } = await this.client.rpc('mark_listings_inactive', {
      p_make: make,
      p_model: model,
      p_current_ids: currentIds,
    });
    this.throwOnError('markListingsInactive', error, { make, model });

    const parsed = z.coerce.number().safeParse(data);
    const affected = parsed.success ? parsed.data : 0;

    if (affected > 0) {
      logger.info('Listings marked inactive', { make, model, count: affected });
    }
    return affected;
  }

  async insertPriceChanges(events: PriceChangeEvent[]): Promise<number> {
    if (events.length === 0) {
      return 0;
    }

    const { error } = await this.client.from('price_history').insert(events);
    this.throwOnError('insertPriceChanges', error, { count: events.length });

    logger.info('Price changes saved', { count: events.length });
    return events.length;
  }

  async getPriceHistory(make: string, model: string, limit?: number): Promise<StoredPriceChange[]> {
    const query = () =>
      this.client
        .from('price_history')
        .select('*')
        .eq('make', make)
        .eq('model', model)
        .order('change_timestamp', { ascending: false })
        .order('id');

    if (limit !== undefined) {
      const { data, error } = await query().limit(limit);
      this.throwOnError('getPriceHistory', error, { make, model });
      return parsePriceChangeRows(data);
    }

    const rows = await this.fetchAll('getPriceHistory', (from, to) => query().range(from, to));
    return parsePriceChangeRows(rows);
  }

  async upsertMetadata(metadata: ScrapeMetadata): Promise<void> {
    const { error } = await this.client
      .from('scraping_metadata')
      .upsert(metadata, { onConflict: METADATA_CONFLICT_KEY });
    this.throwOnError('upsertMetadata', error, { make: metadata.make, model: metadata.model });

    logger.info('Metadata updated', { make: metadata.make, model: metadata.model, status: metadata.status });
  }

  async getAllMetadata(): Promise<ScrapeMetadata[]> {
    const { data, error } = await this.client
      .from('scraping_metadata')
      .select('*')
      .order('last_scrape_timestamp', { ascending: false })
      .order('make')
      .order('model');
    this.throwOnError('getAllMetadata', error);

    return parseMetadataRows(data);
  }

  async listModels(): Promise<ModelCount[]> {
    const rows = await this.fetchAll('listModels', (from, to) =>
      this.client.from('listings').select('make, model').eq('is_active', true).order('id').range(from, to)
    );

    const counts = new Map<string, ModelCount>();
    for (const row of parseRows(modelRowSchema, rows, 'listings')) {
      const key = `${row.make}\u0000${row.model}`;
      const entry = counts.get(key) ?? { make: row.make, model: row.model, count: 0 };
      entry.count++;
      counts.set(key, entry);
    }

    return Array.from(counts.values()).sort(
      (a, b) => a.make.localeCompare(b.make) || a.model.localeCompare(b.model)
    );
  }

  async listAllActiveListings(filter: ListingFilter = {}): Promise<StoredListing[]> {
    const rows = await this.fetchAll('listAllActiveListings', (from, to) => {
      let query = this.client.from('listings').select('*').eq('is_active', true);
      if (filter.make) query = query.eq('make', filter.make);
      if (filter.model) query = query.eq('model', filter.model);
      return query.order('price', { ascending: true }).order('id').range(from, to);
    });

    return parseListingRows(rows);
  }

  async listAllPriceHistory(filter: ListingFilter = {}): Promise<StoredPriceChange[]> {
    const rows = await this.fetchAll('listAllPriceHistory', (from, to) => {
      let query = this.client.from('price_history').select('*');
      if (filter.make) query = query.eq('make', filter.make);
      if (filter.model) query = query.eq('model', filter.model);
      return query.order('change_timestamp', { ascending: false }).order('id').range(from, to);
    });

    return parsePriceChangeRows(rows);
  }

  /**
   * PostgREST caps a response at 1000 rows; read page by page until a short page
   */
  private async fetchAll(
    operation: string,
    build: (from: number, to: number) => PromiseLike<QueryResult>
  ): Promise<unknown[]> {
    const rows: unknown[] = [];

    for (let from = 0; ; from += PAGE_SIZE) {
      const { data, error } = await build(from, from + PAGE_SIZE - 1);
      this.throwOnError(operation, error);

      const page = Array.isArray(data) ? data : [];
      rows.push(...page);

      if (page.length < PAGE_SIZE) {
        return rows;
      }
    }
  }

  private throwOnError(operation: string, error: QueryError | null, context: Record<string, unknown> = {}): void {
    if (!error) return;

    logger.error(`Failed to ${operation}`, { ...context, error: error.message, code: error.code });
    throw new PersistenceError(operation, error.message, error.code);
  }
}
