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
import { SnapshotStore, uniqueById } from './snapshot-store.js';

const listingKey = (listingId: string, make: string, model: string) => `${listingId}\u0000${make}\u0000${model}`;

const matches = (filter: ListingFilter, row: { make: string; model: string }) =>
  (!filter.make || row.make === filter.make) && (!filter.model || row.model === filter.model);

const byChangeTimestampDesc = (a: StoredPriceChange, b: StoredPriceChange) =>
  b.change_timestamp - a.change_timestamp || a.id - b.id;

/**
 * Process-local store with the same semantics as the Supabase one.
 * Backs `--dry-run` and the tests.
 */
export class InMemorySnapshotStore implements SnapshotStore {
  private readonly listings = new Map<string, StoredListing>();
  private readonly priceHistory: StoredPriceChange[] = [];
  private readonly metadata = new Map<string, ScrapeMetadata>();
  private nextListingId = 1;
  private nextChangeId = 1;

  async getActiveListings(make: string, model: string): Promise<StoredListing[]> {
    return Array.from(this.listings.values())
      .filter(row => row.make === make && row.model === model && row.is_active)
      .sort((a, b) => b.scraped_timestamp - a.scraped_timestamp || a.id - b.id)
      .map(row => ({ ...row }));
  }

  async insertListings(make: string, model: string, listings: Listing[]): Promise<UpsertResult> {
    const now = new Date().toISOString();
    let inserted = 0;
    let updated = 0;

    for (const listing of uniqueById(listings)) {
      const key = listingKey(listing.listing_id, make, model);
      const existing = this.listings.get(key);

      if (existing) {
        this.listings.set(key, {
          ...existing,
          ...listing,
          make,
          model,
          is_active: true,
          updated_at: now,
        });
        updated++;
      } else {
        this.listings.set(key, {
          ...listing,
          make,
          model,
          id: this.nextListingId++,
          is_active: true,
          created_at: now,
          updated_at: now,
        });
        inserted++;
      }
    }

    return { inserted, updated };
  }

  async markListingsInactive(make: string, model: string, currentIds: string[]): Promise<number> {
    const current = new Set(currentIds);
    const now = new Date().toISOString();
    let affected = 0;

    for (const [key, row] of this.listings) {
      if (row.make !== make || row.model !== model || !row.is_active) continue;
      if (current.has(row.listing_id)) continue;

      this.listings.set(key, { ...row, is_active: false, updated_at: now });
      affected++;
    }

    return affected;
  }

  async insertPriceChanges(events: PriceChangeEvent[]): Promise<number> {
    const createdAt = new Date().toISOString();
    for (const event of events) {
      this.priceHistory.push({ ...event, id: this.nextChangeId++, created_at: createdAt });
    }
    return events.length;
  }

  async getPriceHistory(make: string, model: string, limit?: number): Promise<StoredPriceChange[]> {
    const rows = this.priceHistory
      .filter(row => row.make === make && row.model === model)
      .sort(byChangeTimestampDesc)
      .map(row => ({ ...row }));

    return limit === undefined ? rows : rows.slice(0, limit);
  }

  async upsertMetadata(metadata: ScrapeMetadata): Promise<void> {
    this.metadata.set(`${metadata.make}\u0000${metadata.model}`, { ...metadata });
  }

  async getAllMetadata(): Promise<ScrapeMetadata[]> {
    return Array.from(this.metadata.values())
      .sort(
        (a, b) =>
          b.last_scrape_timestamp - a.last_scrape_timestamp ||
          a.make.localeCompare(b.make) ||
          a.model.localeCompare(b.model)
      )
      .map(row => ({ ...row }));
  }

  async listModels(): Promise<ModelCount[]> {
    const counts = new Map<string, ModelCount>();

    for (const row of this.listings.values()) {
      if (!row.is_active) continue;
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
    return Array.from(this.listings.values())
      .filter(row => row.is_active && matches(filter, row))
      .sort((a, b) => (a.price ?? Infinity) - (b.price ?? Infinity) || a.id - b.id)
      .map(row => ({ ...row }));
  }

  async listAllPriceHistory(filter: ListingFilter = {}): Promise<StoredPriceChange[]> {
    return this.priceHistory
      .filter(row => matches(filter, row))
      .sort(byChangeTimestampDesc)
      .map(row => ({ ...row }));
  }
}
