import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Reconciler } from './reconciler.js';
import { InMemorySnapshotStore } from '../database/in-memory-snapshot-store.js';
import { Listing } from '../types/index.js';
import { PersistenceError } from '../utils/errors.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const MAKE = 'mercedes-benz';
const MODEL = 'a-200';

function listing(id: string, price: number, scrapedAt = '2024-05-01T08:00:00.000Z'): Listing {
  const date = new Date(scrapedAt);
  return {
    listing_id: id,
    make: MAKE,
    model: MODEL,
    title: `Mercedes-Benz A 200 ${id}`,
    url: `https://www.autoscout24.lu/offres/${id}`,
    price,
    mileage: 30000,
    fuel_type: 'Petrol',
    first_registration: '06-2021',
    power: '120 kW (163 PS)',
    transmission: 'Automatic',
    seller_type: 'Dealer',
    location: 'Luxembourg',
    scraped_date: date.toISOString(),
    scraped_timestamp: Math.floor(date.getTime() / 1000),
  };
}

describe('Reconciler', () => {
  let store: InMemorySnapshotStore;
  let reconciler: Reconciler;

  beforeEach(async () => {
    store = new InMemorySnapshotStore();
    reconciler = new Reconciler(store, () => new Date('2024-05-02T08:00:00.000Z'));

    // Previous run: A at 21000, B at 15000, C at 9000
    await store.insertListings(MAKE, MODEL, [listing('A', 21000), listing('B', 15000), listing('C', 9000)]);
  });

  it('records price changes, refreshes seen listings and deactivates vanished ones', async () => {
    const later = '2024-05-02T08:00:00.000Z';
    const outcome = await reconciler.reconcile(MAKE, MODEL, [listing('A', 20000, later), listing('B', 15000, later)]);

    expect(outcome.skipped).toBe(false);
    expect(outcome.inserted).toBe(0);
    expect(outcome.updated).toBe(2);
    expect(outcome.deactivated).toBe(1);
    expect(outcome.priceChanges).toHaveLength(1);
    expect(outcome.priceChanges[0]).toMatchObject({
      listing_id: 'A',
      price_old: 21000,
      price_new: 20000,
      price_difference: -1000,
      change_type: 'DECREASE',
      last_seen: '2024-05-01T08:00:00.000Z',
    });

    const active = await store.getActiveListings(MAKE, MODEL);
    expect(active.map(l => l.listing_id).sort()).toEqual(['A', 'B']);
    expect(active.find(l => l.listing_id === 'A')?.price).toBe(20000);

    const history = await store.getPriceHistory(MAKE, MODEL);
    expect(history.map(h => h.listing_id)).toEqual(['A']);
  });

  it('counts new listings separately from updated ones', async () => {
    const outcome = await reconciler.reconcile(MAKE, MODEL, [listing('A', 21000), listing('D', 30000)]);

    expect(outcome).toMatchObject({ inserted: 1, updated: 1, deactivated: 2, priceChanges: [] });
  });

  it('re-activates a listing that reappears', async () => {
    await reconciler.reconcile(MAKE, MODEL, [listing('A', 21000)]);
    await reconciler.reconcile(MAKE, MODEL, [listing('A', 21000), listing('C', 8500)]);

    const active = await store.getActiveListings(MAKE, MODEL);
    expect(active.map(l => l.listing_id).sort()).toEqual(['A', 'C']);

    // C was inactive when it came back, so there was no previous price to compare against
    expect(await store.getPriceHistory(MAKE, MODEL)).toEqual([]);
  });

  it('leaves the store untouched for an empty scrape', async () => {
    const outcome = await reconciler.reconcile(MAKE, MODEL, []);

    expect(outcome).toEqual({ skipped: true, inserted: 0, updated: 0, deactivated: 0, priceChanges: [] });
    expect(await store.getActiveListings(MAKE, MODEL)).toHaveLength(3);
  });

  it('is idempotent when the same scrape is applied twice', async () => {
    const scrape = [listing('A', 20000), listing('B', 15000)];
    await reconciler.reconcile(MAKE, MODEL, scrape);
    const second = await reconciler.reconcile(MAKE, MODEL, scrape);

    expect(second).toMatchObject({ inserted: 0, updated: 2, deactivated: 0, priceChanges: [] });
    expect(await store.listModels()).toEqual([{ make: MAKE, model: MODEL, count: 2 }]);
  });

  it('keeps unseen listings active when told the scrape is partial', async () => {
    const outcome = await reconciler.reconcile(MAKE, MODEL, [listing('A', 20000)], { deactivateMissing: false });

    expect(outcome).toMatchObject({ updated: 1, deactivated: 0 });
    expect((await store.getActiveListings(MAKE, MODEL)).map(l => l.listing_id).sort()).toEqual(['A', 'B', 'C']);
    expect(await store.getPriceHistory(MAKE, MODEL)).toHaveLength(1);
  });

  it('records no price change when the listing upsert fails', async () => {
    vi.spyOn(store, 'insertListings').mockRejectedValueOnce(
      new PersistenceError('insertListings', 'connection reset')
    );

    await expect(reconciler.reconcile(MAKE, MODEL, [listing('A', 20000)])).rejects.toThrow(PersistenceError);
    expect(await store.getPriceHistory(MAKE, MODEL)).toEqual([]);

    await reconciler.reconcile(MAKE, MODEL, [listing('A', 20000)]);
    const history = await store.getPriceHistory(MAKE, MODEL);
    expect(history.map(h => [h.listing_id, h.price_old, h.price_new])).toEqual([['A', 21000, 20000]]);
  });

  it('propagates storage failures', async () => {
    vi.spyOn(store, 'insertListings').mockRejectedValueOnce(
      new PersistenceError('insertListings', 'connection reset')
    );

    await expect(reconciler.reconcile(MAKE, MODEL, [listing('A', 20000)])).rejects.toThrow(
      'insertListings failed: connection reset'
    );
  });
});
