import { describe, it, expect, beforeEach } from 'vitest';
import { InMemorySnapshotStore } from './in-memory-snapshot-store.js';
import { Listing } from '../types/index.js';

function listing(id: string, make: string, model: string): Listing {
  return {
    listing_id: id,
    make,
    model,
    title: `${make} ${model} ${id}`,
    url: null,
    price: 18000,
    mileage: 70000,
    fuel_type: 'Diesel',
    first_registration: '03-2019',
    power: '85 kW (116 PS)',
    transmission: 'Manual',
    seller_type: 'Private',
    location: null,
    scraped_date: '2024-05-01T08:00:00.000Z',
    scraped_timestamp: 1714550400,
  };
}

const activeIds = async (store: InMemorySnapshotStore, make: string, model: string) =>
  (await store.getActiveListings(make, model)).map(l => l.listing_id).sort();

describe('InMemorySnapshotStore', () => {
  let store: InMemorySnapshotStore;

  beforeEach(async () => {
    store = new InMemorySnapshotStore();
    await store.insertListings('vw', 'golf', [listing('G1', 'vw', 'golf'), listing('G2', 'vw', 'golf')]);
    await store.insertListings('vw', 'polo', [listing('P1', 'vw', 'polo')]);
  });

  describe('markListingsInactive', () => {
    it('deactivates every active listing of the key for an empty id list', async () => {
      expect(await store.markListingsInactive('vw', 'golf', [])).toBe(2);

      expect(await activeIds(store, 'vw', 'golf')).toEqual([]);
      expect(await activeIds(store, 'vw', 'polo')).toEqual(['P1']);
    });

    it('changes nothing when repeated with the same ids', async () => {
      expect(await store.markListingsInactive('vw', 'golf', ['G1'])).toBe(1);
      const afterFirst = await activeIds(store, 'vw', 'golf');

      expect(await store.markListingsInactive('vw', 'golf', ['G1'])).toBe(0);
      expect(await activeIds(store, 'vw', 'golf')).toEqual(afterFirst);
      expect(afterFirst).toEqual(['G1']);
    });
  });

  it('reactivates a listing when it is saved again', async () => {
    await store.markListingsInactive('vw', 'golf', []);

    expect(await store.insertListings('vw', 'golf', [listing('G2', 'vw', 'golf')])).toEqual({
      inserted: 0,
      updated: 1,
    });
    expect(await activeIds(store, 'vw', 'golf')).toEqual(['G2']);
  });
});
