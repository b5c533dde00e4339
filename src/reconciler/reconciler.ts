import { Listing, ReconcileOutcome } from '../types/index.js';
import { SnapshotStore } from '../database/snapshot-store.js';
import { logger } from '../utils/logger.js';
import { detectPriceChanges } from './price-changes.js';

export interface ReconcileOptions {
  /** False when the scrape is known to be partial, e.g. a results page failed */
  deactivateMissing?: boolean;
}

/**
 * Applies a fresh scrape of one make/model to the snapshot store:
 * upsert what was seen, record price changes, deactivate what was not.
 */
export class Reconciler {
  constructor(
    private readonly store: SnapshotStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async reconcile(
    make: string,
    model: string,
    scraped: Listing[],
    options: ReconcileOptions = {}
  ): Promise<ReconcileOutcome> {
    // An empty scrape is treated as "no update", never as "everything vanished"
    if (scraped.length === 0) {
      logger.warn('Empty scrape result, store left untouched', { make, model });
      return { skipped: true, inserted: 0, updated: 0, deactivated: 0, priceChanges: [] };
    }

    const previous = await this.store.getActiveListings(make, model);
    const priceChanges = detectPriceChanges(scraped, previous, this.now());

    // No event is stored unless its listing row was saved
    const { inserted, updated } = await this.store.insertListings(make, model, scraped);
    await this.store.insertPriceChanges(priceChanges);

    let deactivated = 0;
    if (options.deactivateMissing ?? true) {
      deactivated = await this.store.markListingsInactive(
        make,
        model,
        scraped.map(listing => listing.listing_id)
      );
    } else {
      logger.warn('Partial scrape, unseen listings stay active', { make, model });
    }

    logger.info('Reconciliation completed', {
      make,
      model,
      previous: previous.length,
      scraped: scraped.length,
      inserted,
      updated,
      deactivated,
      priceChanges: priceChanges.length,
    });

    return { skipped: false, inserted, updated, deactivated, priceChanges };
  }
}
