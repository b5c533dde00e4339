import { describe, it, expect, vi, beforeEach, Mock } from 'vitest';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ScrapeRunner, modelPauseSeconds, RunOptions } from './scrape-runner.js';
import { InMemorySnapshotStore } from '../database/in-memory-snapshot-store.js';
import { PageFetcher } from '../scraper/page-client.js';
import { buildSearchUrl } from '../scraper/pagination.js';
import { FetchedPage, Listing } from '../types/index.js';
import { PersistenceError, TransportError } from '../utils/errors.js';
import { captureError } from '../utils/sentry.js';
import { logger } from '../utils/logger.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('../utils/sentry.js', () => ({
  captureError: vi.fn(),
}));

const BASE_URL = 'https://www.autoscout24.lu';
const NOW = new Date('2024-05-02T08:00:00.000Z');

const urlFor = (make: string, model: string) => buildSearchUrl({ baseUrl: BASE_URL, make, model });

function resultPage(ids: string[]): string {
  const articles = ids.map(
    id => `
      <article class="cldt-summary-full-item" data-guid="${id}" data-price="20000" data-mileage="10000">
        <a class="ListItem_title" href="/offres/${id}">Listing ${id}</a>
      </article>`
  );
  return `<html><body>${articles.join('')}</body></html>`;
}

function listingFromPage(id: string): Listing {
  return {
    listing_id: id,
    make: 'audi',
    model: 'a4',
    title: `Listing ${id}`,
    url: null,
    price: 20000,
    mileage: 10000,
    fuel_type: null,
    first_registration: null,
    power: null,
    transmission: null,
    seller_type: null,
    location: null,
    scraped_date: '2024-05-01T08:00:00.000Z',
    scraped_timestamp: 1714550400,
  };
}

class FakeFetcher implements PageFetcher {
  constructor(private readonly pages: Record<string, string>) {}

  async fetchPage(url: string): Promise<FetchedPage> {
    const page = this.pages[url];
    if (page === undefined) {
      throw new TransportError('Request failed: HTTP 503', url, 503);
    }
    return { html: page, responseTimeMs: 200 };
  }
}

const options: RunOptions = { maxPages: 1, delaySeconds: 1, stopOnEmpty: true, adaptiveDelay: false };

describe('ScrapeRunner', () => {
  let store: InMemorySnapshotStore;
  let sleep: Mock<(ms: number) => Promise<void>>;

  const createRunner = (pages: Record<string, string>) =>
    new ScrapeRunner({
      store,
      fetcher: new FakeFetcher(pages),
      baseUrl: BASE_URL,
      maxAutoPages: 50,
      scraperVersion: '2.0',
      sleep,
      now: () => NOW,
    });

  beforeEach(() => {
    vi.clearAllMocks();
    store = new InMemorySnapshotStore();
    sleep = vi.fn(async (_ms: number) => undefined);
  });

  describe('runScrape', () => {
    it('stores the listings and records a successful run', async () => {
      const runner = createRunner({ [urlFor('audi', 'a4')]: resultPage(['a', 'b']) });

      const result = await runner.runScrape('audi', 'a4', options);

      expect(result).toMatchObject({
        make: 'audi',
        model: 'a4',
        status: 'success',
        totalListings: 2,
        inserted: 2,
        updated: 0,
        deactivated: 0,
        priceChanges: 0,
        pagesScraped: 1,
      });
      expect(await store.getAllMetadata()).toEqual([
        {
          make: 'audi',
          model: 'a4',
          last_scrape_date: '2024-05-02T08:00:00.000Z',
          last_scrape_timestamp: 1714636800,
          total_listings: 2,
          new_listings: 2,
          updated_listings: 0,
          price_changes: 0,
          status: 'success',
          error_message: null,
          scraper_version: '2.0',
        },
      ]);
    });

    it('records an error run when page 1 cannot be loaded', async () => {
      const runner = createRunner({});

      const result = await runner.runScrape('audi', 'a4', options);

      expect(result.status).toBe('error');
      expect(result.error).toBe('Request failed: HTTP 503');
      expect(await store.getAllMetadata()).toEqual([
        expect.objectContaining({ status: 'error', error_message: 'Request failed: HTTP 503', total_listings: 0 }),
      ]);
    });

    it('skips a run that found no listings and leaves the store alone', async () => {
      const runner = createRunner({ [urlFor('audi', 'a4')]: resultPage([]) });

      const result = await runner.runScrape('audi', 'a4', options);

      expect(result.status).toBe('skipped');
      expect(await store.getAllMetadata()).toEqual([]);
    });

    it('keeps unseen listings active when a later page failed', async () => {
      const audi = urlFor('audi', 'a4');
      await store.insertListings('audi', 'a4', [listingFromPage('a'), listingFromPage('z')]);
      const runner = createRunner({ [audi]: resultPage(['a']) });

      const result = await runner.runScrape('audi', 'a4', { ...options, maxPages: 2 });

      expect(result).toMatchObject({ status: 'success', updated: 1, deactivated: 0, pagesScraped: 1 });
      expect((await store.getActiveListings('audi', 'a4')).map(l => l.listing_id).sort()).toEqual(['a', 'z']);
    });

    it('exports the model to CSV when an export directory is given', async () => {
      const exportDir = mkdtempSync(join(tmpdir(), 'runner-export-'));
      try {
        const runner = createRunner({ [urlFor('audi', 'a4')]: resultPage(['a']) });

        await runner.runScrape('audi', 'a4', { ...options, exportDir });

        expect(existsSync(join(exportDir, 'audi_a4_listings.csv'))).toBe(true);
        expect(existsSync(join(exportDir, 'audi_a4_price_history.csv'))).toBe(false);
      } finally {
        rmSync(exportDir, { recursive: true, force: true });
      }
    });
  });

  describe('runMultiModel', () => {
    const models = [
      { make: 'audi', model: 'a4' },
      { make: 'bmw', model: 'x1' },
      { make: 'vw', model: 'golf' },
    ];

    it('keeps going after a failing model and pauses between models', async () => {
      const runner = createRunner({
        [urlFor('audi', 'a4')]: resultPage(['a']),
        [urlFor('bmw', 'x1')]: resultPage(['b']),
      });
      vi.spyOn(store, 'getActiveListings')
        .mockResolvedValueOnce([])
        .mockRejectedValueOnce(new PersistenceError('getActiveListings', 'connection reset'));

      const batch = await runner.runMultiModel(models, options);

      expect(batch.results.map(r => r.status)).toEqual(['success', 'error', 'error']);
      expect(batch.results[1].error).toBe('getActiveListings failed: connection reset');
      expect(batch.results[2].error).toBe('Request failed: HTTP 503');
      expect(batch).toMatchObject({ succeeded: 1, skipped: 0, failed: 2 });

      expect(captureError).toHaveBeenCalledTimes(1);
      expect(captureError).toHaveBeenCalledWith(expect.any(PersistenceError), {
        runId: batch.runId,
        make: 'bmw',
        model: 'x1',
      });

      const metadata = await store.getAllMetadata();
      expect(metadata.map(m => [m.make, m.status, m.error_message])).toEqual([
        ['audi', 'success', null],
        ['bmw', 'error', 'getActiveListings failed: connection reset'],
        ['vw', 'error', 'Request failed: HTTP 503'],
      ]);

      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000, 5000]);
    });

    it('still finishes when the failure cannot be recorded', async () => {
      const runner = createRunner({ [urlFor('audi', 'a4')]: resultPage(['a']) });
      vi.spyOn(store, 'insertListings').mockRejectedValue(new PersistenceError('insertListings', 'timeout'));
      vi.spyOn(store, 'upsertMetadata').mockRejectedValue(new PersistenceError('upsertMetadata', 'timeout'));

      const batch = await runner.runMultiModel([models[0]], options);

      expect(batch.failed).toBe(1);
      expect(logger.error).toHaveBeenCalledWith('Failed to record error status', {
        make: 'audi',
        model: 'a4',
        error: 'upsertMetadata failed: timeout',
      });
      expect(sleep).not.toHaveBeenCalled();
    });
  });
});

describe('modelPauseSeconds', () => {
  it('waits twice the page delay, at least 5 seconds', () => {
    expect(modelPauseSeconds(1)).toBe(5);
    expect(modelPauseSeconds(4)).toBe(8);
  });
});
