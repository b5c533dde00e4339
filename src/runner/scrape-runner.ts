import { v4 as uuidv4 } from 'uuid';
import { ScrapeMetadata, ScrapeOptions, ScrapeRunResult, VehicleModel } from '../types/index.js';
import { SnapshotStore } from '../database/snapshot-store.js';
import { ListingScraper } from '../scraper/listing-scraper.js';
import { PageFetcher } from '../scraper/page-client.js';
import { Reconciler } from '../reconciler/reconciler.js';
import { exportModelCsv } from '../reporting/csv-export.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { captureError } from '../utils/sentry.js';

export interface RunOptions extends ScrapeOptions {
  /** Write the model's CSV files here after a successful run */
  exportDir?: string;
}

export interface ScrapeRunnerDeps {
  store: SnapshotStore;
  fetcher: PageFetcher;
  baseUrl: string;
  maxAutoPages: number;
  scraperVersion: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

/**
 * Result of a multi-model batch
 */
export interface MultiModelResult {
  runId: string;
  results: ScrapeRunResult[];
  succeeded: number;
  skipped: number;
  failed: number;
  durationMs: number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Pause between two models of a batch, in seconds */
export function modelPauseSeconds(delaySeconds: number): number {
  return Math.max(5, delaySeconds * 2);
}

/**
 * Runs scrape passes: fetch the result pages of a make/model, reconcile them
 * with the stored snapshot and record the outcome in scraping_metadata.
 */
export class ScrapeRunner {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly deps: ScrapeRunnerDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Scrape one make/model. Page-1 failures end as status "error", empty
   * scrapes as "skipped"; storage errors are thrown to the caller.
   */
  async runScrape(make: string, model: string, options: RunOptions): Promise<ScrapeRunResult> {
    const startTime = Date.now();
    logger.info(`=== Scrape started: ${make} ${model} ===`);

    const scraper = new ListingScraper({
      make,
      model,
      baseUrl: this.deps.baseUrl,
      fetcher: this.deps.fetcher,
      maxAutoPages: this.deps.maxAutoPages,
      sleep: this.sleep,
      now: this.now,
    });

    const scrape = await scraper.scrapeListings(options);

    const result: ScrapeRunResult = {
      make,
      model,
      status: 'success',
      totalListings: scrape.listings.length,
      inserted: 0,
      updated: 0,
      deactivated: 0,
      priceChanges: 0,
      pagesScraped: scrape.pagesScraped,
      durationMs: 0,
    };

    if (scrape.firstPageFailed) {
      result.status = 'error';
      result.error = scrape.error ?? 'First page could not be loaded';
      await this.deps.store.upsertMetadata(this.metadata(result, result.error));
      result.durationMs = Date.now() - startTime;
      logger.error(`Scrape failed: ${make} ${model}`, { error: result.error });
      return result;
    }

    // Listings on a failed page were not seen, not removed
    const outcome = await new Reconciler(this.deps.store, this.now).reconcile(make, model, scrape.listings, {
      deactivateMissing: scrape.failedPages.length === 0,
    });

    if (outcome.skipped) {
      result.status = 'skipped';
      result.durationMs = Date.now() - startTime;
      logger.warn(`No listings found for ${make} ${model}, nothing saved`);
      return result;
    }

    result.inserted = outcome.inserted;
    result.updated = outcome.updated;
    result.deactivated = outcome.deactivated;
    result.priceChanges = outcome.priceChanges.length;

    await this.deps.store.upsertMetadata(this.metadata(result, null));

    if (options.exportDir) {
      await exportModelCsv(this.deps.store, make, model, options.exportDir);
    }

    result.durationMs = Date.now() - startTime;

    const drops = outcome.priceChanges.filter(change => change.price_difference < 0);
    logger.info(`=== Scrape completed: ${make} ${model} ===`, {
      durationSeconds: Math.round(result.durationMs / 100) / 10,
      uniqueListings: result.totalListings,
      inserted: result.inserted,
      updated: result.updated,
      deactivated: result.deactivated,
      priceChanges: result.priceChanges,
      priceDrops: drops.length,
      priceIncreases: result.priceChanges - drops.length,
      failedPages: scrape.failedPages,
    });

    return result;
  }

  /**
   * Scrape several models one after another. A failing model is recorded
   * and reported; the batch always continues with the next one.
   */
  async runMultiModel(models: VehicleModel[], options: RunOptions): Promise<MultiModelResult> {
    const runId = uuidv4();
    const startTime = Date.now();
    const results: ScrapeRunResult[] = [];

    logger.info('Starting multi-model scrape', { runId, models: models.length });

    for (let i = 0; i < models.length; i++) {
      const { make, model } = models[i];
      const modelStart = Date.now();

      try {
        results.push(await this.runScrape(make, model, options));
      } catch (error) {
        const message = errorMessage(error);
        logger.error(`Scrape of ${make} ${model} failed`, { runId, error: message });
        captureError(error instanceof Error ? error : new Error(message), { runId, make, model });

        const failed: ScrapeRunResult = {
          make,
          model,
          status: 'error',
          totalListings: 0,
          inserted: 0,
          updated: 0,
          deactivated: 0,
          priceChanges: 0,
          pagesScraped: 0,
          durationMs: Date.now() - modelStart,
          error: message,
        };
        results.push(failed);
        await this.recordFailure(failed, message);
      }

      if (i < models.length - 1) {
        const pause = modelPauseSeconds(options.delaySeconds);
        logger.info(`Pausing ${pause}s before next model`);
        await this.sleep(pause * 1000);
      }
    }

    const summary: MultiModelResult = {
      runId,
      results,
      succeeded: results.filter(r => r.status === 'success').length,
      skipped: results.filter(r => r.status === 'skipped').length,
      failed: results.filter(r => r.status === 'error').length,
      durationMs: Date.now() - startTime,
    };

    logger.info('Multi-model scrape completed', {
      runId,
      succeeded: summary.succeeded,
      skipped: summary.skipped,
      failed: summary.failed,
      durationMinutes: Math.round(summary.durationMs / 60000),
    });

    return summary;
  }

  private metadata(result: ScrapeRunResult, error: string | null): ScrapeMetadata {
    const now = this.now();
    return {
      make: result.make,
      model: result.model,
      last_scrape_date: now.toISOString(),
      last_scrape_timestamp: Math.floor(now.getTime() / 1000),
      total_listings: result.totalListings,
      new_listings: result.inserted,
      updated_listings: result.updated,
      price_changes: result.priceChanges,
      status: error === null ? 'success' : 'error',
      error_message: error,
      scraper_version: this.deps.scraperVersion,
    };
  }

  private async recordFailure(result: ScrapeRunResult, message: string): Promise<void> {
    try {
      await this.deps.store.upsertMetadata(this.metadata(result, message));
    } catch (error) {
      logger.error('Failed to record error status', {
        make: result.make,
        model: result.model,
        error: errorMessage(error),
      });
    }
  }
}
