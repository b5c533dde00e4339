import * as cheerio from 'cheerio';
import { Listing, ScrapeListingsResult, ScrapeOptions } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { TransportError, errorMessage } from '../utils/errors.js';
import { extractListings, ExtractionContext, PageExtraction } from './listing-extractor.js';
import { AdaptiveDelay, buildPageUrl, buildSearchUrl, detectTotalPages } from './pagination.js';
import { PageFetcher } from './page-client.js';

export interface ListingScraperOptions {
  make: string;
  model: string;
  baseUrl: string;
  fetcher: PageFetcher;
  /** Upper bound for auto-detected page counts */
  maxAutoPages?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Walks the result pages of one make/model search.
 *
 * Pages are fetched one at a time, starting at page 1. The walk ends at the
 * last page, at a page without listings, or (with stopOnEmpty) at a page that
 * only repeats listings already seen in this run.
 */
export class ListingScraper {
  private readonly make: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly fetcher: PageFetcher;
  private readonly maxAutoPages: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(options: ListingScraperOptions) {
    this.make = options.make;
    this.model = options.model;
    this.baseUrl = options.baseUrl;
    this.fetcher = options.fetcher;
    this.maxAutoPages = options.maxAutoPages ?? 50;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  get searchUrl(): string {
    return buildSearchUrl({ baseUrl: this.baseUrl, make: this.make, model: this.model });
  }

  async scrapeListings(options: ScrapeOptions): Promise<ScrapeListingsResult> {
    const listings: Listing[] = [];
    const seenIds = new Set<string>();
    const failedPages: number[] = [];
    const delay = new AdaptiveDelay(options.delaySeconds, options.adaptiveDelay);
    const firstUrl = this.searchUrl;

    logger.info('Starting listing scrape', {
      make: this.make,
      model: this.model,
      maxPages: options.maxPages ?? 'auto',
      stopOnEmpty: options.stopOnEmpty,
      adaptiveDelay: options.adaptiveDelay,
    });

    // Page 1 decides whether the run happens at all
    let totalPages: number;
    try {
      const firstPage = await this.fetcher.fetchPage(firstUrl);
      delay.afterFirstPage(firstPage.responseTimeMs / 1000);

      const $ = cheerio.load(firstPage.html);

      if (options.maxPages === undefined) {
        const detection = detectTotalPages($);
        totalPages = Math.min(detection.totalPages, this.maxAutoPages);
        logger.info('Detected page count', {
          detected: detection.totalPages,
          source: detection.source,
          limitedTo: totalPages,
        });
      } else {
        totalPages = Math.max(1, options.maxPages);
      }

      const extraction = extractListings($, this.context());
      const newListings = this.collect(extraction, seenIds, listings);

      logger.info(`Page 1/${totalPages}: ${newListings} new listings`, {
        containers: extraction.containers,
        failures: extraction.failures.length,
        responseTimeMs: firstPage.responseTimeMs,
        nextDelaySeconds: delay.seconds,
      });

      if (newListings === 0) {
        logger.warn('First page contains no listings, stopping', { make: this.make, model: this.model });
        return { listings: [], pagesScraped: 1, totalPages, firstPageFailed: false, failedPages };
      }
    } catch (error) {
      logger.error('Failed to load first page', { url: firstUrl, error: errorMessage(error) });
      return {
        listings: [],
        pagesScraped: 0,
        totalPages: 0,
        firstPageFailed: true,
        failedPages: [1],
        error: errorMessage(error),
      };
    }

    let pagesScraped = 1;

    for (let page = 2; page <= totalPages; page++) {
      if (delay.seconds > 0) {
        await this.sleep(delay.seconds * 1000);
      }

      const pageUrl = buildPageUrl(firstUrl, page);

      try {
        const fetched = await this.fetcher.fetchPage(pageUrl);
        delay.afterPage(fetched.responseTimeMs / 1000);

        const extraction = extractListings(fetched.html, this.context());
        const newListings = this.collect(extraction, seenIds, listings);
        pagesScraped++;

        logger.info(`Page ${page}/${totalPages}: ${newListings} new listings`, {
          containers: extraction.containers,
          extracted: extraction.listings.length,
          failures: extraction.failures.length,
          responseTimeMs: fetched.responseTimeMs,
          nextDelaySeconds: delay.seconds,
        });

        if (extraction.listings.length === 0) {
          logger.info(`Stopping after page ${page}: page has no listings`);
          break;
        }

        if (newListings === 0 && options.stopOnEmpty) {
          logger.info(`Stopping after page ${page}: no new listings`);
          break;
        }
      } catch (error) {
        failedPages.push(page);

        if (error instanceof TransportError) {
          delay.afterFailure();
          logger.error(`HTTP error on page ${page}`, {
            url: pageUrl,
            error: error.message,
            nextDelaySeconds: delay.seconds,
          });
        } else {
          logger.error(`Unexpected error on page ${page}`, { url: pageUrl, error: errorMessage(error) });
        }
      }
    }

    logger.info('Listing scrape completed', {
      make: this.make,
      model: this.model,
      uniqueListings: listings.length,
      pagesScraped,
      failedPages,
    });

    return { listings, pagesScraped, totalPages, firstPageFailed: false, failedPages };
  }

  private context(): ExtractionContext {
    return { make: this.make, model: this.model, baseUrl: this.baseUrl, now: this.now() };
  }

  /**
   * Append listings not seen earlier in this run; returns how many were new
   */
  private collect(extraction: PageExtraction, seenIds: Set<string>, listings: Listing[]): number {
    let added = 0;
    for (const listing of extraction.listings) {
      if (seenIds.has(listing.listing_id)) continue;
      seenIds.add(listing.listing_id);
      listings.push(listing);
      added++;
    }
    return added;
  }
}
