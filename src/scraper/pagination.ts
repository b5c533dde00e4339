import type { CheerioAPI } from 'cheerio';
import { resultPageSelectors } from './listing-selectors.js';

export const RESULTS_PER_PAGE = 20;
export const MAX_ESTIMATED_PAGES = 50;

export type PageCountSource = 'pagination' | 'page-text' | 'results-count' | 'default';

export interface PageCountDetection {
  totalPages: number;
  source: PageCountSource;
}

export interface SearchUrlOptions {
  baseUrl: string;
  make: string;
  model: string;
  sort?: string;
  desc?: number;
  ustate?: string;
  atype?: string;
}

/**
 * First result page of a make/model search
 */
export function buildSearchUrl(options: SearchUrlOptions): string {
  const base = options.baseUrl.replace(/\/+$/, '');
  const params = [
    `sort=${options.sort ?? 'standard'}`,
    `desc=${options.desc ?? 0}`,
    `ustate=${options.ustate ?? 'N,U'}`,
    `atype=${options.atype ?? 'C'}`,
    'cy=L',
    'source=homepage_search-mask',
  ];

  return `${base}/lst/${encodeURIComponent(options.make)}/${encodeURIComponent(options.model)}?${params.join('&')}`;
}

export function buildPageUrl(firstPageUrl: string, page: number): string {
  return page <= 1 ? firstPageUrl : `${firstPageUrl}&page=${page}`;
}

function maxLinkedPage($: CheerioAPI): number | null {
  let container = $(resultPageSelectors.paginationNav).first();
  if (container.length === 0) {
    container = $(resultPageSelectors.paginationContainer).first();
  }
  if (container.length === 0) {
    return null;
  }

  let maxPage: number | null = null;
  container.find('a[href*="page="]').each((_, link) => {
    const match = /page=(\d+)/.exec($(link).attr('href') ?? '');
    if (match) {
      const page = parseInt(match[1], 10);
      maxPage = maxPage === null ? page : Math.max(maxPage, page);
    }
  });

  return maxPage;
}

/**
 * Work out how many result pages a search has from its first page.
 *
 * Signals in order: highest page linked from the pagination bar, a
 * "Page X of Y" text, then the stated result count at 20 per page
 * (capped at 50). Without any signal the search has one page.
 */
export function detectTotalPages($: CheerioAPI): PageCountDetection {
  const linked = maxLinkedPage($);
  if (linked !== null) {
    return { totalPages: Math.max(1, linked), source: 'pagination' };
  }

  const text = $.root().text();

  const pageOf = /(?:Seite|Page)\s+\d+\s+(?:von|of)\s+(\d+)/i.exec(text);
  if (pageOf) {
    return { totalPages: Math.max(1, parseInt(pageOf[1], 10)), source: 'page-text' };
  }

  const results = /(\d{1,3}(?:[.,\u00a0 ]\d{3})+|\d+)\s*(?:Treffer|results)/i.exec(text);
  if (results) {
    const totalResults = parseInt(results[1].replace(/\D/g, ''), 10);
    const estimated = Math.ceil(totalResults / RESULTS_PER_PAGE);
    return {
      totalPages: Math.max(1, Math.min(estimated, MAX_ESTIMATED_PAGES)),
      source: 'results-count',
    };
  }

  return { totalPages: 1, source: 'default' };
}

/**
 * Delay between page requests, following the server's response times.
 * All values are in seconds.
 */
export class AdaptiveDelay {
  static readonly SLOW_RESPONSE = 3;
  static readonly FAST_RESPONSE = 1;
  static readonly MAX_DELAY = 10;
  static readonly MAX_DELAY_AFTER_FAILURE = 15;

  private current: number;

  constructor(
    private readonly baseDelay: number,
    private readonly adaptive: boolean
  ) {
    this.current = baseDelay;
  }

  get seconds(): number {
    return this.current;
  }

  afterFirstPage(responseSeconds: number): void {
    if (!this.adaptive) return;
    this.current = Math.max(this.baseDelay, responseSeconds * 2);
  }

  afterPage(responseSeconds: number): void {
    if (!this.adaptive) return;

    if (responseSeconds > AdaptiveDelay.SLOW_RESPONSE) {
      this.current = Math.min(this.current * 1.2, AdaptiveDelay.MAX_DELAY);
    } else if (responseSeconds < AdaptiveDelay.FAST_RESPONSE) {
      this.current = Math.max(this.current * 0.9, this.baseDelay);
    }
  }

  afterFailure(): void {
    this.current = Math.min(this.current * 1.5, AdaptiveDelay.MAX_DELAY_AFTER_FAILURE);
  }
}
