import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import { AdaptiveDelay, buildPageUrl, buildSearchUrl, detectTotalPages } from './pagination.js';

const page = (body: string) => cheerio.load(`<html><body>${body}</body></html>`);

describe('buildSearchUrl', () => {
  it('builds the first result page of a make/model search', () => {
    expect(buildSearchUrl({ baseUrl: 'https://www.autoscout24.lu/', make: 'bmw', model: '3-series' })).toBe(
      'https://www.autoscout24.lu/lst/bmw/3-series?sort=standard&desc=0&ustate=N,U&atype=C&cy=L&source=homepage_search-mask'
    );
  });

  it('appends the page number from page 2 on', () => {
    const first = buildSearchUrl({ baseUrl: 'https://www.autoscout24.lu', make: 'audi', model: 'a4' });
    expect(buildPageUrl(first, 1)).toBe(first);
    expect(buildPageUrl(first, 3)).toBe(`${first}&page=3`);
  });
});

describe('detectTotalPages', () => {
  it('uses the highest page linked from the pagination bar', () => {
    const $ = page(`
      <nav class="pagination"><a href="?page=2">2</a><a href="?page=12">12</a><a href="?page=5">5</a></nav>
      <p>Page 1 of 40</p>
    `);
    expect(detectTotalPages($)).toEqual({ totalPages: 12, source: 'pagination' });
  });

  it('falls back to a pagination div', () => {
    const $ = page('<div class="ListPagination_wrapper"><a href="/lst?page=4">4</a></div>');
    expect(detectTotalPages($)).toEqual({ totalPages: 4, source: 'pagination' });
  });

  it('reads "Page X of Y" and "Seite X von Y" texts', () => {
    expect(detectTotalPages(page('<span>Page 1 of 9</span>'))).toEqual({ totalPages: 9, source: 'page-text' });
    expect(detectTotalPages(page('<span>Seite 1 von 6</span>'))).toEqual({ totalPages: 6, source: 'page-text' });
  });

  it('estimates pages from the result count at 20 per page', () => {
    expect(detectTotalPages(page('<h1>128 results</h1>'))).toEqual({ totalPages: 7, source: 'results-count' });
    expect(detectTotalPages(page('<h1>1.234 Treffer</h1>'))).toEqual({ totalPages: 50, source: 'results-count' });
  });

  it('caps the estimate at 50 pages', () => {
    expect(detectTotalPages(page('<h1>5000 results</h1>')).totalPages).toBe(50);
  });

  it('defaults to one page without any signal', () => {
    expect(detectTotalPages(page('<p>Nothing here</p>'))).toEqual({ totalPages: 1, source: 'default' });
  });
});

describe('AdaptiveDelay', () => {
  it('starts at twice the first response time, never below the base delay', () => {
    const slow = new AdaptiveDelay(2, true);
    slow.afterFirstPage(1.5);
    expect(slow.seconds).toBe(3);

    const fast = new AdaptiveDelay(2, true);
    fast.afterFirstPage(0.4);
    expect(fast.seconds).toBe(2);
  });

  it('slows down after slow responses up to 10 seconds', () => {
    const delay = new AdaptiveDelay(2, true);
    delay.afterFirstPage(4);
    expect(delay.seconds).toBe(8);

    delay.afterPage(5);
    expect(delay.seconds).toBeCloseTo(9.6);

    delay.afterPage(5);
    expect(delay.seconds).toBe(10);
  });

  it('speeds up after fast responses down to the base delay', () => {
    const delay = new AdaptiveDelay(2, true);
    delay.afterFirstPage(1.1);
    expect(delay.seconds).toBeCloseTo(2.2);

    delay.afterPage(0.2);
    expect(delay.seconds).toBe(2);
  });

  it('keeps the delay between 1 and 3 second responses', () => {
    const delay = new AdaptiveDelay(2, true);
    delay.afterFirstPage(2);
    delay.afterPage(2);
    expect(delay.seconds).toBe(4);
  });

  it('backs off by half after a failure, up to 15 seconds', () => {
    const delay = new AdaptiveDelay(8, true);
    delay.afterFailure();
    expect(delay.seconds).toBe(12);
    delay.afterFailure();
    expect(delay.seconds).toBe(15);
  });

  it('stays at the base delay when adaptive pacing is off', () => {
    const delay = new AdaptiveDelay(2, false);
    delay.afterFirstPage(4);
    delay.afterPage(5);
    expect(delay.seconds).toBe(2);
  });
});
