import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ScrapeMetadata, StoredListing, StoredPriceChange } from '../types/index.js';
import { SnapshotStore } from '../database/snapshot-store.js';
import { logger } from '../utils/logger.js';

const TOP_DEALS = 10;

const formatNumber = (value: number) => Math.round(value).toLocaleString('en-US');

const label = (row: { make: string; model: string }) => `${row.make.toUpperCase()} ${row.model.toUpperCase()}`;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(date: Date): { date: string; time: string; display: string } {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return { date: day, time, display: `${day} ${time.replace(/-/g, ':')}` };
}

function heading(title: string, width: number): string[] {
  return [title, '='.repeat(width)];
}

/**
 * Plain-text report over the latest run of every tracked model
 */
export function buildMultiModelSummary(
  metadata: ScrapeMetadata[],
  listings: StoredListing[],
  history: StoredPriceChange[],
  scraperVersion: string,
  now: Date = new Date()
): string {
  const stamp = formatTimestamp(now);
  const lines: string[] = [
    'Multi-Model Update Summary',
    '==========================',
    '',
    `Generated: ${stamp.display}`,
    `Scraper version: ${scraperVersion}`,
    '',
  ];

  if (metadata.length === 0) {
    lines.push('No scraping data available.');
    return lines.join('\n') + '\n';
  }

  const sum = (pick: (row: ScrapeMetadata) => number) => metadata.reduce((total, row) => total + pick(row), 0);

  lines.push(
    ...heading('OVERVIEW', 8),
    `Tracked models: ${metadata.length}`,
    `Active listings: ${formatNumber(sum(row => row.total_listings))}`,
    `New listings: ${formatNumber(sum(row => row.new_listings))}`,
    `Updated listings: ${formatNumber(sum(row => row.updated_listings))}`,
    `Price changes: ${formatNumber(sum(row => row.price_changes))}`,
    ''
  );

  const withNew = metadata.filter(row => row.new_listings > 0);
  lines.push(...heading(`MODELS WITH NEW LISTINGS (${withNew.length})`, 50));
  if (withNew.length === 0) {
    lines.push('No new listings found.', '');
  }
  for (const row of withNew) {
    let line = `  ${formatNumber(row.new_listings)} new of ${formatNumber(row.total_listings)} listings`;
    if (row.price_changes > 0) {
      line += ` | ${row.price_changes} price changes`;
    }
    lines.push(`* ${label(row)}`, line, `  ${row.last_scrape_date}`, '');
  }

  const today = stamp.date;
  const withChanges = metadata.filter(row => row.price_changes > 0);
  lines.push(...heading(`MODELS WITH PRICE CHANGES (${withChanges.length})`, 50));
  if (withChanges.length === 0) {
    lines.push('No price changes today.', '');
  }
  for (const row of withChanges) {
    lines.push(`* ${label(row)}: ${row.price_changes} changes`);

    const todays = history.filter(
      change =>
        change.make === row.make &&
        change.model === row.model &&
        formatTimestamp(new Date(change.change_date)).date === today
    );
    for (const type of ['DECREASE', 'INCREASE'] as const) {
      const ofType = todays.filter(change => change.change_type === type);
      if (ofType.length === 0) continue;
      const average = ofType.reduce((total, change) => total + Math.abs(change.price_difference), 0) / ofType.length;
      lines.push(`  ${ofType.length}x ${type.toLowerCase()} (avg ${formatNumber(average)} EUR)`);
    }
    lines.push('');
  }

  lines.push(...heading('ALL TRACKED MODELS', 40));
  for (const row of metadata) {
    const status = row.status === 'success' ? '[OK]' : '[ERROR]';
    let line = `   Listings: ${formatNumber(row.total_listings)} (${formatNumber(row.new_listings)} new)`;
    if (row.price_changes > 0) {
      line += ` | ${row.price_changes} price changes`;
    }
    lines.push(`${status} ${label(row)}`, line, `   Last update: ${row.last_scrape_date}`);

    if (row.status === 'error' && row.error_message) {
      lines.push(`   Error: ${row.error_message}`);
    }

    const prices = listings
      .filter(l => l.make === row.make && l.model === row.model && l.is_active)
      .map(l => l.price)
      .filter((p): p is number => p !== null);
    if (prices.length > 0) {
      const average = prices.reduce((total, price) => total + price, 0) / prices.length;
      lines.push(
        `   Prices: avg ${formatNumber(average)} EUR | ${formatNumber(Math.min(...prices))} - ${formatNumber(Math.max(...prices))} EUR`
      );
    }
    lines.push('');
  }

  const deals = listings
    .filter((l): l is StoredListing & { price: number } => l.is_active && l.price !== null && l.price > 0)
    .sort((a, b) => a.price - b.price)
    .slice(0, TOP_DEALS);

  lines.push(...heading(`TOP ${TOP_DEALS} CHEAPEST OFFERS (all models)`, 50));
  deals.forEach((deal, index) => {
    const title = deal.title.length > 50 ? `${deal.title.slice(0, 50)}...` : deal.title;
    lines.push(`${String(index + 1).padStart(2)}. ${formatNumber(deal.price).padStart(8)} EUR - ${label(deal)}`, `    ${title}`, '');
  });

  lines.push('', '='.repeat(60), `Generated: ${stamp.display}`);
  return lines.join('\n') + '\n';
}

/**
 * Write the summary to `<dataDir>/logs/multi_model/multi_model_summary_<date>_<time>.txt`
 */
export async function writeMultiModelSummary(
  store: SnapshotStore,
  dataDir: string,
  scraperVersion: string,
  now: Date = new Date()
): Promise<string> {
  const [metadata, listings, history] = await Promise.all([
    store.getAllMetadata(),
    store.listAllActiveListings(),
    store.listAllPriceHistory(),
  ]);

  const directory = join(dataDir, 'logs', 'multi_model');
  mkdirSync(directory, { recursive: true });

  const stamp = formatTimestamp(now);
  const filename = join(directory, `multi_model_summary_${stamp.date}_${stamp.time}.txt`);
  writeFileSync(filename, buildMultiModelSummary(metadata, listings, history, scraperVersion, now), 'utf-8');

  logger.info('Multi-model summary written', { file: filename, models: metadata.length });
  return filename;
}
