import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { StoredListing, StoredPriceChange } from '../types/index.js';
import { SnapshotStore } from '../database/snapshot-store.js';
import { logger } from '../utils/logger.js';

type Cell = string | number | boolean | null | undefined;

export const LISTING_COLUMNS = [
  'listing_id',
  'make',
  'model',
  'title',
  'url',
  'price',
  'mileage',
  'fuel_type',
  'first_registration',
  'power',
  'transmission',
  'seller_type',
  'location',
  'scraped_date',
  'scraped_timestamp',
  'is_active',
] as const satisfies readonly (keyof StoredListing)[];

export const PRICE_HISTORY_COLUMNS = [
  'listing_id',
  'make',
  'model',
  'title',
  'price_old',
  'price_new',
  'price_difference',
  'price_change_percent',
  'change_type',
  'change_date',
  'change_timestamp',
  'last_seen',
] as const satisfies readonly (keyof StoredPriceChange)[];

function formatCell(cell: Cell): string {
  const text = cell === null || cell === undefined ? '' : String(cell);
  return `"${text.replace(/"/g, '""')}"`;
}

/**
 * Generate CSV content from rows; every cell is quoted
 */
export function generateCsv(headers: readonly string[], rows: Cell[][]): string {
  const csvRows = [headers.join(',')];

  for (const row of rows) {
    csvRows.push(row.map(formatCell).join(','));
  }

  return csvRows.join('\n');
}

export function generateListingsCsv(listings: StoredListing[]): string {
  return generateCsv(
    LISTING_COLUMNS,
    listings.map(listing => LISTING_COLUMNS.map(column => listing[column]))
  );
}

export function generatePriceHistoryCsv(history: StoredPriceChange[]): string {
  return generateCsv(
    PRICE_HISTORY_COLUMNS,
    history.map(change => PRICE_HISTORY_COLUMNS.map(column => change[column]))
  );
}

export interface CsvExportResult {
  listingsFile: string | null;
  priceHistoryFile: string | null;
}

/**
 * Write `<make>_<model>_listings.csv` and `<make>_<model>_price_history.csv`.
 * An empty set writes no file.
 */
export async function exportModelCsv(
  store: SnapshotStore,
  make: string,
  model: string,
  outputDir: string
): Promise<CsvExportResult> {
  mkdirSync(outputDir, { recursive: true });

  const result: CsvExportResult = { listingsFile: null, priceHistoryFile: null };

  const listings = await store.getActiveListings(make, model);
  if (listings.length > 0) {
    result.listingsFile = join(outputDir, `${make}_${model}_listings.csv`);
    writeFileSync(result.listingsFile, generateListingsCsv(listings), 'utf-8');
    logger.info('Listings exported', { file: result.listingsFile, rows: listings.length });
  }

  const history = await store.getPriceHistory(make, model);
  if (history.length > 0) {
    result.priceHistoryFile = join(outputDir, `${make}_${model}_price_history.csv`);
    writeFileSync(result.priceHistoryFile, generatePriceHistoryCsv(history), 'utf-8');
    logger.info('Price history exported', { file: result.priceHistoryFile, rows: history.length });
  }

  return result;
}
