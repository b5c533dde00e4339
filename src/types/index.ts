// Database Models
export type FuelType = 'Diesel' | 'Petrol' | 'Electric' | 'Hybrid' | 'LPG' | 'CNG';
export type SellerType = 'Private' | 'Dealer';
export type Transmission = 'Automatic' | 'Manual';
export type ChangeType = 'DECREASE' | 'INCREASE';
export type ScrapeStatus = 'success' | 'error';

/**
 * One vehicle offer as observed on a result page.
 * Known codes are mapped to their names; unknown codes are kept as scraped.
 */
export interface Listing {
  listing_id: string;
  make: string;
  model: string;
  title: string;
  url: string | null;
  price: number | null;
  mileage: number | null;
  fuel_type: FuelType | string | null;
  first_registration: string | null;
  power: string | null;
  transmission: Transmission | string | null;
  seller_type: SellerType | string | null;
  location: string | null;
  scraped_date: string;
  scraped_timestamp: number;
}

export interface StoredListing extends Listing {
  id: number;
  is_active: boolean;
  created_at: string | null;
  updated_at: string | null;
}

export interface PriceChangeEvent {
  listing_id: string;
  make: string;
  model: string;
  title: string | null;
  price_old: number;
  price_new: number;
  price_difference: number;
  price_change_percent: number;
  change_type: ChangeType;
  change_date: string;
  change_timestamp: number;
  last_seen: string | null;
}

export interface StoredPriceChange extends PriceChangeEvent {
  id: number;
  created_at: string | null;
}

export interface ScrapeMetadata {
  make: string;
  model: string;
  last_scrape_date: string;
  last_scrape_timestamp: number;
  total_listings: number;
  new_listings: number;
  updated_listings: number;
  price_changes: number;
  status: ScrapeStatus;
  error_message: string | null;
  scraper_version: string;
}

export interface VehicleModel {
  make: string;
  model: string;
}

export interface ModelCount extends VehicleModel {
  count: number;
}

export interface ListingFilter {
  make?: string;
  model?: string;
}

// Storage results
export interface UpsertResult {
  inserted: number;
  updated: number;
}

export interface ReconcileOutcome extends UpsertResult {
  skipped: boolean;
  deactivated: number;
  priceChanges: PriceChangeEvent[];
}

// Scraper Types
export interface ScrapeOptions {
  /** Undefined means auto-detect from the first page */
  maxPages?: number;
  delaySeconds: number;
  stopOnEmpty: boolean;
  adaptiveDelay: boolean;
}

export interface ScrapeListingsResult {
  listings: Listing[];
  pagesScraped: number;
  totalPages: number;
  firstPageFailed: boolean;
  failedPages: number[];
  error?: string;
}

export interface FetchedPage {
  html: string;
  responseTimeMs: number;
}

export interface ScrapeRunResult {
  make: string;
  model: string;
  status: 'success' | 'skipped' | 'error';
  totalListings: number;
  inserted: number;
  updated: number;
  deactivated: number;
  priceChanges: number;
  pagesScraped: number;
  durationMs: number;
  error?: string;
}

// Reporting Types
export interface Vehicle {
  id: number | null;
  listing_id: string;
  title: string;
  price: number | null;
  mileage: number | null;
  age: number | null;
  fuel_type: string | null;
  first_registration: string | null;
  power_kw: number | null;
  power_ps: number | null;
  power_display: string | null;
  transmission: string | null;
  seller_type: string | null;
  location: string | null;
  url: string | null;
}

export interface DimensionStats {
  min: number;
  max: number;
  median: number;
  mean: number;
}

export interface MarketAnalysis {
  total_vehicles: number;
  price_stats: DimensionStats;
  mileage_stats: DimensionStats;
  age_stats: DimensionStats;
  power_stats: DimensionStats;
}

export interface ScoreBreakdown {
  price_score: number;
  mileage_score: number;
  age_score: number;
  power_score: number;
}

export interface VehicleScore {
  total_score: number;
  breakdown: ScoreBreakdown | Record<string, never>;
}

export interface ScoredVehicle extends Vehicle {
  score: VehicleScore;
}

export interface ListingStatistics {
  listings: {
    total_listings: number;
    avg_price: number | null;
    min_price: number | null;
    max_price: number | null;
    avg_mileage: number | null;
  };
  fuel_types: Record<string, number>;
  seller_types: Record<string, number>;
  price_changes: {
    total_changes: number;
    price_drops: number;
    price_increases: number;
    avg_change: number | null;
  };
  generated_at: string;
}

// Configuration
export interface Config {
  supabase: {
    url: string;
    serviceKey: string;
  };
  site: {
    baseUrl: string;
    requestTimeoutMs: number;
    maxAutoPages: number;
  };
  app: {
    dataDir: string;
    modelsFile: string;
    schedule: string;
    apiPort: number;
    logLevel: string;
    scraperVersion: string;
  };
}

// Utility Types
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
