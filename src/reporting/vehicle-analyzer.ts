import {
  DimensionStats,
  ListingStatistics,
  MarketAnalysis,
  StoredListing,
  StoredPriceChange,
  Vehicle,
  VehicleScore,
} from '../types/index.js';
import { parsePower } from '../scraper/listing-selectors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const SCORE_WEIGHTS = {
  price: 0.35,
  mileage: 0.25,
  age: 0.25,
  power: 0.15,
} as const;

export function round(value: number, decimals = 0): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function median(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Age in years from a "MM-YYYY" first registration, to one decimal.
 * Counts whole days, as a calendar difference would.
 */
export function calculateAge(firstRegistration: string | null, now: Date = new Date()): number | null {
  if (!firstRegistration) return null;

  const match = /^(\d{1,2})-(\d{4})$/.exec(firstRegistration.trim());
  if (!match) return null;

  const month = Number(match[1]);
  const year = Number(match[2]);
  if (month < 1 || month > 12) return null;

  const registered = new Date(year, month - 1, 1);
  const days = Math.floor((now.getTime() - registered.getTime()) / DAY_MS);
  return round(days / 365.25, 1);
}

export function toVehicle(listing: StoredListing, now: Date = new Date()): Vehicle {
  const { kw, ps } = parsePower(listing.power);

  return {
    id: listing.id,
    listing_id: listing.listing_id,
    title: listing.title,
    price: listing.price,
    mileage: listing.mileage,
    age: calculateAge(listing.first_registration, now),
    fuel_type: listing.fuel_type,
    first_registration: listing.first_registration,
    power_kw: kw,
    power_ps: ps,
    power_display: listing.power,
    transmission: listing.transmission,
    seller_type: listing.seller_type,
    location: listing.location,
    url: listing.url,
  };
}

interface CompleteVehicle {
  price: number;
  mileage: number;
  age: number;
  power_ps: number;
}

// Zero counts as missing
function isComplete(vehicle: Vehicle): vehicle is Vehicle & CompleteVehicle {
  return Boolean(vehicle.price && vehicle.mileage && vehicle.age && vehicle.power_ps);
}

function dimension(values: number[], meanDecimals: number, medianDecimals?: number): DimensionStats {
  const mid = median(values);
  return {
    min: Math.min(...values),
    max: Math.max(...values),
    median: medianDecimals === undefined ? mid : round(mid, medianDecimals),
    mean: round(mean(values), meanDecimals),
  };
}

/**
 * Min/max/median/mean per dimension over vehicles with price, mileage,
 * age and power all known. Null when no such vehicle exists.
 */
export function marketAnalysis(vehicles: Vehicle[]): MarketAnalysis | null {
  const complete = vehicles.filter(isComplete);
  if (complete.length === 0) {
    return null;
  }

  return {
    total_vehicles: complete.length,
    price_stats: dimension(complete.map(v => v.price), 2),
    mileage_stats: dimension(complete.map(v => v.mileage), 0),
    age_stats: dimension(complete.map(v => v.age), 1, 1),
    power_stats: dimension(complete.map(v => v.power_ps), 0),
  };
}

/**
 * Score a vehicle against the market of its make/model.
 * Cheaper, newer and less driven is better; more power is better.
 */
export function vehicleScore(vehicle: Vehicle, analysis: MarketAnalysis | null): VehicleScore {
  if (!analysis || !isComplete(vehicle)) {
    return { total_score: 0, breakdown: {} };
  }

  const lowerIsBetter = (value: number, stats: DimensionStats) =>
    Math.max(0, 100 - ((value - stats.median) / stats.median) * 100);

  const priceScore = lowerIsBetter(vehicle.price, analysis.price_stats);
  const mileageScore = lowerIsBetter(vehicle.mileage, analysis.mileage_stats);
  const ageScore = lowerIsBetter(vehicle.age, analysis.age_stats);
  const powerScore = Math.min(
    100,
    50 + ((vehicle.power_ps - analysis.power_stats.median) / analysis.power_stats.median) * 50
  );

  const total =
    priceScore * SCORE_WEIGHTS.price +
    mileageScore * SCORE_WEIGHTS.mileage +
    ageScore * SCORE_WEIGHTS.age +
    powerScore * SCORE_WEIGHTS.power;

  return {
    total_score: round(total, 1),
    breakdown: {
      price_score: round(priceScore, 1),
      mileage_score: round(mileageScore, 1),
      age_score: round(ageScore, 1),
      power_score: round(powerScore, 1),
    },
  };
}

function countBy(values: (string | null)[]): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    if (value === null) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Object.fromEntries([...counts.entries()].sort((a, b) => b[1] - a[1]));
}

/**
 * Totals for `--mode=stats`: active listings with a price, fuel and seller
 * breakdowns, and the price-change ledger.
 */
export function buildStatistics(
  listings: StoredListing[],
  history: StoredPriceChange[],
  now: Date = new Date()
): ListingStatistics {
  const priced = listings.filter(listing => listing.is_active && listing.price !== null);
  const prices = priced.map(listing => listing.price).filter((p): p is number => p !== null);
  const mileages = priced.map(listing => listing.mileage).filter((m): m is number => m !== null);
  const active = listings.filter(listing => listing.is_active);
  const differences = history.map(change => change.price_difference);

  return {
    listings: {
      total_listings: priced.length,
      avg_price: prices.length > 0 ? round(mean(prices), 2) : null,
      min_price: prices.length > 0 ? Math.min(...prices) : null,
      max_price: prices.length > 0 ? Math.max(...prices) : null,
      avg_mileage: mileages.length > 0 ? round(mean(mileages)) : null,
    },
    fuel_types: countBy(active.map(listing => listing.fuel_type)),
    seller_types: countBy(active.map(listing => listing.seller_type)),
    price_changes: {
      total_changes: history.length,
      price_drops: differences.filter(d => d < 0).length,
      price_increases: differences.filter(d => d > 0).length,
      avg_change: differences.length > 0 ? round(mean(differences), 2) : null,
    },
    generated_at: now.toISOString(),
  };
}
