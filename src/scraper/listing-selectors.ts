/**
 * Selectors and code tables for the AutoScout24 result-page markup.
 * Listing containers carry most fields as data-* attributes; power,
 * transmission and location sit in labelled child elements.
 */

import { FuelType, SellerType, Transmission } from '../types/index.js';

export interface ResultPageSelectors {
  article: string;
  titleLink: string;
  power: string;
  transmission: string;
  location: string;
  paginationNav: string;
  paginationContainer: string;
}

export const resultPageSelectors: ResultPageSelectors = {
  article: 'article.cldt-summary-full-item',
  titleLink: 'a[class*="title"]',
  power: 'span[data-testid="VehicleDetails-speedometer"]',
  transmission: 'span[data-testid="VehicleDetails-transmission"]',
  location: 'span[class*="SellerInfo"]',
  paginationNav: 'nav[class*="pagination"], nav[class*="Pagination"]',
  paginationContainer: 'div[class*="pagination"], div[class*="Pagination"]',
};

export const listingAttributes = {
  id: 'data-guid',
  fallbackId: 'id',
  price: 'data-price',
  mileage: 'data-mileage',
  fuelType: 'data-fuel-type',
  firstRegistration: 'data-first-registration',
  sellerType: 'data-seller-type',
} as const;

export const fuelTypeCodes: Record<string, FuelType> = {
  d: 'Diesel',
  b: 'Petrol',
  e: 'Electric',
  h: 'Hybrid',
  l: 'LPG',
  c: 'CNG',
};

export const sellerTypeCodes: Record<string, SellerType> = {
  p: 'Private',
  d: 'Dealer',
};

export const POWER_PATTERN = /(\d+)\s*kW\s*\((\d+)\s*(?:CH|PS)\)/;

export function convertFuelType(code: string | null | undefined): FuelType | string | null {
  if (!code) return null;
  return fuelTypeCodes[code] ?? code;
}

export function convertSellerType(code: string | null | undefined): SellerType | string | null {
  if (!code) return null;
  return sellerTypeCodes[code] ?? code;
}

export function convertTransmission(text: string | null | undefined): Transmission | string | null {
  if (!text) return null;

  const lower = text.toLowerCase();
  if (lower.includes('automatique')) return 'Automatic';
  if (lower.includes('manuelle')) return 'Manual';
  return text;
}

/**
 * Parse "150 kW (204 PS)" (or "... CH)") into its two numbers.
 */
export function parsePower(text: string | null | undefined): { kw: number | null; ps: number | null } {
  if (!text) {
    return { kw: null, ps: null };
  }

  const match = POWER_PATTERN.exec(text);
  if (!match) {
    return { kw: null, ps: null };
  }

  return { kw: parseInt(match[1], 10), ps: parseInt(match[2], 10) };
}

export function formatPower(text: string | null | undefined): string | null {
  const { kw, ps } = parsePower(text);
  if (kw === null || ps === null) return null;
  return `${kw} kW (${ps} PS)`;
}
