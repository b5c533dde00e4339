import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { Listing } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { ExtractionError, errorMessage } from '../utils/errors.js';
import {
  convertFuelType,
  convertSellerType,
  convertTransmission,
  formatPower,
  listingAttributes,
  resultPageSelectors,
} from './listing-selectors.js';

export interface ExtractionContext {
  make: string;
  model: string;
  baseUrl: string;
  now?: Date;
}

export interface ExtractionFailure {
  index: number;
  listingId: string | null;
  reason: string;
}

export interface PageExtraction {
  containers: number;
  listings: Listing[];
  failures: ExtractionFailure[];
}

function cleanText(value: string | undefined | null): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.replace(/\s+/g, ' ').trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseNumber(value: string | undefined): number | null {
  const text = cleanText(value);
  if (text === null) return null;

  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

function resolveUrl(href: string | undefined, baseUrl: string): string | null {
  const text = cleanText(href);
  if (text === null) return null;

  try {
    return new URL(text, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Turn one listing container into a Listing.
 * Throws ExtractionError when the identifier or the title is missing.
 */
export function extractListing(article: Cheerio<Element>, context: ExtractionContext): Listing {
  const listingId =
    cleanText(article.attr(listingAttributes.id)) ?? cleanText(article.attr(listingAttributes.fallbackId));
  if (!listingId) {
    throw new ExtractionError('Listing container has no identifier');
  }

  const titleLink = article.find(resultPageSelectors.titleLink).first();
  const title = cleanText(titleLink.text());
  if (!title) {
    throw new ExtractionError('Listing has no title', listingId);
  }

  const mileage = parseNumber(article.attr(listingAttributes.mileage));
  const now = context.now ?? new Date();

  return {
    listing_id: listingId,
    make: context.make,
    model: context.model,
    title,
    url: resolveUrl(titleLink.attr('href'), context.baseUrl),
    price: parseNumber(article.attr(listingAttributes.price)),
    mileage: mileage === null ? null : Math.round(mileage),
    fuel_type: convertFuelType(cleanText(article.attr(listingAttributes.fuelType))),
    first_registration: cleanText(article.attr(listingAttributes.firstRegistration)),
    power: formatPower(cleanText(article.find(resultPageSelectors.power).first().text())),
    transmission: convertTransmission(cleanText(article.find(resultPageSelectors.transmission).first().text())),
    seller_type: convertSellerType(cleanText(article.attr(listingAttributes.sellerType))),
    location: cleanText(article.find(resultPageSelectors.location).first().text()),
    scraped_date: now.toISOString(),
    scraped_timestamp: Math.floor(now.getTime() / 1000),
  };
}

/**
 * Extract every listing container of a result page.
 * A container that fails is logged and skipped; its siblings are still extracted.
 */
export function extractListings(page: string | CheerioAPI, context: ExtractionContext): PageExtraction {
  const $ = typeof page === 'string' ? cheerio.load(page) : page;
  const articles = $<Element, string>(resultPageSelectors.article).toArray();
  const listings: Listing[] = [];
  const failures: ExtractionFailure[] = [];

  articles.forEach((element, index) => {
    const article = $(element);
    try {
      listings.push(extractListing(article, context));
    } catch (error) {
      const listingId = error instanceof ExtractionError ? error.listingId : cleanText(article.attr(listingAttributes.id));
      const reason = errorMessage(error);

      logger.warn('Failed to extract listing', {
        index,
        listingId,
        reason,
        make: context.make,
        model: context.model,
      });
      failures.push({ index, listingId, reason });
    }
  });

  return {
    containers: articles.length,
    listings,
    failures,
  };
}
