import axios, { AxiosInstance } from 'axios';
import { FetchedPage } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { TransportError } from '../utils/errors.js';

export interface PageFetcher {
  fetchPage(url: string): Promise<FetchedPage>;
}

export interface PageClientOptions {
  timeoutMs?: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/**
 * Fetches result pages over plain HTTP.
 * One attempt per page with a fixed timeout; callers decide what a failure means.
 */
export class PageClient implements PageFetcher {
  private client: AxiosInstance;

  constructor(options: PageClientOptions = {}) {
    this.client = axios.create({
      timeout: options.timeoutMs ?? 15000,
      responseType: 'text',
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'de-DE,de;q=0.8,en-US;q=0.5,en;q=0.3',
        'Cache-Control': 'max-age=0',
      },
    });
  }

  async fetchPage(url: string): Promise<FetchedPage> {
    const startTime = Date.now();

    try {
      const response = await this.client.get<string>(url);
      const responseTimeMs = Date.now() - startTime;

      logger.debug('Page fetched', {
        url,
        status: response.status,
        responseTimeMs,
        htmlLength: response.data.length,
      });

      return { html: response.data, responseTimeMs };
    } catch (error) {
      throw this.toTransportError(error, url);
    }
  }

  private toTransportError(error: unknown, url: string): TransportError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const reason = status ? `HTTP ${status}` : error.code || error.message;
      return new TransportError(`Request failed: ${reason}`, url, status);
    }
    if (error instanceof Error) {
      return new TransportError(error.message, url);
    }
    return new TransportError(String(error), url);
  }
}
