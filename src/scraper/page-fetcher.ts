/**
 * HTTP Page Fetcher
 *
 * Downloads a blog page with browser-like headers and parses it with cheerio
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { PageFetchError, type PageFetcher } from './types.js';
import type { ScraperConfig } from '../types/index.js';

export class HttpPageFetcher implements PageFetcher {
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(options: Partial<Pick<ScraperConfig, 'userAgent' | 'timeoutMs'>> = {}) {
    this.userAgent = options.userAgent ?? config.scraper.userAgent;
    this.timeoutMs = options.timeoutMs ?? config.scraper.timeoutMs;
  }

  async fetch(url: string): Promise<CheerioAPI> {
    logger.debug({ url }, 'Fetching page');

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PageFetchError(url, `Request failed: ${reason}`, { cause: error });
    }

    if (!response.ok) {
      throw new PageFetchError(url, `HTTP ${response.status}: ${response.statusText}`, {
        status: response.status,
      });
    }

    const html = await response.text();
    logger.debug({ url, bytes: html.length }, 'Page downloaded');

    return cheerio.load(html);
  }
}
