/**
 * Scraper Types
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

/**
 * Loads a page and hands back a queryable document
 */
export interface PageFetcher {
  /**
   * @throws PageFetchError when the page cannot be loaded
   */
  fetch(url: string): Promise<CheerioAPI>;
}

/**
 * One strategy for finding post containers on a list page
 */
export interface PostMatcher {
  name: string;
  match($: CheerioAPI): Cheerio<Element>;
}

/**
 * Raised when a page cannot be loaded, as opposed to a page that loads but has no posts
 */
export class PageFetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'PageFetchError';
    this.url = url;
    this.status = options.status;
  }
}
