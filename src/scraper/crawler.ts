/**
 * Announcement Crawler
 *
 * Walks the blog's "Older Posts" pagination from the newest page backwards,
 * collecting announcements until one older than the cutoff year shows up.
 * Posts are assumed to be in descending date order across pages.
 */

import type { CheerioAPI } from 'cheerio';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { parseAnnouncementDate } from '../utils/dates.js';
import { HttpPageFetcher } from './page-fetcher.js';
import { DEFAULT_POST_MATCHERS, findOlderPostsHref, locatePosts } from './post-locator.js';
import { extractPost } from './post-extractor.js';
import type { AnnouncementRecord, CrawlResult } from '../types/index.js';
import type { PageFetcher, PostMatcher } from './types.js';

const PROGRESS_EVERY_PAGES = 5;

export interface CrawlOptions {
  fetcher?: PageFetcher;
  matchers?: readonly PostMatcher[];
  /** Clock used for the cutoff year */
  now?: Date;
  /** Pause between page requests */
  delayMs?: number;
  pagesPerYear?: number;
}

/**
 * Crawl the blog starting at `startUrl`, keeping announcements from the last
 * `yearsBack` calendar years (cutoff = current year - yearsBack, inclusive).
 */
export async function crawlAnnouncements(
  startUrl: string,
  yearsBack: number,
  options: CrawlOptions = {}
): Promise<CrawlResult> {
  const {
    fetcher = new HttpPageFetcher(),
    matchers = DEFAULT_POST_MATCHERS,
    now = new Date(),
    delayMs = config.scraper.rateLimitMs,
    pagesPerYear = config.scraper.pagesPerYear,
  } = options;

  const cutoffYear = now.getFullYear() - yearsBack;
  const maxPages = yearsBack * pagesPerYear;
  const limiter = new RateLimiter(delayMs);

  const queue: string[] = [startUrl];
  const visited = new Set<string>();
  const records: AnnouncementRecord[] = [];
  let pagesVisited = 0;
  let fetchErrors = 0;
  let reachedCutoff = false;

  logger.info({ startUrl, yearsBack, cutoffYear, maxPages }, 'Starting announcement crawl');

  while (queue.length > 0 && pagesVisited < maxPages) {
    const url = queue.shift();
    if (url === undefined || visited.has(url)) {
      continue;
    }

    visited.add(url);
    pagesVisited++;

    let $: CheerioAPI;
    try {
      $ = await limiter.execute(() => fetcher.fetch(url));
    } catch (error) {
      fetchErrors++;
      logger.error({ error, url }, 'Error scraping page');
      continue;
    }

    const { posts, matcher } = locatePosts($, matchers);
    logger.debug({ url, count: posts.length, matcher }, 'Located posts');

    for (const element of posts) {
      const record = extractPost($(element));
      if (!record) {
        logger.debug({ url }, 'Skipping post without announcement fields');
        continue;
      }

      const announced = parseAnnouncementDate(record.announcementDate);
      if (!announced) {
        continue;
      }

      if (announced.getUTCFullYear() >= cutoffYear) {
        records.push(record);
      } else {
        // Everything after this post is older still
        logger.info(
          { url, announcementDate: record.announcementDate, cutoffYear },
          'Reached cutoff year'
        );
        reachedCutoff = true;
        queue.length = 0;
        break;
      }
    }

    // Still followed after a cutoff, so an older page can be queued again
    const href = findOlderPostsHref($);
    if (href) {
      const nextUrl = resolveUrl(href, url);
      if (nextUrl && !visited.has(nextUrl)) {
        queue.push(nextUrl);
      }
    }

    if (pagesVisited % PROGRESS_EVERY_PAGES === 0) {
      logger.info({ pagesVisited, found: records.length }, 'Crawl progress');
    }
  }

  if (pagesVisited >= maxPages && queue.length > 0) {
    logger.warn({ maxPages, pending: queue.length }, 'Page limit reached, stopping crawl');
  }

  logger.info(
    { pagesVisited, found: records.length, fetchErrors, reachedCutoff },
    'Crawl completed'
  );

  return { records, pagesVisited, fetchErrors, reachedCutoff, cutoffYear };
}

function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).toString();
  } catch (error) {
    logger.warn({ href, base, error }, 'Ignoring malformed pagination link');
    return null;
  }
}
