/**
 * Core types for the CSE dividend announcements scraper
 */

/**
 * Sentinel used by the blog when the ex-dividend date is not yet known
 */
export const TBA = 'TBA';

/**
 * One dividend announcement recovered from a blog post.
 *
 * Dates keep the blog's `DD-Mon-YYYY` spelling (e.g. `05-Jun-2024`) and are only
 * set when they parse as real calendar dates.
 */
export interface AnnouncementRecord {
  readonly companyName?: string;
  readonly companyCode?: string;
  readonly postDate?: string;
  readonly announcementDate: string;
  /** `DD-Mon-YYYY`, or `TBA` when the blog has not announced it yet */
  readonly exDividendDate?: string;
  readonly financialYear?: string;
  readonly dividendRate?: string;
}

export interface CrawlResult {
  records: AnnouncementRecord[];
  pagesVisited: number;
  fetchErrors: number;
  reachedCutoff: boolean;
  cutoffYear: number;
}

export interface ScraperConfig {
  blogUrl: string;
  userAgent: string;
  rateLimitMs: number;
  timeoutMs: number;
  pagesPerYear: number;
}

export interface TableOptions {
  /** Cells longer than this are cut and end with an ellipsis. `null` keeps full width. */
  maxColumnWidth: number | null;
  /** Width of the `=` banner printed around the table */
  separatorWidth: number;
}
